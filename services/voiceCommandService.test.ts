import { describe, expect, it } from 'vitest';
import { AssistanceSubtype, IntentType, ProximityEvent, ProximityZone, SafetyEventType, SafetyState } from '../types';
import { AudioService } from './audioService';
import { AbortedError } from './errors';
import { GeminiService } from './geminiService';
import { SafetyEventMonitor } from './safetyMonitor';
import {
  NOT_HEARD_RESPONSE,
  safetyCheckResponse,
  SpeechRecognizer,
  statusResponse,
  UNKNOWN_RESPONSE,
  VoiceCommandService
} from './voiceCommandService';

const person: ProximityEvent = {
  objectType: 'person',
  direction: 'ahead',
  zone: ProximityZone.CRITICAL,
  size: 0.7,
  timestamp: 0
};

const setup = (options: { objects?: ProximityEvent[]; recognizer?: SpeechRecognizer; gemini?: GeminiService } = {}) => {
  const spoken: string[] = [];
  const commands: Array<[string, string]> = [];
  const scenes: Array<[string, number]> = [];
  const monitor = new SafetyEventMonitor(() => 1000);
  const service = new VoiceCommandService({
    audio: new AudioService({ synthesize: async (text) => void spoken.push(text) }),
    monitor,
    gemini: options.gemini ?? null,
    recognizer: options.recognizer ?? null,
    context: {
      latestObjects: () => options.objects ?? [],
      lastAnnouncement: () => 'person ahead, critical',
      isConnectivityDegraded: () => false,
      recordVoiceCommand: (command, response) => commands.push([command, response]),
      recordSceneSummary: (summary, count) => scenes.push([summary, count])
    }
  });
  return { service, monitor, spoken, commands, scenes };
};

describe('safetyCheckResponse', () => {
  it('warns about the closest object', () => {
    expect(safetyCheckResponse([person])).toBe('Not safe. person ahead is very close.');
    expect(safetyCheckResponse([{ ...person, zone: ProximityZone.WARNING, direction: 'left' }])).toBe(
      'Caution. person to the left is getting close.'
    );
    expect(safetyCheckResponse([{ ...person, zone: ProximityZone.FAR }])).toBe('The path looks clear.');
    expect(safetyCheckResponse([])).toBe('The path looks clear.');
  });
});

describe('statusResponse', () => {
  it('lists active safety events and sensor health', () => {
    expect(statusResponse([], false)).toBe('No active safety alerts. All sensors connected.');
    expect(statusResponse([SafetyEventType.FALL], true)).toBe('Active alerts: fall. Sensor connection is degraded.');
  });
});

describe('VoiceCommandService', () => {
  it('answers a safety check with priority speech and logs it', async () => {
    const { service, spoken, commands } = setup({ objects: [person] });
    const outcome = await service.handleTranscript('is it safe to walk');

    expect(outcome.intent.type).toBe(IntentType.SAFETY_CHECK);
    expect(spoken).toEqual(['Not safe. person ahead is very close.']);
    expect(commands).toEqual([['is it safe to walk', 'Not safe. person ahead is very close.']]);
  });

  it('raises an assistance request with its subtype', async () => {
    const { service, monitor } = setup();
    const outcome = await service.handleTranscript('I need the bathroom');

    expect(outcome.response).toBe('Requesting the bathroom. Your caregiver has been notified.');
    expect(monitor.status(SafetyEventType.ASSISTANCE)).toMatchObject({
      state: SafetyState.ACTIVE,
      subtype: AssistanceSubtype.BATHROOM
    });
  });

  it('raises an emergency', async () => {
    const { service, monitor } = setup();
    await service.handleTranscript('emergency');
    expect(monitor.isActive(SafetyEventType.EMERGENCY)).toBe(true);
  });

  it('repeats the last announcement', async () => {
    const { service } = setup();
    expect((await service.handleTranscript('repeat that')).response).toBe('person ahead, critical');
  });

  it('describes the scene and records the summary', async () => {
    const { service, scenes } = setup({ objects: [person] });
    const outcome = await service.handleTranscript('describe the scene');
    expect(outcome.response).toBe('I see a person ahead. Closest: person ahead.');
    expect(scenes).toEqual([['I see a person ahead. Closest: person ahead.', 1]]);
  });

  it('falls back to a help prompt for unknown requests', async () => {
    const { service } = setup();
    expect((await service.handleTranscript('play some music')).response).toBe(UNKNOWN_RESPONSE);
  });

  it('stops without speaking when aborted', async () => {
    const { service, spoken, commands } = setup();
    const controller = new AbortController();
    controller.abort();

    await expect(service.handleTranscript('is it safe', controller.signal)).rejects.toBeInstanceOf(AbortedError);
    expect(spoken).toEqual([]);
    expect(commands).toEqual([]);
  });

  it('listens through the recognizer', async () => {
    const { service, spoken } = setup({ recognizer: { listen: async () => 'any alerts' } });
    const outcome = await service.listenAndRespond();
    expect(outcome.intent.type).toBe(IntentType.STATUS);
    expect(spoken).toEqual(['No active safety alerts. All sensors connected.']);
  });

  it('asks again when nothing was heard', async () => {
    const { service, spoken, commands } = setup({ recognizer: { listen: async () => '' } });
    await service.listenAndRespond();
    expect(spoken).toEqual([NOT_HEARD_RESPONSE]);
    expect(commands).toEqual([]);
  });

  it('speaks and records an on-demand scene description', async () => {
    const { service, spoken, scenes } = setup();
    expect(await service.describeScene()).toBe("I don't see anything nearby.");
    expect(spoken).toEqual(["I don't see anything nearby."]);
    expect(scenes).toEqual([["I don't see anything nearby.", 0]]);
  });
});
