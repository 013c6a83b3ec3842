import {
  AssistanceSubtype,
  IntentResult,
  IntentType,
  ProximityEvent,
  ProximityZone,
  SafetyEventType,
  VoiceCommandOutcome
} from '../types';
import { assistancePhrase } from './alerts';
import { AudioRecorder, AudioService } from './audioService';
import { AbortedError } from './errors';
import { GeminiService, simpleIntentParser } from './geminiService';
import { createLogger } from './logger';
import { directionPhrase, zoneRank } from './proximityClassifier';
import { SafetyEventMonitor } from './safetyMonitor';
import { summarizeScene } from './sceneSummary';

const log = createLogger('Voice');

export interface SpeechRecognizer {
  listen(signal?: AbortSignal): Promise<string>;
}

/** Records a fixed-length clip and asks Gemini for the transcript. */
export class GeminiSpeechRecognizer implements SpeechRecognizer {
  constructor(
    private readonly recorder: AudioRecorder,
    private readonly gemini: GeminiService,
    private readonly seconds = 5
  ) {}

  async listen(signal?: AbortSignal): Promise<string> {
    const clip = await this.recorder.record(this.seconds, signal);
    return this.gemini.transcribe(clip, signal);
  }
}

/** Narrow view of the rest of the system that voice responses are built from. */
export interface VoiceContext {
  latestObjects(): ProximityEvent[];
  lastAnnouncement(): string | null;
  isConnectivityDegraded(): boolean;
  recordVoiceCommand(command: string, response: string): void;
  recordSceneSummary(summary: string, objectCount: number): void;
}

export interface VoiceCommandDeps {
  audio: AudioService;
  monitor: SafetyEventMonitor;
  context: VoiceContext;
  gemini?: GeminiService | null;
  recognizer?: SpeechRecognizer | null;
}

export const NOT_HEARD_RESPONSE = "I didn't catch that. Please try again.";
export const UNKNOWN_RESPONSE =
  "Sorry, I didn't understand. You can ask what is around you, whether it is safe, or ask for assistance.";

const closestFirst = (objects: ProximityEvent[]) =>
  [...objects].sort((a, b) => zoneRank(b.zone) - zoneRank(a.zone) || b.size - a.size);

export function safetyCheckResponse(objects: ProximityEvent[]): string {
  const [closest] = closestFirst(objects);
  if (closest?.zone === ProximityZone.CRITICAL) {
    return `Not safe. ${closest.objectType} ${directionPhrase(closest.direction)} is very close.`;
  }
  if (closest?.zone === ProximityZone.WARNING) {
    return `Caution. ${closest.objectType} ${directionPhrase(closest.direction)} is getting close.`;
  }
  return 'The path looks clear.';
}

export function statusResponse(activeTypes: SafetyEventType[], degraded: boolean): string {
  const alerts = activeTypes.length === 0 ? 'No active safety alerts.' : `Active alerts: ${activeTypes.join(', ')}.`;
  const sensors = degraded ? 'Sensor connection is degraded.' : 'All sensors connected.';
  return `${alerts} ${sensors}`;
}

/**
 * On-demand voice task: listen, classify, answer immediately.
 * Answers go out as priority speech, so they follow the current utterance and
 * overtake any queued proximity alerts.
 */
export class VoiceCommandService {
  constructor(private readonly deps: VoiceCommandDeps) {}

  async listenAndRespond(signal?: AbortSignal): Promise<VoiceCommandOutcome> {
    const { recognizer, audio } = this.deps;
    if (!recognizer) {
      const response = 'Voice commands are unavailable.';
      await audio.speak(response, true);
      return { intent: { type: IntentType.UNKNOWN, confidence: 0, originalQuery: '' }, response };
    }

    const transcript = await recognizer.listen(signal);
    if (signal?.aborted) throw new AbortedError();

    if (!transcript.trim()) {
      await audio.speak(NOT_HEARD_RESPONSE, true);
      return { intent: { type: IntentType.UNKNOWN, confidence: 0, originalQuery: '' }, response: NOT_HEARD_RESPONSE };
    }
    return this.handleTranscript(transcript, signal);
  }

  async handleTranscript(transcript: string, signal?: AbortSignal): Promise<VoiceCommandOutcome> {
    log.info(`Heard: "${transcript}"`);
    const intent = await this.classify(transcript, signal);
    const response = await this.respond(intent, signal);

    // Cancellation point: nothing is spoken or logged once the task was aborted.
    if (signal?.aborted) throw new AbortedError();

    this.deps.context.recordVoiceCommand(transcript, response);
    await this.deps.audio.speak(response, true);
    return { intent, response };
  }

  async describeScene(signal?: AbortSignal): Promise<string> {
    const { context, gemini, audio } = this.deps;
    const objects = context.latestObjects();
    const summary = gemini ? await gemini.describeScene(objects, signal) : summarizeScene(objects);
    if (signal?.aborted) throw new AbortedError();

    context.recordSceneSummary(summary, objects.length);
    await audio.speak(summary, true);
    return summary;
  }

  private async classify(transcript: string, signal?: AbortSignal): Promise<IntentResult> {
    if (this.deps.gemini) return this.deps.gemini.classifyIntent(transcript, signal);
    return simpleIntentParser(transcript) ?? { type: IntentType.UNKNOWN, confidence: 0.5, originalQuery: transcript };
  }

  private async respond(intent: IntentResult, signal?: AbortSignal): Promise<string> {
    const { context, monitor, gemini } = this.deps;

    switch (intent.type) {
      case IntentType.DESCRIBE: {
        const objects = context.latestObjects();
        const summary = gemini ? await gemini.describeScene(objects, signal) : summarizeScene(objects);
        if (!signal?.aborted) context.recordSceneSummary(summary, objects.length);
        return summary;
      }
      case IntentType.SAFETY_CHECK:
        return safetyCheckResponse(context.latestObjects());
      case IntentType.STATUS:
        return statusResponse(monitor.activeTypes(), context.isConnectivityDegraded());
      case IntentType.REQUEST_ASSISTANCE: {
        const subtype = intent.assistanceType ?? AssistanceSubtype.GENERAL;
        if (signal?.aborted) throw new AbortedError();
        monitor.raise(SafetyEventType.ASSISTANCE, { subtype });
        return `Requesting ${assistancePhrase(subtype)}. Your caregiver has been notified.`;
      }
      case IntentType.EMERGENCY:
        if (signal?.aborted) throw new AbortedError();
        monitor.raise(SafetyEventType.EMERGENCY);
        return 'Calling for help now. Stay where you are.';
      case IntentType.REPEAT:
        return context.lastAnnouncement() ?? 'There is nothing to repeat yet.';
      case IntentType.UNKNOWN:
        return UNKNOWN_RESPONSE;
    }
  }
}
