import { AxiosInstance } from 'axios';
import { AppConfig } from './config';
import { AppDatabase } from './db/client';
import { AlertAggregator } from './services/alertAggregator';
import { createProximityAlert, createSafetyAlert } from './services/alerts';
import { Announcer } from './services/announcer';
import { createApiServer } from './services/apiServer';
import { AudioService, SpeechSynthesizer } from './services/audioService';
import { ConnectivityMonitor } from './services/connectivity';
import { CooldownTracker } from './services/cooldownTracker';
import { DataLogger } from './services/dataLogger';
import { DetectionProducer } from './services/detectionProducer';
import { DetectionSource } from './services/detectionSource';
import { describeError, isAbortError } from './services/errors';
import { GeminiService } from './services/geminiService';
import { createLogger } from './services/logger';
import { classifyDetection } from './services/proximityClassifier';
import { QueryService } from './services/queryService';
import { SafetyEventMonitor } from './services/safetyMonitor';
import { SensorPoller } from './services/sensorPoller';
import { SpeechRecognizer, VoiceCommandService } from './services/voiceCommandService';
import { DetectionEvent, ProximityEvent, ProximityZone, SafetyEventType, VoiceCommandOutcome } from './types';

const log = createLogger('App');

const WELCOME_MESSAGE = 'Vision assistant ready.';

export interface AppDeps {
  config: AppConfig;
  db: AppDatabase;
  synthesizer: SpeechSynthesizer;
  relevantClasses: Set<string>;
  detectionSource?: DetectionSource | null;
  sensorClient?: AxiosInstance;
  gemini?: GeminiService | null;
  recognizer?: SpeechRecognizer | null;
  now?: () => number;
}

export interface IngestResult {
  classified: ProximityEvent[];
  announced: ProximityEvent[];
}

/**
 * Composition root: owns every shared resource and wires producers to the
 * aggregator, the aggregator to the announcer and persistence, and the
 * dashboard to the read models.
 */
export class VisionAssistApp {
  readonly monitor: SafetyEventMonitor;
  readonly cooldown: CooldownTracker;
  readonly aggregator: AlertAggregator;
  readonly audio: AudioService;
  readonly announcer: Announcer;
  readonly connectivity: ConnectivityMonitor;
  readonly dataLogger: DataLogger;
  readonly sensorPoller: SensorPoller;
  readonly detectionProducer: DetectionProducer | null;
  readonly voice: VoiceCommandService;
  readonly query: QueryService;

  private latestObjects: ProximityEvent[] = [];
  private voiceController: AbortController | null = null;
  private interactionId = 0;
  private started = false;
  private stopped = false;
  private readonly now: () => number;

  constructor(deps: AppDeps) {
    const { config } = deps;
    this.now = deps.now ?? Date.now;

    this.monitor = new SafetyEventMonitor(this.now);
    this.cooldown = new CooldownTracker({ windowMs: config.alertCooldownMs, escalation: config.escalationPolicy });
    this.aggregator = new AlertAggregator({
      capacity: config.alertQueueCapacity,
      staleAfterMs: config.staleAlertMs,
      now: this.now
    });
    this.audio = new AudioService(deps.synthesizer);
    this.announcer = new Announcer(this.aggregator, this.audio);
    this.connectivity = new ConnectivityMonitor(this.now);
    this.dataLogger = new DataLogger(deps.db, this.now);

    this.sensorPoller = new SensorPoller(this.monitor, this.connectivity, {
      baseUrl: config.sensorHubUrl,
      timeoutMs: config.pollTimeoutMs,
      maxBackoffMs: config.maxBackoffMs,
      intervals: config.pollIntervals,
      client: deps.sensorClient
    });

    this.detectionProducer = deps.detectionSource
      ? new DetectionProducer({
          source: deps.detectionSource,
          relevantClasses: deps.relevantClasses,
          connectivity: this.connectivity,
          onDetections: (events) => {
            this.ingest(events);
          },
          intervalMs: config.inferenceIntervalMs,
          maxBackoffMs: config.maxBackoffMs,
          now: this.now
        })
      : null;

    this.voice = new VoiceCommandService({
      audio: this.audio,
      monitor: this.monitor,
      gemini: deps.gemini ?? null,
      recognizer: deps.recognizer ?? null,
      context: {
        latestObjects: () => [...this.latestObjects],
        lastAnnouncement: () => this.announcer.lastAnnouncement?.message ?? null,
        isConnectivityDegraded: () => this.connectivity.isDegraded(),
        recordVoiceCommand: (command, response) => {
          this.dataLogger.logVoiceCommand(command, response);
        },
        recordSceneSummary: (summary, objectCount) => {
          this.dataLogger.logSceneSummary(summary, objectCount);
        }
      }
    });

    this.query = new QueryService({
      dataLogger: this.dataLogger,
      monitor: this.monitor,
      connectivity: this.connectivity,
      environment: () => this.sensorPoller.latestEnvironment,
      now: this.now
    });

    // Every published alert is persisted, spoken or not.
    this.aggregator.subscribe((alert) => {
      this.dataLogger.recordAlert(alert);
    });

    // A refresh is the same incident; only new raises and acknowledgements are announced.
    this.monitor.onTransition((transition) => {
      if (transition.kind === 'refreshed') return;
      this.aggregator.publish(createSafetyAlert(transition));
    });
  }

  get isRunning(): boolean {
    return this.started;
  }

  /** One detection cycle through classifier, cooldown and aggregator. */
  ingest(detections: DetectionEvent[]): IngestResult {
    const classified: ProximityEvent[] = [];
    const announced: ProximityEvent[] = [];

    for (const detection of detections) {
      const event = classifyDetection(detection);
      if (!event) {
        log.debug(`Skipping unclassifiable detection: ${detection.objectType}`);
        continue;
      }
      classified.push(event);

      // Far objects are recorded but never consume a cooldown window.
      if (event.zone === ProximityZone.FAR) {
        this.dataLogger.recordDetection(event, false);
        continue;
      }

      const admitted = this.cooldown.admit(event);
      this.dataLogger.recordDetection(event, admitted);
      if (admitted) {
        this.aggregator.publish(createProximityAlert(event));
        announced.push(event);
      }
    }

    this.latestObjects = classified;
    this.cooldown.prune(this.now());
    return { classified, announced };
  }

  acknowledge(type: SafetyEventType): { changed: boolean } {
    const transition = this.monitor.acknowledge(type);
    // The hub keeps its own flag; clearing it is best effort and never blocks the response.
    void this.sensorPoller.acknowledgeRemote(type);
    return { changed: transition !== null };
  }

  createHttpApp() {
    return createApiServer({
      query: this.query,
      acknowledge: (type) => this.acknowledge(type),
      now: this.now
    });
  }

  /** The aggregator closes on stop(), so an app instance runs once. */
  start(options: { pollers?: boolean } = {}): void {
    if (this.started || this.stopped) return;
    this.started = true;

    this.dataLogger.recoverOpenSessions();
    this.dataLogger.startSession();
    this.announcer.start();
    if (options.pollers !== false) {
      this.sensorPoller.start();
      this.detectionProducer?.start();
    }
    void this.audio.speak(WELCOME_MESSAGE, true);
    log.info('Started');
  }

  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;
    this.stopped = true;

    this.voiceController?.abort();
    await Promise.all([this.detectionProducer?.stop(), this.sensorPoller.stop()]);
    await this.announcer.stop();
    this.aggregator.close();
    this.dataLogger.endSession();
    log.info('Stopped');
  }

  /** Keyboard "s": closes the open session, or opens a new one. Null unless a session was opened. */
  toggleSession(): number | null {
    if (this.dataLogger.currentSessionId() !== null) {
      this.dataLogger.endSession();
      return null;
    }
    return this.dataLogger.startSession();
  }

  /** Starts a voice interaction, interrupting any that is still listening or thinking. */
  async voiceCommand(transcript?: string): Promise<VoiceCommandOutcome | null> {
    const signal = this.beginInteraction();
    const id = this.interactionId;
    try {
      return transcript === undefined
        ? await this.voice.listenAndRespond(signal)
        : await this.voice.handleTranscript(transcript, signal);
    } catch (error) {
      if (isAbortError(error)) {
        log.debug(`Voice interaction ${id} interrupted`);
        return null;
      }
      log.error(`Voice command failed: ${describeError(error)}`);
      await this.audio.speak('Sorry, something went wrong.', true);
      return null;
    } finally {
      this.endInteraction(id);
    }
  }

  async describeScene(): Promise<string | null> {
    const signal = this.beginInteraction();
    const id = this.interactionId;
    try {
      return await this.voice.describeScene(signal);
    } catch (error) {
      if (isAbortError(error)) return null;
      log.error(`Scene description failed: ${describeError(error)}`);
      return null;
    } finally {
      this.endInteraction(id);
    }
  }

  private beginInteraction(): AbortSignal {
    this.voiceController?.abort();
    this.voiceController = new AbortController();
    this.interactionId += 1;
    return this.voiceController.signal;
  }

  private endInteraction(id: number) {
    if (id === this.interactionId) this.voiceController = null;
  }
}
