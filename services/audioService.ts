import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { createLogger } from './logger';

const execFileAsync = promisify(execFile);
const log = createLogger('Audio');

export interface SpeechSynthesizer {
  synthesize(text: string): Promise<void>;
}

export interface AudioRecorder {
  record(seconds: number, signal?: AbortSignal): Promise<Buffer>;
}

const defaultSpeechCommand = () => (process.platform === 'darwin' ? 'say' : 'espeak');

// Speaks through the host TTS binary (espeak on the Pi/Linux, say on macOS).
export class SystemSpeechSynthesizer implements SpeechSynthesizer {
  constructor(
    private readonly command: string = defaultSpeechCommand(),
    private readonly wordsPerMinute = 165
  ) {}

  async synthesize(text: string): Promise<void> {
    const rateFlag = this.command === 'say' ? '-r' : '-s';
    await execFileAsync(this.command, [rateFlag, String(this.wordsPerMinute), text]);
  }
}

// Captures a mono 16 kHz WAV clip from the default microphone via ALSA.
export class ArecordRecorder implements AudioRecorder {
  async record(seconds: number, signal?: AbortSignal): Promise<Buffer> {
    const { stdout } = await execFileAsync(
      'arecord',
      ['-q', '-d', String(seconds), '-f', 'S16_LE', '-r', '16000', '-c', '1', '-t', 'wav', '-'],
      { encoding: 'buffer', maxBuffer: 16 * 1024 * 1024, signal }
    );
    return stdout;
  }
}

interface PendingUtterance {
  text: string;
  priority: boolean;
  resolve: () => void;
}

// AudioService serializes every utterance: nothing overlaps and nothing is cut off mid-sentence.
export class AudioService {
  public isSpeaking: boolean = false;
  private readonly lane: PendingUtterance[] = [];
  private readonly idleWaiters = new Set<() => void>();

  constructor(private readonly synthesizer: SpeechSynthesizer) {}

  /**
   * Resolves once the utterance has been spoken (or skipped after a synthesis error).
   * Priority utterances wait for the current one, then go ahead of everything queued.
   */
  speak(text: string, priority: boolean = false): Promise<void> {
    const cleanText = text.replace(/<[^>]*>/g, '').trim();
    if (!cleanText) return Promise.resolve();

    return new Promise((resolve) => {
      const utterance: PendingUtterance = { text: cleanText, priority, resolve };
      if (priority) {
        const firstNormal = this.lane.findIndex((pending) => !pending.priority);
        if (firstNormal === -1) this.lane.push(utterance);
        else this.lane.splice(firstNormal, 0, utterance);
      } else {
        this.lane.push(utterance);
      }
      this.pump();
    });
  }

  get pendingCount(): number {
    return this.lane.length;
  }

  get idle(): boolean {
    return !this.isSpeaking && this.lane.length === 0;
  }

  /** Resolves once nothing is speaking or queued, or when the signal aborts. */
  whenIdle(signal?: AbortSignal): Promise<void> {
    if (this.idle || signal?.aborted) return Promise.resolve();
    return new Promise((resolve) => {
      const done = () => {
        this.idleWaiters.delete(done);
        signal?.removeEventListener('abort', done);
        resolve();
      };
      this.idleWaiters.add(done);
      signal?.addEventListener('abort', done, { once: true });
    });
  }

  private pump() {
    if (this.isSpeaking) return;
    const next = this.lane.shift();
    if (!next) {
      [...this.idleWaiters].forEach((notify) => notify());
      return;
    }

    this.isSpeaking = true;
    log.debug(`Speaking: ${next.text}`);
    void this.synthesizer
      .synthesize(next.text)
      .catch((error: unknown) => {
        // Even on error, resolve so the chain continues
        log.warn('Speech synthesis failed, skipping utterance', error);
      })
      .finally(() => {
        this.isSpeaking = false;
        next.resolve();
        this.pump();
      });
  }
}
