import { GoogleGenAI, Type, Schema, GenerateContentParameters } from "@google/genai";
import { AssistanceSubtype, IntentResult, IntentType, ProximityEvent } from "../types";
import { AbortedError, describeError } from "./errors";
import { createLogger } from "./logger";
import { summarizeScene } from "./sceneSummary";

const log = createLogger("Gemini");
const modelName = 'gemini-2.5-flash';

export interface ContentGenerator {
  generateContent(params: GenerateContentParameters): Promise<{ text?: string }>;
}

const statusOf = (error: unknown): number | undefined => {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
};

const isIntentType = (value: unknown): value is IntentType =>
  typeof value === 'string' && Object.values(IntentType).some((type) => type === value);

const isAssistanceSubtype = (value: unknown): value is AssistanceSubtype =>
  typeof value === 'string' && Object.values(AssistanceSubtype).some((subtype) => subtype === value);

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

// Keyword classifier used when the model is unreachable or rate limited
export const simpleIntentParser = (text: string): IntentResult | null => {
  const t = text.toLowerCase();

  // Emergency first: "help" on its own is urgent
  if (t.includes('emergency') || t.includes('call 911') || t.includes('sos') || /\bhelp me\b/.test(t)) {
    return { type: IntentType.EMERGENCY, confidence: 0.9, originalQuery: text };
  }

  // Assistance requests (joystick equivalents)
  if (t.includes('bathroom') || t.includes('toilet') || t.includes('restroom')) {
    return { type: IntentType.REQUEST_ASSISTANCE, confidence: 0.9, originalQuery: text, assistanceType: AssistanceSubtype.BATHROOM };
  }
  if (t.includes('water') || t.includes('food') || t.includes('hungry') || t.includes('thirsty')) {
    return { type: IntentType.REQUEST_ASSISTANCE, confidence: 0.9, originalQuery: text, assistanceType: AssistanceSubtype.FOOD_WATER };
  }
  if (t.includes('medication') || t.includes('medicine') || t.includes('pills')) {
    return { type: IntentType.REQUEST_ASSISTANCE, confidence: 0.9, originalQuery: text, assistanceType: AssistanceSubtype.MEDICATION };
  }
  if (t.includes('need help') || t.includes('assistance') || t.includes('caregiver')) {
    return { type: IntentType.REQUEST_ASSISTANCE, confidence: 0.8, originalQuery: text, assistanceType: AssistanceSubtype.GENERAL };
  }

  if (t.includes('repeat') || t.includes('say that again') || t.includes('what did you say')) {
    return { type: IntentType.REPEAT, confidence: 0.9, originalQuery: text };
  }

  // Safety
  if (t.includes('safe') || t.includes('danger') || t.includes('clear') || t.includes('watch out')) {
    return { type: IntentType.SAFETY_CHECK, confidence: 0.9, originalQuery: text };
  }

  if (t.includes('status') || t.includes('alerts') || t.includes('connected')) {
    return { type: IntentType.STATUS, confidence: 0.8, originalQuery: text };
  }

  if (t.includes('describe') || t.includes('around me') || t.includes('what do you see') || t.includes('in front')) {
    return { type: IntentType.DESCRIBE, confidence: 0.9, originalQuery: text };
  }

  return null;
};

const RETRY_BASE_MS = 1000;
const TRANSIENT_STATUSES = new Set([429, 500, 503]);

const isTransient = (error: unknown): boolean => {
  const status = statusOf(error);
  if (status !== undefined && TRANSIENT_STATUSES.has(status)) return true;
  const message = describeError(error);
  return message.includes('quota') || message.includes('Overloaded');
};

/**
 * Gemini-backed language services for the voice command task.
 * Every call degrades to a local answer so a quota or network failure never silences the user.
 */
export class GeminiService {
  constructor(private readonly models: ContentGenerator, private readonly retryCount = 3) {}

  /** Retries quota and overload failures, doubling the wait each time. Other errors surface at once. */
  private async generateContentWithRetry(params: GenerateContentParameters): Promise<{ text?: string }> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.models.generateContent(params);
      } catch (error) {
        if (!isTransient(error) || attempt >= this.retryCount) throw error;
        const wait = RETRY_BASE_MS * 2 ** (attempt - 1);
        log.warn(`Request failed (${statusOf(error) ?? 'unknown'}), retry ${attempt} in ${wait}ms`);
        await sleep(wait);
      }
    }
  }

  // 1. Natural Language Understanding (NLU)
  async classifyIntent(transcript: string, signal?: AbortSignal): Promise<IntentResult> {
    if (!transcript || transcript.trim().length === 0) {
      return { type: IntentType.UNKNOWN, confidence: 0, originalQuery: '' };
    }

    if (signal?.aborted) throw new AbortedError();

    const prompt = `
      Classify the voice command of a vision-impaired user wearing an assistive camera.

      - DESCRIBE: "What's around me?", "Describe the scene".
      - SAFETY_CHECK: "Is it safe to walk?", "Is the path clear?".
      - STATUS: "Any alerts?", "Are you connected?".
      - REQUEST_ASSISTANCE: "I need the bathroom", "Can I get some water?", "I need my medication". Set assistanceType.
      - EMERGENCY: "Help me", "Call for help", "Emergency".
      - REPEAT: "Say that again", "What did you say?".
      - UNKNOWN: anything else.

      User said: "${transcript}"
    `;

    const schema: Schema = {
      type: Type.OBJECT,
      properties: {
        intent: { type: Type.STRING, enum: Object.values(IntentType) },
        assistanceType: { type: Type.STRING, enum: Object.values(AssistanceSubtype) },
      },
      required: ['intent'],
    };

    try {
      const result = await this.generateContentWithRetry({
        model: modelName,
        contents: prompt,
        config: {
          responseMimeType: "application/json",
          responseSchema: schema,
          temperature: 0.1,
        }
      });

      if (signal?.aborted) throw new AbortedError();

      const json: unknown = JSON.parse(result.text || "{}");
      const intent = typeof json === 'object' && json !== null && 'intent' in json ? json.intent : undefined;
      if (!isIntentType(intent)) throw new Error(`Unexpected intent: ${String(intent)}`);

      const assistanceType = typeof json === 'object' && json !== null && 'assistanceType' in json ? json.assistanceType : undefined;
      const parsed: IntentResult = { type: intent, confidence: 1, originalQuery: transcript };
      if (intent === IntentType.REQUEST_ASSISTANCE) {
        parsed.assistanceType = isAssistanceSubtype(assistanceType) ? assistanceType : AssistanceSubtype.GENERAL;
      }
      return parsed;

    } catch (error) {
      if (signal?.aborted || error instanceof AbortedError) throw new AbortedError();
      log.warn("Intent classification failed:", describeError(error));

      const fallback = simpleIntentParser(transcript);
      if (fallback) {
        log.info(`Using keyword intent for: ${transcript}`);
        return fallback;
      }

      return { type: IntentType.UNKNOWN, confidence: 0.5, originalQuery: transcript };
    }
  }

  // 2. Scene Description from the latest detection cycle
  async describeScene(objects: ProximityEvent[], signal?: AbortSignal): Promise<string> {
    const local = summarizeScene(objects);
    if (objects.length === 0) return local;
    if (signal?.aborted) throw new AbortedError();

    const listing = objects
      .map((o) => `${o.objectType} (${o.direction}, ${o.zone})`)
      .join('; ');

    try {
      const response = await this.generateContentWithRetry({
        model: modelName,
        contents: `Objects detected by the camera: ${listing}. Describe the scene in 1-2 short, calm sentences for a blind pedestrian. Mention the closest objects first.`,
        config: {
          systemInstruction: "You are a concise walking assistant. Never invent objects that are not listed.",
          temperature: 0.3,
          maxOutputTokens: 120,
        }
      });
      if (signal?.aborted) throw new AbortedError();
      return response.text?.trim() || local;
    } catch (error) {
      if (signal?.aborted || error instanceof AbortedError) throw new AbortedError();
      log.warn("Scene description failed, using local summary:", describeError(error));
      return local;
    }
  }

  // 3. Speech-to-text for a recorded clip
  async transcribe(audio: Buffer, signal?: AbortSignal): Promise<string> {
    if (signal?.aborted) throw new AbortedError();

    const response = await this.generateContentWithRetry({
      model: modelName,
      contents: {
        parts: [
          { inlineData: { mimeType: 'audio/wav', data: audio.toString('base64') } },
          { text: 'Transcribe the spoken words exactly. Return only the transcript, or an empty string if nothing was said.' }
        ]
      },
      config: { temperature: 0 }
    });

    if (signal?.aborted) throw new AbortedError();
    return (response.text ?? '').trim();
  }
}

export const createGeminiService = (apiKey: string | null): GeminiService | null => {
  if (!apiKey) return null;
  const ai = new GoogleGenAI({ apiKey });
  return new GeminiService(ai.models);
};
