import { readFileSync } from 'node:fs';
import axios, { AxiosInstance } from 'axios';
import { DetectionEvent } from '../types';
import { ConnectivityError, describeError, StartupError } from './errors';
import { frameRelativeSize } from './proximityClassifier';

export interface RawDetection {
  name: string;
  confidence: number;
  bbox: [number, number, number, number]; // x1, y1, x2, y2 in pixels
}

export interface DetectionFrame {
  frame_width: number;
  frame_height: number;
  detections: RawDetection[];
}

export interface DetectionSource {
  detect(signal?: AbortSignal): Promise<DetectionFrame>;
}

const isFiniteNumber = (value: unknown): value is number => typeof value === 'number' && Number.isFinite(value);

const isBox = (value: unknown): value is RawDetection['bbox'] =>
  Array.isArray(value) && value.length === 4 && value.every(isFiniteNumber);

const isRawDetection = (value: unknown): value is RawDetection =>
  typeof value === 'object' &&
  value !== null &&
  'name' in value &&
  typeof value.name === 'string' &&
  'confidence' in value &&
  isFiniteNumber(value.confidence) &&
  'bbox' in value &&
  isBox(value.bbox);

export const isDetectionFrame = (value: unknown): value is DetectionFrame =>
  typeof value === 'object' &&
  value !== null &&
  'frame_width' in value &&
  isFiniteNumber(value.frame_width) &&
  'frame_height' in value &&
  isFiniteNumber(value.frame_height) &&
  'detections' in value &&
  Array.isArray(value.detections) &&
  value.detections.every(isRawDetection);

/** Object detector sidecar: GET returns the labelled boxes of the latest camera frame. */
export class HttpDetectionSource implements DetectionSource {
  private readonly client: AxiosInstance;

  constructor(url: string, timeoutMs = 2000, client?: AxiosInstance) {
    this.client = client ?? axios.create({ baseURL: url, timeout: timeoutMs });
  }

  async detect(signal?: AbortSignal): Promise<DetectionFrame> {
    let data: unknown;
    try {
      const response = await this.client.get<unknown>('', { signal });
      data = response.data;
    } catch (error) {
      if (signal?.aborted) throw error;
      throw new ConnectivityError(`Detector unreachable: ${describeError(error)}`, 'video', { cause: error });
    }
    if (!isDetectionFrame(data)) throw new ConnectivityError('Detector returned a malformed frame', 'video');
    return data;
  }
}

export const parseRelevantClasses = (text: string): Set<string> =>
  new Set(
    text
      .split(/\r?\n/)
      .map((line) => line.trim().toLowerCase())
      .filter((line) => line.length > 0 && !line.startsWith('#'))
  );

export function loadRelevantClasses(path: string): Set<string> {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (error) {
    throw new StartupError(`Relevant class list not found at ${path}`, { cause: error });
  }
  const classes = parseRelevantClasses(text);
  if (classes.size === 0) throw new StartupError(`Relevant class list at ${path} is empty`);
  return classes;
}

export function toDetectionEvents(frame: DetectionFrame, relevant: Set<string>, now: number): DetectionEvent[] {
  const events: DetectionEvent[] = [];
  for (const detection of frame.detections) {
    const objectType = detection.name.trim().toLowerCase();
    if (!relevant.has(objectType)) continue;

    const [x1, y1, x2, y2] = detection.bbox;
    const bbox = { x1, y1, x2, y2 };
    events.push({
      objectType,
      size: frameRelativeSize(bbox, frame.frame_width, frame.frame_height),
      xCenter: (x1 + x2) / 2,
      frameWidth: frame.frame_width,
      timestamp: now,
      confidence: detection.confidence,
      bbox
    });
  }
  return events;
}
