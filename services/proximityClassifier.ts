import { BoundingBox, DetectionEvent, Direction, ProximityEvent, ProximityZone } from '../types';

// Zone is a bounding-box size heuristic, not a depth estimate.
export const CRITICAL_SIZE = 0.6;
export const WARNING_SIZE = 0.4;

// Horizontal bands, measured at the box centre.
export const LEFT_BAND = 0.33;
export const RIGHT_BAND = 0.67;

const ZONE_RANK: Record<ProximityZone, number> = {
  [ProximityZone.FAR]: 0,
  [ProximityZone.WARNING]: 1,
  [ProximityZone.CRITICAL]: 2
};

const DIRECTION_PHRASES: Record<Direction, string> = {
  left: 'to the left',
  ahead: 'ahead',
  right: 'to the right'
};

const clamp = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));

export const zoneRank = (zone: ProximityZone): number => ZONE_RANK[zone];

export const directionPhrase = (direction: Direction): string => DIRECTION_PHRASES[direction];

export function classifyZone(size: number): ProximityZone {
  if (size >= CRITICAL_SIZE) return ProximityZone.CRITICAL;
  if (size >= WARNING_SIZE) return ProximityZone.WARNING;
  return ProximityZone.FAR;
}

export function classifyDirection(xCenter: number, frameWidth: number): Direction {
  const position = xCenter / frameWidth;
  if (position < LEFT_BAND) return 'left';
  if (position > RIGHT_BAND) return 'right';
  return 'ahead';
}

/**
 * Largest side of the box relative to the matching frame side.
 * A person filling 65% of the frame height reads as 0.65 regardless of how narrow they are.
 */
export function frameRelativeSize(bbox: BoundingBox, frameWidth: number, frameHeight: number): number {
  if (frameWidth <= 0 || frameHeight <= 0) return 0;
  const widthRatio = Math.abs(bbox.x2 - bbox.x1) / frameWidth;
  const heightRatio = Math.abs(bbox.y2 - bbox.y1) / frameHeight;
  return clamp(Math.max(widthRatio, heightRatio), 0, 1);
}

export function classifyDetection(detection: DetectionEvent): ProximityEvent | null {
  const objectType = detection.objectType.trim();
  if (!objectType) return null;
  if (!Number.isFinite(detection.size) || !Number.isFinite(detection.xCenter)) return null;
  if (!(detection.frameWidth > 0)) return null;

  const size = clamp(detection.size, 0, 1);
  const event: ProximityEvent = {
    objectType,
    direction: classifyDirection(detection.xCenter, detection.frameWidth),
    zone: classifyZone(size),
    size,
    timestamp: detection.timestamp
  };
  if (detection.confidence !== undefined) event.confidence = detection.confidence;
  if (detection.bbox) event.bbox = detection.bbox;
  return event;
}

export function describeProximity(event: Pick<ProximityEvent, 'objectType' | 'direction' | 'zone'>): string {
  return `${event.objectType} ${DIRECTION_PHRASES[event.direction]}, ${event.zone}`;
}
