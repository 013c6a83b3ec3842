import { Direction, ProximityEvent } from '../types';
import { zoneRank } from './proximityClassifier';

const DIRECTION_ORDER: Direction[] = ['ahead', 'left', 'right'];
const DIRECTION_WORDS: Record<Direction, string> = {
  ahead: 'ahead',
  left: 'on your left',
  right: 'on your right'
};

const pluralize = (name: string, count: number) => {
  if (count === 1) return `a ${name}`;
  if (name === 'person') return `${count} people`;
  return `${count} ${name}s`;
};

const joinPhrases = (phrases: string[]) =>
  phrases.length <= 1 ? phrases.join('') : `${phrases.slice(0, -1).join(', ')} and ${phrases[phrases.length - 1]}`;

// Local, offline summary: "I see 2 people ahead and a chair on your left. Closest: person ahead."
export function summarizeScene(objects: ProximityEvent[]): string {
  if (objects.length === 0) return "I don't see anything nearby.";

  const phrases: string[] = [];
  for (const direction of DIRECTION_ORDER) {
    const counts = new Map<string, number>();
    for (const object of objects) {
      if (object.direction === direction) counts.set(object.objectType, (counts.get(object.objectType) ?? 0) + 1);
    }
    const names = [...counts].map(([name, count]) => pluralize(name, count));
    if (names.length > 0) phrases.push(`${joinPhrases(names)} ${DIRECTION_WORDS[direction]}`);
  }

  const closest = [...objects].sort((a, b) => zoneRank(b.zone) - zoneRank(a.zone) || b.size - a.size)[0];
  return `I see ${joinPhrases(phrases)}. Closest: ${closest.objectType} ${DIRECTION_WORDS[closest.direction]}.`;
}
