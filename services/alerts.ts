import {
  AssistanceSubtype,
  ProximityAlert,
  ProximityEvent,
  SafetyAlert,
  SafetyEventType,
  SafetyTransition
} from '../types';
import { describeProximity } from './proximityClassifier';

// Labels used by the sensor hub and the dashboard banners.
export const ASSISTANCE_LABELS: Record<AssistanceSubtype, string> = {
  [AssistanceSubtype.GENERAL]: 'General Help',
  [AssistanceSubtype.BATHROOM]: 'Bathroom',
  [AssistanceSubtype.FOOD_WATER]: 'Food/Water',
  [AssistanceSubtype.MEDICATION]: 'Medication'
};

const ASSISTANCE_PHRASES: Record<AssistanceSubtype, string> = {
  [AssistanceSubtype.GENERAL]: 'general help',
  [AssistanceSubtype.BATHROOM]: 'the bathroom',
  [AssistanceSubtype.FOOD_WATER]: 'food or water',
  [AssistanceSubtype.MEDICATION]: 'medication'
};

export const assistancePhrase = (subtype: AssistanceSubtype): string => ASSISTANCE_PHRASES[subtype];

export function safetyMessage(transition: SafetyTransition): string {
  const { event, kind } = transition;
  const acknowledged = kind === 'acknowledged';

  switch (event.type) {
    case SafetyEventType.FALL:
      return acknowledged
        ? 'Fall alert acknowledged. Your caregiver has been notified.'
        : 'Fall detected. Alerting your caregiver.';
    case SafetyEventType.EMERGENCY:
      return acknowledged
        ? 'Emergency acknowledged. Help is on the way.'
        : 'Emergency button pressed. Requesting help now.';
    case SafetyEventType.ASSISTANCE: {
      const phrase = assistancePhrase(event.subtype ?? AssistanceSubtype.GENERAL);
      return acknowledged
        ? `Your request for ${phrase} has been acknowledged.`
        : `Assistance requested for ${phrase}.`;
    }
  }
}

export const createProximityAlert = (event: ProximityEvent): ProximityAlert => ({
  kind: 'proximity',
  message: describeProximity(event),
  createdAt: event.timestamp,
  event
});

export const createSafetyAlert = (transition: SafetyTransition): SafetyAlert => ({
  kind: 'safety',
  message: safetyMessage(transition),
  createdAt: transition.at,
  transition
});
