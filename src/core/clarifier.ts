import {
  SLOT_ORDER,
  type PendingQuestionT,
  type SlotNameT,
  type TravelRequirementsT,
} from '../schemas/requirements.js';
import { formatBudget, formatDateRange } from './normalize.js';

const ASK: Record<SlotNameT, string> = {
  destination: 'Where would you like to go?',
  dateRange: 'When are you planning to travel? A month or specific dates both work.',
  travelerCount: 'How many people will be traveling?',
  budget: "What's your total budget for the trip?",
};

/**
 * First UNSET field in slot order; failing that, the first TENTATIVE one as a
 * confirmation. Null once every field is confirmed. Preferences never count.
 */
export function selectNextQuestion(req: TravelRequirementsT): PendingQuestionT | null {
  const unset = SLOT_ORDER.find((f) => req[f].confidence === 'UNSET');
  if (unset) return { field: unset, kind: 'ASK' };
  const tentative = SLOT_ORDER.find((f) => req[f].confidence === 'TENTATIVE');
  if (tentative) return { field: tentative, kind: 'CONFIRM' };
  return null;
}

export function formatTravelers(n: number): string {
  return n === 1 ? '1 traveler' : `${n} travelers`;
}

/** Human-readable value of a field, or null when it is unset. */
export function formatFieldValue(field: SlotNameT, req: TravelRequirementsT): string | null {
  switch (field) {
    case 'destination':
      return req.destination.value;
    case 'dateRange':
      return req.dateRange.value ? formatDateRange(req.dateRange.value) : null;
    case 'travelerCount':
      return req.travelerCount.value === null ? null : formatTravelers(req.travelerCount.value);
    case 'budget':
      return req.budget.value ? formatBudget(req.budget.value) : null;
  }
}

function describe(field: SlotNameT, value: string): string {
  switch (field) {
    case 'destination':
      return `you'd like to go to ${value}`;
    case 'dateRange':
      return `you're traveling ${value.includes(' to ') ? 'from ' : 'in '}${value}`;
    case 'travelerCount':
      return `there will be ${value}`;
    case 'budget':
      return `your budget is ${value}`;
  }
}

export function buildClarifyingQuestion(q: PendingQuestionT, req: TravelRequirementsT): string {
  if (q.kind === 'CONFIRM') {
    const value = formatFieldValue(q.field, req);
    if (value !== null) return `Just to confirm, ${describe(q.field, value)}. Is that right?`;
  }
  return ASK[q.field];
}

export function buildSummary(req: TravelRequirementsT): string {
  const line = (label: string, field: SlotNameT) => `- ${label}: ${formatFieldValue(field, req) ?? 'not set'}`;
  return [
    "Here's what I have for your trip:",
    line('Destination', 'destination'),
    line('Dates', 'dateRange'),
    `- Travelers: ${req.travelerCount.value ?? 'not set'}`,
    line('Budget', 'budget'),
    `- Preferences: ${req.preferences.length > 0 ? req.preferences.join(', ') : 'none'}`,
    "Everything is confirmed, so I'll pass this on for detailed planning.",
  ].join('\n');
}
