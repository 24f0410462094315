import { z } from 'zod';
import { ConversationState, Intent, RequirementsStatus, type TravelRequirementsT } from './requirements.js';

export const TurnInput = z.object({
  session_id: z.string().min(1).max(128).optional(),
  text: z.string().max(2000),
});
export type TurnInputT = z.infer<typeof TurnInput>;

const SnapshotSlot = z.object({
  value: z.unknown(),
  confidence: z.string(),
});

export const RequirementsSnapshot = z.object({
  destination: SnapshotSlot,
  date_range: SnapshotSlot,
  traveler_count: SnapshotSlot,
  budget: SnapshotSlot,
  preferences: z.array(z.string()),
  status: RequirementsStatus,
});
export type RequirementsSnapshotT = z.infer<typeof RequirementsSnapshot>;

export const TurnOutput = z.object({
  session_id: z.string().min(1),
  reply_text: z.string().min(1),
  status: RequirementsStatus,
  ready_for_handoff: z.boolean(),
  requirements_snapshot: RequirementsSnapshot,
  intent: Intent,
  turn_count: z.number().int().min(0),
  conversation_state: ConversationState,
  trust_score: z.number().min(0).max(1),
});
export type TurnOutputT = z.infer<typeof TurnOutput>;

export function toRequirementsSnapshot(req: TravelRequirementsT): RequirementsSnapshotT {
  return {
    destination: { ...req.destination },
    date_range: { ...req.dateRange },
    traveler_count: { ...req.travelerCount },
    budget: { ...req.budget },
    preferences: [...req.preferences],
    status: req.status,
  };
}
