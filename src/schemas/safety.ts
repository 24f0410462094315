import { z } from 'zod';

export type Direction = 'IN' | 'OUT';

/** `provider` when the moderation provider answered; `local` when only the pattern rules ran. */
export type VerdictSource = 'provider' | 'local';

/** `riskScore` runs from 0 (clean) to 1. */
export type SafetyVerdict =
  | { action: 'ALLOW'; text: string; redacted: boolean; riskScore: number; source: VerdictSource }
  | { action: 'BLOCK'; reason: string; riskScore: number; source: VerdictSource };

/** OpenAI-compatible `/moderations` response. */
export const ModerationResponse = z.object({
  results: z
    .array(
      z.object({
        flagged: z.boolean(),
        categories: z.record(z.boolean()).optional().default({}),
        category_scores: z.record(z.number()).optional().default({}),
      }),
    )
    .min(1),
});
export type ModerationResponseT = z.infer<typeof ModerationResponse>;

export const SafetyPatterns = z.object({
  injection: z.array(z.string()).min(1),
  hardPolicy: z.array(z.string()),
  sensitive: z.array(
    z.object({
      label: z.string(),
      pattern: z.string(),
    }),
  ),
});
export type SafetyPatternsT = z.infer<typeof SafetyPatterns>;
