import patternsJson from '../data/safety_patterns.json';
import { SafetyPatterns, type Direction, type SafetyPatternsT, type SafetyVerdict } from '../schemas/safety.js';
import type { Logger } from '../util/logging.js';
import { withResilience } from '../util/resilience.js';
import { toStdError } from './errors.js';
import type { ModerationProvider, ModerationResult } from './moderation.js';

export const SAFE_INPUT_MESSAGE =
  "I'm sorry, but I can't help with that request. I'm happy to help you plan a trip, though. Where would you like to go?";
export const SAFE_OUTPUT_MESSAGE =
  "I'm sorry, something went wrong while preparing my reply. Could you tell me a bit more about the trip you have in mind?";

/** Risk of a block that carries no provider score. */
export const BLOCK_RISK = 0.8;
/** Risk of a reply that needed redaction. */
export const REDACTED_RISK = 0.1;
const INJECTION_RISK_STEP = 0.4;

export interface SafetyGate {
  check(text: string, direction: Direction): Promise<SafetyVerdict>;
}

interface CompiledPatterns {
  injection: RegExp[];
  hardPolicy: RegExp[];
  sensitive: Array<{ label: string; re: RegExp }>;
}

function compile(p: SafetyPatternsT): CompiledPatterns {
  return {
    injection: p.injection.map((src) => new RegExp(src, 'i')),
    hardPolicy: p.hardPolicy.map((src) => new RegExp(src, 'i')),
    sensitive: p.sensitive.map((s) => ({ label: s.label, re: new RegExp(s.pattern, 'gi') })),
  };
}

export const DEFAULT_SAFETY_PATTERNS: SafetyPatternsT = SafetyPatterns.parse(patternsJson);

export function redactSensitive(text: string, sensitive: CompiledPatterns['sensitive']): { text: string; redacted: boolean } {
  let out = text;
  for (const { label, re } of sensitive) {
    out = out.replace(re, `[REDACTED_${label}]`);
  }
  return { text: out, redacted: out !== text };
}

export interface SafetyGateOptions {
  provider?: ModerationProvider;
  timeoutMs?: number;
  patterns?: SafetyPatternsT;
  log?: Logger;
}

/**
 * Screens text in both directions. Pattern rules always run; the moderation
 * provider, when configured, adds category moderation and is skipped when it
 * times out or errors.
 */
export function createSafetyGate(opts: SafetyGateOptions = {}): SafetyGate {
  const compiled = compile(opts.patterns ?? DEFAULT_SAFETY_PATTERNS);

  async function moderate(text: string, direction: Direction): Promise<ModerationResult | undefined> {
    const provider = opts.provider;
    if (!provider) return undefined;
    try {
      return await withResilience('moderation', (signal) => provider.moderate(text, signal), {
        timeoutMs: opts.timeoutMs,
      });
    } catch (err) {
      opts.log?.warn({ direction, err: toStdError(err, 'moderation') }, 'moderation unavailable, using local rules');
      return undefined;
    }
  }

  return {
    async check(text, direction) {
      if (direction === 'IN') {
        // Each injection pattern that matches adds to the risk.
        const hits = compiled.injection.filter((re) => re.test(text)).length;
        if (hits > 0) {
          const riskScore = Math.min(1, hits * INJECTION_RISK_STEP);
          return { action: 'BLOCK', reason: 'potential_injection', riskScore, source: 'local' };
        }
      } else if (compiled.hardPolicy.some((re) => re.test(text))) {
        return { action: 'BLOCK', reason: 'hard_policy', riskScore: BLOCK_RISK, source: 'local' };
      }

      const moderation = await moderate(text, direction);
      const source = moderation ? 'provider' : 'local';
      const providerRisk = moderation?.score ?? 0;
      if (moderation?.flagged) {
        const categories = moderation.categories.length > 0 ? moderation.categories.join(',') : 'policy';
        const riskScore = providerRisk > 0 ? providerRisk : BLOCK_RISK;
        return { action: 'BLOCK', reason: `flagged:${categories}`, riskScore, source };
      }

      if (direction === 'OUT') {
        const { text: safeText, redacted } = redactSensitive(text, compiled.sensitive);
        const riskScore = Math.max(providerRisk, redacted ? REDACTED_RISK : 0);
        return { action: 'ALLOW', text: safeText, redacted, riskScore, source };
      }
      return { action: 'ALLOW', text, redacted: false, riskScore: providerRisk, source };
    },
  };
}
