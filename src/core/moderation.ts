import { fetch as undiciFetch, type Dispatcher } from 'undici';
import { ModerationResponse } from '../schemas/safety.js';
import { ModerationError, ProviderHttpError } from './errors.js';

export interface ModerationResult {
  flagged: boolean;
  categories: string[];
  /** Highest category score, 0 when the provider sends none. */
  score: number;
}

export interface ModerationProvider {
  moderate(text: string, signal?: AbortSignal): Promise<ModerationResult>;
}

export interface ModerationProviderConfig {
  baseUrl: string;
  apiKey?: string;
  model: string;
  dispatcher?: Dispatcher;
}

/** Client for an OpenAI-compatible `/moderations` endpoint. */
export function createModerationProvider(cfg: ModerationProviderConfig): ModerationProvider {
  const url = `${cfg.baseUrl.replace(/\/$/, '')}/moderations`;

  return {
    async moderate(text, signal) {
      const res = await undiciFetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...(cfg.apiKey ? { Authorization: `Bearer ${cfg.apiKey}` } : {}),
        },
        body: JSON.stringify({ model: cfg.model, input: text }),
        signal,
        dispatcher: cfg.dispatcher,
      });

      if (!res.ok) {
        const errorText = await res.text();
        throw new ProviderHttpError(`HTTP ${res.status}: ${errorText.substring(0, 100)}`, res.status, 'moderation');
      }

      const parsed = ModerationResponse.safeParse(await res.json());
      if (!parsed.success) {
        throw new ModerationError('unexpected moderation response shape');
      }
      const first = parsed.data.results[0];
      return {
        flagged: first.flagged,
        categories: Object.entries(first.categories)
          .filter(([, hit]) => hit)
          .map(([name]) => name),
        score: Math.max(0, ...Object.values(first.category_scores)),
      };
    },
  };
}
