import { fetch as undiciFetch, type Dispatcher } from 'undici';
import { z } from 'zod';
import { MalformedResponseError, ProviderHttpError } from './errors.js';

export type ResponseFormat = 'text' | 'json';

export interface CompleteOptions {
  responseFormat?: ResponseFormat;
  signal?: AbortSignal;
}

export interface LlmClient {
  readonly model: string;
  complete(prompt: string, opts?: CompleteOptions): Promise<string>;
}

export interface LlmClientConfig {
  baseUrl: string;
  apiKey?: string;
  model: string;
  temperature?: number;
  /** undici dispatcher, mostly for tests (MockAgent). */
  dispatcher?: Dispatcher;
}

const ChatCompletion = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
      }),
    )
    .optional(),
});

function providerName(baseUrl: string): string {
  try {
    return new URL(baseUrl).hostname || 'custom';
  } catch {
    return 'custom';
  }
}

/**
 * OpenAI-compatible chat completion client. A single attempt per call: retries,
 * timeouts and circuit breaking are applied by the caller through `withResilience`.
 */
export function createLlmClient(cfg: LlmClientConfig): LlmClient {
  const url = `${cfg.baseUrl.replace(/\/$/, '')}/chat/completions`;
  const provider = providerName(cfg.baseUrl);

  return {
    model: cfg.model,
    async complete(prompt, opts = {}) {
      const format = opts.responseFormat ?? 'text';
      const body = {
        model: cfg.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: cfg.temperature ?? (format === 'json' ? 0.2 : 0.5),
        ...(format === 'json' ? { response_format: { type: 'json_object' } } : {}),
      };

      const res = await undiciFetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...(cfg.apiKey ? { Authorization: `Bearer ${cfg.apiKey}` } : {}),
        },
        body: JSON.stringify(body),
        signal: opts.signal,
        dispatcher: cfg.dispatcher,
      });

      if (!res.ok) {
        const errorText = await res.text();
        throw new ProviderHttpError(`HTTP ${res.status}: ${errorText.substring(0, 100)}`, res.status, provider);
      }

      const parsed = ChatCompletion.safeParse(await res.json());
      const content = parsed.success ? parsed.data.choices?.[0]?.message?.content : undefined;
      if (typeof content !== 'string' || content.trim().length === 0) {
        throw new MalformedResponseError('empty completion', provider);
      }
      return content.trim();
    },
  };
}

/**
 * Try to extract a JSON object from an LLM response safely.
 * Returns undefined if no valid JSON object can be found.
 */
export function safeExtractJson(text: string): unknown {
  const m = text.match(/\{[\s\S]*\}/);
  if (!m) return undefined;
  try {
    return JSON.parse(m[0]);
  } catch {
    return undefined;
  }
}
