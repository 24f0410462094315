import { z } from 'zod';

const ProvidersConfigSchema = z.object({
  llm: z.object({
    baseUrl: z.string().url().default('https://api.openai.com/v1'),
    apiKey: z.string().optional(),
    model: z.string().min(1).default('gpt-4o-mini'),
  }),
  extractor: z.object({
    kind: z.enum(['llm', 'heuristic']),
    timeoutMs: z.coerce.number().min(250).default(4000),
  }),
  intent: z.object({
    timeoutMs: z.coerce.number().min(250).default(3000),
  }),
  moderation: z.object({
    baseUrl: z.string().url().default('https://api.openai.com/v1'),
    apiKey: z.string().optional(),
    model: z.string().min(1).default('omni-moderation-latest'),
    timeoutMs: z.coerce.number().min(250).default(3000),
  }),
  defaultCurrency: z
    .string()
    .regex(/^[A-Za-z]{3}$/)
    .transform((c) => c.toUpperCase())
    .default('USD'),
});

export type ProvidersConfig = z.infer<typeof ProvidersConfigSchema>;

/**
 * Reads provider settings from the environment. Without an LLM key the extractor
 * defaults to the local heuristic rules and the classifiers use keyword fallbacks.
 */
export function loadProvidersConfig(): ProvidersConfig {
  const llmKey = process.env.LLM_API_KEY || undefined;
  return ProvidersConfigSchema.parse({
    llm: {
      baseUrl: process.env.LLM_PROVIDER_BASEURL || undefined,
      apiKey: llmKey,
      model: process.env.LLM_MODEL || undefined,
    },
    extractor: {
      kind: process.env.EXTRACTOR || (llmKey ? 'llm' : 'heuristic'),
      timeoutMs: process.env.EXTRACTOR_TIMEOUT_MS || undefined,
    },
    intent: {
      timeoutMs: process.env.INTENT_TIMEOUT_MS || undefined,
    },
    moderation: {
      baseUrl: process.env.MODERATION_BASEURL || process.env.LLM_PROVIDER_BASEURL || undefined,
      apiKey: process.env.MODERATION_API_KEY || undefined,
      model: process.env.MODERATION_MODEL || undefined,
      timeoutMs: process.env.MODERATION_TIMEOUT_MS || undefined,
    },
    defaultCurrency: process.env.DEFAULT_CURRENCY || undefined,
  });
}
