/**
 * Runtime settings from the environment
 *
 * Read once at process start. Anything optional switches the matching
 * collaborator off instead of failing.
 */

import { z } from 'zod';
import { ConfigurationError } from '@/lib/errors';
import { DEFAULT_WEIGHTS, type FusionWeights } from '@/lib/detection/config';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const emptyToUndefined = (value: unknown) => (value === '' ? undefined : value);

const optionalString = z.preprocess(emptyToUndefined, z.string().optional());

const weightsFromList = z
  .string()
  .transform((value, ctx): FusionWeights | typeof z.NEVER => {
    const parts = value.split(',').map((part) => Number(part.trim()));
    if (parts.length !== 4 || parts.some((part) => Number.isNaN(part))) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'FUSION_WEIGHTS must be four numbers: content,link,behavior,qr',
      });
      return z.NEVER;
    }
    const [content, link, behavior, qr] = parts;
    return { content, link, behavior, qr };
  });

export const settingsSchema = z.object({
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).optional(),
  DATABASE_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
  WHOIS_API_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
  WHOIS_API_KEY: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  CLASSIFIER_MODEL: z.string().default('claude-3-5-haiku-20241022'),
  EVALUATOR_TIMEOUT_MS: positiveInt(10000),
  EXTERNAL_CALL_TIMEOUT_MS: positiveInt(5000),
  CIRCUIT_FAILURE_THRESHOLD: positiveInt(5),
  CIRCUIT_RESET_TIMEOUT_MS: positiveInt(60000),
  MAX_NORMAL_HOPS: positiveInt(8),
  FUSION_WEIGHTS: z.preprocess(emptyToUndefined, weightsFromList.optional()),
});

export type RawSettings = z.infer<typeof settingsSchema>;

export interface Settings {
  logLevel?: RawSettings['LOG_LEVEL'];
  databaseUrl?: string;
  whois?: { apiUrl: string; apiKey?: string };
  classifier?: { apiKey: string; model: string };
  evaluatorTimeoutMs: number;
  externalCallTimeoutMs: number;
  circuitFailureThreshold: number;
  circuitResetTimeoutMs: number;
  maxNormalHops: number;
  weights: FusionWeights;
}

/**
 * @throws ConfigurationError listing every invalid variable
 */
export function loadSettings(env: Record<string, string | undefined> = process.env): Settings {
  const parsed = settingsSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid environment configuration',
      parsed.error.issues.map((issue) => ({ field: issue.path.join('.'), message: issue.message }))
    );
  }

  const raw = parsed.data;
  return {
    logLevel: raw.LOG_LEVEL,
    databaseUrl: raw.DATABASE_URL,
    whois: raw.WHOIS_API_URL ? { apiUrl: raw.WHOIS_API_URL, apiKey: raw.WHOIS_API_KEY } : undefined,
    classifier: raw.ANTHROPIC_API_KEY ? { apiKey: raw.ANTHROPIC_API_KEY, model: raw.CLASSIFIER_MODEL } : undefined,
    evaluatorTimeoutMs: raw.EVALUATOR_TIMEOUT_MS,
    externalCallTimeoutMs: raw.EXTERNAL_CALL_TIMEOUT_MS,
    circuitFailureThreshold: raw.CIRCUIT_FAILURE_THRESHOLD,
    circuitResetTimeoutMs: raw.CIRCUIT_RESET_TIMEOUT_MS,
    maxNormalHops: raw.MAX_NORMAL_HOPS,
    weights: raw.FUSION_WEIGHTS ?? { ...DEFAULT_WEIGHTS },
  };
}
