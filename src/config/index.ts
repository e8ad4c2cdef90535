import { z } from 'zod';
import { LENGTH_MODES, LengthMode } from '../types';
import { ConfigError } from '../utils/errors';

export const DEFAULT_APOLOGY_TEXT =
  'Ah... sorry, my thoughts got all tangled up just now. Could you say that one more time?';

const commaList = z
  .string()
  .optional()
  .transform(value =>
    (value ?? '')
      .split(',')
      .map(item => item.trim())
      .filter(item => item.length > 0)
  );

// Blank .env entries count as unset, here and in positiveInt
const optionalText = z
  .string()
  .optional()
  .transform(value => (value && value.trim().length > 0 ? value.trim() : undefined));

const positiveInt = (fallback: number) =>
  z.preprocess(
    value => (typeof value === 'string' && value.trim().length === 0 ? undefined : value),
    z.coerce.number().int().positive().default(fallback)
  );

const envSchema = z.object({
  OPENAI_API_KEY: optionalText,
  COMPANION_ENABLED_SOURCES: commaList,
  COMPANION_PRIORITY_ORDER: commaList,
  COMPANION_LENGTH_MODE: z.enum(LENGTH_MODES).default('auto'),
  COMPANION_SOURCE_TIMEOUT_MS: positiveInt(30_000),
  COMPANION_MAX_CONCURRENCY: positiveInt(4),
  COMPANION_SEED: optionalText,
  COMPANION_APOLOGY_TEXT: optionalText,
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info')
});

export interface EngineConfig {
  openaiApiKey?: string;
  // Empty means every registered source
  enabledSources: string[];
  priorityOrder: string[];
  lengthMode: LengthMode;
  sourceTimeoutMs: number;
  maxConcurrency: number;
  seed?: string;
  apologyText: string;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  return {
    openaiApiKey: values.OPENAI_API_KEY,
    enabledSources: values.COMPANION_ENABLED_SOURCES,
    priorityOrder: values.COMPANION_PRIORITY_ORDER,
    lengthMode: values.COMPANION_LENGTH_MODE,
    sourceTimeoutMs: values.COMPANION_SOURCE_TIMEOUT_MS,
    maxConcurrency: values.COMPANION_MAX_CONCURRENCY,
    seed: values.COMPANION_SEED,
    apologyText: values.COMPANION_APOLOGY_TEXT ?? DEFAULT_APOLOGY_TEXT,
    logLevel: values.LOG_LEVEL
  };
}
