import path from 'path';
import { z } from 'zod';
import { fromZodError } from 'zod-validation-error';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'http']).default('info'),
  LOG_DIR: z.string().optional(),

  // Cache
  ENGINE_CACHE_ENABLED: booleanFlag.default('true'),
  ENGINE_CACHE_PATH: z.string().default('.cache/generation-cache.sqlite'),
  ENGINE_CACHE_CAPACITY_MB: z.coerce.number().positive().default(256),

  // Retry / backoff
  RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
  RETRY_MULTIPLIER: z.coerce.number().min(1).default(2),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().positive().default(30000),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(20).default(5),
  RETRY_JITTER_RATIO: z.coerce.number().min(0).max(1).default(0.25),

  // Output validation
  VALIDATION_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(2),
  QUALITY_MIN_CONTENT_LENGTH: z.coerce.number().int().nonnegative().default(20),

  // Media
  MEDIA_MAX_BYTES: z.coerce.number().int().positive().default(50 * 1024 * 1024),
  MEDIA_MIN_DIMENSION: z.coerce.number().int().nonnegative().default(32),
  MEDIA_ALLOWED_ROOTS: z.string().optional(),

  // Providers
  PROVIDER_MAX_CONCURRENCY: z.coerce.number().int().min(1).default(5),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  JUDGE_MODEL: z.string().default('gemini/gemini-2.5-flash'),
  OPENAI_API_KEY: z.string().optional(),
  GEMINI_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  PERPLEXITY_API_KEY: z.string().optional(),
  OLLAMA_BASE_URL: z.string().url().default('http://localhost:11434/v1'),
});

export type Env = z.infer<typeof envSchema>;

export interface EngineConfig {
  env: Env['NODE_ENV'];
  cache: {
    enabled: boolean;
    path: string;
    capacityBytes: number;
  };
  retry: {
    baseDelayMs: number;
    multiplier: number;
    maxDelayMs: number;
    maxAttempts: number;
    jitterRatio: number;
  };
  validation: {
    maxAttempts: number;
    minContentLength: number;
  };
  media: {
    maxBytes: number;
    minDimension: number;
    allowedRoots: string[];
  };
  providers: {
    maxConcurrency: number;
    openaiApiKey?: string;
    geminiApiKey?: string;
    anthropicApiKey?: string;
    perplexityApiKey?: string;
    ollamaBaseUrl: string;
  };
  requestTimeoutMs?: number;
  judgeModel: string;
}

export class ConfigError extends Error {
  code = 'CONFIG_INVALID';
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function emptyToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const cleaned: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(env)) {
    cleaned[key] = value !== undefined && value.trim() !== '' ? value.trim() : undefined;
  }
  return cleaned;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = envSchema.safeParse(emptyToUndefined(source));
  if (!parsed.success) {
    throw new ConfigError(fromZodError(parsed.error, { prefix: 'Invalid engine configuration' }).message);
  }
  const env = parsed.data;

  const allowedRoots = (env.MEDIA_ALLOWED_ROOTS ?? process.cwd())
    .split(',')
    .map((root) => root.trim())
    .filter((root) => root !== '')
    .map((root) => path.resolve(root));

  return {
    env: env.NODE_ENV,
    cache: {
      enabled: env.ENGINE_CACHE_ENABLED,
      path: env.ENGINE_CACHE_PATH,
      capacityBytes: Math.floor(env.ENGINE_CACHE_CAPACITY_MB * 1024 * 1024),
    },
    retry: {
      baseDelayMs: env.RETRY_BASE_DELAY_MS,
      multiplier: env.RETRY_MULTIPLIER,
      maxDelayMs: env.RETRY_MAX_DELAY_MS,
      maxAttempts: env.RETRY_MAX_ATTEMPTS,
      jitterRatio: env.RETRY_JITTER_RATIO,
    },
    validation: {
      maxAttempts: env.VALIDATION_MAX_ATTEMPTS,
      minContentLength: env.QUALITY_MIN_CONTENT_LENGTH,
    },
    media: {
      maxBytes: env.MEDIA_MAX_BYTES,
      minDimension: env.MEDIA_MIN_DIMENSION,
      allowedRoots,
    },
    providers: {
      maxConcurrency: env.PROVIDER_MAX_CONCURRENCY,
      openaiApiKey: env.OPENAI_API_KEY,
      geminiApiKey: env.GEMINI_API_KEY,
      anthropicApiKey: env.ANTHROPIC_API_KEY,
      perplexityApiKey: env.PERPLEXITY_API_KEY,
      ollamaBaseUrl: env.OLLAMA_BASE_URL,
    },
    requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
    judgeModel: env.JUDGE_MODEL,
  };
}

/**
 * Lists backends that cannot be reached with the current credentials.
 * Missing keys are not fatal: a request for such a backend fails as a
 * permanent provider error.
 */
export function describeMissingCredentials(config: EngineConfig): string[] {
  const warnings: string[] = [];
  if (!config.providers.openaiApiKey) warnings.push('OPENAI_API_KEY not set - openai/ models unavailable');
  if (!config.providers.geminiApiKey) warnings.push('GEMINI_API_KEY not set - gemini/ models unavailable');
  if (!config.providers.anthropicApiKey) warnings.push('ANTHROPIC_API_KEY not set - anthropic/ models unavailable');
  if (!config.providers.perplexityApiKey) warnings.push('PERPLEXITY_API_KEY not set - perplexity/ models unavailable');
  return warnings;
}
