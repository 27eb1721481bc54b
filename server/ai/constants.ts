export const FINGERPRINT_VERSION = "v1";

export const DEFAULT_BACKOFF = {
  baseDelayMs: 1000,
  multiplier: 2,
  maxDelayMs: 30000,
  maxAttempts: 5,
  jitterRatio: 0.25,
} as const;

export const DEFAULT_VALIDATION_ATTEMPTS = 2;
export const DEFAULT_MIN_CONTENT_LENGTH = 20;

export const MAX_MEDIA_BYTES = 50 * 1024 * 1024;
export const MIN_MEDIA_DIMENSION = 32;

export const DEFAULT_CACHE_CAPACITY_BYTES = 256 * 1024 * 1024;

export const DEFAULT_PROVIDER_CONCURRENCY = 5;
export const DEFAULT_MAX_TOKENS = 2000;
export const PERPLEXITY_BASE_URL = "https://api.perplexity.ai";

export const TRANSIENT_STATUSES = new Set([408, 409, 425, 429]);
export const PERMANENT_STATUSES = new Set([400, 401, 402, 403, 404, 405, 413, 422]);
