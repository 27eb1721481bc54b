import { PERMANENT_STATUSES, TRANSIENT_STATUSES } from "../constants.js";
import { errorMessage, ProviderError } from "../types.js";

type HeaderBag = Record<string, string | null | undefined> | Headers | undefined;

function readHeader(headers: HeaderBag, name: string): string | undefined {
  if (!headers) return undefined;
  if (headers instanceof Headers) {
    return headers.get(name) ?? undefined;
  }
  const value = headers[name] ?? headers[name.toLowerCase()];
  return value ?? undefined;
}

export function parseRetryAfterMs(headers: HeaderBag, now: number = Date.now()): number | undefined {
  const raw = readHeader(headers, "retry-after")?.trim();
  if (!raw) return undefined;

  const seconds = Number(raw);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);

  const dateMs = Date.parse(raw);
  if (!Number.isNaN(dateMs)) return Math.max(0, dateMs - now);

  return undefined;
}

/**
 * Reads a google.rpc.RetryInfo delay ("retryDelay": "12s") from an error
 * body. Gemini reports its rate-limit hint there rather than in a header.
 */
export function parseRetryDelayMs(body: string): number | undefined {
  const match = body.match(/"retryDelay"\s*:\s*"(\d+(?:\.\d+)?)s"/);
  return match ? Math.round(Number(match[1]) * 1000) : undefined;
}

export function isTransientStatus(status: number): boolean {
  return TRANSIENT_STATUSES.has(status) || status >= 500;
}

/**
 * Maps an HTTP status reported by a backend onto the retry classification.
 * Statuses outside both lists are treated as permanent so that unexpected
 * client errors are not retried.
 */
export function errorFromStatus(
  provider: string,
  status: number,
  message: string,
  headers?: HeaderBag,
  retryAfterHintMs?: number
): ProviderError {
  if (isTransientStatus(status)) {
    return new ProviderError(message, "transient", provider, status, parseRetryAfterMs(headers) ?? retryAfterHintMs);
  }
  const detail = PERMANENT_STATUSES.has(status) ? message : `Unexpected status ${status}: ${message}`;
  return new ProviderError(detail, "permanent", provider, status);
}

/** Errors without a status (dropped sockets, DNS, fetch failures) are worth another try. */
export function connectionError(provider: string, error: unknown): ProviderError {
  return new ProviderError(`Connection error: ${errorMessage(error)}`, "transient", provider);
}
