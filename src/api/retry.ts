/**
 * Retry with exponential backoff for Graph requests
 *
 * Graph throttles with 429 (and occasionally 503) and says how long to back
 * off in Retry-After. Those waits are honored, and a wait longer than
 * `maxDelayMs` ends the retries; everything else retryable backs off
 * exponentially with jitter.
 */

import type { RetryConfig, RetryResult, ApiError } from './types.js';
import { logger, type ApiLogger } from './logger.js';

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.1,
  retryableStatuses: [429, 500, 502, 503, 504],
};

export const RATE_LIMIT_STATUS = 429;
export const UNAUTHORIZED_STATUS = 401;
export const SERVER_ERROR_THRESHOLD = 500;

/** Socket-level failures, matched against the message and undici's `cause.code` */
const NETWORK_ERROR_CODES = ['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'ENOTFOUND', 'EAI_AGAIN', 'UND_ERR_SOCKET'];

/** Failures raised before a connection carried any request bytes */
const NOT_SENT_ERROR_CODES = ['ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN'];

// =============================================================================
// Types
// =============================================================================

export interface RetryOptions extends RetryConfig {
  logger?: ApiLogger;
  /** Called before sleeping ahead of attempt `attempt + 1` */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Replaces the default status/network check */
  isRetryable?: (error: Error) => boolean;
  /** Called once when a retryable error outlasts maxRetries */
  onExhausted?: (error: Error, attempts: number) => void;
}

/**
 * A non-2xx Graph response
 */
export class ApiRequestError extends Error {
  public readonly status: number;
  /** Graph error code, e.g. "Request_ResourceNotFound" */
  public readonly code?: string;
  /** Parsed response body */
  public readonly details?: Record<string, unknown>;
  /** Seconds from Retry-After */
  public readonly retryAfter?: number;

  constructor(
    message: string,
    status: number,
    options: {
      code?: string;
      details?: Record<string, unknown>;
      retryAfter?: number;
      cause?: Error;
    } = {}
  ) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = 'ApiRequestError';
    this.status = status;
    this.code = options.code;
    this.details = options.details;
    this.retryAfter = options.retryAfter;
  }

  toApiError(): ApiError {
    return { status: this.status, message: this.message, code: this.code, details: this.details };
  }

  isRateLimited(): boolean {
    return this.status === RATE_LIMIT_STATUS;
  }

  isUnauthorized(): boolean {
    return this.status === UNAUTHORIZED_STATUS;
  }

  isServerError(): boolean {
    return this.status >= SERVER_ERROR_THRESHOLD;
  }
}

// =============================================================================
// Backoff
// =============================================================================

function resolveRetryConfig(config: RetryConfig): Required<RetryConfig> {
  return {
    maxRetries: config.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries,
    baseDelayMs: config.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs: config.maxDelayMs ?? DEFAULT_RETRY_CONFIG.maxDelayMs,
    jitterFactor: config.jitterFactor ?? DEFAULT_RETRY_CONFIG.jitterFactor,
    retryableStatuses: config.retryableStatuses ?? DEFAULT_RETRY_CONFIG.retryableStatuses,
  };
}

/**
 * Delay before the retry that follows failed attempt `attempt` (1-based)
 *
 * A server-sent Retry-After (seconds) takes precedence over backoff and is
 * not capped; `withRetry` gives up instead when it exceeds `maxDelayMs`.
 * Backoff never exceeds `maxDelayMs`.
 */
export function calculateDelay(attempt: number, config: Required<RetryConfig>, retryAfter?: number): number {
  if (retryAfter !== undefined && retryAfter > 0) {
    const spread = Math.random() * config.baseDelayMs * config.jitterFactor;
    return retryAfter * 1000 + spread;
  }

  const backoff = config.baseDelayMs * 2 ** (attempt - 1);
  // Symmetric jitter: backoff ± backoff * jitterFactor
  const jitter = (Math.random() * 2 - 1) * backoff * config.jitterFactor;

  return Math.min(Math.max(backoff + jitter, 0), config.maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Retry Conditions
// =============================================================================

function causeCode(error: Error): string | undefined {
  const cause: unknown = error.cause;
  if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
}

/**
 * Throttling, server errors, timeouts and dropped connections are retryable
 */
export function isRetryableError(error: Error, config: Required<RetryConfig>): boolean {
  if (error instanceof ApiRequestError) {
    return config.retryableStatuses.includes(error.status);
  }

  // fetch() aborted by our timeout, or undici's "TypeError: fetch failed"
  if (error.name === 'AbortError' || error.name === 'TimeoutError') return true;
  if (error.name === 'TypeError' && error.message.includes('fetch')) return true;

  const code = causeCode(error);
  if (code && NETWORK_ERROR_CODES.includes(code)) return true;

  const message = error.message.toLowerCase();
  return (
    message.includes('socket hang up') ||
    NETWORK_ERROR_CODES.some((networkCode) => message.includes(networkCode.toLowerCase()))
  );
}

/**
 * Retry check for requests that must not be sent twice (POST creates)
 *
 * Only failures where Graph cannot have acted on the request qualify:
 * throttling (429) and connections that were never established. A 5xx,
 * a timeout or a dropped connection may follow a completed create.
 */
export function isRetryableBeforeSend(error: Error): boolean {
  if (error instanceof ApiRequestError) {
    return error.isRateLimited();
  }

  const code = causeCode(error);
  if (code) return NOT_SENT_ERROR_CODES.includes(code);

  const message = error.message.toLowerCase();
  return NOT_SENT_ERROR_CODES.some((notSentCode) => message.includes(notSentCode.toLowerCase()));
}

/**
 * Read a Retry-After header (delta-seconds or HTTP-date) as whole seconds
 */
export function parseRetryAfter(value: string | null): number | undefined {
  const trimmed = value?.trim();
  if (!trimmed) return undefined;

  if (/^\d+$/.test(trimmed)) {
    const seconds = Number(trimmed);
    return seconds > 0 ? seconds : undefined;
  }

  const until = Date.parse(trimmed) - Date.now();
  return Number.isNaN(until) || until <= 0 ? undefined : Math.ceil(until / 1000);
}

// =============================================================================
// withRetry
// =============================================================================

/**
 * Run `fn` until it succeeds, fails with a non-retryable error, or runs out
 * of retries. Never throws; the outcome is in the returned RetryResult.
 *
 * @example
 * ```typescript
 * const result = await withRetry(() => fetchPolicies(), { maxRetries: 5 });
 * if (!result.success) throw result.error;
 * ```
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<RetryResult<T>> {
  const config = resolveRetryConfig(options);
  const log = options.logger ?? logger;
  const retryable = options.isRetryable ?? ((error: Error) => isRetryableError(error, config));
  const startTime = Date.now();

  for (let attempt = 1; ; attempt++) {
    let failure: Error;
    try {
      const data = await fn();
      const totalTimeMs = Date.now() - startTime;
      if (attempt > 1) {
        log.info(`Request succeeded on attempt ${attempt}`, { attempts: attempt, totalTimeMs });
      }
      return { success: true, data, attempts: attempt, totalTimeMs };
    } catch (err) {
      failure = err instanceof Error ? err : new Error(String(err));
    }

    const canRetry = retryable(failure);
    if (!canRetry || attempt > config.maxRetries) {
      const totalTimeMs = Date.now() - startTime;
      if (!canRetry) {
        log.debug('Not retrying', { error: failure.message, attempts: attempt });
      } else if (config.maxRetries > 0) {
        log.warn(`Giving up after ${config.maxRetries} retries`, {
          error: failure.message,
          attempts: attempt,
          totalTimeMs,
        });
        options.onExhausted?.(failure, attempt);
      }
      return { success: false, error: failure, attempts: attempt, totalTimeMs };
    }

    const status = failure instanceof ApiRequestError ? failure.status : undefined;
    const retryAfter = failure instanceof ApiRequestError ? failure.retryAfter : undefined;
    if (retryAfter !== undefined && retryAfter * 1000 > config.maxDelayMs) {
      log.warn(`Not retrying: server asked to wait ${retryAfter}s, over the ${config.maxDelayMs}ms limit`, {
        error: failure.message,
        status,
        attempts: attempt,
      });
      return { success: false, error: failure, attempts: attempt, totalTimeMs: Date.now() - startTime };
    }

    const delayMs = calculateDelay(attempt, config, retryAfter);

    log.info(`Retrying in ${Math.round(delayMs)}ms (${attempt}/${config.maxRetries})`, {
      error: failure.message,
      status,
      delayMs: Math.round(delayMs),
    });
    options.onRetry?.(attempt, failure, delayMs);

    await sleep(delayMs);
  }
}
