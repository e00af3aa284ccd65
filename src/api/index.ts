/**
 * Graph API client module
 *
 * Provides:
 * - GraphClient with groups and Conditional Access policies sub-clients
 * - Retry logic with exponential backoff
 * - Logging with secret redaction
 */

// Main client
export { createClient, escapeODataString, DEFAULT_GRAPH_BASE_URL, DEFAULT_TIMEOUT_MS } from './client.js';

export type { GraphClient, GroupsClient, PoliciesClient } from './client.js';

// Retry utilities
export {
  withRetry,
  ApiRequestError,
  calculateDelay,
  isRetryableError,
  isRetryableBeforeSend,
  parseRetryAfter,
  sleep,
  DEFAULT_RETRY_CONFIG,
  RATE_LIMIT_STATUS,
  UNAUTHORIZED_STATUS,
  SERVER_ERROR_THRESHOLD,
} from './retry.js';

export type { RetryOptions } from './retry.js';

// Logger utilities
export {
  logger,
  createLogger,
  ApiLogger,
  parseLogLevel,
  redactString,
  redactPatterns,
  redactObject,
  redactValue,
  redactHeaders,
} from './logger.js';

export type { LogLevel, LogEntry, LoggerConfig } from './logger.js';

// Types
export type {
  GraphCollection,
  ApiError,
  GraphErrorBody,
  HttpMethod,
  QueryParams,
  Group,
  CreateGroupRequest,
  PolicyState,
  PolicyPayload,
  PolicyConditions,
  PolicyUserConditions,
  RemotePolicy,
  TokenProvider,
  GraphClientConfig,
  RetryConfig,
  RetryResult,
} from './types.js';
