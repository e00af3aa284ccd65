/**
 * Type definitions for the Microsoft Graph endpoints used by ca-deploy
 *
 * Only the groups and Conditional Access policy resources are modelled.
 * Policy bodies stay loosely typed: the engine only touches the display name
 * and the user group lists, everything else is passed through to Graph.
 */

import type { ApiLogger } from './logger.js';

// =============================================================================
// Common Types
// =============================================================================

/**
 * Graph collection response envelope
 */
export interface GraphCollection<T> {
  value: T[];
  '@odata.nextLink'?: string;
}

/**
 * API error response shape
 */
export interface ApiError {
  /** HTTP status code */
  status: number;
  /** Error message from API */
  message: string;
  /** Error code for programmatic handling */
  code?: string;
  /** Additional error details */
  details?: Record<string, unknown>;
}

/**
 * Graph error body (`{ error: { code, message } }`)
 */
export interface GraphErrorBody {
  error?: {
    code?: string;
    message?: string;
    innerError?: Record<string, unknown>;
  };
}

// =============================================================================
// Request Types
// =============================================================================

/**
 * HTTP methods supported by the API
 */
export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

/**
 * Query parameter values accepted by the request builder
 */
export type QueryParams = Record<string, string | number | boolean | undefined>;

// =============================================================================
// Groups
// =============================================================================

/**
 * Directory group as returned by Graph
 */
export interface Group {
  id: string;
  displayName: string;
  description?: string | null;
  mailEnabled?: boolean;
  mailNickname?: string;
  securityEnabled?: boolean;
  groupTypes?: string[];
  membershipRule?: string | null;
  membershipRuleProcessingState?: string | null;
}

/**
 * Create group request body
 */
export interface CreateGroupRequest {
  displayName: string;
  description?: string;
  mailEnabled: boolean;
  mailNickname: string;
  securityEnabled: boolean;
  groupTypes?: string[];
  membershipRule?: string;
  membershipRuleProcessingState?: 'On' | 'Paused';
}

// =============================================================================
// Conditional Access Policies
// =============================================================================

/**
 * Conditional Access policy state values
 */
export type PolicyState = 'enabled' | 'disabled' | 'enabledForReportingButNotEnforced';

/**
 * Conditional Access policy body. Fields other than `displayName` and the
 * user group lists are opaque here.
 */
export interface PolicyPayload {
  displayName: string;
  state?: string;
  conditions?: PolicyConditions;
  [field: string]: unknown;
}

export interface PolicyConditions {
  users?: PolicyUserConditions;
  [field: string]: unknown;
}

export interface PolicyUserConditions {
  includeGroups?: string[];
  excludeGroups?: string[];
  [field: string]: unknown;
}

/**
 * Conditional Access policy as stored in the tenant
 */
export interface RemotePolicy extends PolicyPayload {
  id: string;
  createdDateTime?: string | null;
  modifiedDateTime?: string | null;
}

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * Supplies bearer tokens to the client. `forceRefresh` asks for a new token
 * instead of a cached one.
 */
export interface TokenProvider {
  getToken(options?: { forceRefresh?: boolean }): Promise<string>;
}

/**
 * Graph client configuration
 */
export interface GraphClientConfig {
  /** Token source for the Authorization header */
  tokenProvider: TokenProvider;
  /** Base URL for Graph (defaults to https://graph.microsoft.com/v1.0) */
  baseUrl?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Retry policy overrides */
  retry?: RetryConfig;
  /** Logger for request/response tracing (default: warn-level logger) */
  logger?: ApiLogger;
}

/**
 * Retry configuration for API requests
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
  /** Jitter factor (0-1) to add randomness (default: 0.1) */
  jitterFactor?: number;
  /** HTTP status codes to retry on (default: [429, 500, 502, 503, 504]) */
  retryableStatuses?: number[];
}

/**
 * Result of a retry operation
 */
export type RetryResult<T> =
  | {
      success: true;
      /** The result data */
      data: T;
      /** Number of attempts made */
      attempts: number;
      /** Total time spent on retries (ms) */
      totalTimeMs: number;
    }
  | {
      success: false;
      /** The last error seen */
      error: Error;
      attempts: number;
      totalTimeMs: number;
    };
