/**
 * Microsoft Graph API Client
 *
 * Provides a typed interface to the Graph endpoints ca-deploy needs with:
 * - Bearer token from a TokenProvider on every request
 * - One forced token refresh when Graph answers 401
 * - Per-request timeout
 * - Retry with exponential backoff (429 / 5xx / network); POSTs only on 429
 *   or a connection that was never made
 * - Logging with secret redaction
 */

import type {
  CreateGroupRequest,
  Group,
  GraphClientConfig,
  GraphErrorBody,
  HttpMethod,
  PolicyPayload,
  QueryParams,
  RemotePolicy,
  TokenProvider,
} from './types.js';
import {
  withRetry,
  ApiRequestError,
  isRetryableError,
  isRetryableBeforeSend,
  parseRetryAfter,
  DEFAULT_RETRY_CONFIG,
} from './retry.js';
import { ApiLogger } from './logger.js';
import { AuthError, isDeployError } from '../errors.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Groups sub-client
 */
export interface GroupsClient {
  /** Groups whose display name starts with `prefix` (all pages) */
  listByDisplayNamePrefix(prefix: string): Promise<Group[]>;
  create(request: CreateGroupRequest): Promise<Group>;
}

/**
 * Conditional Access policies sub-client
 */
export interface PoliciesClient {
  /** Policies whose display name ends with `suffix` (all pages) */
  listByDisplayNameSuffix(suffix: string): Promise<RemotePolicy[]>;
  create(payload: PolicyPayload): Promise<RemotePolicy>;
  update(policyId: string, payload: PolicyPayload): Promise<void>;
}

/**
 * Main Graph client interface
 */
export interface GraphClient {
  readonly groups: GroupsClient;
  readonly policies: PoliciesClient;

  getConfig(): { baseUrl: string; timeout: number };
}

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_GRAPH_BASE_URL = 'https://graph.microsoft.com/v1.0';
export const DEFAULT_TIMEOUT_MS = 30000;

const POLICIES_PATH = '/identity/conditionalAccess/policies';
const GROUP_SELECT = 'id,displayName,mailEnabled,mailNickname,securityEnabled,groupTypes';

// =============================================================================
// Response Parsing
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isGroup(value: unknown): value is Group {
  return isRecord(value) && typeof value.id === 'string' && typeof value.displayName === 'string';
}

function isRemotePolicy(value: unknown): value is RemotePolicy {
  return isRecord(value) && typeof value.id === 'string' && typeof value.displayName === 'string';
}

interface Page<T> {
  items: T[];
  nextLink?: string;
}

function readPage<T>(body: unknown, guard: (value: unknown) => value is T, what: string): Page<T> {
  if (!isRecord(body) || !Array.isArray(body.value)) {
    throw new Error(`Unexpected ${what} list response from Graph`);
  }
  const nextLink = body['@odata.nextLink'];
  return {
    items: body.value.filter(guard),
    nextLink: typeof nextLink === 'string' ? nextLink : undefined,
  };
}

function readEntity<T>(body: unknown, guard: (value: unknown) => value is T, what: string): T {
  if (!guard(body)) {
    throw new Error(`Unexpected ${what} response from Graph`);
  }
  return body;
}

function readGraphError(body: unknown): GraphErrorBody['error'] | undefined {
  if (!isRecord(body) || !isRecord(body.error)) return undefined;
  const { code, message } = body.error;
  return {
    code: typeof code === 'string' ? code : undefined,
    message: typeof message === 'string' ? message : undefined,
  };
}

/**
 * Escape a value for use inside an OData string literal
 */
export function escapeODataString(value: string): string {
  return value.replace(/'/g, "''");
}

// =============================================================================
// Client Implementation
// =============================================================================

/**
 * Create a Graph API client with auth, retry and logging
 */
export function createClient(config: GraphClientConfig): GraphClient {
  const baseUrl = (config.baseUrl ?? DEFAULT_GRAPH_BASE_URL).replace(/\/+$/, '');
  const timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;
  const tokenProvider: TokenProvider = config.tokenProvider;
  const log = config.logger ?? new ApiLogger({ level: 'warn' });
  const retryConfig = { ...DEFAULT_RETRY_CONFIG, ...config.retry };

  function buildUrl(pathOrUrl: string, params?: QueryParams): string {
    // nextLink values are absolute
    const url = /^https?:\/\//.test(pathOrUrl) ? new URL(pathOrUrl) : new URL(`${baseUrl}${pathOrUrl}`);
    if (params) {
      for (const [key, value] of Object.entries(params)) {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      }
    }
    return url.toString();
  }

  /**
   * Send one HTTP request and return the parsed JSON body (undefined for 204)
   */
  async function send(
    method: HttpMethod,
    url: string,
    token: string,
    body?: unknown
  ): Promise<unknown> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      Accept: 'application/json',
    };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    log.request(method, url, { headers, body });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const startTime = Date.now();
      const response = await fetch(url, {
        method,
        headers,
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: controller.signal,
      });
      const durationMs = Date.now() - startTime;

      const text = await response.text();
      let parsed: unknown = undefined;
      if (text) {
        try {
          parsed = JSON.parse(text);
        } catch {
          parsed = text;
        }
      }

      log.response(response.status, url, {
        durationMs,
        body: response.ok ? undefined : parsed,
      });

      if (!response.ok) {
        const graphError = readGraphError(parsed);
        const message =
          graphError?.message ??
          (typeof parsed === 'string' && parsed ? parsed.substring(0, 200) : `Graph API error (${response.status})`);

        throw new ApiRequestError(message, response.status, {
          code: graphError?.code,
          details: isRecord(parsed) ? parsed : undefined,
          retryAfter: parseRetryAfter(response.headers.get('Retry-After')),
        });
      }

      return parsed;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Send with a fresh-token retry on 401
   */
  async function sendAuthenticated(method: HttpMethod, url: string, body?: unknown): Promise<unknown> {
    const token = await tokenProvider.getToken();
    try {
      return await send(method, url, token, body);
    } catch (err) {
      if (!(err instanceof ApiRequestError) || !err.isUnauthorized()) {
        throw err;
      }
    }

    log.info('Graph returned 401, refreshing access token');
    const refreshed = await tokenProvider.getToken({ forceRefresh: true });
    try {
      return await send(method, url, refreshed, body);
    } catch (err) {
      if (err instanceof ApiRequestError && err.isUnauthorized()) {
        throw new AuthError(`Graph rejected the access token after a refresh: ${err.message}`, err);
      }
      throw err;
    }
  }

  /**
   * Make an API request with retry logic
   */
  async function request(
    method: HttpMethod,
    pathOrUrl: string,
    options: { params?: QueryParams; body?: unknown } = {}
  ): Promise<unknown> {
    const url = buildUrl(pathOrUrl, options.params);

    const result = await withRetry(() => sendAuthenticated(method, url, options.body), {
      ...retryConfig,
      logger: log,
      // Auth and config failures are never transient. A POST may have created
      // its object before failing, so it is resent only when Graph cannot have seen it.
      isRetryable: (error) =>
        !isDeployError(error) &&
        (method === 'POST' ? isRetryableBeforeSend(error) : isRetryableError(error, retryConfig)),
    });

    if (!result.success) {
      throw result.error;
    }

    return result.data;
  }

  /**
   * GET a collection, following @odata.nextLink until exhausted
   */
  async function listAll<T>(
    path: string,
    params: QueryParams,
    guard: (value: unknown) => value is T,
    what: string
  ): Promise<T[]> {
    const items: T[] = [];
    let page = readPage(await request('GET', path, { params }), guard, what);
    items.push(...page.items);

    while (page.nextLink) {
      page = readPage(await request('GET', page.nextLink), guard, what);
      items.push(...page.items);
    }

    return items;
  }

  // ---------------------------------------------------------------------------
  // Groups Client
  // ---------------------------------------------------------------------------

  const groups: GroupsClient = {
    async listByDisplayNamePrefix(prefix: string): Promise<Group[]> {
      return listAll(
        '/groups',
        {
          $filter: `startswith(displayName,'${escapeODataString(prefix)}')`,
          $select: GROUP_SELECT,
        },
        isGroup,
        'group'
      );
    },

    async create(req: CreateGroupRequest): Promise<Group> {
      const body = await request('POST', '/groups', { body: req });
      return readEntity(body, isGroup, 'group');
    },
  };

  // ---------------------------------------------------------------------------
  // Policies Client
  // ---------------------------------------------------------------------------

  const policies: PoliciesClient = {
    async listByDisplayNameSuffix(suffix: string): Promise<RemotePolicy[]> {
      return listAll(
        POLICIES_PATH,
        { $filter: `endswith(displayName,'${escapeODataString(suffix)}')` },
        isRemotePolicy,
        'policy'
      );
    },

    async create(payload: PolicyPayload): Promise<RemotePolicy> {
      const body = await request('POST', POLICIES_PATH, { body: payload });
      return readEntity(body, isRemotePolicy, 'policy');
    },

    async update(policyId: string, payload: PolicyPayload): Promise<void> {
      await request('PATCH', `${POLICIES_PATH}/${encodeURIComponent(policyId)}`, { body: payload });
    },
  };

  return {
    groups,
    policies,

    getConfig() {
      return { baseUrl, timeout };
    },
  };
}
