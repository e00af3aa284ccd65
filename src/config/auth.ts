/**
 * Entra ID authentication for ca-deploy
 *
 * Tokens come from one of two sources:
 *
 * 1. CA_DEPLOY_ACCESS_TOKEN: a pre-acquired Graph token (CI, pipelines).
 *    It cannot be refreshed; a 401 after it ends the run.
 * 2. Device code flow through @azure/msal-node. The first token is acquired
 *    interactively; later calls go through acquireTokenSilent, which uses the
 *    cached refresh token, so long runs survive access token expiry.
 */

import {
  PublicClientApplication,
  type AccountInfo,
  type DeviceCodeRequest,
  type SilentFlowRequest,
} from '@azure/msal-node';
import type { TokenProvider } from '../api/types.js';
import { logger as defaultLogger, type ApiLogger } from '../api/logger.js';
import { AuthError } from '../errors.js';

// =============================================================================
// Constants
// =============================================================================

/**
 * Delegated Graph permissions the deployment needs
 */
export const GRAPH_SCOPES = [
  'https://graph.microsoft.com/Policy.Read.All',
  'https://graph.microsoft.com/Policy.ReadWrite.ConditionalAccess',
  'https://graph.microsoft.com/Group.ReadWrite.All',
];

/** Tokens expiring within this window are refreshed before use */
const EXPIRY_SKEW_MS = 5 * 60 * 1000;

// =============================================================================
// Types
// =============================================================================

/**
 * Fields of an MSAL AuthenticationResult the provider reads
 */
export interface TokenResult {
  accessToken: string;
  expiresOn: Date | null;
  account: AccountInfo | null;
}

/**
 * The part of PublicClientApplication the provider uses
 */
export interface DeviceCodeApp {
  acquireTokenByDeviceCode(request: DeviceCodeRequest): Promise<TokenResult | null>;
  acquireTokenSilent(request: SilentFlowRequest): Promise<TokenResult>;
}

export interface DeviceCodeAuthOptions {
  tenantId: string;
  clientId: string;
  scopes?: string[];
  /** Receives the "go to https://microsoft.com/devicelogin and enter ..." text */
  onDeviceCode?: (message: string) => void;
  /** Override the MSAL application (tests) */
  app?: DeviceCodeApp;
  logger?: ApiLogger;
}

// =============================================================================
// Providers
// =============================================================================

/**
 * Token provider for a pre-acquired access token
 */
export function createStaticTokenProvider(token: string): TokenProvider {
  return {
    async getToken(options = {}): Promise<string> {
      if (options.forceRefresh) {
        throw new AuthError('The configured access token was rejected and cannot be refreshed');
      }
      return token;
    },
  };
}

/**
 * Token provider backed by the MSAL device code flow
 */
export function createDeviceCodeTokenProvider(options: DeviceCodeAuthOptions): TokenProvider {
  const scopes = options.scopes ?? GRAPH_SCOPES;
  const log = options.logger ?? defaultLogger;
  const onDeviceCode = options.onDeviceCode ?? ((message: string) => console.error(message));
  const app: DeviceCodeApp =
    options.app ??
    new PublicClientApplication({
      auth: {
        clientId: options.clientId,
        authority: `https://login.microsoftonline.com/${options.tenantId}`,
      },
    });

  let current: TokenResult | null = null;

  function isFresh(result: TokenResult): boolean {
    if (!result.expiresOn) return true;
    return result.expiresOn.getTime() - Date.now() > EXPIRY_SKEW_MS;
  }

  async function signIn(): Promise<TokenResult> {
    let result: TokenResult | null;
    try {
      result = await app.acquireTokenByDeviceCode({
        scopes,
        deviceCodeCallback: (response) => onDeviceCode(response.message),
      });
    } catch (err) {
      throw new AuthError(
        `Device code sign-in failed: ${err instanceof Error ? err.message : String(err)}`,
        err instanceof Error ? err : undefined
      );
    }
    if (!result?.accessToken) {
      throw new AuthError('Device code sign-in returned no access token');
    }
    log.info('Signed in', { account: result.account?.username });
    return result;
  }

  async function refresh(previous: TokenResult, forceRefresh: boolean): Promise<TokenResult> {
    if (!previous.account) {
      throw new AuthError('Access token expired and no account is cached for a silent refresh');
    }
    try {
      const result = await app.acquireTokenSilent({
        account: previous.account,
        scopes,
        forceRefresh,
      });
      log.debug('Access token refreshed', { expiresOn: result.expiresOn?.toISOString() });
      return result;
    } catch (err) {
      throw new AuthError(
        `Token refresh failed: ${err instanceof Error ? err.message : String(err)}`,
        err instanceof Error ? err : undefined
      );
    }
  }

  return {
    async getToken(request = {}): Promise<string> {
      const forceRefresh = request.forceRefresh ?? false;

      if (current === null) {
        current = await signIn();
      } else if (forceRefresh || !isFresh(current)) {
        current = await refresh(current, forceRefresh);
      }

      return current.accessToken;
    },
  };
}
