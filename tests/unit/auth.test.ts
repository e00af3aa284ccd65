/**
 * Unit Tests: Token Providers
 *
 * Tests the two token sources:
 * 1. A static CA_DEPLOY_ACCESS_TOKEN
 * 2. MSAL device code sign-in with silent refresh
 *
 * @see src/config/auth.ts
 */

import { describe, it, expect, vi } from 'vitest';
import type { AccountInfo, DeviceCodeRequest, SilentFlowRequest } from '@azure/msal-node';
import {
  createDeviceCodeTokenProvider,
  createStaticTokenProvider,
  type DeviceCodeApp,
  type TokenResult,
} from '../../src/config/auth.js';
import { createLogger } from '../../src/api/logger.js';
import { AuthError } from '../../src/errors.js';

// =============================================================================
// Test Fixtures
// =============================================================================

const quietLogger = createLogger({ level: 'error' });

const ACCOUNT: AccountInfo = {
  homeAccountId: 'home-id',
  environment: 'login.microsoftonline.com',
  tenantId: 'test-tenant',
  username: 'admin@contoso.test',
  localAccountId: 'local-id',
};

function tokenResult(accessToken: string, expiresInMs: number, account: AccountInfo | null = ACCOUNT): TokenResult {
  return { accessToken, expiresOn: new Date(Date.now() + expiresInMs), account };
}

const HOUR = 60 * 60 * 1000;

function createFakeApp(
  signIn: () => Promise<TokenResult | null>,
  silent: (request: SilentFlowRequest) => Promise<TokenResult> = async () => tokenResult('refreshed-token', HOUR)
) {
  const acquireTokenByDeviceCode = vi.fn(async (request: DeviceCodeRequest) => {
    request.deviceCodeCallback({
      userCode: 'ABCD1234',
      deviceCode: 'device-code',
      verificationUri: 'https://microsoft.com/devicelogin',
      expiresIn: 900,
      interval: 5,
      message: 'To sign in, open https://microsoft.com/devicelogin and enter ABCD1234',
    });
    return signIn();
  });
  const acquireTokenSilent = vi.fn(silent);
  const app: DeviceCodeApp = { acquireTokenByDeviceCode, acquireTokenSilent };
  return { app, acquireTokenByDeviceCode, acquireTokenSilent };
}

// =============================================================================
// Static Token
// =============================================================================

describe('createStaticTokenProvider', () => {
  it('returns the configured token', async () => {
    const provider = createStaticTokenProvider('test-token');

    expect(await provider.getToken()).toBe('test-token');
  });

  it('cannot refresh', async () => {
    const provider = createStaticTokenProvider('test-token');

    await expect(provider.getToken({ forceRefresh: true })).rejects.toBeInstanceOf(AuthError);
  });
});

// =============================================================================
// Device Code
// =============================================================================

describe('createDeviceCodeTokenProvider', () => {
  it('signs in once and reuses a fresh token', async () => {
    const { app, acquireTokenByDeviceCode, acquireTokenSilent } = createFakeApp(async () =>
      tokenResult('first-token', HOUR)
    );
    const onDeviceCode = vi.fn();
    const provider = createDeviceCodeTokenProvider({
      tenantId: 'test-tenant',
      clientId: 'test-client',
      app,
      onDeviceCode,
      logger: quietLogger,
    });

    expect(await provider.getToken()).toBe('first-token');
    expect(await provider.getToken()).toBe('first-token');
    expect(acquireTokenByDeviceCode).toHaveBeenCalledTimes(1);
    expect(acquireTokenSilent).not.toHaveBeenCalled();
    expect(onDeviceCode).toHaveBeenCalledWith(
      'To sign in, open https://microsoft.com/devicelogin and enter ABCD1234'
    );
  });

  it('refreshes silently when the token is about to expire', async () => {
    const { app, acquireTokenSilent } = createFakeApp(async () => tokenResult('first-token', 60 * 1000));
    const provider = createDeviceCodeTokenProvider({
      tenantId: 'test-tenant',
      clientId: 'test-client',
      app,
      logger: quietLogger,
    });

    await provider.getToken();
    expect(await provider.getToken()).toBe('refreshed-token');
    expect(acquireTokenSilent).toHaveBeenCalledTimes(1);
    expect(acquireTokenSilent.mock.calls[0]?.[0]).toMatchObject({ account: ACCOUNT, forceRefresh: false });
  });

  it('forces a refresh on request', async () => {
    const { app, acquireTokenSilent } = createFakeApp(async () => tokenResult('first-token', HOUR));
    const provider = createDeviceCodeTokenProvider({
      tenantId: 'test-tenant',
      clientId: 'test-client',
      app,
      logger: quietLogger,
    });

    await provider.getToken();
    expect(await provider.getToken({ forceRefresh: true })).toBe('refreshed-token');
    expect(acquireTokenSilent.mock.calls[0]?.[0]).toMatchObject({ forceRefresh: true });
  });

  it('asks for the Conditional Access and group scopes', async () => {
    const { app, acquireTokenByDeviceCode } = createFakeApp(async () => tokenResult('first-token', HOUR));
    const provider = createDeviceCodeTokenProvider({
      tenantId: 'test-tenant',
      clientId: 'test-client',
      app,
      logger: quietLogger,
    });

    await provider.getToken();

    expect(acquireTokenByDeviceCode.mock.calls[0]?.[0].scopes).toEqual([
      'https://graph.microsoft.com/Policy.Read.All',
      'https://graph.microsoft.com/Policy.ReadWrite.ConditionalAccess',
      'https://graph.microsoft.com/Group.ReadWrite.All',
    ]);
  });

  it('turns a failed sign-in into an AuthError', async () => {
    const { app } = createFakeApp(async () => {
      throw new Error('authorization_declined');
    });
    const provider = createDeviceCodeTokenProvider({
      tenantId: 'test-tenant',
      clientId: 'test-client',
      app,
      logger: quietLogger,
    });

    await expect(provider.getToken()).rejects.toThrow('Device code sign-in failed: authorization_declined');
    await expect(provider.getToken()).rejects.toBeInstanceOf(AuthError);
  });

  it('rejects a sign-in without a token', async () => {
    const { app } = createFakeApp(async () => null);
    const provider = createDeviceCodeTokenProvider({
      tenantId: 'test-tenant',
      clientId: 'test-client',
      app,
      logger: quietLogger,
    });

    await expect(provider.getToken()).rejects.toThrow('Device code sign-in returned no access token');
  });

  it('cannot refresh without a cached account', async () => {
    const { app } = createFakeApp(async () => tokenResult('first-token', HOUR, null));
    const provider = createDeviceCodeTokenProvider({
      tenantId: 'test-tenant',
      clientId: 'test-client',
      app,
      logger: quietLogger,
    });

    await provider.getToken();
    await expect(provider.getToken({ forceRefresh: true })).rejects.toThrow(
      'Access token expired and no account is cached for a silent refresh'
    );
  });

  it('turns a failed refresh into an AuthError', async () => {
    const { app } = createFakeApp(
      async () => tokenResult('first-token', HOUR),
      async () => {
        throw new Error('interaction_required');
      }
    );
    const provider = createDeviceCodeTokenProvider({
      tenantId: 'test-tenant',
      clientId: 'test-client',
      app,
      logger: quietLogger,
    });

    await provider.getToken();
    await expect(provider.getToken({ forceRefresh: true })).rejects.toThrow(
      'Token refresh failed: interaction_required'
    );
  });
});
