/**
 * Unit Tests: Logger and Redaction
 *
 * @see src/api/logger.ts
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  ApiLogger,
  createLogger,
  parseLogLevel,
  redactHeaders,
  redactObject,
  redactPatterns,
  redactString,
} from '../../src/api/logger.js';

afterEach(() => {
  vi.restoreAllMocks();
});

// =============================================================================
// Redaction
// =============================================================================

describe('redactString', () => {
  it('keeps the ends of long values', () => {
    expect(redactString('abcdefghijklmnop')).toBe('abcd...mnop');
  });

  it('hides short values entirely', () => {
    expect(redactString('short')).toBe('[REDACTED]');
  });
});

describe('redactPatterns', () => {
  it('redacts bearer tokens', () => {
    expect(redactPatterns('Authorization: Bearer abc.def.ghi123')).toBe('Authorization: Bear...i123');
  });

  it('redacts JWTs', () => {
    expect(redactPatterns('got eyJhbGciOi.eyJzdWIiOi.c2lnbmF0dXJl')).toBe('got eyJh...dXJl');
  });

  it('leaves ordinary text alone', () => {
    expect(redactPatterns('Created policy CA01 - Require MFA')).toBe('Created policy CA01 - Require MFA');
  });
});

describe('redactObject', () => {
  it('redacts sensitive keys at any depth', () => {
    expect(
      redactObject({
        access_token: 'test-secret-value',
        password: 'short',
        headers: { Authorization: 'Bearer abcdefghijkl' },
        count: 3,
      })
    ).toEqual({
      access_token: 'test...alue',
      password: '[REDACTED]',
      headers: { Authorization: 'Bear...ijkl' },
      count: 3,
    });
  });
});

describe('redactHeaders', () => {
  it('redacts the Authorization header', () => {
    const headers = new Headers({ Authorization: 'Bearer abcdefghijkl', Accept: 'application/json' });

    expect(redactHeaders(headers)).toEqual({
      authorization: 'Bear...ijkl',
      accept: 'application/json',
    });
  });
});

describe('parseLogLevel', () => {
  it('accepts known levels in any case', () => {
    expect(parseLogLevel('WARN')).toBe('warn');
    expect(parseLogLevel('debug')).toBe('debug');
  });

  it('ignores unknown or missing values', () => {
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});

// =============================================================================
// ApiLogger
// =============================================================================

describe('ApiLogger', () => {
  it('writes warnings with redacted message and context', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const log = new ApiLogger({ level: 'warn', timestamps: false });

    log.warn('Token token_abcdefghijkl leaked', { accessToken: 'test-access-token' });

    expect(warn).toHaveBeenCalledWith('[WARN] Token toke...ijkl leaked {"accessToken":"test...oken"}');
  });

  it('drops entries below its level', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const log = new ApiLogger({ level: 'warn', timestamps: false });

    log.info('not shown');
    log.debug('not shown either');

    expect(error).not.toHaveBeenCalled();
  });

  it('writes JSON lines with error details', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const log = new ApiLogger({ json: true });

    log.error('Request failed', new Error('boom'), { status: 500 });

    expect(error).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(error.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({
      level: 'error',
      message: 'Request failed',
      context: { status: 500 },
      error: { name: 'Error', message: 'boom' },
    });
  });

  it('carries child context on every entry', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const log = createLogger({ timestamps: false }).child({ template: '1-mfa.json' });

    log.info('Created', { policyId: 'policy-1' });

    expect(error).toHaveBeenCalledWith('[INFO] Created {"template":"1-mfa.json","policyId":"policy-1"}');
  });

  it('logs failed responses at warn', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const log = new ApiLogger({ level: 'warn', timestamps: false });

    log.response(404, 'https://graph.test/v1.0/groups', { durationMs: 12 });

    expect(warn).toHaveBeenCalledWith(
      '[WARN] HTTP Response 404: https://graph.test/v1.0/groups {"status":404,"durationMs":12}'
    );
  });
});
