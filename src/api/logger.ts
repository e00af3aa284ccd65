/**
 * Structured logging for ca-deploy
 *
 * Everything goes to stderr so stdout stays free for command output (and
 * parseable under --json). Messages and context are scrubbed of Graph bearer
 * tokens, Entra JWTs and client secrets before they are written.
 */

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  /** Minimum level written (default: info) */
  level?: LogLevel;
  /** One JSON object per line instead of text */
  json?: boolean;
  /** Prefix text lines with an ISO timestamp (default: true) */
  timestamps?: boolean;
}

// =============================================================================
// Redaction
// =============================================================================

const SECRET_PATTERNS: readonly RegExp[] = [
  /Bearer\s+[a-zA-Z0-9._~+/=-]+/gi,
  // Entra access and id tokens
  /eyJ[a-zA-Z0-9_-]*\.eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*/g,
  /client[_-]?secret[=:]\s*[^\s&"']+/gi,
  /secret[_-]?[a-zA-Z0-9]{10,}/gi,
  /token[_-]?[a-zA-Z0-9]{10,}/gi,
];

const SECRET_HEADERS = new Set(['authorization', 'proxy-authorization', 'cookie', 'set-cookie', 'x-api-key']);

/** Compared lower-cased */
const SECRET_KEYS = new Set([
  'accesstoken',
  'access_token',
  'refreshtoken',
  'refresh_token',
  'idtoken',
  'id_token',
  'token',
  'clientsecret',
  'client_secret',
  'secret',
  'password',
  'credentials',
  'devicecode',
  'device_code',
]);

const MAX_REDACTION_DEPTH = 10;

/**
 * Keep the first and last four characters of a secret
 *
 * @example
 * redactString('abcdefghijklmnop') // 'abcd...mnop'
 * redactString('short') // '[REDACTED]'
 */
export function redactString(value: string): string {
  return value.length < 10 ? '[REDACTED]' : `${value.slice(0, 4)}...${value.slice(-4)}`;
}

/**
 * Replace anything that looks like a token or secret inside free text
 */
export function redactPatterns(value: string): string {
  return SECRET_PATTERNS.reduce((text, pattern) => {
    pattern.lastIndex = 0;
    return text.replace(pattern, (match) => redactString(match));
  }, value);
}

function isSecretKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SECRET_KEYS.has(lower) || SECRET_HEADERS.has(lower);
}

/**
 * Deep copy of a JSON-like value with secrets scrubbed
 */
export function redactValue(value: unknown, depth = 0): unknown {
  if (depth > MAX_REDACTION_DEPTH) return '[MAX_DEPTH]';
  if (typeof value === 'string') return redactPatterns(value);
  if (Array.isArray(value)) return value.map((item) => redactValue(item, depth + 1));
  if (typeof value === 'object' && value !== null) {
    return redactObject(Object.fromEntries(Object.entries(value)), depth);
  }
  return value;
}

/**
 * Scrub an object: values under secret-looking keys are masked outright,
 * everything else is pattern-redacted
 */
export function redactObject(obj: Record<string, unknown>, depth = 0): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (!isSecretKey(key)) {
      result[key] = redactValue(value, depth + 1);
    } else if (typeof value === 'string' && value !== '') {
      result[key] = redactString(value);
    } else {
      result[key] = value === null || value === undefined ? value : '[REDACTED]';
    }
  }
  return result;
}

export function redactHeaders(headers: Headers | Record<string, string>): Record<string, string> {
  const entries: [string, string][] =
    headers instanceof Headers ? Array.from(headers.entries()) : Object.entries(headers);

  return Object.fromEntries(
    entries.map(([key, value]) => [
      key,
      SECRET_HEADERS.has(key.toLowerCase()) ? redactString(value) : redactPatterns(value),
    ])
  );
}

/**
 * Log level from CA_DEPLOY_LOG_LEVEL; unknown values are ignored
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const level = value?.trim().toLowerCase();
  return level === 'debug' || level === 'info' || level === 'warn' || level === 'error' ? level : undefined;
}

// =============================================================================
// Logger
// =============================================================================

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export class ApiLogger {
  private readonly config: Required<LoggerConfig>;
  private readonly baseContext: Record<string, unknown>;

  constructor(config: LoggerConfig = {}, baseContext: Record<string, unknown> = {}) {
    this.config = {
      level: config.level ?? 'info',
      json: config.json ?? false,
      timestamps: config.timestamps ?? true,
    };
    this.baseContext = redactObject(baseContext);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.config.level];
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Outgoing request, at debug
   */
  request(method: string, url: string, options: { headers?: Headers | Record<string, string>; body?: unknown } = {}): void {
    this.log('debug', 'HTTP Request', {
      method,
      url,
      headers: options.headers ? redactHeaders(options.headers) : undefined,
      body: options.body,
    });
  }

  /**
   * Graph response: failures at warn, the rest at debug
   */
  response(status: number, url: string, options: { body?: unknown; durationMs?: number } = {}): void {
    this.log(status >= 400 ? 'warn' : 'debug', `HTTP Response ${status}: ${url}`, {
      status,
      durationMs: options.durationMs,
      body: options.body,
    });
  }

  /**
   * Logger that adds `context` to every entry
   */
  child(context: Record<string, unknown>): ApiLogger {
    return new ApiLogger(this.config, { ...this.baseContext, ...context });
  }

  formatEntry(entry: LogEntry): string {
    if (this.config.json) {
      return JSON.stringify(entry);
    }

    let line = this.config.timestamps ? `[${entry.timestamp}] ` : '';
    line += `[${entry.level.toUpperCase()}] ${entry.message}`;
    if (entry.context && Object.keys(entry.context).length > 0) {
      line += ` ${JSON.stringify(entry.context)}`;
    }
    if (entry.error) {
      line += `\n  Error: ${entry.error.name}: ${entry.error.message}`;
    }
    return line;
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: redactPatterns(message),
    };

    const merged = { ...this.baseContext, ...context };
    if (Object.keys(merged).length > 0) {
      entry.context = redactObject(merged);
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: redactPatterns(error.message),
        stack: error.stack === undefined ? undefined : redactPatterns(error.stack),
      };
    }

    const line = this.formatEntry(entry);
    if (level === 'warn') {
      console.warn(line);
    } else {
      console.error(line);
    }
  }
}

// =============================================================================
// Default Instance
// =============================================================================

export const logger = new ApiLogger({
  level: parseLogLevel(process.env.CA_DEPLOY_LOG_LEVEL),
  json: process.env.CA_DEPLOY_LOG_JSON === 'true',
});

export function createLogger(config: LoggerConfig = {}): ApiLogger {
  return new ApiLogger(config);
}
