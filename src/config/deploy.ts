/**
 * Deployment configuration resolution
 *
 * Each option is resolved from (highest to lowest):
 * 1. CLI flag
 * 2. Environment variable (CA_DEPLOY_*)
 * 3. Config file (ca-deploy.yaml in the working directory, or --config)
 * 4. Default, usually derived from the prefix
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { PolicyState } from '../api/types.js';
import { DEFAULT_GRAPH_BASE_URL, DEFAULT_TIMEOUT_MS } from '../api/client.js';
import { ConfigError } from '../errors.js';

// =============================================================================
// Constants
// =============================================================================

/** Config file looked up in the working directory */
export const DEFAULT_CONFIG_FILE = 'ca-deploy.yaml';

/** Delay between templates */
export const DEFAULT_PACING_MS = 1000;

/** Microsoft Entra ID P2 service plan (AAD_PREMIUM_P2) */
export const AADP2_SERVICE_PLAN_ID = 'eec0eb4f-6444-4f95-aba0-50c24d67f998';

const POLICY_STATES: readonly PolicyState[] = [
  'enabled',
  'disabled',
  'enabledForReportingButNotEnforced',
];

// =============================================================================
// Types
// =============================================================================

/**
 * Fully resolved configuration for a run
 */
export interface DeployConfig {
  /** Run prefix, e.g. "CA" */
  prefix: string;
  /** Per-template exclusion groups are named exclusionGroupPrefix + "CA01" */
  exclusionGroupPrefix: string;
  groups: {
    aadp2: string;
    syncAccounts: string;
    emergencyAccess: string;
  };
  /** Absolute path of the templates folder */
  templatesDir: string;
  auth: {
    tenantId?: string;
    clientId?: string;
    accessToken?: string;
  };
  graphBaseUrl: string;
  pacingMs: number;
  timeoutMs: number;
  sequenceStart: number;
  /** Create the AADP2 group with a license-based dynamic membership rule */
  aadp2Dynamic: boolean;
  aadp2ServicePlanId: string;
  /** Replaces each payload's `state` when set */
  stateOverride?: PolicyState;
}

/**
 * Values taken from CLI flags (strings as commander hands them over)
 */
export interface ConfigOverrides {
  config?: string;
  prefix?: string;
  exclusionPrefix?: string;
  aadp2Group?: string;
  syncAccountsGroup?: string;
  emergencyAccessGroup?: string;
  templates?: string;
  tenantId?: string;
  clientId?: string;
  graphUrl?: string;
  pacing?: string;
  timeout?: string;
  start?: string;
  aadp2Dynamic?: boolean;
  state?: string;
}

/**
 * Shape of ca-deploy.yaml
 */
export interface FileConfig {
  prefix?: string;
  exclusionGroupPrefix?: string;
  groups?: {
    aadp2?: string;
    syncAccounts?: string;
    emergencyAccess?: string;
  };
  templates?: string;
  auth?: {
    tenantId?: string;
    clientId?: string;
  };
  graphBaseUrl?: string;
  pacingMs?: number;
  timeoutMs?: number;
  sequenceStart?: number;
  aadp2Dynamic?: boolean;
  aadp2ServicePlanId?: string;
  stateOverride?: string;
}

export interface ResolveConfigOptions {
  cli?: ConfigOverrides;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Require tenant/client ids or an access token (false for offline commands) */
  requireAuth?: boolean;
}

// =============================================================================
// Config File
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(source: Record<string, unknown>, key: string, path: string): string | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigError(`${path}.${key} in config file must be a string`, 'config');
  }
  return value;
}

function readNumber(source: Record<string, unknown>, key: string): number | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ConfigError(`${key} in config file must be an integer`, 'config');
  }
  return value;
}

function readBoolean(source: Record<string, unknown>, key: string): boolean | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${key} in config file must be true or false`, 'config');
  }
  return value;
}

function readSection(source: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = source[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new ConfigError(`${key} in config file must be a mapping`, 'config');
  }
  return value;
}

/**
 * Parse the text of a YAML config file
 */
export function parseConfigFile(content: string): FileConfig {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    throw new ConfigError(
      `Config file is not valid YAML: ${err instanceof Error ? err.message : String(err)}`,
      'config'
    );
  }
  if (raw === null || raw === undefined) return {};
  if (!isRecord(raw)) {
    throw new ConfigError('Config file must contain a mapping at the top level', 'config');
  }

  const groups = readSection(raw, 'groups');
  const auth = readSection(raw, 'auth');

  return {
    prefix: readString(raw, 'prefix', 'config'),
    exclusionGroupPrefix: readString(raw, 'exclusionGroupPrefix', 'config'),
    groups: {
      aadp2: readString(groups, 'aadp2', 'groups'),
      syncAccounts: readString(groups, 'syncAccounts', 'groups'),
      emergencyAccess: readString(groups, 'emergencyAccess', 'groups'),
    },
    templates: readString(raw, 'templates', 'config'),
    auth: {
      tenantId: readString(auth, 'tenantId', 'auth'),
      clientId: readString(auth, 'clientId', 'auth'),
    },
    graphBaseUrl: readString(raw, 'graphBaseUrl', 'config'),
    pacingMs: readNumber(raw, 'pacingMs'),
    timeoutMs: readNumber(raw, 'timeoutMs'),
    sequenceStart: readNumber(raw, 'sequenceStart'),
    aadp2Dynamic: readBoolean(raw, 'aadp2Dynamic'),
    aadp2ServicePlanId: readString(raw, 'aadp2ServicePlanId', 'config'),
    stateOverride: readString(raw, 'stateOverride', 'config'),
  };
}

/**
 * Load the config file, if there is one
 *
 * An explicitly named file must exist; the default one is optional.
 */
export function loadConfigFile(
  explicitPath: string | undefined,
  cwd: string
): { config: FileConfig; path: string } | null {
  const path = resolve(cwd, explicitPath ?? DEFAULT_CONFIG_FILE);
  if (!existsSync(path)) {
    if (explicitPath) {
      throw new ConfigError(`Config file not found: ${path}`, 'config');
    }
    return null;
  }
  return { config: parseConfigFile(readFileSync(path, 'utf-8')), path };
}

// =============================================================================
// Resolution
// =============================================================================

function nonEmpty(...values: Array<string | undefined>): string | undefined {
  for (const value of values) {
    if (value !== undefined && value.trim() !== '') return value.trim();
  }
  return undefined;
}

function parseInteger(value: string, option: string, min: number): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigError(`--${option} must be a whole number, got "${value}"`, option);
  }
  const parsed = parseInt(value, 10);
  if (parsed < min) {
    throw new ConfigError(`--${option} must be at least ${min}, got ${parsed}`, option);
  }
  return parsed;
}

function pickInteger(
  option: string,
  min: number,
  fallback: number,
  cliOrEnv: string | undefined,
  fromFile: number | undefined
): number {
  if (cliOrEnv !== undefined) return parseInteger(cliOrEnv, option, min);
  if (fromFile !== undefined) {
    if (fromFile < min) {
      throw new ConfigError(`${option} must be at least ${min}, got ${fromFile}`, option);
    }
    return fromFile;
  }
  return fallback;
}

/**
 * Narrow a string to a policy state
 */
export function parsePolicyState(value: string): PolicyState {
  const state = POLICY_STATES.find((s) => s === value);
  if (!state) {
    throw new ConfigError(
      `Invalid policy state "${value}" (expected one of: ${POLICY_STATES.join(', ')})`,
      'state'
    );
  }
  return state;
}

/**
 * Resolve the run configuration from CLI flags, environment and config file
 */
export function resolveDeployConfig(options: ResolveConfigOptions = {}): DeployConfig {
  const cli = options.cli ?? {};
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const requireAuth = options.requireAuth ?? true;

  const loaded = loadConfigFile(cli.config, cwd);
  const file = loaded?.config ?? {};
  const fileDir = loaded ? dirname(loaded.path) : cwd;

  const prefix = nonEmpty(cli.prefix, env.CA_DEPLOY_PREFIX, file.prefix);
  if (!prefix) {
    throw new ConfigError('A run prefix is required', 'prefix');
  }

  // CLI and env paths are relative to the working directory, file paths to the file
  const templatesFromCliOrEnv = nonEmpty(cli.templates, env.CA_DEPLOY_TEMPLATES);
  const templatesFromFile = nonEmpty(file.templates);
  let templatesDir: string;
  if (templatesFromCliOrEnv) {
    templatesDir = resolve(cwd, templatesFromCliOrEnv);
  } else if (templatesFromFile) {
    templatesDir = resolve(fileDir, templatesFromFile);
  } else {
    throw new ConfigError('A templates folder is required', 'templates');
  }

  const auth = {
    tenantId: nonEmpty(cli.tenantId, env.CA_DEPLOY_TENANT_ID, file.auth?.tenantId),
    clientId: nonEmpty(cli.clientId, env.CA_DEPLOY_CLIENT_ID, file.auth?.clientId),
    accessToken: nonEmpty(env.CA_DEPLOY_ACCESS_TOKEN),
  };

  if (requireAuth && !auth.accessToken) {
    if (!auth.tenantId) {
      throw new ConfigError('A tenant id is required for sign-in', 'tenant-id');
    }
    if (!auth.clientId) {
      throw new ConfigError('A client id is required for sign-in', 'client-id');
    }
  }

  const stateValue = nonEmpty(cli.state, file.stateOverride);

  return {
    prefix,
    exclusionGroupPrefix:
      nonEmpty(cli.exclusionPrefix, env.CA_DEPLOY_EXCLUSION_PREFIX, file.exclusionGroupPrefix) ??
      `${prefix}_Exclusion_`,
    groups: {
      aadp2: nonEmpty(cli.aadp2Group, env.CA_DEPLOY_AADP2_GROUP, file.groups?.aadp2) ?? `${prefix}_AADP2`,
      syncAccounts:
        nonEmpty(cli.syncAccountsGroup, env.CA_DEPLOY_SYNC_ACCOUNTS_GROUP, file.groups?.syncAccounts) ??
        `${prefix}_Exclusion_SynchronizationServiceAccounts`,
      emergencyAccess:
        nonEmpty(cli.emergencyAccessGroup, env.CA_DEPLOY_EMERGENCY_ACCESS_GROUP, file.groups?.emergencyAccess) ??
        `${prefix}_Exclusion_EmergencyAccessAccounts`,
    },
    templatesDir,
    auth,
    graphBaseUrl: nonEmpty(cli.graphUrl, env.CA_DEPLOY_GRAPH_URL, file.graphBaseUrl) ?? DEFAULT_GRAPH_BASE_URL,
    pacingMs: pickInteger(
      'pacing',
      0,
      DEFAULT_PACING_MS,
      nonEmpty(cli.pacing, env.CA_DEPLOY_PACING_MS),
      file.pacingMs
    ),
    timeoutMs: pickInteger(
      'timeout',
      1,
      DEFAULT_TIMEOUT_MS,
      nonEmpty(cli.timeout, env.CA_DEPLOY_TIMEOUT_MS),
      file.timeoutMs
    ),
    sequenceStart: pickInteger('start', 1, 1, nonEmpty(cli.start), file.sequenceStart),
    aadp2Dynamic: cli.aadp2Dynamic ?? file.aadp2Dynamic ?? true,
    aadp2ServicePlanId: nonEmpty(file.aadp2ServicePlanId) ?? AADP2_SERVICE_PLAN_ID,
    stateOverride: stateValue ? parsePolicyState(stateValue) : undefined,
  };
}
