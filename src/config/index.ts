/**
 * Configuration module exports
 */

export {
  resolveDeployConfig,
  loadConfigFile,
  parseConfigFile,
  parsePolicyState,
  DEFAULT_CONFIG_FILE,
  DEFAULT_PACING_MS,
  AADP2_SERVICE_PLAN_ID,
  type DeployConfig,
  type ConfigOverrides,
  type FileConfig,
  type ResolveConfigOptions,
} from './deploy.js';

export {
  createDeviceCodeTokenProvider,
  createStaticTokenProvider,
  GRAPH_SCOPES,
  type DeviceCodeApp,
  type DeviceCodeAuthOptions,
  type TokenResult,
} from './auth.js';
