/**
 * Command exports
 */

export {
  deployCommand,
  createTokenProvider,
  type DeployOptions,
  type DeployCommandDependencies,
} from './deploy.js';
export { planCommand, type PlanOptions } from './plan.js';
