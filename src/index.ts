export { runDeployWorkflow } from './deploy/workflow.js';
export { parseMenuChoice, dispatchMenuChoice } from './deploy/menu.js';
export { createDefaultDeps } from './deploy/deps.js';
export { runPreflightReport } from './preflight/report.js';
export { checkRequiredFiles } from './preflight/checker.js';
export { isConfirmation } from './preflight/readiness.js';
export { ConfigLoader } from './utils/config.js';
export * from './utils/errors.js';
export type { PreflightConfig, RequiredEnvVar } from './env/types.js';
export type { DeployDeps, DeployOutcome, MenuChoice } from './deploy/types.js';
export type { DeployToolClient, ToolInfo } from './tools/types.js';
