/**
 * Deploy workflow types
 */

import type { PreflightConfig } from '../env/types.js';
import type { DeployToolClient } from '../tools/types.js';

/**
 * Subset of an ora spinner the workflow relies on
 */
export interface StatusSpinner {
  succeed(text?: string): unknown;
  warn(text?: string): unknown;
  fail(text?: string): unknown;
}

export interface DeployDeps {
  tool: DeployToolClient;
  print: (line?: string) => void;
  prompt: (message: string) => Promise<string>;
  startSpinner: (text: string) => StatusSpinner;
  fileExists: (filePath: string) => Promise<boolean>;
}

export interface DeployContext {
  config: PreflightConfig;
  deps: DeployDeps;
}

/**
 * Parsed menu selection
 */
export type MenuChoice =
  | { kind: 'init' }
  | { kind: 'link' }
  | { kind: 'deploy' }
  | { kind: 'exit' }
  | { kind: 'invalid'; input: string };

export type DeployAction = Exclude<MenuChoice['kind'], 'invalid'>;

export interface DeployOutcome {
  action: DeployAction;
  exitCode: number;
}
