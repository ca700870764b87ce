/**
 * Deployment CLI invocation
 */

import { runInteractive } from '../utils/exec.js';
import { logger } from '../utils/logger.js';
import { checkAuthentication, getToolVersion, locateTool } from './detector.js';
import type { DeploySubcommand, DeployToolClient, ToolInfo } from './types.js';

/**
 * Start the tool's interactive login flow
 *
 * @returns Exit code of the login command
 */
export async function loginTool(info: ToolInfo, cwd?: string): Promise<number> {
  const code = await runInteractive(info.command, info.authArgs, { cwd });
  logger.debug('Login finished', { code });
  return code;
}

/**
 * Run a deployment subcommand attached to the terminal
 *
 * @returns Exit code of the subcommand, un-normalized
 */
export async function runSubcommand(info: ToolInfo, subcommand: DeploySubcommand, cwd?: string): Promise<number> {
  const args = info.subcommands[subcommand];
  const code = await runInteractive(info.command, args, { cwd });
  logger.debug('Subcommand finished', { command: info.command, args, code });
  return code;
}

/**
 * Client bound to one tool and working directory
 */
export function createToolClient(info: ToolInfo, cwd: string): DeployToolClient {
  return {
    info,
    locate: () => locateTool(info),
    getVersion: () => getToolVersion(info),
    checkAuthentication: () => checkAuthentication(info),
    login: () => loginTool(info, cwd),
    run: (subcommand) => runSubcommand(info, subcommand, cwd),
  };
}
