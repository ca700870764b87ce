/**
 * Deployment CLI detection utilities
 */

import { exec } from '../utils/exec.js';
import { getCommandPath } from '../utils/which.js';
import { logger } from '../utils/logger.js';
import type { AuthStatus, ToolInfo } from './types.js';

/**
 * Resolve the tool executable through PATH
 */
export async function locateTool(info: ToolInfo): Promise<string | null> {
  return getCommandPath(info.command);
}

/**
 * Get tool version
 */
export async function getToolVersion(info: ToolInfo): Promise<string | null> {
  try {
    const result = await exec(info.command, info.versionArgs, { timeout: 10000 });
    if (result.code !== 0) {
      return null;
    }

    // railway 3.17.1
    const match = result.stdout.match(/(\d+\.\d+\.\d+)/);
    return match ? match[1] : result.stdout || null;
  } catch (error) {
    logger.debug('Version check failed', { command: info.command, error });
    return null;
  }
}

/**
 * Parse the account from `railway whoami` output
 *
 * Logged in as Jane Doe (jane@example.com) 👋
 */
export function parseAuthUser(output: string): string | null {
  const match = output.match(/Logged in as\s+([^\n]+?)\s*(?:👋)?\s*$/m);
  return match ? match[1] : null;
}

/**
 * Check authentication by running the identity subcommand; exit code 0 means logged in
 */
export async function checkAuthentication(info: ToolInfo): Promise<AuthStatus> {
  try {
    const result = await exec(info.command, info.authCheckArgs);
    if (result.code !== 0) {
      logger.debug('Identity query failed', { code: result.code, stderr: result.stderr });
      return { authenticated: false, user: null };
    }
    return { authenticated: true, user: parseAuthUser(result.stdout) };
  } catch (error) {
    logger.debug('Identity query could not run', { command: info.command, error });
    return { authenticated: false, user: null };
  }
}
