/**
 * Preflight checks: tool presence, authentication, required files
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import chalk from 'chalk';
import { MissingArtifactError, MissingDependencyError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { printSection, symbols } from '../utils/display.js';
import type { DeployContext } from '../deploy/types.js';

export interface FileCheckResult {
  name: string;
  present: boolean;
}

/**
 * True when `filePath` exists and is a regular file
 */
export async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * Check every required file, in order, without stopping at the first miss
 */
export async function checkRequiredFiles(
  workingDir: string,
  files: string[],
  fileExists: (filePath: string) => Promise<boolean> = isRegularFile
): Promise<FileCheckResult[]> {
  const results: FileCheckResult[] = [];
  for (const name of files) {
    results.push({ name, present: await fileExists(path.join(workingDir, name)) });
  }
  return results;
}

export function formatFileResult(result: FileCheckResult): string {
  return result.present
    ? `${symbols.ok} ${result.name}`
    : `${symbols.missing} ${result.name} - MISSING!`;
}

/**
 * Abort with install instructions when the tool is not on PATH
 */
export async function ensureToolInstalled({ deps }: DeployContext): Promise<string> {
  const { tool, print } = deps;
  const spinner = deps.startSpinner(`Checking for ${tool.info.displayName}...`);
  const toolPath = await tool.locate();

  if (!toolPath) {
    spinner.fail(chalk.red(`${tool.info.displayName} not found!`));
    print();
    print(`Install ${tool.info.displayName}:`);
    print(`  npm install -g ${tool.info.npmPackage}`);
    print();
    print(`Or visit: ${tool.info.docsUrl}`);
    throw new MissingDependencyError(tool.info.command);
  }

  spinner.succeed(chalk.green(`${tool.info.displayName} found`));
  logger.debug('Tool located', { path: toolPath });
  print();
  return toolPath;
}

/**
 * Query the identity subcommand and fall back to the interactive login.
 * The login result is not re-verified; the tool reports its own failures.
 */
export async function ensureAuthenticated({ deps }: DeployContext): Promise<void> {
  const { tool, print } = deps;
  const spinner = deps.startSpinner('Checking Railway authentication...');
  const status = await tool.checkAuthentication();

  if (status.authenticated) {
    const account = status.user ? ` as ${status.user}` : '';
    spinner.succeed(chalk.green(`Already logged in to Railway${account}`));
    return;
  }

  spinner.warn(chalk.yellow('Not logged in to Railway'));
  print();
  print('Logging in...');
  const code = await tool.login();
  if (code !== 0) {
    logger.debug('Login exited non-zero; continuing', { code });
  }
}

/**
 * Print the file checklist and abort after the full list if anything is missing
 */
export async function verifyRequiredFiles({ config, deps }: DeployContext): Promise<void> {
  const { print } = deps;
  printSection(print, '📦 Pre-deployment Checklist');

  const results = await checkRequiredFiles(config.workingDir, config.requiredFiles, deps.fileExists);
  for (const result of results) {
    print(formatFileResult(result));
  }

  const missing = results.filter(result => !result.present).map(result => result.name);
  if (missing.length > 0) {
    print();
    print(chalk.red('❌ Some required files are missing!'));
    print('Please ensure all files are present before deploying.');
    throw new MissingArtifactError(missing);
  }
}
