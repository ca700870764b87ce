import * as path from 'path';
import chalk from 'chalk';
import { ConfigLoader } from '../utils/config.js';
import { ConfigurationError, PreflightError, getErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { PreflightConfig } from '../env/types.js';

export interface CommonOptions {
  cwd?: string;
  debug?: boolean;
}

/**
 * Load configuration for a command and switch on debug logging when asked
 */
export async function loadCommandConfig(options: CommonOptions): Promise<PreflightConfig> {
  if (options.debug) {
    logger.enableDebugMode();
  }

  const workingDir = path.resolve(options.cwd ?? process.cwd());
  const config = await ConfigLoader.load(workingDir, { debug: options.debug });

  if (config.debug) {
    logger.enableDebugMode();
  }
  return config;
}

/**
 * Exit with the error's code. Checklist errors were already reported by the
 * step that raised them.
 */
export function exitWithError(error: unknown): never {
  if (error instanceof ConfigurationError) {
    logger.error(error.message);
    process.exit(error.exitCode);
  }
  if (error instanceof PreflightError) {
    logger.debug(`${error.name}: ${error.message}`);
    process.exit(error.exitCode);
  }

  logger.error(chalk.red(`Unexpected error: ${getErrorMessage(error)}`), error);
  process.exit(1);
}

/**
 * Run a command body and exit with the code it returns, or with the code of
 * the error it throws
 */
export async function runAndExit(task: () => Promise<number>): Promise<never> {
  let exitCode: number;
  try {
    exitCode = await task();
  } catch (error) {
    return exitWithError(error);
  }
  return process.exit(exitCode);
}
