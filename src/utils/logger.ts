import chalk from 'chalk';
import { inspect } from 'node:util';

/**
 * Console logger
 *
 * Debug output is off unless enabled through config, `--debug` or
 * RAILWAY_PREFLIGHT_DEBUG. Debug and error lines go to stderr so they never
 * mix with checklist output.
 */
class Logger {
  private debugEnabled = false;

  enableDebugMode(): void {
    this.debugEnabled = true;
  }

  debug(message: string, ...args: unknown[]): void {
    if (!this.debugEnabled) {
      return;
    }
    const details = args.map(arg => inspect(arg, { depth: 4, breakLength: Infinity })).join(' ');
    console.error(chalk.gray(`[debug] ${message}${details ? ` ${details}` : ''}`));
  }

  info(message: string): void {
    console.log(chalk.cyan('ℹ'), message);
  }

  success(message: string): void {
    console.log(chalk.green('✅'), message);
  }

  warn(message: string): void {
    console.log(chalk.yellow('⚠️ '), message);
  }

  error(message: string, error?: unknown): void {
    console.error(chalk.red('❌'), message);
    if (error !== undefined && this.debugEnabled) {
      console.error(chalk.gray(error instanceof Error && error.stack ? error.stack : String(error)));
    }
  }
}

export const logger = new Logger();
