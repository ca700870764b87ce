/**
 * Child process helpers
 *
 * `exec` captures output for checks such as `railway whoami`;
 * `runInteractive` hands the terminal to the child for login and deploy.
 * Neither rejects on a non-zero exit code: callers inspect `code`.
 */

import { spawn } from 'node:child_process';
import { logger } from './logger.js';

export interface ExecOptions {
  cwd?: string;
  timeout?: number; // ms, 0 or undefined = no timeout
}

export interface ExecResult {
  code: number;
  stdout: string;
  stderr: string;
}

/**
 * Run a command and collect its output
 *
 * @returns Exit code with trimmed stdout/stderr. A signal-terminated child reports code 1.
 */
export function exec(command: string, args: string[] = [], options: ExecOptions = {}): Promise<ExecResult> {
  return new Promise((resolve, reject) => {
    logger.debug('exec', { command, args, cwd: options.cwd });

    const child = spawn(command, args, {
      cwd: options.cwd,
      timeout: options.timeout || undefined,
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });

    let stdout = '';
    let stderr = '';

    child.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on('error', reject);
    child.on('close', (code) => {
      resolve({
        code: code ?? 1,
        stdout: stdout.trim(),
        stderr: stderr.trim(),
      });
    });
  });
}

/**
 * Run a command attached to the current terminal
 *
 * Blocks (asynchronously) until the child exits, with no timeout.
 *
 * @returns The child's exit code, or 1 when it was killed by a signal
 */
export function runInteractive(command: string, args: string[] = [], options: Pick<ExecOptions, 'cwd'> = {}): Promise<number> {
  return new Promise((resolve, reject) => {
    logger.debug('runInteractive', { command, args, cwd: options.cwd });

    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: 'inherit',
    });

    child.on('error', reject);
    child.on('close', (code, signal) => {
      if (signal) {
        logger.debug(`${command} terminated by ${signal}`);
      }
      resolve(code ?? 1);
    });
  });
}
