import { createInterface } from 'node:readline';
import inquirer from 'inquirer';
import ora from 'ora';
import { isRegularFile } from '../preflight/checker.js';
import { createToolClient } from '../tools/manager.js';
import { getToolInfo } from '../tools/registry.js';
import type { PreflightConfig } from '../env/types.js';
import type { DeployDeps } from './types.js';

type Prompt = DeployDeps['prompt'];

/**
 * Free-text prompt. The raw answer is returned so callers decide what counts as "yes".
 */
export async function promptInput(message: string): Promise<string> {
  const { answer } = await inquirer.prompt<{ answer: string }>([
    {
      type: 'input',
      name: 'answer',
      message,
    },
  ]);
  return answer;
}

/**
 * Prompt that answers from one line reader over a non-TTY stream, one line per
 * call. After end of input every answer is ''.
 *
 * The reader is opened on the first call and shared by all later ones.
 */
export function createLinePrompt(input: NodeJS.ReadableStream, write: (text: string) => void): Prompt {
  const buffered: string[] = [];
  const waiting: Array<(line: string) => void> = [];
  let ended = false;
  let opened = false;

  const open = (): void => {
    opened = true;
    const reader = createInterface({ input, terminal: false, crlfDelay: Infinity });
    reader.on('line', (line) => {
      const resolve = waiting.shift();
      if (resolve) {
        resolve(line);
      } else {
        buffered.push(line);
      }
    });
    reader.on('close', () => {
      ended = true;
      for (const resolve of waiting.splice(0)) {
        resolve('');
      }
    });
  };

  return async (message) => {
    if (!opened) {
      open();
    }
    write(`${message} `);

    const next = buffered.shift();
    const answer = next !== undefined
      ? next
      : ended
        ? ''
        : await new Promise<string>((resolve) => waiting.push(resolve));

    write('\n');
    return answer;
  };
}

/**
 * inquirer on a terminal; a shared line reader when input is piped
 */
export function createPrompt(
  input: NodeJS.ReadableStream & { isTTY?: boolean },
  write: (text: string) => void
): Prompt {
  return input.isTTY ? promptInput : createLinePrompt(input, write);
}

/**
 * Production collaborators: real Railway CLI, terminal prompts, ora spinners
 */
export function createDefaultDeps(config: PreflightConfig): DeployDeps {
  return {
    tool: createToolClient(getToolInfo(config.cliCommand), config.workingDir),
    print: (line = '') => console.log(line),
    prompt: createPrompt(process.stdin, (text) => process.stdout.write(text)),
    startSpinner: (text) => ora(text).start(),
    fileExists: isRegularFile,
  };
}
