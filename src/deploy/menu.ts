/**
 * Deployment menu: choice parsing and dispatch
 */

import chalk from 'chalk';
import { DelegatedFailureError, InvalidSelectionError } from '../utils/errors.js';
import { printSection } from '../utils/display.js';
import { formatToolCommand } from '../tools/registry.js';
import type { DeploySubcommand } from '../tools/types.js';
import type { DeployContext, DeployOutcome, MenuChoice } from './types.js';

export const MENU_PROMPT = 'Choose an option (1-4):';

export const MENU_OPTIONS: ReadonlyArray<{ key: string; label: string; choice: MenuChoice }> = [
  { key: '1', label: 'Initialize new Railway project', choice: { kind: 'init' } },
  { key: '2', label: 'Link to existing Railway project', choice: { kind: 'link' } },
  { key: '3', label: 'Deploy to current project', choice: { kind: 'deploy' } },
  { key: '4', label: 'Exit', choice: { kind: 'exit' } },
];

/**
 * Map raw input to a menu choice. Only the exact keys are accepted.
 */
export function parseMenuChoice(input: string): MenuChoice {
  const option = MENU_OPTIONS.find(entry => entry.key === input);
  return option ? option.choice : { kind: 'invalid', input };
}

export function printMenu(print: (line?: string) => void): void {
  printSection(print, '🚀 Deployment Options');
  for (const option of MENU_OPTIONS) {
    print(`${option.key}. ${option.label}`);
  }
  print();
}

/**
 * Run the subcommand and turn a non-zero exit into a DelegatedFailureError
 */
async function runDelegated({ deps }: DeployContext, subcommand: DeploySubcommand): Promise<void> {
  const { tool, print } = deps;
  const code = await tool.run(subcommand);
  if (code !== 0) {
    const display = formatToolCommand(tool.info, tool.info.subcommands[subcommand]);
    print();
    print(chalk.red(`❌ ${display} failed (exit code ${code})`));
    throw new DelegatedFailureError(display, code);
  }
}

export async function dispatchMenuChoice(ctx: DeployContext, choice: MenuChoice): Promise<DeployOutcome> {
  const { print } = ctx.deps;
  const info = ctx.deps.tool.info;
  const hint = (...args: string[]) => formatToolCommand(info, args);

  switch (choice.kind) {
    case 'init':
      print();
      print('Initializing new Railway project...');
      await runDelegated(ctx, 'init');
      print();
      print(chalk.green('✅ Project initialized'));
      print();
      print('Next steps:');
      print(`  1. Add environment variables: ${hint('variables')}`);
      print(`  2. Deploy: ${hint('up')}`);
      return { action: 'init', exitCode: 0 };

    case 'link':
      print();
      print('Linking to existing project...');
      await runDelegated(ctx, 'link');
      print();
      print(chalk.green('✅ Project linked'));
      return { action: 'link', exitCode: 0 };

    case 'deploy':
      print();
      print('Deploying to Railway...');
      await runDelegated(ctx, 'up');
      print();
      print(chalk.green('✅ Deployment complete!'));
      print();
      print('View your deployment:');
      print(`  ${hint('open')}`);
      print();
      print('View logs:');
      print(`  ${hint('logs')}`);
      return { action: 'deploy', exitCode: 0 };

    case 'exit':
      print('Exiting...');
      return { action: 'exit', exitCode: 0 };

    case 'invalid':
      print(chalk.red('Invalid option'));
      throw new InvalidSelectionError(choice.input);

    default: {
      const unreachable: never = choice;
      throw new Error(`Unhandled menu choice: ${JSON.stringify(unreachable)}`);
    }
  }
}
