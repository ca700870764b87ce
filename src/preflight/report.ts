/**
 * Non-interactive preflight report used by the `check` command
 */

import chalk from 'chalk';
import { formatToolCommand } from '../tools/registry.js';
import { checkRequiredFiles } from './checker.js';
import type { PreflightConfig } from '../env/types.js';
import type { DeployDeps } from '../deploy/types.js';

export type ReportDeps = Pick<DeployDeps, 'tool' | 'print' | 'startSpinner' | 'fileExists'>;

/**
 * Print the status of every check without prompting or logging in
 *
 * @returns true when every check passed
 */
export async function runPreflightReport(config: PreflightConfig, deps: ReportDeps): Promise<boolean> {
  const { tool, print } = deps;
  const info = tool.info;
  let hasIssues = false;

  print(chalk.bold('\n🔍 Railway Preflight Check\n'));

  print(chalk.bold(`${info.displayName}:`));
  const spinner = deps.startSpinner(`Looking for ${info.command}...`);
  const toolPath = await tool.locate();
  if (toolPath) {
    const version = await tool.getVersion();
    spinner.succeed(chalk.green(`${info.displayName} found`));
    print(`  ${chalk.green('✓')} ${toolPath}${version ? ` (v${version})` : ''}`);
  } else {
    spinner.fail(chalk.red(`${info.displayName} not found`));
    print(`  ${chalk.red('✗')} ${info.command} is not on PATH`);
    print(`      ${chalk.dim(`Install with: npm install -g ${info.npmPackage}`)}`);
    hasIssues = true;
  }
  print();

  print(chalk.bold('Authentication:'));
  if (toolPath) {
    const auth = await tool.checkAuthentication();
    if (auth.authenticated) {
      print(`  ${chalk.green('✓')} Logged in${auth.user ? ` as ${auth.user}` : ''}`);
    } else {
      print(`  ${chalk.red('✗')} Not logged in`);
      print(`      ${chalk.dim(`Run: ${formatToolCommand(info, info.authArgs)}`)}`);
      hasIssues = true;
    }
  } else {
    print(`  ${chalk.dim('○')} Skipped (${info.displayName} not installed)`);
  }
  print();

  print(chalk.bold('Required files:'));
  const files = await checkRequiredFiles(config.workingDir, config.requiredFiles, deps.fileExists);
  for (const file of files) {
    if (file.present) {
      print(`  ${chalk.green('✓')} ${file.name}`);
    } else {
      print(`  ${chalk.red('✗')} ${file.name} - missing`);
      hasIssues = true;
    }
  }
  print();

  print(chalk.bold('Environment variables (set these in Railway):'));
  for (const envVar of config.envVars) {
    print(`  ${chalk.dim('•')} ${envVar.name} - ${envVar.description}`);
  }
  print();

  if (hasIssues) {
    print(chalk.yellow('⚠ Some issues detected. Resolve them before deploying.\n'));
  } else {
    print(chalk.green('✓ All checks passed!\n'));
  }

  return !hasIssues;
}
