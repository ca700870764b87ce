/**
 * Environment readiness gate
 *
 * The variables live in the deployment target, so they cannot be checked
 * from here; the operator has to acknowledge them instead.
 */

import chalk from 'chalk';
import { OperatorDeclinedError } from '../utils/errors.js';
import { printSection } from '../utils/display.js';
import type { RequiredEnvVar } from '../env/types.js';
import type { DeployContext } from '../deploy/types.js';

export const READINESS_PROMPT = 'Have you prepared all environment variables? (y/n):';

export const SECRET_RECIPE = 'python -c "import secrets; print(secrets.token_hex(32))"';

/**
 * Only a bare "y" or "Y" confirms. "yes", "Y " and empty input do not.
 */
export function isConfirmation(answer: string): boolean {
  return answer === 'y' || answer === 'Y';
}

export function formatEnvVarList(envVars: RequiredEnvVar[]): string[] {
  return envVars.map((envVar, index) => `  ${index + 1}. ${envVar.name} - ${envVar.description}`);
}

export async function confirmEnvironmentReady({ config, deps }: DeployContext): Promise<void> {
  const { print } = deps;
  printSection(print, '🔧 Environment Variables Required');

  print('Make sure you have these ready:');
  for (const line of formatEnvVarList(config.envVars)) {
    print(line);
  }
  print();

  const answer = await deps.prompt(READINESS_PROMPT);
  if (isConfirmation(answer)) {
    return;
  }

  print();
  print(chalk.yellow('⚠️  Please prepare your environment variables first.'));
  if (config.secretVariable) {
    print();
    print(`To generate a secure ${config.secretVariable}:`);
    print(`  ${SECRET_RECIPE}`);
  }
  print();
  throw new OperatorDeclinedError();
}
