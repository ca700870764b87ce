/**
 * Interactive deploy workflow
 *
 * Runs strictly top to bottom: tool check, authentication, file checklist,
 * readiness gate, menu, dispatch, footer. Any failed step throws a
 * PreflightError and nothing after it runs.
 */

import { ensureAuthenticated, ensureToolInstalled, verifyRequiredFiles } from '../preflight/checker.js';
import { confirmEnvironmentReady } from '../preflight/readiness.js';
import { logger } from '../utils/logger.js';
import { RULE } from '../utils/display.js';
import { MENU_PROMPT, dispatchMenuChoice, parseMenuChoice, printMenu } from './menu.js';
import { printReferenceFooter } from './footer.js';
import type { PreflightConfig } from '../env/types.js';
import type { DeployContext, DeployDeps, DeployOutcome } from './types.js';

export const BANNER = '🚂 Railway Deployment Script';

export async function runDeployWorkflow(config: PreflightConfig, deps: DeployDeps): Promise<DeployOutcome> {
  const ctx: DeployContext = { config, deps };
  const { print } = deps;

  print(BANNER);
  print(RULE);
  print();

  await ensureToolInstalled(ctx);
  await ensureAuthenticated(ctx);
  await verifyRequiredFiles(ctx);
  await confirmEnvironmentReady(ctx);

  printMenu(print);
  const input = await deps.prompt(MENU_PROMPT);
  const choice = parseMenuChoice(input);
  logger.debug('Menu choice', choice);

  const outcome = await dispatchMenuChoice(ctx, choice);
  if (outcome.action !== 'exit') {
    printReferenceFooter(print, deps.tool.info);
  }
  return outcome;
}
