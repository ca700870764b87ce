#!/usr/bin/env node

import { Command } from 'commander';
import { createDeployCommand } from './commands/deploy.js';
import { createCheckCommand } from './commands/check.js';
import { getDirname, readPackageVersion } from '../utils/paths.js';
import { exitWithError } from './options.js';

const program = new Command();

program
  .name('railway-preflight')
  .description('Pre-deployment checklist and Railway CLI launcher for Python web backends')
  .version(readPackageVersion(getDirname(import.meta.url)));

// `deploy` runs when no command is given
program.addCommand(createDeployCommand(), { isDefault: true });
program.addCommand(createCheckCommand());

program.parseAsync(process.argv).catch(exitWithError);
