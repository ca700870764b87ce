import { Command } from 'commander';
import { runPreflightReport } from '../../preflight/report.js';
import { createDefaultDeps } from '../../deploy/deps.js';
import { loadCommandConfig, runAndExit, type CommonOptions } from '../options.js';

export function createCheckCommand(): Command {
  const command = new Command('check');

  command
    .description('Report Railway CLI, authentication and required-file status without deploying')
    .option('-C, --cwd <dir>', 'Project directory to check (defaults to the current directory)')
    .option('--debug', 'Print debug logs')
    .action((options: CommonOptions) =>
      runAndExit(async () => {
        const config = await loadCommandConfig(options);
        const passed = await runPreflightReport(config, createDefaultDeps(config));
        return passed ? 0 : 1;
      })
    );

  return command;
}
