import { Command } from 'commander';
import { runDeployWorkflow } from '../../deploy/workflow.js';
import { createDefaultDeps } from '../../deploy/deps.js';
import { loadCommandConfig, runAndExit, type CommonOptions } from '../options.js';

export function createDeployCommand(): Command {
  const command = new Command('deploy');

  command
    .description('Run the pre-deployment checklist, then initialize, link or deploy with the Railway CLI')
    .option('-C, --cwd <dir>', 'Project directory to check (defaults to the current directory)')
    .option('--debug', 'Print debug logs')
    .action((options: CommonOptions) =>
      runAndExit(async () => {
        const config = await loadCommandConfig(options);
        const outcome = await runDeployWorkflow(config, createDefaultDeps(config));
        return outcome.exitCode;
      })
    );

  return command;
}
