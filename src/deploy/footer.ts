import chalk from 'chalk';
import { printSection } from '../utils/display.js';
import { formatToolCommand } from '../tools/registry.js';
import type { ToolInfo } from '../tools/types.js';

const LABEL_WIDTH = 21;

const REFERENCE_COMMANDS: ReadonlyArray<{ label: string; args: string[] }> = [
  { label: 'View logs', args: ['logs'] },
  { label: 'Open dashboard', args: ['open'] },
  { label: 'Set variables', args: ['variables'] },
  { label: 'View project info', args: ['status'] },
  { label: 'Run locally', args: ['run', 'python', 'app.py'] },
];

export function formatReferenceCommands(info: ToolInfo): string[] {
  return REFERENCE_COMMANDS.map(
    ({ label, args }) => `${`${label}:`.padEnd(LABEL_WIDTH)}${formatToolCommand(info, args)}`
  );
}

export function printReferenceFooter(print: (line?: string) => void, info: ToolInfo): void {
  printSection(print, '📊 Useful Railway Commands');
  for (const line of formatReferenceCommands(info)) {
    print(line);
  }
  print();
  print(chalk.green('✅ Deployment process complete!'));
  print();
}
