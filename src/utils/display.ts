import chalk from 'chalk';

export const RULE = '='.repeat(60);

/**
 * Print a titled section header framed by rules
 */
export function printSection(print: (line?: string) => void, title: string): void {
  print();
  print(RULE);
  print(title);
  print(RULE);
  print();
}

export const symbols = {
  ok: chalk.green('✅'),
  missing: chalk.red('❌'),
};
