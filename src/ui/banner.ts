import chalk from 'chalk';
import { intro, outro } from '@clack/prompts';

export function showBanner(version: string): void {
  intro(chalk.bgCyan.black(` compose2apptainer v${version} `));
}

export function showContext(ctx: { composePath: string; binary: string; dryRun: boolean }): void {
  const lines = [
    `${chalk.green('+')} Compose: ${ctx.composePath}`,
    `${chalk.green('+')} Runtime: ${ctx.binary}`,
  ];
  if (ctx.dryRun) lines.push(`${chalk.yellow('-')} Dry run: commands are printed, not executed`);

  console.log(lines.map((l) => `  ${l}`).join('\n'));
  console.log();
}

export function showOutro(message: string, failed = false): void {
  outro(failed ? chalk.red(message) : chalk.green(message));
}
