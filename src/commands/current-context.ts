import { Command } from 'commander';
import type { CliContext } from '../cli-context';
import { exitWithError } from './handle-error';

/**
 * Print the current context as JSON. The token is included.
 */
export async function currentContextCommand(ctx: CliContext): Promise<void> {
  try {
    ctx.reporter.json(ctx.selector.showCurrent());
  } catch (error) {
    exitWithError(ctx, error);
  }
}

export function registerCurrentContextCommand(program: Command, ctx: CliContext): Command {
  program
    .command('current-context')
    .description('Show the current context')
    .action(() => currentContextCommand(ctx));

  return program;
}
