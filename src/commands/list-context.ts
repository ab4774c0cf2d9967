import { Command } from 'commander';
import type { CliContext } from '../cli-context';
import { exitWithError } from './handle-error';

/**
 * Print the context names as a JSON array, in store order.
 */
export async function listContextCommand(ctx: CliContext): Promise<void> {
  try {
    ctx.reporter.json(ctx.selector.list());
  } catch (error) {
    exitWithError(ctx, error);
  }
}

export function registerListContextCommand(program: Command, ctx: CliContext): Command {
  program
    .command('list-context')
    .description('List all available contexts')
    .action(() => listContextCommand(ctx));

  return program;
}
