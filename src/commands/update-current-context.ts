import { Command } from 'commander';
import type { CliContext } from '../cli-context';
import { exitWithError } from './handle-error';

export async function updateCurrentContextCommand(ctx: CliContext, contextName: string): Promise<void> {
  try {
    const switched = ctx.selector.switch(contextName);
    ctx.reporter.success(`Successfully switched to context: ${switched.name}`);
  } catch (error) {
    exitWithError(ctx, error);
  }
}

export function registerUpdateCurrentContextCommand(program: Command, ctx: CliContext): Command {
  program
    .command('update-current-context')
    .description('Switch the current context')
    .argument('<contextName>', 'Name of an existing context')
    .action((contextName: string) => updateCurrentContextCommand(ctx, contextName));

  return program;
}
