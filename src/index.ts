#!/usr/bin/env node

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { join } from 'path';
import chalk from 'chalk';
import { createCliContext, type CliContext } from './cli-context';
import { registerLoginCommand } from './commands/login';
import { registerCurrentContextCommand } from './commands/current-context';
import { registerListContextCommand } from './commands/list-context';
import { registerUpdateCurrentContextCommand } from './commands/update-current-context';
import { exitWithError } from './commands/handle-error';
import { ConsoleReporter } from './services/reporter';

const pkg: { version: string } = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));

export function createProgram(ctx: CliContext): Command {
  const program = new Command();

  program
    .name('cloudctx')
    .description('Log in to the cloud platform and manage saved credential contexts')
    .version(pkg.version);

  registerLoginCommand(program, ctx);
  registerCurrentContextCommand(program, ctx);
  registerListContextCommand(program, ctx);
  registerUpdateCurrentContextCommand(program, ctx);

  return program;
}

export function printUsage(): void {
  console.log(chalk.blue(`cloudctx v${pkg.version}`));
  console.log('Usage: cloudctx <command> [options]');
  console.log('');
  console.log('Commands:');
  console.log('  login                   - Log in and save credentials as a context');
  console.log('  current-context         - Show the current context');
  console.log('  list-context            - List all available contexts');
  console.log('  update-current-context  - Switch the current context');
  console.log('');
  console.log("Use 'cloudctx <command> --help' for more information");
}

export async function main(argv: string[] = process.argv): Promise<void> {
  // Show help if no command provided
  if (argv.length <= 2) {
    printUsage();
    return;
  }

  const ctx = createCliContext();
  await createProgram(ctx).parseAsync(argv);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    exitWithError({ reporter: new ConsoleReporter(), env: process.env }, error);
  });
}
