/**
 * cloudctx login
 *
 * Obtains an API token (flag, environment, pasted, or created in the
 * browser), validates it against the platform and stores it as a context
 * that becomes current.
 *
 * Local Config Read/Write:
 *   - Writes: <config dir>/contexts.json (only after the token is validated)
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { DEFAULT_ENDPOINT, ENV_VARS } from '../config/endpoints';
import { DEFAULT_CONTEXT_NAME } from '../config/types';
import type { CliContext } from '../cli-context';
import type { LoginResult } from '../services/login-orchestrator';
import { exitWithError } from './handle-error';

export interface LoginCommandOptions {
  endpoint: string;
  apiToken?: string;
  context: string;
  callbackTimeout?: number;
}

export function parseTimeoutSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError('Must be a positive number of seconds.');
  }
  return seconds;
}

export async function loginCommand(ctx: CliContext, options: LoginCommandOptions): Promise<void> {
  const controller = new AbortController();
  const onSigint = (): void => {
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  let result: LoginResult;
  try {
    result = await ctx.createLoginOrchestrator().login({
      endpoint: options.endpoint,
      apiToken: options.apiToken,
      contextName: options.context,
      callbackTimeoutMs: options.callbackTimeout === undefined ? undefined : options.callbackTimeout * 1000,
      signal: controller.signal,
    });
  } catch (error) {
    exitWithError(ctx, error);
  } finally {
    process.off('SIGINT', onSigint);
  }

  // The orchestrator has already reported the failure
  if (result.status === 'failed') {
    process.exit(1);
  }
}

/**
 * Register the `login` command with the CLI program
 */
export function registerLoginCommand(program: Command, ctx: CliContext): Command {
  program
    .command('login')
    .description('Log in to the platform and save the credentials as a context')
    .addOption(
      new Option('--endpoint <url>', 'Platform endpoint').env(ENV_VARS.ENDPOINT).default(DEFAULT_ENDPOINT)
    )
    .addOption(new Option('--api-token <token>', 'API token (skips the interactive prompt)').env(ENV_VARS.API_TOKEN))
    .addOption(
      new Option('--context <name>', 'Name of the context to save').env(ENV_VARS.CONTEXT).default(DEFAULT_CONTEXT_NAME)
    )
    .addOption(
      new Option('--callback-timeout <seconds>', 'Stop waiting for the browser after this many seconds').argParser(
        parseTimeoutSeconds
      )
    )
    .action((options: LoginCommandOptions) => loginCommand(ctx, options));

  return program;
}
