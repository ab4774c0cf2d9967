import { ENV_VARS } from '../config/endpoints';
import { CloudCtxError, errorMessage } from '../errors';
import type { CliContext } from '../cli-context';

/**
 * Report a command failure and exit non-zero.
 *
 * Known failures print their message only; anything else is an internal
 * error and prints the stack when CLOUDCTX_DEBUG is set.
 */
export function exitWithError(ctx: Pick<CliContext, 'reporter' | 'env'>, error: unknown): never {
  if (error instanceof CloudCtxError) {
    ctx.reporter.error(error.message);
  } else {
    ctx.reporter.error(`Unexpected error: ${errorMessage(error)}`);
    if (ctx.env[ENV_VARS.DEBUG] && error instanceof Error && error.stack) {
      console.error(error.stack);
    }
  }
  process.exit(1);
}
