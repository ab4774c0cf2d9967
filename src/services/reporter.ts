/**
 * User-facing output.
 *
 * Everything the CLI prints goes through a Reporter so that services can be
 * exercised without a terminal. ConsoleReporter is the chalk/ora rendition.
 */

import chalk from 'chalk';
import ora from 'ora';

export interface ProgressHandle {
  succeed(text?: string): void;
  fail(text?: string): void;
}

export interface Reporter {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Pretty-printed JSON on stdout */
  json(data: unknown): void;
  /** Spinner for a network round trip */
  progress(text: string): ProgressHandle;
}

export class ConsoleReporter implements Reporter {
  info(message: string): void {
    console.log(chalk.blue(message));
  }

  success(message: string): void {
    console.log(chalk.green(`✓ ${message}`));
  }

  warn(message: string): void {
    console.log(chalk.yellow(`⚠️  ${message}`));
  }

  error(message: string): void {
    console.error(chalk.red(`✗ ${message}`));
  }

  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  progress(text: string): ProgressHandle {
    const spinner = ora(text).start();
    return {
      succeed: (done) => {
        spinner.succeed(done);
      },
      fail: (failed) => {
        spinner.fail(failed);
      },
    };
  }
}
