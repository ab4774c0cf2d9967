/**
 * Interactive prompts used by the login flow.
 *
 * The orchestrator only talks to the PromptProvider interface; the terminal
 * implementation below is backed by @inquirer/prompts.
 */

import { confirm, password, select } from '@inquirer/prompts';

export type AuthMethod = 'create' | 'paste';

export interface PromptProvider {
  /** Ask how to obtain a token */
  chooseAuthMethod(): Promise<AuthMethod>;
  /** Yes/no confirmation; Enter accepts */
  confirm(message: string): Promise<boolean>;
  /** Masked input; resolves with a non-empty value */
  password(message: string): Promise<string>;
}

/**
 * Raised by @inquirer/prompts when the user presses Ctrl-C in a prompt.
 */
export function isPromptExitError(error: unknown): boolean {
  return error instanceof Error && error.name === 'ExitPromptError';
}

export class TerminalPromptProvider implements PromptProvider {
  async chooseAuthMethod(): Promise<AuthMethod> {
    return select<AuthMethod>({
      message: 'How would you like to authenticate cloudctx? [Use arrows to move]',
      choices: [
        { name: 'Create a new API token with a web browser', value: 'create' },
        { name: 'Paste an existing API token', value: 'paste' },
      ],
    });
  }

  async confirm(message: string): Promise<boolean> {
    return confirm({ message, default: true });
  }

  async password(message: string): Promise<string> {
    const value = await password({
      message,
      mask: '*',
      validate: (input) => (input.trim().length > 0 ? true : 'Token is required'),
    });
    return value.trim();
  }
}
