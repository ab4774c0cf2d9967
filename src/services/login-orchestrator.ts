/**
 * Login Orchestrator
 *
 * Drives one login session:
 *
 *   ChoosingMethod -> AwaitingBrowserCallback | AwaitingPastedToken
 *                  -> ValidatingToken -> Success | Failed
 *
 * A token passed in by the caller skips straight to ValidatingToken. The
 * store is written once, on Success; no failure path touches it. The browser
 * callback listener only exists inside the listener scope, which releases
 * it on every exit path.
 */

import { DEFAULT_ENDPOINT, PLATFORM_PATHS, buildAuthUrl, normalizeEndpoint } from '../config/endpoints';
import { DEFAULT_CONTEXT_NAME, type CloudContext } from '../config/types';
import { CallbackCancelledError, ConfigError, RestApiClientError, errorMessage } from '../errors';
import type { CallbackListener, CallbackListenerScope } from './auth-callback-server';
import type { ContextStore } from './context-store';
import { isPromptExitError, type PromptProvider } from './prompt-provider';
import type { Reporter } from './reporter';
import type { CredentialValidatorFactory, UserSchema } from './rest-api-client';

export type LoginState =
  | 'ChoosingMethod'
  | 'AwaitingBrowserCallback'
  | 'AwaitingPastedToken'
  | 'ValidatingToken'
  | 'Success'
  | 'Failed';

export type LoginFailureReason =
  | 'no-code'
  | 'callback-error'
  | 'cancelled'
  | 'bad-credentials'
  | 'http-error'
  | 'server-inconsistency';

export interface LoginFailure {
  status: 'failed';
  reason: LoginFailureReason;
  message: string;
}

export type LoginResult = { status: 'success'; context: CloudContext } | LoginFailure;

type TokenOutcome = { status: 'token'; token: string } | LoginFailure;

export interface LoginOptions {
  /** Platform endpoint; defaults to DEFAULT_ENDPOINT */
  endpoint?: string;
  /** Pre-supplied token; skips method selection */
  apiToken?: string;
  /** Context to write; defaults to DEFAULT_CONTEXT_NAME */
  contextName?: string;
  /** Deadline for the browser callback; no deadline when omitted */
  callbackTimeoutMs?: number;
  /** Aborts the browser callback wait */
  signal?: AbortSignal;
}

export interface LoginDependencies {
  store: Pick<ContextStore, 'addContext'>;
  prompts: PromptProvider;
  reporter: Reporter;
  createValidator: CredentialValidatorFactory;
  callbackListenerScope: CallbackListenerScope;
  openBrowser: (url: string) => Promise<boolean>;
  /** Observer for state transitions */
  onStateChange?: (state: LoginState) => void;
}

export class LoginOrchestrator {
  constructor(private readonly deps: LoginDependencies) {}

  async login(options: LoginOptions = {}): Promise<LoginResult> {
    const endpoint = normalizeEndpoint(options.endpoint ?? DEFAULT_ENDPOINT);

    let apiToken = options.apiToken;
    if (!apiToken) {
      const outcome = await this.obtainToken(endpoint, options);
      if (outcome.status === 'failed') {
        return outcome;
      }
      apiToken = outcome.token;
    }

    return this.validateAndSave(endpoint, apiToken, options);
  }

  private async obtainToken(endpoint: string, options: LoginOptions): Promise<TokenOutcome> {
    this.enter('ChoosingMethod');

    try {
      const method = await this.deps.prompts.chooseAuthMethod();
      if (method === 'create') {
        return await this.obtainTokenFromBrowser(endpoint, options);
      }
      return await this.obtainPastedToken();
    } catch (error) {
      if (isPromptExitError(error)) {
        return this.fail('cancelled', 'Login cancelled');
      }
      throw error;
    }
  }

  private async obtainTokenFromBrowser(endpoint: string, options: LoginOptions): Promise<TokenOutcome> {
    this.enter('AwaitingBrowserCallback');

    try {
      return await this.deps.callbackListenerScope((listener) =>
        this.waitForBrowserToken(endpoint, listener, options)
      );
    } catch (error) {
      if (isPromptExitError(error)) {
        throw error;
      }
      return this.fail('callback-error', `Error acquiring token from web browser: ${errorMessage(error)}`);
    }
  }

  private async waitForBrowserToken(
    endpoint: string,
    listener: CallbackListener,
    options: LoginOptions
  ): Promise<TokenOutcome> {
    const { reporter, prompts } = this.deps;
    const tokenPage = endpoint + PLATFORM_PATHS.TOKEN_CREATION_PAGE;
    const authUrl = buildAuthUrl(endpoint, listener.callbackUrl);

    const shouldOpen = await prompts.confirm(`Press Enter to open ${authUrl} in your browser...`);
    if (!shouldOpen) {
      reporter.info(`Open ${authUrl} in your browser to continue.`);
    } else if (await this.deps.openBrowser(authUrl)) {
      reporter.success(`Opened ${authUrl} in your web browser.`);
    } else {
      reporter.warn(`Failed to open browser. Try creating a new API token at ${tokenPage}`);
    }

    let code: string | null;
    try {
      code = await listener.waitForCode({
        timeoutMs: options.callbackTimeoutMs,
        signal: options.signal,
      });
    } catch (error) {
      if (error instanceof CallbackCancelledError) {
        return this.fail('cancelled', `Login cancelled: ${error.message}`);
      }
      return this.fail('callback-error', `Error acquiring token from web browser: ${errorMessage(error)}`);
    }

    if (code === null) {
      return this.fail('no-code', 'No code could be obtained from browser callback page');
    }
    return { status: 'token', token: code };
  }

  private async obtainPastedToken(): Promise<TokenOutcome> {
    this.enter('AwaitingPastedToken');

    let token = '';
    while (token === '') {
      token = (await this.deps.prompts.password('Paste your authentication token')).trim();
    }
    return { status: 'token', token };
  }

  private async validateAndSave(
    endpoint: string,
    apiToken: string,
    options: LoginOptions
  ): Promise<LoginResult> {
    this.enter('ValidatingToken');
    const { reporter } = this.deps;

    const progress = reporter.progress('Validating token...');
    let user: UserSchema;
    try {
      user = await this.fetchIdentity(endpoint, apiToken);
    } catch (error) {
      progress.fail();
      if (error instanceof RestApiClientError) {
        if (error.statusCode === 401) {
          return this.fail(
            'bad-credentials',
            `Error validating token: HTTP 401: Bad credentials (${endpoint}${PLATFORM_PATHS.TOKEN_HELP_PAGE})`
          );
        }
        return this.fail('http-error', `Error validating token: HTTP ${error.statusCode}`);
      }
      if (error instanceof ConfigError) {
        return this.fail('server-inconsistency', error.message);
      }
      throw error;
    }

    // SIGINT may arrive while the identity calls are in flight
    if (options.signal?.aborted) {
      progress.fail();
      return this.fail('cancelled', 'Login cancelled');
    }
    progress.succeed('Token validated');

    const context: CloudContext = {
      name: options.contextName ?? DEFAULT_CONTEXT_NAME,
      endpoint,
      apiToken,
      email: user.email,
    };
    this.deps.store.addContext(context);
    this.enter('Success');

    reporter.success(`Configured credentials (current-context: ${context.name})`);
    reporter.success(`Logged in as ${user.email} at ${endpoint}`);
    return { status: 'success', context };
  }

  /**
   * Both identity records must exist for the token to count as valid.
   */
  private async fetchIdentity(endpoint: string, apiToken: string): Promise<UserSchema> {
    const validator = this.deps.createValidator(endpoint, apiToken);

    const user = await validator.getCurrentUser();
    if (!user) {
      throw new ConfigError('current user is not found');
    }
    const organization = await validator.getCurrentOrganization();
    if (!organization) {
      throw new ConfigError('current organization is not found');
    }
    return user;
  }

  private fail(reason: LoginFailureReason, message: string): LoginFailure {
    this.enter('Failed');
    this.deps.reporter.error(message);
    return { status: 'failed', reason, message };
  }

  private enter(state: LoginState): void {
    this.deps.onStateChange?.(state);
  }
}
