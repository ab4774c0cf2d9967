import { ContextStore } from './services/context-store';
import { ContextSelector } from './services/context-selector';
import { getContextStorePath } from './services/config-paths';
import { LoginOrchestrator } from './services/login-orchestrator';
import { TerminalPromptProvider } from './services/prompt-provider';
import { ConsoleReporter, type Reporter } from './services/reporter';
import { createRestValidator } from './services/rest-api-client';
import { localCallbackListenerScope } from './services/auth-callback-server';
import { openBrowser } from './services/browser';

/**
 * Everything a command needs, built once at process start.
 */
export interface CliContext {
  store: ContextStore;
  selector: ContextSelector;
  reporter: Reporter;
  env: NodeJS.ProcessEnv;
  createLoginOrchestrator(): LoginOrchestrator;
}

export function createCliContext(env: NodeJS.ProcessEnv = process.env): CliContext {
  const store = new ContextStore(getContextStorePath(env));
  const selector = new ContextSelector(store);
  const reporter = new ConsoleReporter();

  return {
    store,
    selector,
    reporter,
    env,
    createLoginOrchestrator: () =>
      new LoginOrchestrator({
        store,
        prompts: new TerminalPromptProvider(),
        reporter,
        createValidator: createRestValidator,
        callbackListenerScope: localCallbackListenerScope,
        openBrowser: (url) => openBrowser(url),
      }),
  };
}
