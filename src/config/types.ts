/**
 * Configuration Type Definitions
 *
 * The context store lives at `<config dir>/contexts.json`:
 *
 *   {
 *     "currentContextName": "default",
 *     "contexts": [
 *       { "name": "default", "endpoint": "...", "apiToken": "...", "email": "..." }
 *     ]
 *   }
 *
 * Context order in the file is insertion order and is preserved on rewrite.
 */

/**
 * Name used when login is not given an explicit context name.
 */
export const DEFAULT_CONTEXT_NAME = 'default';

/**
 * A named credential profile. Only ever built after the token was
 * validated against the remote service.
 */
export interface CloudContext {
  /** Unique (case-sensitive) profile name, e.g. "default", "staging" */
  name: string;
  /** Base URL of the platform, without trailing slash */
  endpoint: string;
  /** Opaque API token */
  apiToken: string;
  /** Identity reported by the platform when the context was created */
  email: string;
}

/**
 * Persisted shape of the context store.
 */
export interface ContextStoreData {
  /** Name of the current context; null only while the store is empty */
  currentContextName: string | null;
  /** Contexts in insertion order */
  contexts: CloudContext[];
}

/**
 * Well-known file names for configuration
 */
export const CONFIG_FILES = {
  /** Directory under the home directory */
  homeDirName: '.cloudctx',
  /** Directory under %APPDATA% on Windows */
  windowsDirName: 'cloudctx',
  /** Context store file */
  contextsFile: 'contexts.json',
} as const;
