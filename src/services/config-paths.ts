import * as os from 'os';
import * as path from 'path';
import { CONFIG_FILES } from '../config/types';
import { ENV_VARS } from '../config/endpoints';

/**
 * Get the default configuration directory based on OS.
 * - macOS/Linux: ~/.cloudctx
 * - Windows: %APPDATA%/cloudctx (or homedir fallback)
 */
export function getDefaultConfigDir(): string {
  if (process.platform === 'win32') {
    const appData = process.env.APPDATA ?? os.homedir();
    return path.join(appData, CONFIG_FILES.windowsDirName);
  }
  return path.join(os.homedir(), CONFIG_FILES.homeDirName);
}

/**
 * Get the configuration directory, respecting CLOUDCTX_HOME override.
 */
export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[ENV_VARS.HOME];
  return override && override.trim() !== '' ? override : getDefaultConfigDir();
}

/**
 * Path of the context store file.
 */
export function getContextStorePath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getConfigDir(env), CONFIG_FILES.contextsFile);
}
