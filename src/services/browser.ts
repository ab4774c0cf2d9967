import open from 'open';

/**
 * The part of a spawned opener process that tells us whether it started.
 */
export interface LaunchedProcess {
  pid?: number;
  once(event: 'error', listener: (err: Error) => void): unknown;
}

export type BrowserLauncher = (url: string) => Promise<LaunchedProcess>;

/**
 * Open `url` in the default browser.
 *
 * Best effort: resolves false instead of throwing when no browser could be
 * launched, so the caller can tell the user to open the URL by hand.
 */
export async function openBrowser(url: string, launch: BrowserLauncher = open): Promise<boolean> {
  try {
    const child = await launch(url);
    if (child.pid !== undefined) {
      return true;
    }
    // Spawn failed; the child reports why through its 'error' event
    return await new Promise<boolean>((resolve) => {
      child.once('error', () => resolve(false));
    });
  } catch {
    return false;
  }
}
