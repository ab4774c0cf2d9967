/**
 * Local HTTP listener for the browser login flow.
 *
 * The token-creation page redirects the browser to `callbackUrl` with the
 * new token in the `code` query parameter. The server hands over exactly one
 * value (the code, or null when the redirect carried none); later requests
 * are answered but ignored.
 */

import * as http from 'http';
import { CallbackCancelledError } from '../errors';
import { findFreePort } from './free-port';

export const CALLBACK_PATH = '/callback';

export interface WaitForCodeOptions {
  /** Give up after this many milliseconds; waits forever when omitted */
  timeoutMs?: number;
  /** Abort the wait, e.g. on SIGINT */
  signal?: AbortSignal;
}

/**
 * What the login flow needs from a callback listener.
 */
export interface CallbackListener {
  readonly callbackUrl: string;
  waitForCode(options?: WaitForCodeOptions): Promise<string | null>;
}

/**
 * Scoped acquisition: the listener only exists while `fn` runs.
 */
export type CallbackListenerScope = <T>(fn: (listener: CallbackListener) => Promise<T>) => Promise<T>;

const SUCCESS_PAGE = `<!doctype html>
<html><head><title>cloudctx</title></head>
<body><h1>Token received</h1><p>You can close this window and return to the terminal.</p></body></html>
`;

const MISSING_CODE_PAGE = `<!doctype html>
<html><head><title>cloudctx</title></head>
<body><h1>No token received</h1><p>The redirect did not include a token. Return to the terminal and try again.</p></body></html>
`;

const ALREADY_COMPLETED_PAGE = `<!doctype html>
<html><head><title>cloudctx</title></head>
<body><h1>Login already completed</h1><p>You can close this window.</p></body></html>
`;

export class AuthCallbackServer implements CallbackListener {
  private server: http.Server | null = null;
  private delivered = false;
  private readonly result: Promise<string | null>;
  private deliver: (code: string | null) => void = () => {};

  constructor(
    private readonly port: number,
    private readonly host: string = '127.0.0.1'
  ) {
    this.result = new Promise((resolve) => {
      this.deliver = resolve;
    });
  }

  get callbackUrl(): string {
    return `http://${this.host}:${this.port}${CALLBACK_PATH}`;
  }

  /**
   * Bind the port and start accepting redirects.
   */
  async start(): Promise<void> {
    if (this.server) {
      return;
    }

    const server = http.createServer((req, res) => {
      this.handleRequest(req, res);
    });

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.port, this.host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    this.server = server;
  }

  /**
   * Block until the browser delivers a value, the deadline passes, or the
   * signal aborts.
   */
  waitForCode(options: WaitForCodeOptions = {}): Promise<string | null> {
    const { timeoutMs, signal } = options;

    if (signal?.aborted) {
      return Promise.reject(new CallbackCancelledError());
    }

    return new Promise((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;

      const cleanup = (): void => {
        if (timer) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };
      const onAbort = (): void => {
        cleanup();
        reject(new CallbackCancelledError());
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          cleanup();
          reject(new CallbackCancelledError(`No browser callback received within ${timeoutMs}ms`));
        }, timeoutMs);
      }

      this.result.then(
        (code) => {
          cleanup();
          resolve(code);
        },
        (error: unknown) => {
          cleanup();
          reject(error);
        }
      );
    });
  }

  /**
   * Stop listening and drop open connections. Safe to call more than once.
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
      server.closeAllConnections();
    });
  }

  isListening(): boolean {
    return this.server !== null && this.server.listening;
  }

  private handleRequest(req: http.IncomingMessage, res: http.ServerResponse): void {
    let url: URL;
    try {
      url = new URL(req.url ?? '/', 'http://127.0.0.1');
    } catch {
      res.writeHead(400, { 'content-type': 'text/plain' });
      res.end('Bad request');
      return;
    }

    if (url.pathname !== CALLBACK_PATH) {
      res.writeHead(404, { 'content-type': 'text/plain' });
      res.end('Not found');
      return;
    }

    if (this.delivered) {
      this.respondHtml(res, ALREADY_COMPLETED_PAGE);
      return;
    }

    const code = url.searchParams.get('code');
    this.delivered = true;
    this.respondHtml(res, code ? SUCCESS_PAGE : MISSING_CODE_PAGE);
    this.deliver(code ? code : null);
  }

  private respondHtml(res: http.ServerResponse, page: string): void {
    res.writeHead(200, {
      'content-type': 'text/html; charset=utf-8',
      connection: 'close',
    });
    res.end(page);
  }
}

/**
 * Start a callback server on `port`, run `fn`, and always stop the server.
 */
export async function withAuthCallbackServer<T>(
  port: number,
  fn: (server: AuthCallbackServer) => Promise<T>
): Promise<T> {
  const server = new AuthCallbackServer(port);
  await server.start();
  try {
    return await fn(server);
  } finally {
    await server.stop();
  }
}

/**
 * Default listener scope: reserve a free loopback port for this session only.
 */
export const localCallbackListenerScope: CallbackListenerScope = async (fn) => {
  const port = await findFreePort();
  return withAuthCallbackServer(port, fn);
};
