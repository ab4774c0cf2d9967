import { describe, it, expect, afterEach } from 'vitest';
import * as net from 'net';
import {
  AuthCallbackServer,
  localCallbackListenerScope,
  withAuthCallbackServer,
} from './auth-callback-server';
import { findFreePort } from './free-port';
import { CallbackCancelledError } from '../errors';

function rawRequest(port: number, request: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const socket = net.connect(port, '127.0.0.1', () => {
      socket.write(request);
    });
    let response = '';
    socket.setEncoding('utf-8');
    socket.on('data', (chunk: string) => {
      response += chunk;
    });
    socket.on('end', () => resolve(response));
    socket.on('error', reject);
  });
}

describe('AuthCallbackServer', () => {
  let server: AuthCallbackServer | null = null;

  async function startServer(): Promise<AuthCallbackServer> {
    const port = await findFreePort();
    server = new AuthCallbackServer(port);
    await server.start();
    return server;
  }

  afterEach(async () => {
    await server?.stop();
    server = null;
  });

  it('should expose a loopback callback url', async () => {
    const port = await findFreePort();
    const s = new AuthCallbackServer(port);

    expect(s.callbackUrl).toBe(`http://127.0.0.1:${port}/callback`);
  });

  it('should deliver the code from the redirect', async () => {
    const s = await startServer();
    const waiting = s.waitForCode();

    const response = await fetch(`${s.callbackUrl}?code=tok1`);

    expect(response.status).toBe(200);
    expect(await response.text()).toContain('Token received');
    await expect(waiting).resolves.toBe('tok1');
  });

  it('should deliver null when the redirect has no code', async () => {
    const s = await startServer();

    const response = await fetch(s.callbackUrl);

    expect(await response.text()).toContain('No token received');
    await expect(s.waitForCode()).resolves.toBeNull();
  });

  it('should treat an empty code as absent', async () => {
    const s = await startServer();

    await fetch(`${s.callbackUrl}?code=`);

    await expect(s.waitForCode()).resolves.toBeNull();
  });

  it('should ignore other paths and keep waiting', async () => {
    const s = await startServer();
    const waiting = s.waitForCode();

    const notFound = await fetch(s.callbackUrl.replace('/callback', '/favicon.ico'));
    expect(notFound.status).toBe(404);

    await fetch(`${s.callbackUrl}?code=after-favicon`);
    await expect(waiting).resolves.toBe('after-favicon');
  });

  it('should read the code regardless of a malformed Host header', async () => {
    const s = await startServer();
    const port = Number(new URL(s.callbackUrl).port);
    const waiting = s.waitForCode();

    const response = await rawRequest(
      port,
      'GET /callback?code=bad-host HTTP/1.1\r\nHost: a b\r\nConnection: close\r\n\r\n'
    );

    expect(response.startsWith('HTTP/1.1 200')).toBe(true);
    await expect(waiting).resolves.toBe('bad-host');
  });

  it('should answer 400 for a request target that is not a URL path', async () => {
    const s = await startServer();
    const port = Number(new URL(s.callbackUrl).port);
    const waiting = s.waitForCode();

    const response = await rawRequest(
      port,
      'GET http://[bad HTTP/1.1\r\nHost: 127.0.0.1\r\nConnection: close\r\n\r\n'
    );
    expect(response.startsWith('HTTP/1.1 400')).toBe(true);

    await fetch(`${s.callbackUrl}?code=after-bad-target`);
    await expect(waiting).resolves.toBe('after-bad-target');
  });

  it('should hand over exactly one code', async () => {
    const s = await startServer();

    await fetch(`${s.callbackUrl}?code=first`);
    const second = await fetch(`${s.callbackUrl}?code=second`);

    expect(await second.text()).toContain('Login already completed');
    await expect(s.waitForCode()).resolves.toBe('first');
  });

  it('should reject when the signal aborts', async () => {
    const s = await startServer();
    const controller = new AbortController();

    const waiting = s.waitForCode({ signal: controller.signal });
    controller.abort();

    await expect(waiting).rejects.toBeInstanceOf(CallbackCancelledError);
  });

  it('should reject immediately for an already aborted signal', async () => {
    const s = await startServer();
    const controller = new AbortController();
    controller.abort();

    await expect(s.waitForCode({ signal: controller.signal })).rejects.toThrow(
      'Waiting for browser callback was cancelled'
    );
  });

  it('should reject after the deadline', async () => {
    const s = await startServer();

    await expect(s.waitForCode({ timeoutMs: 20 })).rejects.toThrow(
      'No browser callback received within 20ms'
    );
  });

  it('should stop idempotently', async () => {
    const s = await startServer();

    await s.stop();
    await s.stop();

    expect(s.isListening()).toBe(false);
  });
});

describe('withAuthCallbackServer', () => {
  it('should stop the server after the callback resolves', async () => {
    const port = await findFreePort();
    const seen: { server?: AuthCallbackServer } = {};

    const result = await withAuthCallbackServer(port, async (s) => {
      seen.server = s;
      expect(s.isListening()).toBe(true);
      return 'done';
    });

    expect(result).toBe('done');
    expect(seen.server?.isListening()).toBe(false);
  });

  it('should stop the server and free the port when the callback throws', async () => {
    const port = await findFreePort();
    const seen: { server?: AuthCallbackServer } = {};

    await expect(
      withAuthCallbackServer(port, async (s) => {
        seen.server = s;
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(seen.server?.isListening()).toBe(false);
    // The same port can be bound again
    await withAuthCallbackServer(port, async (s) => {
      expect(s.isListening()).toBe(true);
    });
  });
});

describe('localCallbackListenerScope', () => {
  it('should provide a working listener on a free port', async () => {
    const code = await localCallbackListenerScope(async (listener) => {
      const waiting = listener.waitForCode();
      await fetch(`${listener.callbackUrl}?code=scoped`);
      return waiting;
    });

    expect(code).toBe('scoped');
  });
});
