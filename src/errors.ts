/**
 * Error taxonomy for cloudctx.
 *
 * Commands catch these at the command boundary and turn them into
 * user-facing messages. Anything that is not a CloudCtxError is treated as
 * an unexpected internal failure.
 */

export class CloudCtxError extends Error {
  public readonly code: string;

  constructor(message: string, code: string = 'CLOUDCTX_ERROR') {
    super(message);
    this.name = new.target.name;
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The configuration is inconsistent: a malformed store file, or a remote
 * service that accepted a token but has no user/organization behind it.
 */
export class ConfigError extends CloudCtxError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
  }
}

export class NotFoundError extends CloudCtxError {
  constructor(message: string) {
    super(message, 'NOT_FOUND');
  }
}

/**
 * Non-success response from the remote REST API.
 */
export class RestApiClientError extends CloudCtxError {
  public readonly statusCode: number;

  constructor(message: string, statusCode: number) {
    super(message, 'REST_API_ERROR');
    this.statusCode = statusCode;
  }
}

/**
 * The wait for a browser callback was interrupted (abort signal or deadline).
 */
export class CallbackCancelledError extends CloudCtxError {
  constructor(message: string = 'Waiting for browser callback was cancelled') {
    super(message, 'CALLBACK_CANCELLED');
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
