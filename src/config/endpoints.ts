/**
 * Remote platform endpoint configuration.
 *
 * This is the single source of truth for the URLs and environment variables
 * the CLI knows about.
 */

/**
 * Default platform endpoint.
 * Can be overridden via:
 * - CLI flag: `--endpoint`
 * - Environment variable: `CLOUDCTX_API_ENDPOINT`
 */
export const DEFAULT_ENDPOINT = 'https://cloud.cloudctx.dev';

/**
 * Paths on the platform, relative to the endpoint.
 */
export const PLATFORM_PATHS = {
  /** Web page where a signed-in user creates API tokens (browser login target) */
  TOKEN_CREATION_PAGE: '/api_tokens',
  /** Page referenced when a token is rejected */
  TOKEN_HELP_PAGE: '/api-token',
  /** REST: the user owning the token */
  CURRENT_USER: '/api/v1/auth/current',
  /** REST: the organization the token belongs to */
  CURRENT_ORGANIZATION: '/api/v1/current_org',
} as const;

/**
 * Environment variables honoured as defaults for CLI flags.
 */
export const ENV_VARS = {
  ENDPOINT: 'CLOUDCTX_API_ENDPOINT',
  API_TOKEN: 'CLOUDCTX_API_TOKEN',
  CONTEXT: 'CLOUDCTX_CONTEXT',
  HOME: 'CLOUDCTX_HOME',
  DEBUG: 'CLOUDCTX_DEBUG',
} as const;

/**
 * Default request timeout in milliseconds.
 */
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

/**
 * Strip trailing slashes so paths can be appended directly.
 */
export function normalizeEndpoint(endpoint: string): string {
  return endpoint.replace(/\/+$/, '');
}

/**
 * Build the browser URL that creates a token and redirects to `callbackUrl`.
 */
export function buildAuthUrl(endpoint: string, callbackUrl: string): string {
  const base = normalizeEndpoint(endpoint) + PLATFORM_PATHS.TOKEN_CREATION_PAGE;
  return `${base}?callback=${encodeURIComponent(callbackUrl)}`;
}
