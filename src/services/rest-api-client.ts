/**
 * REST client for the platform API.
 *
 * Only the identity calls needed to validate a token live here. The token is
 * sent as a bearer token; a 404 means "no such record" and comes back as null,
 * any other non-2xx response raises RestApiClientError with the status code.
 */

import { DEFAULT_REQUEST_TIMEOUT_MS, PLATFORM_PATHS, normalizeEndpoint } from '../config/endpoints';
import { ConfigError, RestApiClientError } from '../errors';

export interface UserSchema {
  email: string;
  name?: string;
}

export interface OrganizationSchema {
  name: string;
  uid?: string;
}

/**
 * Identity lookups used to validate a token.
 */
export interface CredentialValidator {
  getCurrentUser(): Promise<UserSchema | null>;
  getCurrentOrganization(): Promise<OrganizationSchema | null>;
}

export type CredentialValidatorFactory = (endpoint: string, apiToken: string) => CredentialValidator;

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class BaseRestApiClient {
  constructor(
    protected readonly endpoint: string,
    private readonly apiToken: string
  ) {}

  /**
   * GET a JSON object; null on 404.
   */
  protected async getJson(urlPath: string): Promise<JsonObject | null> {
    const url = this.endpoint + urlPath;
    const response = await fetch(url, {
      method: 'GET',
      headers: {
        accept: 'application/json',
        authorization: `Bearer ${this.apiToken}`,
      },
      signal: AbortSignal.timeout(DEFAULT_REQUEST_TIMEOUT_MS),
    });

    if (response.status === 404) {
      return null;
    }
    if (!response.ok) {
      const errorText = await response.text();
      throw new RestApiClientError(
        `GET ${url} failed: ${response.status} ${errorText}`.trim(),
        response.status
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new RestApiClientError(`GET ${url} returned invalid JSON`, response.status);
    }
    if (!isJsonObject(body)) {
      throw new RestApiClientError(`GET ${url} returned an unexpected payload`, response.status);
    }
    return body;
  }
}

export class RestApiClientV1 extends BaseRestApiClient implements CredentialValidator {
  async getCurrentUser(): Promise<UserSchema | null> {
    const body = await this.getJson(PLATFORM_PATHS.CURRENT_USER);
    if (body === null) {
      return null;
    }
    if (typeof body.email !== 'string') {
      throw new ConfigError('current user payload has no email');
    }
    return {
      email: body.email,
      name: typeof body.name === 'string' ? body.name : undefined,
    };
  }

  async getCurrentOrganization(): Promise<OrganizationSchema | null> {
    const body = await this.getJson(PLATFORM_PATHS.CURRENT_ORGANIZATION);
    if (body === null) {
      return null;
    }
    return {
      name: typeof body.name === 'string' ? body.name : '',
      uid: typeof body.uid === 'string' ? body.uid : undefined,
    };
  }
}

export class RestApiClient {
  public readonly v1: RestApiClientV1;

  constructor(endpoint: string, apiToken: string) {
    this.v1 = new RestApiClientV1(normalizeEndpoint(endpoint), apiToken);
  }
}

/**
 * Default validator wiring used by the CLI.
 */
export const createRestValidator: CredentialValidatorFactory = (endpoint, apiToken) =>
  new RestApiClient(endpoint, apiToken).v1;
