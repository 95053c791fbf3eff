import ms from 'ms';
import * as x from 'x-value';

import type {HTTPClient, HTTPMethod} from '../../@utils/index.js';
import {getErrorCode} from '../../@utils/index.js';
import {ResponseFormatError} from '../../errors.js';

export const CLOUDFLARE_ENDPOINT_DEFAULT =
  'https://api.cloudflare.com/client/v4';

const TIMEOUT_DEFAULT = ms('15s');

/**
 * `errors` is only logged, its items are left unchecked.
 */
const CloudflareResponseStatus = x.object({
  success: x.boolean,
  errors: x.array(x.unknown).optional(),
});

/**
 * The v4 envelope. `result` is left unchecked here as it is `null` on
 * failures and differs per endpoint otherwise.
 */
export type CloudflareResponse = x.TypeOf<typeof CloudflareResponseStatus> & {
  result?: unknown;
};

export type CloudflareAPIOptions = {
  /**
   * API token, sent as a bearer token.
   */
  token: string;
  endpoint?: string;
  timeout?: number;
};

export class CloudflareAPI {
  readonly endpoint: string;

  private headers: Record<string, string>;
  private timeout: number;

  constructor(
    private client: HTTPClient,
    {
      token,
      endpoint = CLOUDFLARE_ENDPOINT_DEFAULT,
      timeout = TIMEOUT_DEFAULT,
    }: CloudflareAPIOptions,
  ) {
    if (!token) {
      throw new Error('Cloudflare API token is required.');
    }

    this.endpoint = endpoint.replace(/\/+$/, '');

    this.headers = {
      authorization: `Bearer ${token}`,
      accept: 'application/json',
    };

    this.timeout = timeout;
  }

  get(
    path: string,
    query: Record<string, string> = {},
  ): Promise<CloudflareResponse> {
    const search = new URLSearchParams(query).toString();

    return this.request('GET', search ? `${path}?${search}` : path);
  }

  patch(path: string, body: object): Promise<CloudflareResponse> {
    return this.request('PATCH', path, body);
  }

  private async request(
    method: HTTPMethod,
    path: string,
    body?: object,
  ): Promise<CloudflareResponse> {
    const url = `${this.endpoint}${path}`;

    const data = await this.client.request(method, url, {
      expectJSON: true,
      headers: this.headers,
      body,
      timeout: this.timeout,
    });

    const status = satisfiesResponse(
      value => CloudflareResponseStatus.satisfies(value),
      data,
      url,
    );

    return {
      ...status,
      result:
        typeof data === 'object' && data !== null && 'result' in data
          ? data.result
          : undefined,
    };
  }
}

/**
 * Checks a response value against its expected shape, reporting a
 * mismatch as a `ResponseFormatError`.
 */
export function satisfiesResponse<T>(
  satisfies: (value: unknown) => T,
  value: unknown,
  source: string,
): T {
  try {
    return satisfies(value);
  } catch (error) {
    throw new ResponseFormatError(
      `unexpected response from ${source}: ${getErrorCode(error)}`,
      {cause: error},
    );
  }
}
