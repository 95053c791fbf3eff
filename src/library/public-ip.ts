import ms from 'ms';

import type {HTTPClient} from './@utils/index.js';
import {truncate} from './@utils/index.js';
import {ResponseFormatError} from './errors.js';
import {IPv4Address} from './x.js';

export const PUBLIC_IP_URL_DEFAULT = 'https://api.ipify.org';

const TIMEOUT_DEFAULT = ms('10s');

export type PublicIPOptions = {
  url?: string;
  timeout?: number;
};

/**
 * Asks a plain-text IP echo endpoint for the public IPv4 address of this
 * machine. Transport errors are not handled here.
 */
export async function fetchPublicIPv4(
  client: HTTPClient,
  {
    url = PUBLIC_IP_URL_DEFAULT,
    timeout = TIMEOUT_DEFAULT,
  }: PublicIPOptions = {},
): Promise<IPv4Address> {
  const ip = (await client.request('GET', url, {timeout})).trim();

  try {
    return IPv4Address.satisfies(ip);
  } catch (error) {
    throw new ResponseFormatError(
      `${url} returned "${truncate(ip, 64)}" instead of an IPv4 address.`,
      {cause: error},
    );
  }
}
