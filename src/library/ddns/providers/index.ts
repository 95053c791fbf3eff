import type {HTTPClient} from '../../@utils/index.js';
import type {IDDNSProvider} from '../ddns-provider.js';
import {DryRunRecordMutator, LiveRecordMutator} from '../record-mutator.js';

import type {CloudflareAPIOptions} from './cloudflare-api.js';
import {CloudflareAPI} from './cloudflare-api.js';
import {CloudflareDDNSProvider} from './cloudflare-ddns-provider.js';

export type DDNSProviderOptions = CloudflareAPIOptions & {
  dryRun: boolean;
};

export function createDDNSProvider(
  client: HTTPClient,
  {dryRun, ...options}: DDNSProviderOptions,
): IDDNSProvider {
  const api = new CloudflareAPI(client, options);

  return new CloudflareDDNSProvider(
    api,
    dryRun ? new DryRunRecordMutator() : new LiveRecordMutator(api),
  );
}

export * from './cloudflare-api.js';
export * from './cloudflare-ddns-provider.js';
