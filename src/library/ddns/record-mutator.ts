import {DRY_RUN_WOULD_PATCH, Logs} from '../@log/index.js';

import type {
  CloudflareAPI,
  CloudflareResponse,
} from './providers/cloudflare-api.js';

export type RecordPatch = {
  content: string;
};

/**
 * Performs the mutating calls of a provider. Swapping the implementation
 * switches between live and dry runs without the provider knowing.
 */
export type IRecordMutator = {
  readonly dryRun: boolean;

  patch(path: string, patch: RecordPatch): Promise<CloudflareResponse>;
};

export class LiveRecordMutator implements IRecordMutator {
  readonly dryRun = false;

  constructor(private api: CloudflareAPI) {}

  patch(path: string, patch: RecordPatch): Promise<CloudflareResponse> {
    return this.api.patch(path, patch);
  }
}

/**
 * Logs the call it would have made and answers like a successful one,
 * with the payload as result. Never touches the network.
 */
export class DryRunRecordMutator implements IRecordMutator {
  readonly dryRun = true;

  async patch(path: string, patch: RecordPatch): Promise<CloudflareResponse> {
    Logs.info('dry-run', DRY_RUN_WOULD_PATCH(path, patch));

    return {success: true, result: patch};
  }
}
