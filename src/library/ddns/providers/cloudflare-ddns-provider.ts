import * as x from 'x-value';

import {
  Logs,
  RECORDS_LOOKUP_FAILED,
  UPDATE_FAILED,
  UPDATE_RESPONSE,
  ZONE_LOOKUP_FAILED,
} from '../../@log/index.js';
import type {DNSRecordType, IDDNSProvider} from '../ddns-provider.js';
import {DNSRecord, Zone} from '../ddns-provider.js';
import type {IRecordMutator} from '../record-mutator.js';

import type {CloudflareAPI, CloudflareResponse} from './cloudflare-api.js';
import {satisfiesResponse} from './cloudflare-api.js';

const ZoneList = x.array(Zone);

const DNSRecordList = x.array(DNSRecord);

export class CloudflareDDNSProvider implements IDDNSProvider {
  readonly name = 'cloudflare';

  constructor(
    private api: CloudflareAPI,
    private mutator: IRecordMutator,
  ) {}

  async resolveZoneId(zoneName: string): Promise<string | undefined> {
    const path = '/zones';

    const response = await this.api.get(path, {name: zoneName});

    if (!response.success) {
      Logs.error('zone', ZONE_LOOKUP_FAILED(response));
      return undefined;
    }

    const [zone] = satisfiesResponse(
      value => ZoneList.satisfies(value),
      response.result ?? [],
      path,
    );

    // Same-named zones (e.g. pending and active) come in API order.
    return zone?.id;
  }

  async listRecords(
    zoneId: string,
    recordName: string,
    type: DNSRecordType = 'A',
  ): Promise<DNSRecord[]> {
    const path = `/zones/${encodeURIComponent(zoneId)}/dns_records`;

    const response = await this.api.get(path, {name: recordName, type});

    if (!response.success) {
      Logs.error('records', RECORDS_LOOKUP_FAILED(response));
      return [];
    }

    return satisfiesResponse(
      value => DNSRecordList.satisfies(value),
      response.result ?? [],
      path,
    );
  }

  async updateRecordAddress(
    zoneId: string,
    recordId: string,
    address: string,
  ): Promise<CloudflareResponse> {
    const path = `/zones/${encodeURIComponent(
      zoneId,
    )}/dns_records/${encodeURIComponent(recordId)}`;

    const response = await this.mutator.patch(path, {content: address});

    if (response.success) {
      Logs.info('update', UPDATE_RESPONSE(response));
    } else {
      Logs.error('update', UPDATE_FAILED(recordId, response));
    }

    return response;
  }
}
