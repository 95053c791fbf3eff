import * as x from 'x-value';

/**
 * Only address records of IPv4 are reconciled.
 */
export const DNSRecordType = x.literal('A');

export type DNSRecordType = x.TypeOf<typeof DNSRecordType>;

export const DNSRecord = x.object({
  id: x.string,
  name: x.string,
  type: x.string,
  /**
   * Address the record currently points to.
   */
  content: x.string,
});

export type DNSRecord = x.TypeOf<typeof DNSRecord>;

export const Zone = x.object({
  id: x.string,
  name: x.string.optional(),
});

export type Zone = x.TypeOf<typeof Zone>;

export type IDDNSProvider = {
  readonly name: string;

  /**
   * Resolves to `undefined` if the provider reports a failure or knows no
   * zone by that name.
   */
  resolveZoneId(zoneName: string): Promise<string | undefined>;

  /**
   * Resolves to an empty array if the provider reports a failure or no
   * record matches.
   */
  listRecords(
    zoneId: string,
    recordName: string,
    type?: DNSRecordType,
  ): Promise<DNSRecord[]>;

  /**
   * Changes the address of one record, leaving its other attributes as
   * they are.
   */
  updateRecordAddress(
    zoneId: string,
    recordId: string,
    address: string,
  ): Promise<unknown>;
};
