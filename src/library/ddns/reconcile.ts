import {
  CONFIG_TOKEN_MISSING,
  CONFIG_ZONE_OR_NAME_MISSING,
  IP_PUBLIC_ADDRESS,
  Logs,
  NETWORK_ERROR,
  RECORDS_FOUND,
  RECORDS_NOT_FOUND,
  RUN_DRY_RUN_NOTICE,
  RUN_NO_UPDATE_NEEDED,
  RUN_RECORDS_UPDATED,
  RUN_STARTED,
  UPDATE_RECORD_UP_TO_DATE,
  UPDATE_RECORD_UPDATING,
  ZONE_NOT_FOUND,
  ZONE_RESOLVED,
} from '../@log/index.js';
import type {Config} from '../config.js';
import {TransportError} from '../errors.js';
import {ExitCode} from '../exit-code.js';

import type {IDDNSProvider} from './ddns-provider.js';

export type ReconcileDependencies = {
  /**
   * Only called once the token is known to be non-empty.
   */
  createProvider(token: string): IDDNSProvider;
  resolvePublicIP(): Promise<string>;
};

/**
 * Points every A record of `config.name` in `config.zone` at the current
 * public IP, and tells how it went with an exit code.
 *
 * Transport errors end the run with `ExitCode.networkError`, records after
 * the failing one are left alone. Other errors are rethrown.
 */
export async function reconcile(
  {token, zone, name, dryRun}: Config,
  {createProvider, resolvePublicIP}: ReconcileDependencies,
): Promise<ExitCode> {
  if (!token) {
    Logs.error('config', CONFIG_TOKEN_MISSING);
    return ExitCode.tokenMissing;
  }

  if (!zone || !name) {
    Logs.error('config', CONFIG_ZONE_OR_NAME_MISSING);
    return ExitCode.parametersMissing;
  }

  const provider = createProvider(token);

  Logs.info('run', RUN_STARTED(name, zone, dryRun));

  if (dryRun) {
    Logs.warn('dry-run', RUN_DRY_RUN_NOTICE);
  }

  try {
    const zoneId = await provider.resolveZoneId(zone);

    if (zoneId === undefined) {
      Logs.error('zone', ZONE_NOT_FOUND(zone));
      return ExitCode.zoneNotFound;
    }

    Logs.debug('zone', ZONE_RESOLVED(zone, zoneId));

    const records = await provider.listRecords(zoneId, name, 'A');

    if (records.length === 0) {
      Logs.info('records', RECORDS_NOT_FOUND(name, zone));
      return ExitCode.noRecords;
    }

    Logs.debug('records', RECORDS_FOUND(records.length, name));

    const ip = await resolvePublicIP();

    Logs.info('ip', IP_PUBLIC_ADDRESS(ip));

    let updatedCount = 0;

    for (const record of records) {
      if (record.content === ip) {
        Logs.info('update', UPDATE_RECORD_UP_TO_DATE(record.id, ip));
        continue;
      }

      Logs.info(
        'update',
        UPDATE_RECORD_UPDATING(record.id, record.content, ip),
      );

      await provider.updateRecordAddress(zoneId, record.id, ip);

      updatedCount++;
    }

    if (updatedCount === 0) {
      Logs.info('run', RUN_NO_UPDATE_NEEDED);
      return ExitCode.upToDate;
    }

    Logs.info('run', RUN_RECORDS_UPDATED(updatedCount, dryRun));

    return ExitCode.success;
  } catch (error) {
    if (error instanceof TransportError) {
      Logs.error('network', NETWORK_ERROR(error));
      Logs.debug('network', error);
      return ExitCode.networkError;
    }

    throw error;
  }
}
