#!/usr/bin/env node

import {CommanderError} from 'commander';

import {
  ConsoleLogSink,
  Logs,
  NodeHTTPClient,
  RUN_UNEXPECTED_ERROR,
  RotatingFileLogSink,
  configureLogs,
  createDDNSProvider,
  fetchPublicIPv4,
  getFailureExitCode,
  reconcile,
  resolveConfig,
  resolveLogsConfig,
} from '../library/index.js';

async function main(): Promise<number> {
  const {level, file} = resolveLogsConfig(process.env);

  configureLogs({
    level,
    sinks: [new ConsoleLogSink(), new RotatingFileLogSink({path: file})],
  });

  const config = await resolveConfig(process.argv.slice(2), process.env);

  const client = new NodeHTTPClient();

  return reconcile(config, {
    createProvider: token =>
      createDDNSProvider(client, {
        token,
        endpoint: config.endpoint,
        dryRun: config.dryRun,
      }),
    resolvePublicIP: () => fetchPublicIPv4(client, {url: config.publicIPURL}),
  });
}

main().then(
  exitCode => {
    process.exitCode = exitCode;
  },
  error => {
    // Commander has already printed the usage error or the help.
    if (!(error instanceof CommanderError)) {
      Logs.error('run', RUN_UNEXPECTED_ERROR, error);
    }

    process.exitCode = getFailureExitCode(error);
  },
);
