import {homedir} from 'os';
import {join, resolve} from 'path';

import {Command} from 'commander';
import * as x from 'x-value';

import type {LogLevel} from './@log/index.js';
import {
  CONFIG_TOKEN_FILE_EMPTY,
  CONFIG_TOKEN_FILE_PERMISSIONS_TOO_OPEN,
  CONFIG_TOKEN_FILE_UNREADABLE,
  CONFIG_TOKEN_READ_FROM_FILE,
  Logs,
  parseLogLevel,
} from './@log/index.js';
import {gentleStat, readFirstLine} from './@utils/index.js';
import {CLOUDFLARE_ENDPOINT_DEFAULT} from './ddns/index.js';
import {PUBLIC_IP_URL_DEFAULT} from './public-ip.js';

const LOG_FILE_DEFAULT = 'ddns.log';

const TOKEN_FILE_NAME_DEFAULT = '.cloudflare_token';

/**
 * Values of `DDNS_DRY_RUN` (case-insensitive) that turn real updates on.
 */
const DRY_RUN_DISABLING_VALUES = ['0', 'false', 'no'];

export const Config = x.object({
  token: x.string.optional(),
  /**
   * Zone name, e.g.: "example.com"
   */
  zone: x.string.optional(),
  /**
   * Full record name, e.g.: "host.example.com"
   */
  name: x.string.optional(),
  dryRun: x.boolean,
  endpoint: x.string,
  publicIPURL: x.string,
});

export type Config = x.TypeOf<typeof Config>;

export type Environment = Record<string, string | undefined>;

export type LogsConfig = {
  level: LogLevel;
  file: string;
};

export type CLIOptions = {
  zone?: string;
  name?: string;
  token?: string;
};

const ENVIRONMENT_HELP = `
Environment variables:
  CLOUDFLARE_API_TOKEN   API token (required unless --token or a token file is used)
  CLOUDFLARE_TOKEN_FILE  file whose first line is the token (default: ~/${TOKEN_FILE_NAME_DEFAULT})
  DDNS_ZONE_NAME         zone name if --zone is not given
  DDNS_DNS_NAME          record name if --name is not given
  DDNS_DRY_RUN           dry run unless 0, false or no (default: 1)
  DDNS_LOG_FILE          log file (default: ./${LOG_FILE_DEFAULT})
  DDNS_LOG_LEVEL         DEBUG, INFO, WARNING or ERROR (default: INFO)
  DDNS_PUBLIC_IP_URL     plain-text IP echo endpoint (default: ${PUBLIC_IP_URL_DEFAULT})
  DDNS_API_ENDPOINT      Cloudflare API base (default: ${CLOUDFLARE_ENDPOINT_DEFAULT})`;

export function createProgram(): Command {
  return new Command('cf-ddns')
    .description(
      'Point the A records of a Cloudflare host at the public IPv4 address of this machine.',
    )
    .option('-z, --zone <zone>', 'Cloudflare zone name (e.g. example.com)')
    .option(
      '-n, --name <name>',
      'DNS record name to update (e.g. host.example.com)',
    )
    .option('-t, --token <token>', 'Cloudflare API token')
    .addHelpText('after', ENVIRONMENT_HELP)
    .exitOverride();
}

/**
 * Splits arguments holding whitespace, as some schedulers pass
 * "--zone example.com" as a single argument.
 */
export function normalizeArgs(args: string[]): string[] {
  return args
    .flatMap(arg => (/\s/.test(arg) ? arg.trim().split(/\s+/) : [arg]))
    .filter(arg => arg !== '');
}

/**
 * Throws a `CommanderError` on invalid arguments and after printing help,
 * instead of exiting.
 */
export function parseArgs(args: string[]): CLIOptions {
  const program = createProgram();

  program.parse(normalizeArgs(args), {from: 'user'});

  return program.opts<CLIOptions>();
}

export function parseDryRun(value: string | undefined): boolean {
  return (
    value === undefined ||
    !DRY_RUN_DISABLING_VALUES.includes(value.trim().toLowerCase())
  );
}

export function resolveLogsConfig(
  env: Environment,
  cwd = process.cwd(),
): LogsConfig {
  return {
    level: parseLogLevel(env.DDNS_LOG_LEVEL),
    file: resolve(cwd, env.DDNS_LOG_FILE || LOG_FILE_DEFAULT),
  };
}

export type ResolveConfigOptions = {
  homeDir?: string;
};

/**
 * Builds the run configuration. Flags take precedence over environment
 * variables; empty values count as absent.
 */
export async function resolveConfig(
  args: string[],
  env: Environment,
  {homeDir = homedir()}: ResolveConfigOptions = {},
): Promise<Config> {
  const options = parseArgs(args);

  const token =
    options.token ||
    env.CLOUDFLARE_API_TOKEN ||
    (await readTokenFile(
      env.CLOUDFLARE_TOKEN_FILE || join(homeDir, TOKEN_FILE_NAME_DEFAULT),
    ));

  return Config.satisfies({
    token: token || undefined,
    zone: options.zone || env.DDNS_ZONE_NAME || undefined,
    name: options.name || env.DDNS_DNS_NAME || undefined,
    dryRun: parseDryRun(env.DDNS_DRY_RUN),
    endpoint: env.DDNS_API_ENDPOINT || CLOUDFLARE_ENDPOINT_DEFAULT,
    publicIPURL: env.DDNS_PUBLIC_IP_URL || PUBLIC_IP_URL_DEFAULT,
  });
}

async function readTokenFile(path: string): Promise<string | undefined> {
  const stats = await gentleStat(path);

  if (!stats?.isFile()) {
    return undefined;
  }

  const mode = stats.mode & 0o777;

  if (process.platform !== 'win32' && (mode & 0o077) !== 0) {
    Logs.warn('config', CONFIG_TOKEN_FILE_PERMISSIONS_TOO_OPEN(path, mode));
  }

  let token: string;

  try {
    token = await readFirstLine(path);
  } catch (error) {
    Logs.warn('config', CONFIG_TOKEN_FILE_UNREADABLE(path, error));
    return undefined;
  }

  if (!token) {
    Logs.warn('config', CONFIG_TOKEN_FILE_EMPTY(path));
    return undefined;
  }

  Logs.info('config', CONFIG_TOKEN_READ_FROM_FILE(path));

  return token;
}
