import { Command, InvalidArgumentError } from 'commander';

import { ScimTesterOverrides, parseResourceTypeList } from './modules/config/scim-tester.config';
import { LogLevel, parseLogLevel } from './modules/logging/log-levels';

type CliOptions = {
  token?: string;
  verbose?: boolean;
  resourceTypes?: string[];
  timeout?: number;
  logLevel?: LogLevel;
};

export interface CliInvocation {
  overrides: ScimTesterOverrides;
  verbose: boolean;
  logLevel?: LogLevel;
}

const LOG_LEVEL_NAMES = Object.keys(LogLevel).filter((key) => Number.isNaN(Number(key)));

function parseTimeout(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new InvalidArgumentError('Expected a positive number of milliseconds.');
  }
  return ms;
}

function parseResourceTypes(value: string): string[] {
  const names = parseResourceTypeList(value);
  if (names === undefined) {
    throw new InvalidArgumentError('Expected a comma separated list of resource type names.');
  }
  return names;
}

function parseLogLevelOption(value: string): LogLevel {
  if (!LOG_LEVEL_NAMES.includes(value.trim().toUpperCase())) {
    throw new InvalidArgumentError(`Valid levels are: ${LOG_LEVEL_NAMES.join(', ')}`);
  }
  return parseLogLevel(value);
}

export function buildCommand(): Command {
  return new Command()
    .name('scim-tester')
    .description('Check a SCIM 2.0 server for protocol conformance')
    .argument('[host]', 'Base URL of the SCIM server (default: $SCIM_BASE_URL)')
    .option('--token <token>', 'Bearer token (default: $SCIM_TOKEN)')
    .option('--verbose', 'Print the data attached to each result')
    .option('--resource-types <names>', 'Comma separated resource type names to test', parseResourceTypes)
    .option('--timeout <ms>', 'Per-request timeout in milliseconds', parseTimeout)
    .option('--log-level <level>', 'Log level on stderr (default: $LOG_LEVEL or WARN)', parseLogLevelOption)
    .exitOverride();
}

/**
 * Parse command line arguments. Usage errors surface as CommanderError
 * (the command is built with exitOverride()).
 */
export function parseCli(argv: readonly string[], from: 'node' | 'user' = 'node'): CliInvocation {
  const command = buildCommand();
  command.parse([...argv], { from });

  const options = command.opts<CliOptions>();
  const [host] = command.args;
  const overrides: ScimTesterOverrides = {};
  if (host !== undefined) overrides.baseUrl = host;
  if (options.token !== undefined) overrides.token = options.token;
  if (options.timeout !== undefined) overrides.timeoutMs = options.timeout;
  if (options.resourceTypes !== undefined) overrides.resourceTypes = options.resourceTypes;

  return { overrides, verbose: options.verbose === true, logLevel: options.logLevel };
}
