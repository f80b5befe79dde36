/**
 * Command-line argument parsing for eqp-spec-server.
 *
 * @packageDocumentation
 */

import { getEnvVarDocumentation } from '../config/env.js';
import type { PartialConfig } from '../config/types.js';

const ENV_HELP = Object.entries(getEnvVarDocumentation())
  .map(([name, doc]) => `  ${name.padEnd(23)}${doc.description}`)
  .join('\n');

export const HELP_TEXT = `
eqp-spec-server - Equipment parameter spec store

Usage:
  eqp-spec-server [options]

Options:
  --mcp                  Serve MCP on stdio instead of starting the HTTP server
  --host <host>          Interface to bind (default: 127.0.0.1)
  --port, -p <port>      Port to listen on (default: 5001)
  --data-dir <path>      Directory holding parameter_specs.csv (default: data)
  --config, -c <path>    Config file (default: eqp-spec.toml)
  --debug, -d            Enable debug logging
  --help, -h             Show this help message

Environment (overrides the config file; flags override both):
${ENV_HELP}

Tools provided over MCP:
  - list_parameter_specs: Lists every stored spec
  - add_parameter_spec: Validates and stores a new spec
`;

/**
 * Parsed command-line options.
 */
export interface CliOptions {
  /** Serve MCP on stdio. */
  mcp: boolean;
  /** Force the debug log level. */
  debug: boolean;
  /** Print usage and exit. */
  help: boolean;
  host?: string;
  port?: number;
  dataDir?: string;
  configPath?: string;
}

/**
 * Error thrown for unusable command-line arguments.
 */
export class CliArgsError extends Error {
  /** The offending argument. */
  public readonly arg: string;

  constructor(message: string, arg: string) {
    super(message);
    this.name = 'CliArgsError';
    this.arg = arg;
  }
}

function parsePort(raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new CliArgsError(`Invalid value for --port: '${raw}'`, '--port');
  }
  return Number(raw);
}

/**
 * Parses arguments (without the node and script entries).
 *
 * @param args - Arguments, e.g. `process.argv.slice(2)`.
 * @returns The parsed options.
 * @throws CliArgsError for unknown flags or missing values.
 *
 * @example
 * ```typescript
 * parseCliArgs(['--port', '8080', '--debug']);
 * // { mcp: false, debug: true, help: false, port: 8080 }
 * ```
 */
export function parseCliArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = { mcp: false, debug: false, help: false };

  const valueAfter = (index: number, flag: string): string => {
    const next = args[index + 1];
    if (next === undefined || next.startsWith('-')) {
      throw new CliArgsError(`Missing value for ${flag}`, flag);
    }
    return next;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    switch (arg) {
      case '--mcp':
        options.mcp = true;
        break;
      case '--debug':
      case '-d':
        options.debug = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      case '--host':
        options.host = valueAfter(i, arg);
        i++;
        break;
      case '--port':
      case '-p':
        options.port = parsePort(valueAfter(i, arg));
        i++;
        break;
      case '--data-dir':
        options.dataDir = valueAfter(i, arg);
        i++;
        break;
      case '--config':
      case '-c':
        options.configPath = valueAfter(i, arg);
        i++;
        break;
      default:
        throw new CliArgsError(`Unknown option: ${arg}`, arg);
    }
  }

  return options;
}

/**
 * Converts parsed flags to configuration overrides.
 *
 * @param options - Parsed options.
 * @returns Overrides holding only the flags that were given.
 */
export function cliOverrides(options: CliOptions): PartialConfig {
  const overrides: PartialConfig = {};

  if (options.host !== undefined) {
    overrides.server = { ...overrides.server, host: options.host };
  }
  if (options.port !== undefined) {
    overrides.server = { ...overrides.server, port: options.port };
  }
  if (options.dataDir !== undefined) {
    overrides.storage = { data_dir: options.dataDir };
  }
  if (options.debug) {
    overrides.logging = { level: 'debug' };
  }

  return overrides;
}
