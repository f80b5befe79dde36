/**
 * Startup wiring: configuration layering and service construction.
 *
 * @packageDocumentation
 */

import path from 'node:path';
import { applyEnvOverrides, type EnvRecord } from '../config/env.js';
import { DEFAULT_CONFIG_FILE } from '../config/defaults.js';
import { loadConfigFile, mergeConfig } from '../config/parser.js';
import type { Config } from '../config/types.js';
import { assertConfigValid } from '../config/validator.js';
import { createHttpApp } from '../servers/http/app.js';
import { startHttpServer } from '../servers/http/server.js';
import type { ServerLogger } from '../servers/logging.js';
import { startStdioSpecServer } from '../servers/mcp/server.js';
import { ParameterSpecEngine } from '../specs/engine.js';
import { CsvSpecStore } from '../store/csv-store.js';
import { cliOverrides, type CliOptions } from './args.js';

/**
 * Builds the effective configuration.
 *
 * Override precedence: CLI flags > env > config file > defaults
 *
 * @param options - Parsed command-line options.
 * @param env - Environment to read overrides from.
 * @returns The validated configuration.
 * @throws ConfigParseError, EnvOverridesError or ConfigValidationError.
 */
export async function loadRuntimeConfig(options: CliOptions, env: EnvRecord): Promise<Config> {
  const fileConfig = await loadConfigFile(options.configPath ?? DEFAULT_CONFIG_FILE);
  const config = mergeConfig(applyEnvOverrides(fileConfig, env), cliOverrides(options));
  assertConfigValid(config);
  return config;
}

/**
 * Absolute path of the CSV file a configuration points at.
 *
 * @param config - Effective configuration.
 */
export function resolveDataFile(config: Config): string {
  return path.resolve(config.storage.data_dir, config.storage.file_name);
}

/**
 * Builds the engine over the configured CSV file.
 *
 * @param config - Effective configuration.
 * @param logger - Root logger.
 */
export function createEngine(config: Config, logger: ServerLogger): ParameterSpecEngine {
  const store = new CsvSpecStore({ filePath: resolveDataFile(config) });
  return new ParameterSpecEngine({ store, logger: logger.child('engine') });
}

/**
 * Starts the HTTP server, or the stdio MCP server when `mcp` is set.
 *
 * @param options - Parsed command-line options.
 * @param config - Effective configuration.
 * @param logger - Root logger.
 */
export async function startServices(
  options: CliOptions,
  config: Config,
  logger: ServerLogger
): Promise<void> {
  const engine = createEngine(config, logger);
  const dataFile = resolveDataFile(config);

  if (options.mcp) {
    logger.info('server_start', { mode: 'mcp', dataFile });
    await startStdioSpecServer({ engine, logger: logger.child('mcp') });
    return;
  }

  logger.info('server_start', { mode: 'http', dataFile });
  const app = createHttpApp({ engine, logger: logger.child('http') });
  await startHttpServer({
    app,
    host: config.server.host,
    port: config.server.port,
    logger: logger.child('http'),
  });
}
