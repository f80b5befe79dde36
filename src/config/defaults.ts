/**
 * Default configuration values.
 *
 * @packageDocumentation
 */

import type { Config, LoggingSettings, ServerSettings, StorageSettings } from './types.js';

/**
 * Default config file name, looked up in the working directory.
 */
export const DEFAULT_CONFIG_FILE = 'eqp-spec.toml';

/**
 * Loopback listener on the port the REST API has always used.
 */
export const DEFAULT_SERVER: ServerSettings = {
  host: '127.0.0.1',
  port: 5001,
};

/**
 * Default storage location relative to the working directory.
 */
export const DEFAULT_STORAGE: StorageSettings = {
  data_dir: 'data',
  file_name: 'parameter_specs.csv',
};

/**
 * Default logging settings.
 */
export const DEFAULT_LOGGING: LoggingSettings = {
  level: 'info',
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  server: DEFAULT_SERVER,
  storage: DEFAULT_STORAGE,
  logging: DEFAULT_LOGGING,
};
