/**
 * Configuration types for eqp-spec.toml.
 *
 * @packageDocumentation
 */

import type { ServerLogLevel } from '../servers/logging.js';

/**
 * HTTP listener settings.
 */
export interface ServerSettings {
  /** Interface to bind. */
  host: string;
  /** TCP port to listen on. */
  port: number;
}

/**
 * Where the specification file lives.
 */
export interface StorageSettings {
  /** Directory holding the CSV file, relative to the working directory. */
  data_dir: string;
  /** CSV file name inside data_dir. */
  file_name: string;
}

/**
 * Logging settings.
 */
export interface LoggingSettings {
  /** Minimum level emitted. */
  level: ServerLogLevel;
}

/**
 * Complete configuration after defaults are applied.
 */
export interface Config {
  server: ServerSettings;
  storage: StorageSettings;
  logging: LoggingSettings;
}

/**
 * Configuration with every field optional, as read from a partial source
 * such as environment variables or CLI flags.
 */
export interface PartialConfig {
  server?: Partial<ServerSettings>;
  storage?: Partial<StorageSettings>;
  logging?: Partial<LoggingSettings>;
}
