/**
 * TOML configuration parser for eqp-spec.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { isServerLogLevel, SERVER_LOG_LEVELS } from '../servers/logging.js';
import { isMissingPathError, safeReadTextFile } from '../utils/safe-fs.js';
import { DEFAULT_CONFIG, DEFAULT_LOGGING, DEFAULT_SERVER, DEFAULT_STORAGE } from './defaults.js';
import type {
  Config,
  LoggingSettings,
  PartialConfig,
  ServerSettings,
  StorageSettings,
} from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readSection(parsed: RawSection, name: string): RawSection | undefined {
  const section = parsed[name];
  if (section === undefined) {
    return undefined;
  }
  if (!isRecord(section)) {
    throw new ConfigParseError(`Invalid type for '${name}': expected a table`);
  }
  return section;
}

/**
 * Validates that a value is a string.
 *
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a number.
 *
 * @throws ConfigParseError if value is not a number.
 */
function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${typeof value}`
    );
  }
  return value;
}

function parseServer(raw: RawSection | undefined): ServerSettings {
  const result: ServerSettings = { ...DEFAULT_SERVER };
  if (raw === undefined) {
    return result;
  }
  if ('host' in raw) {
    result.host = validateString(raw.host, 'server.host');
  }
  if ('port' in raw) {
    result.port = validateNumber(raw.port, 'server.port');
  }
  return result;
}

function parseStorage(raw: RawSection | undefined): StorageSettings {
  const result: StorageSettings = { ...DEFAULT_STORAGE };
  if (raw === undefined) {
    return result;
  }
  if ('data_dir' in raw) {
    result.data_dir = validateString(raw.data_dir, 'storage.data_dir');
  }
  if ('file_name' in raw) {
    result.file_name = validateString(raw.file_name, 'storage.file_name');
  }
  return result;
}

function parseLogging(raw: RawSection | undefined): LoggingSettings {
  const result: LoggingSettings = { ...DEFAULT_LOGGING };
  if (raw === undefined) {
    return result;
  }
  if ('level' in raw) {
    const level = validateString(raw.level, 'logging.level');
    if (!isServerLogLevel(level)) {
      throw new ConfigParseError(
        `Invalid value for 'logging.level': '${level}'. Expected one of: ${SERVER_LOG_LEVELS.join(', ')}`
      );
    }
    result.level = level;
  }
  return result;
}

/**
 * Parses TOML configuration content into a complete Config.
 *
 * Missing sections and keys fall back to defaults; unknown keys are ignored.
 *
 * @param tomlContent - TOML text.
 * @returns Parsed configuration with defaults applied.
 * @throws ConfigParseError for invalid TOML or mistyped values.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [server]
 * port = 8080
 * `);
 * console.log(config.server.port); // 8080
 * console.log(config.server.host); // "127.0.0.1"
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: RawSection;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return {
    server: parseServer(readSection(parsed, 'server')),
    storage: parseStorage(readSection(parsed, 'storage')),
    logging: parseLogging(readSection(parsed, 'logging')),
  };
}

/**
 * Loads configuration from a TOML file.
 *
 * A missing file yields the defaults; an unreadable or malformed one fails.
 *
 * @param filePath - Path to the config file.
 * @returns Parsed configuration with defaults applied.
 * @throws ConfigParseError when the file cannot be read or parsed.
 */
export async function loadConfigFile(filePath: string): Promise<Config> {
  let content: string;
  try {
    content = await safeReadTextFile(filePath);
  } catch (error) {
    if (isMissingPathError(error)) {
      return getDefaultConfig();
    }
    const fileError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(
      `Failed to read config file "${filePath}": ${fileError.message}`,
      fileError
    );
  }

  try {
    return parseConfig(content);
  } catch (error) {
    if (error instanceof ConfigParseError) {
      throw new ConfigParseError(`Error in config file "${filePath}": ${error.message}`, error);
    }
    throw error;
  }
}

/**
 * Returns a fresh copy of the default configuration.
 */
export function getDefaultConfig(): Config {
  return mergeConfig(DEFAULT_CONFIG, {});
}

/**
 * Merges a partial configuration over a complete one.
 *
 * @param base - The base configuration.
 * @param partial - Values that take precedence.
 * @returns A new configuration.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    server: { ...base.server, ...partial.server },
    storage: { ...base.storage, ...partial.storage },
    logging: { ...base.logging, ...partial.logging },
  };
}
