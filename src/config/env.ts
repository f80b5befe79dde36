/**
 * Environment variable overrides for configuration.
 *
 * Provides support for EQP_SPEC_* environment variables to override
 * configuration values at runtime. Environment variables take precedence
 * over config file values, which take precedence over defaults.
 *
 * Override precedence: CLI flags > env > config file > defaults
 *
 * @packageDocumentation
 */

import { isServerLogLevel, SERVER_LOG_LEVELS, type ServerLogLevel } from '../servers/logging.js';
import { mergeConfig } from './parser.js';
import type { Config, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Gets the default environment from process.env.
 */
function getDefaultEnv(): EnvRecord {
  return process.env;
}

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

/**
 * Error listing every environment variable that could not be coerced.
 */
export class EnvOverridesError extends Error {
  /** The individual coercion failures, in variable order. */
  public readonly errors: readonly EnvCoercionError[];

  /**
   * Creates a new EnvOverridesError.
   *
   * @param errors - The collected coercion failures.
   */
  constructor(errors: readonly EnvCoercionError[]) {
    const details = errors.map((e) => `  - ${e.message}`).join('\n');
    super(`Invalid environment overrides (${String(errors.length)}):\n${details}`);
    this.name = 'EnvOverridesError';
    this.errors = errors;
  }
}

/**
 * One supported variable: how to coerce it and where the result goes.
 */
interface EnvVarMapping {
  readonly description: string;
  readonly type: 'string' | 'number' | 'logLevel';
  readonly apply: (overrides: PartialConfig, value: string, envVar: string) => void;
}

/**
 * Coerces a string value to a number.
 *
 * @throws EnvCoercionError if the value cannot be converted to a valid number.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * Coerces a string value to a log level name. Case-insensitive.
 *
 * @throws EnvCoercionError for an unknown level.
 */
function coerceToLogLevel(value: string, envVar: string): ServerLogLevel {
  const normalized = value.trim().toLowerCase();
  if (isServerLogLevel(normalized)) {
    return normalized;
  }
  throw new EnvCoercionError(
    envVar,
    value,
    'logLevel',
    `Cannot coerce '${envVar}' value '${value}' to a log level. Expected one of: ${SERVER_LOG_LEVELS.join(', ')}`
  );
}

/**
 * Mapping from environment variable names to config fields.
 */
const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvVarMapping>> = {
  EQP_SPEC_HOST: {
    description: 'Override the HTTP listen host (server.host)',
    type: 'string',
    apply: (overrides, value) => {
      overrides.server = { ...overrides.server, host: value };
    },
  },
  EQP_SPEC_PORT: {
    description: 'Override the HTTP listen port (server.port)',
    type: 'number',
    apply: (overrides, value, envVar) => {
      overrides.server = { ...overrides.server, port: coerceToNumber(value, envVar) };
    },
  },
  EQP_SPEC_DATA_DIR: {
    description: 'Override the directory holding the CSV file (storage.data_dir)',
    type: 'string',
    apply: (overrides, value) => {
      overrides.storage = { ...overrides.storage, data_dir: value };
    },
  },
  EQP_SPEC_FILE_NAME: {
    description: 'Override the CSV file name (storage.file_name)',
    type: 'string',
    apply: (overrides, value) => {
      overrides.storage = { ...overrides.storage, file_name: value };
    },
  },
  EQP_SPEC_LOG_LEVEL: {
    description: 'Override the minimum log level: debug, info, warn or error (logging.level)',
    type: 'logLevel',
    apply: (overrides, value, envVar) => {
      overrides.logging = { ...overrides.logging, level: coerceToLogLevel(value, envVar) };
    },
  },
};

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads environment variables and returns configuration overrides.
 *
 * Unset and empty variables are ignored.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion failures instead of throwing.
 * @returns Result containing overrides and any errors.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ EQP_SPEC_PORT: '8080' });
 * console.log(result.overrides); // { server: { port: 8080 } }
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = getDefaultEnv(),
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      mapping.apply(overrides, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvOverridesError listing every variable that cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = getDefaultEnv()): Config {
  const { overrides, errors } = readEnvOverrides(env, { collectErrors: true });

  if (errors.length > 0) {
    throw new EnvOverridesError(errors);
  }

  return mergeConfig(config, overrides);
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    docs[envVar] = { description: mapping.description, type: mapping.type };
  }
  return docs;
}
