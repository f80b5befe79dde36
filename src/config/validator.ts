/**
 * Semantic validation for configuration values.
 *
 * Validates that configuration values are semantically correct beyond just type checking:
 * the port is a usable TCP port, the host is not blank, and the file name
 * names a file rather than a path.
 *
 * @packageDocumentation
 */

import type { Config } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ValidationError[];
}

const MAX_PORT = 65535;

/**
 * Validates that a string is not blank.
 */
function validateNonBlank(value: string, fieldPath: string, errors: ValidationError[]): void {
  if (value.trim() === '') {
    errors.push({
      field: fieldPath,
      value,
      message: `'${fieldPath}' must not be empty`,
    });
  }
}

/**
 * Validates that the port is an integer in 1..65535.
 */
function validatePort(value: number, errors: ValidationError[]): void {
  if (!Number.isInteger(value) || value < 1 || value > MAX_PORT) {
    errors.push({
      field: 'server.port',
      value,
      message: `'server.port' must be an integer between 1 and ${String(MAX_PORT)}, got ${String(value)}`,
    });
  }
}

/**
 * Validates that the file name has no directory part.
 */
function validateFileName(value: string, errors: ValidationError[]): void {
  validateNonBlank(value, 'storage.file_name', errors);
  if (value.includes('/') || value.includes('\\')) {
    errors.push({
      field: 'storage.file_name',
      value,
      message: `'storage.file_name' must be a bare file name, got '${value}'`,
    });
  }
}

/**
 * Validates configuration semantically.
 *
 * @param config - The parsed configuration to validate.
 * @returns Validation result with any errors.
 *
 * @example
 * ```typescript
 * const result = validateConfig(parseConfig(tomlContent));
 * if (!result.valid) {
 *   for (const error of result.errors) {
 *     console.error(`${error.field}: ${error.message}`);
 *   }
 * }
 * ```
 */
export function validateConfig(config: Config): ValidationResult {
  const errors: ValidationError[] = [];

  validateNonBlank(config.server.host, 'server.host', errors);
  validatePort(config.server.port, errors);
  validateNonBlank(config.storage.data_dir, 'storage.data_dir', errors);
  validateFileName(config.storage.file_name, errors);

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @param config - The parsed configuration to validate.
 * @throws ConfigValidationError if validation fails.
 */
export function assertConfigValid(config: Config): void {
  const result = validateConfig(config);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
