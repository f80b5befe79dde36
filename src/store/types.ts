/**
 * Storage port for specification records.
 *
 * @packageDocumentation
 */

import type { ParameterSpec } from '../specs/types.js';

/**
 * Durable storage of the full record set.
 *
 * Implementations hold no authoritative in-memory copy: every `readAll`
 * reflects the backing medium as it is at that moment.
 */
export interface SpecStore {
  /**
   * Reads every stored record in insertion order. A store that was never
   * written to yields an empty list.
   */
  readAll(): Promise<ParameterSpec[]>;

  /**
   * Appends one record. The caller is responsible for validation.
   */
  append(spec: ParameterSpec): Promise<void>;
}

/**
 * Failure kinds for store operations.
 *
 * - `read_failed`: the backing file exists but could not be read
 * - `write_failed`: the directory or file could not be created or appended
 * - `corrupt_file`: the file was read but its contents are not a valid table
 */
export type SpecStoreErrorKind = 'read_failed' | 'write_failed' | 'corrupt_file';

/**
 * Fatal storage error. Never a caller-input problem.
 */
export class SpecStoreError extends Error {
  /** The kind of failure. */
  public readonly kind: SpecStoreErrorKind;
  /** The backing file involved. */
  public readonly filePath: string;
  /** The underlying cause if available. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new SpecStoreError.
   *
   * @param message - Human-readable error message.
   * @param kind - The kind of failure.
   * @param filePath - The backing file involved.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, kind: SpecStoreErrorKind, filePath: string, cause?: Error) {
    super(message);
    this.name = 'SpecStoreError';
    this.kind = kind;
    this.filePath = filePath;
    this.cause = cause;
  }
}
