/**
 * Caller-input errors raised by the specification engine.
 *
 * @packageDocumentation
 */

import { MAX_TEXT_LENGTH, type SpecField } from './types.js';

/**
 * Error codes for rejected add requests.
 *
 * - `MISSING_FIELD`: a required field is absent from the input
 * - `EMPTY_FIELD`: a text field is empty after trimming
 * - `FIELD_TOO_LONG`: a text field exceeds the maximum length
 * - `INVALID_TEXT`: a text field holds a value that is not text
 * - `INVALID_NUMBER`: a limit is not a finite number
 * - `INVALID_RELATIONSHIP`: the limits violate `lsl < lcl < cl < ucl < usl`
 * - `DUPLICATE_KEY`: a record with the same tool/parameter name exists
 */
export type ParameterSpecErrorCode =
  | 'MISSING_FIELD'
  | 'EMPTY_FIELD'
  | 'FIELD_TOO_LONG'
  | 'INVALID_TEXT'
  | 'INVALID_NUMBER'
  | 'INVALID_RELATIONSHIP'
  | 'DUPLICATE_KEY';

/** Codes that always name the offending field. */
export type FieldErrorCode = Extract<
  ParameterSpecErrorCode,
  'MISSING_FIELD' | 'EMPTY_FIELD' | 'FIELD_TOO_LONG' | 'INVALID_TEXT' | 'INVALID_NUMBER'
>;

/** Codes that concern the record as a whole. */
export type RecordErrorCode = Exclude<ParameterSpecErrorCode, FieldErrorCode>;

/**
 * Message for the relationship check. Shared by every adapter.
 */
export const INVALID_RELATIONSHIP_MESSAGE =
  'Invalid value relationship: LSL < LCL < CL < UCL < USL required';

/**
 * Message for the uniqueness check. Shared by every adapter.
 */
export const DUPLICATE_KEY_MESSAGE =
  'Parameter spec already exists for this tool_name and parameter_name';

function fieldMessage(code: FieldErrorCode, field: SpecField): string {
  switch (code) {
    case 'MISSING_FIELD':
      return `Missing required field: ${field}`;
    case 'EMPTY_FIELD':
      return `Field cannot be empty: ${field}`;
    case 'FIELD_TOO_LONG':
      return `Field exceeds maximum length of ${String(MAX_TEXT_LENGTH)}: ${field}`;
    case 'INVALID_TEXT':
      return `Field must be a string: ${field}`;
    case 'INVALID_NUMBER':
      return `Invalid number format for field: ${field}`;
  }
}

function recordMessage(code: RecordErrorCode): string {
  switch (code) {
    case 'INVALID_RELATIONSHIP':
      return INVALID_RELATIONSHIP_MESSAGE;
    case 'DUPLICATE_KEY':
      return DUPLICATE_KEY_MESSAGE;
  }
}

/**
 * Error raised when an add request is rejected.
 *
 * The message is the exact text adapters put in their error payloads.
 */
export class ParameterSpecError extends Error {
  /** The error code for programmatic handling. */
  public readonly code: ParameterSpecErrorCode;
  /** The field that failed, for field-level codes. */
  public readonly field: SpecField | undefined;

  private constructor(code: ParameterSpecErrorCode, message: string, field?: SpecField) {
    super(message);
    this.name = 'ParameterSpecError';
    this.code = code;
    this.field = field;
  }

  /**
   * Creates an error for a single offending field.
   *
   * @param code - A field-level code.
   * @param field - The offending field.
   */
  static forField(code: FieldErrorCode, field: SpecField): ParameterSpecError {
    return new ParameterSpecError(code, fieldMessage(code, field), field);
  }

  /**
   * Creates an error concerning the record as a whole.
   *
   * @param code - A record-level code.
   */
  static forRecord(code: RecordErrorCode): ParameterSpecError {
    return new ParameterSpecError(code, recordMessage(code));
  }
}

/**
 * Type guard for ParameterSpecError.
 *
 * @param error - Any thrown value.
 * @returns True if the value is a ParameterSpecError.
 */
export function isParameterSpecError(error: unknown): error is ParameterSpecError {
  return error instanceof ParameterSpecError;
}
