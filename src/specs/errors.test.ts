import { describe, expect, it } from 'vitest';
import {
  DUPLICATE_KEY_MESSAGE,
  INVALID_RELATIONSHIP_MESSAGE,
  ParameterSpecError,
  isParameterSpecError,
} from './errors.js';

describe('ParameterSpecError', () => {
  it.each([
    ['MISSING_FIELD', 'usl', 'Missing required field: usl'],
    ['EMPTY_FIELD', 'tool_name', 'Field cannot be empty: tool_name'],
    ['FIELD_TOO_LONG', 'parameter_name', 'Field exceeds maximum length of 100: parameter_name'],
    ['INVALID_TEXT', 'tool_name', 'Field must be a string: tool_name'],
    ['INVALID_NUMBER', 'cl', 'Invalid number format for field: cl'],
  ] as const)('should format %s for %s', (code, field, message) => {
    const error = ParameterSpecError.forField(code, field);

    expect(error.message).toBe(message);
    expect(error.code).toBe(code);
    expect(error.field).toBe(field);
    expect(error.name).toBe('ParameterSpecError');
  });

  it('should use the shared record-level messages', () => {
    expect(ParameterSpecError.forRecord('INVALID_RELATIONSHIP').message).toBe(
      INVALID_RELATIONSHIP_MESSAGE
    );
    expect(ParameterSpecError.forRecord('DUPLICATE_KEY').message).toBe(DUPLICATE_KEY_MESSAGE);
    expect(ParameterSpecError.forRecord('DUPLICATE_KEY').field).toBeUndefined();
  });

  it('should be recognized by the type guard', () => {
    expect(isParameterSpecError(ParameterSpecError.forRecord('DUPLICATE_KEY'))).toBe(true);
    expect(isParameterSpecError(new Error('other'))).toBe(false);
    expect(isParameterSpecError('DUPLICATE_KEY')).toBe(false);
  });
});
