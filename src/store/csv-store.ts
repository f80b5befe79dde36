/**
 * CSV-backed specification store.
 *
 * The file is the only copy of the data. Each read parses it from scratch;
 * each append adds exactly one line, creating the directory and the header
 * first when the file does not exist yet.
 *
 * @packageDocumentation
 */

import { dirname } from 'node:path';
import { formatLimit, roundLimit } from '../specs/decimal.js';
import {
  SPEC_FIELDS,
  isSpecField,
  type LimitField,
  type ParameterSpec,
  type SpecField,
} from '../specs/types.js';
import {
  PathValidationError,
  safeAppendTextFile,
  safeMkdirp,
  safeReadTextFileIfExists,
} from '../utils/safe-fs.js';
import { CsvSyntaxError, encodeCsvRow, parseCsv } from './csv.js';
import { SpecStoreError, type SpecStore } from './types.js';

/**
 * The header line, columns in fixed order.
 */
export const CSV_HEADER = SPEC_FIELDS.join(',');

/**
 * Options for creating a CsvSpecStore.
 */
export interface CsvSpecStoreOptions {
  /** Path of the CSV file. Parent directories are created on first append. */
  filePath: string;
}

function specCell(spec: ParameterSpec, field: SpecField): string {
  switch (field) {
    case 'tool_name':
    case 'parameter_name':
      return spec[field];
    default:
      return formatLimit(spec[field]);
  }
}

/**
 * Encodes one record as a CSV line (without terminator).
 *
 * Cells follow `header`, so a row appended to a file with reordered or
 * extra columns lines up with that file's header. Columns that are not
 * record fields get an empty cell.
 *
 * @param spec - The record.
 * @param header - Column names in file order. Defaults to the canonical order.
 * @returns The encoded row, limits with three fractional digits.
 */
export function encodeSpecRow(
  spec: ParameterSpec,
  header: readonly string[] = SPEC_FIELDS
): string {
  return encodeCsvRow(
    header.map((name) => {
      const field = name.trim();
      return isSpecField(field) ? specCell(spec, field) : '';
    })
  );
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Maps header names to column positions, rejecting headers that lack a field.
 */
function indexHeader(header: readonly string[], filePath: string): Record<SpecField, number> {
  const positions = new Map<string, number>();
  header.forEach((name, index) => {
    if (!positions.has(name.trim())) {
      positions.set(name.trim(), index);
    }
  });

  const column = (field: SpecField): number => {
    const position = positions.get(field);
    if (position === undefined) {
      throw new SpecStoreError(
        `Corrupt spec file "${filePath}": header is missing column "${field}"`,
        'corrupt_file',
        filePath
      );
    }
    return position;
  };

  return {
    tool_name: column('tool_name'),
    parameter_name: column('parameter_name'),
    usl: column('usl'),
    lsl: column('lsl'),
    ucl: column('ucl'),
    lcl: column('lcl'),
    cl: column('cl'),
  };
}

/**
 * Decodes one data row into a record.
 */
function decodeRow(
  row: readonly string[],
  header: Record<SpecField, number>,
  width: number,
  rowNumber: number,
  filePath: string
): ParameterSpec {
  if (row.length !== width) {
    throw new SpecStoreError(
      `Corrupt spec file "${filePath}": row ${String(rowNumber)} has ${String(row.length)} columns, expected ${String(width)}`,
      'corrupt_file',
      filePath
    );
  }

  const cell = (field: SpecField): string => row[header[field]] ?? '';

  const limit = (field: LimitField): number => {
    const text = cell(field).trim();
    const value = Number(text);
    if (text === '' || !Number.isFinite(value)) {
      throw new SpecStoreError(
        `Corrupt spec file "${filePath}": row ${String(rowNumber)} has a non-numeric ${field}`,
        'corrupt_file',
        filePath
      );
    }
    return roundLimit(value);
  };

  return {
    tool_name: cell('tool_name'),
    parameter_name: cell('parameter_name'),
    usl: limit('usl'),
    lsl: limit('lsl'),
    ucl: limit('ucl'),
    lcl: limit('lcl'),
    cl: limit('cl'),
  };
}

/**
 * Tokenizes the file, reporting syntax errors as a corrupt file.
 */
function parseSpecRows(text: string, filePath: string): string[][] {
  try {
    return parseCsv(text);
  } catch (error) {
    if (error instanceof CsvSyntaxError) {
      throw new SpecStoreError(
        `Corrupt spec file "${filePath}": ${error.message}`,
        'corrupt_file',
        filePath,
        error
      );
    }
    throw error;
  }
}

/**
 * Parses the full file contents into records.
 *
 * @param text - File contents.
 * @param filePath - Path used in error messages.
 * @returns Records in file order; empty for a header-only or empty file.
 * @throws SpecStoreError with kind `corrupt_file`.
 */
export function decodeSpecTable(text: string, filePath: string): ParameterSpec[] {
  const [headerRow, ...dataRows] = parseSpecRows(text, filePath);
  if (headerRow === undefined) {
    return [];
  }

  const header = indexHeader(headerRow, filePath);
  // Row numbers count the header as row 1
  return dataRows.map((row, i) => decodeRow(row, header, headerRow.length, i + 2, filePath));
}

/**
 * Specification store persisted as a headered CSV file.
 *
 * @example
 * ```typescript
 * const store = new CsvSpecStore({ filePath: 'data/parameter_specs.csv' });
 * await store.append({ tool_name: 'CVD_02', parameter_name: 'temperature',
 *   usl: 500, lsl: 300, ucl: 480, lcl: 320, cl: 400 });
 * const all = await store.readAll();
 * ```
 */
export class CsvSpecStore implements SpecStore {
  /** Path of the backing file. */
  public readonly filePath: string;

  /**
   * Creates a new CsvSpecStore.
   *
   * @param options - Store options.
   */
  constructor(options: CsvSpecStoreOptions) {
    this.filePath = options.filePath;
  }

  /**
   * Reads every record. A missing file or directory reads as empty.
   *
   * @throws SpecStoreError with kind `read_failed` or `corrupt_file`.
   */
  async readAll(): Promise<ParameterSpec[]> {
    const text = await this.readText();
    if (text === undefined) {
      return [];
    }
    return decodeSpecTable(text, this.filePath);
  }

  /**
   * Appends one record, writing the header first for a new file.
   *
   * The row follows the column order of the file's existing header. The
   * header (when needed) and the row go out in a single append.
   *
   * @throws SpecStoreError with kind `write_failed`, `read_failed` or
   * `corrupt_file` (an existing header lacking a record column).
   */
  async append(spec: ParameterSpec): Promise<void> {
    const existing = (await this.readText()) ?? '';
    const [existingHeader] = parseSpecRows(existing, this.filePath);

    let chunk = '';
    let header: readonly string[] = SPEC_FIELDS;
    if (existingHeader === undefined) {
      chunk = `${CSV_HEADER}\n`;
    } else {
      indexHeader(existingHeader, this.filePath);
      header = existingHeader;
      if (!existing.endsWith('\n')) {
        chunk = '\n';
      }
    }
    chunk += `${encodeSpecRow(spec, header)}\n`;

    try {
      await safeMkdirp(dirname(this.filePath));
      await safeAppendTextFile(this.filePath, chunk);
    } catch (error) {
      const cause = toError(error);
      throw new SpecStoreError(
        `Failed to append to spec file "${this.filePath}": ${cause.message}`,
        'write_failed',
        this.filePath,
        cause
      );
    }
  }

  private async readText(): Promise<string | undefined> {
    try {
      return await safeReadTextFileIfExists(this.filePath);
    } catch (error) {
      const cause = toError(error);
      const detail = cause instanceof PathValidationError ? 'invalid path' : cause.message;
      throw new SpecStoreError(
        `Failed to read spec file "${this.filePath}": ${detail}`,
        'read_failed',
        this.filePath,
        cause
      );
    }
  }
}
