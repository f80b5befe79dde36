/**
 * Minimal CSV codec for the specification file.
 *
 * Writing quotes a field only when it holds a comma, a double quote or a
 * line break, doubling inner quotes. Reading accepts quoted fields with
 * embedded line breaks, both `\n` and `\r\n` terminators, and skips blank
 * lines.
 *
 * @packageDocumentation
 */

/**
 * Error thrown when CSV text cannot be tokenized.
 */
export class CsvSyntaxError extends Error {
  /** 1-based line where the problem was detected. */
  public readonly line: number;

  /**
   * Creates a new CsvSyntaxError.
   *
   * @param message - Human-readable error message.
   * @param line - 1-based line number.
   */
  constructor(message: string, line: number) {
    super(`${message} (line ${String(line)})`);
    this.name = 'CsvSyntaxError';
    this.line = line;
  }
}

const NEEDS_QUOTING = /[",\r\n]/;

/**
 * Encodes one field.
 *
 * @param value - Raw field text.
 * @returns The field, quoted when necessary.
 */
export function encodeCsvField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) {
    return value;
  }
  return `"${value.replaceAll('"', '""')}"`;
}

/**
 * Encodes one row without a line terminator.
 *
 * @param fields - Raw field texts.
 * @returns The encoded row.
 */
export function encodeCsvRow(fields: readonly string[]): string {
  return fields.map(encodeCsvField).join(',');
}

/**
 * Parses CSV text into rows of fields.
 *
 * A leading byte-order mark is ignored. Lines with no content at all are
 * skipped, matching how spreadsheet tools treat trailing blank lines.
 *
 * @param text - CSV text.
 * @returns Rows in file order.
 * @throws CsvSyntaxError on an unterminated quoted field or stray quote.
 */
export function parseCsv(text: string): string[][] {
  const source = text.startsWith('\uFEFF') ? text.slice(1) : text;
  const rows: string[][] = [];

  let row: string[] = [];
  let field = '';
  let quoted = false;
  let inQuotes = false;
  let line = 1;
  let quoteLine = 1;

  const endField = (): void => {
    row.push(field);
    field = '';
    quoted = false;
  };

  const endRow = (): void => {
    endField();
    const blank = row.length === 1 && row[0] === '';
    if (!blank) {
      rows.push(row);
    }
    row = [];
  };

  for (let i = 0; i < source.length; i++) {
    const ch = source.charAt(i);

    if (inQuotes) {
      if (ch === '"') {
        if (source.charAt(i + 1) === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (ch === '\n') {
          line++;
        }
        field += ch;
      }
      continue;
    }

    switch (ch) {
      case ',':
        endField();
        break;
      case '\r':
        if (source.charAt(i + 1) === '\n') {
          i++;
        }
        endRow();
        line++;
        break;
      case '\n':
        endRow();
        line++;
        break;
      case '"':
        if (field !== '' || quoted) {
          throw new CsvSyntaxError('Unexpected quote inside unquoted field', line);
        }
        inQuotes = true;
        quoted = true;
        quoteLine = line;
        break;
      default:
        if (quoted) {
          throw new CsvSyntaxError('Unexpected character after closing quote', line);
        }
        field += ch;
    }
  }

  if (inQuotes) {
    throw new CsvSyntaxError('Unterminated quoted field', quoteLine);
  }

  if (field !== '' || quoted || row.length > 0) {
    endRow();
  }

  return rows;
}
