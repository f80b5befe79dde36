/**
 * Durable storage for parameter specifications.
 *
 * @packageDocumentation
 */

export { SpecStoreError, type SpecStore, type SpecStoreErrorKind } from './types.js';
export {
  CsvSpecStore,
  CSV_HEADER,
  encodeSpecRow,
  decodeSpecTable,
  type CsvSpecStoreOptions,
} from './csv-store.js';
export { CsvSyntaxError, encodeCsvField, encodeCsvRow, parseCsv } from './csv.js';
