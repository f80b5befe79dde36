/**
 * Equipment parameter spec service.
 *
 * Stores specification and control limits for equipment parameters in a CSV
 * file and serves them over a REST API and an MCP server, both backed by the
 * same validation engine.
 *
 * @packageDocumentation
 */

/**
 * Package version string.
 */
export const VERSION = '0.1.0';

// Specs
export {
  TEXT_FIELDS,
  LIMIT_FIELDS,
  SPEC_FIELDS,
  MAX_TEXT_LENGTH,
  LIMIT_DECIMALS,
  isSpecField,
  specKey,
  roundLimit,
  formatLimit,
  parseLimit,
  ParameterSpecError,
  isParameterSpecError,
  INVALID_RELATIONSHIP_MESSAGE,
  DUPLICATE_KEY_MESSAGE,
  validateSpecInput,
  normalizeText,
  normalizeLimit,
  hasOrderedLimits,
  renderSpecJson,
  renderSpecListJson,
  ParameterSpecEngine,
} from './specs/index.js';
export type {
  TextField,
  LimitField,
  SpecField,
  ParameterSpec,
  SpecInput,
  ParameterSpecErrorCode,
  FieldErrorCode,
  RecordErrorCode,
  RenderJsonOptions,
  ParameterSpecEngineOptions,
} from './specs/index.js';

// Store
export {
  CsvSpecStore,
  CSV_HEADER,
  SpecStoreError,
  decodeSpecTable,
  encodeSpecRow,
  CsvSyntaxError,
  encodeCsvField,
  encodeCsvRow,
  parseCsv,
} from './store/index.js';
export type { SpecStore, SpecStoreErrorKind, CsvSpecStoreOptions } from './store/index.js';

// Config
export {
  ConfigParseError,
  ConfigValidationError,
  EnvCoercionError,
  EnvOverridesError,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE,
  parseConfig,
  loadConfigFile,
  mergeConfig,
  getDefaultConfig,
  readEnvOverrides,
  applyEnvOverrides,
  validateConfig,
  assertConfigValid,
} from './config/index.js';
export type { Config, PartialConfig, EnvRecord, ValidationResult } from './config/index.js';

// Servers
export { createHttpApp, startHttpServer } from './servers/http/index.js';
export type { HttpAppDeps, HttpAppEnv, StartHttpServerOptions } from './servers/http/index.js';
export { createSpecMcpServer, startStdioSpecServer, SPEC_TOOLS } from './servers/mcp/index.js';
export type { SpecMcpServerConfig } from './servers/mcp/index.js';
export { API_DOC_RESOURCES, readApiDoc, ApiDocNotFoundError } from './servers/api-docs.js';
export type { ApiDocResource } from './servers/api-docs.js';
export {
  ServerLogger,
  createServerLogger,
  SERVER_LOG_LEVELS,
  isServerLogLevel,
} from './servers/logging.js';
export type { ServerLogLevel, ServerLogEntry, ServerLoggerOptions } from './servers/logging.js';
