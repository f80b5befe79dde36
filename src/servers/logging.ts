/**
 * Structured logging for the HTTP and MCP servers.
 *
 * Entries are single JSON lines on stderr. Stdout stays free for the MCP
 * stdio transport, which owns it for JSON-RPC.
 *
 * @packageDocumentation
 */

/**
 * Log levels supported by the server logger, least severe first.
 */
export const SERVER_LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

/**
 * Log level name.
 */
export type ServerLogLevel = (typeof SERVER_LOG_LEVELS)[number];

/**
 * Structured log entry for server operations.
 */
export interface ServerLogEntry {
  /** ISO 8601 timestamp of the log entry. */
  readonly timestamp: string;
  /** Log level. */
  readonly level: ServerLogLevel;
  /** Server name that generated the log. */
  readonly server: string;
  /** Event type or identifier. */
  readonly event: string;
  /** Additional structured data. */
  readonly data?: Record<string, unknown>;
}

/**
 * Options for creating a server logger.
 */
export interface ServerLoggerOptions {
  /** Name of the server (e.g., 'http', 'mcp'). */
  serverName: string;
  /** Minimum level to emit. Default is 'info'. */
  level?: ServerLogLevel;
  /** Function to get current timestamp (injectable for testing). */
  now?: () => Date;
  /** Receives each serialized line (injectable for testing). Default writes to stderr. */
  write?: (line: string) => void;
}

/**
 * Type guard for log level names.
 *
 * @param value - Candidate level name.
 */
export function isServerLogLevel(value: string): value is ServerLogLevel {
  const names: readonly string[] = SERVER_LOG_LEVELS;
  return names.includes(value);
}

function writeToStderr(line: string): void {
  process.stderr.write(line);
}

/**
 * Serializes an entry, falling back to a data-less entry when the data
 * cannot be stringified (cycles, BigInt).
 */
function serializeEntry(entry: ServerLogEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (error) {
    const { data: _dropped, ...rest } = entry;
    return JSON.stringify({
      ...rest,
      serializationError: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Structured logger for server operations.
 *
 * @example
 * ```typescript
 * const logger = createServerLogger({ serverName: 'http', level: 'debug' });
 * logger.info('http_listening', { host: '127.0.0.1', port: 5001 });
 * logger.debug('tool_call', { name: 'list_parameter_specs' });
 * ```
 */
export class ServerLogger {
  private readonly serverName: string;
  private readonly threshold: number;
  private readonly now: () => Date;
  private readonly write: (line: string) => void;

  constructor(options: ServerLoggerOptions) {
    this.serverName = options.serverName;
    this.threshold = SERVER_LOG_LEVELS.indexOf(options.level ?? 'info');
    this.now = options.now ?? ((): Date => new Date());
    this.write = options.write ?? writeToStderr;
  }

  /**
   * Returns a logger for another server name sharing this logger's
   * threshold, clock and sink.
   *
   * @param serverName - Name for the child logger.
   */
  child(serverName: string): ServerLogger {
    return new ServerLogger({
      serverName,
      level: SERVER_LOG_LEVELS[this.threshold] ?? 'info',
      now: this.now,
      write: this.write,
    });
  }

  /**
   * True when entries at `level` are emitted.
   *
   * @param level - Level to test.
   */
  isEnabled(level: ServerLogLevel): boolean {
    return SERVER_LOG_LEVELS.indexOf(level) >= this.threshold;
  }

  debug(event: string, data?: Record<string, unknown>): void {
    this.log('debug', event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: ServerLogLevel, event: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry: ServerLogEntry = {
      timestamp: this.now().toISOString(),
      level,
      server: this.serverName,
      event,
      ...(data !== undefined ? { data } : {}),
    };

    this.write(serializeEntry(entry) + '\n');
  }
}

/**
 * Creates a structured logger for server operations.
 *
 * @param options - Logger configuration options.
 * @returns A configured ServerLogger instance.
 */
export function createServerLogger(options: ServerLoggerOptions): ServerLogger {
  return new ServerLogger(options);
}
