#!/usr/bin/env node
/**
 * CLI entry point for eqp-spec-server.
 *
 * Usage:
 *   npx tsx src/cli/index.ts [--mcp] [--port <port>] [--debug]
 *
 * Or when compiled:
 *   node dist/src/cli/index.js [--mcp] [--port <port>] [--debug]
 *
 * @packageDocumentation
 */

import { createServerLogger } from '../servers/logging.js';
import { CliArgsError, HELP_TEXT, parseCliArgs, type CliOptions } from './args.js';
import { loadRuntimeConfig, startServices } from './runtime.js';

const SERVER_NAME = 'eqp-spec-server';

function parseArgs(): CliOptions {
  try {
    return parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliArgsError) {
      process.stderr.write(`Error: ${error.message}\n${HELP_TEXT}`);
      process.exit(2);
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const options = parseArgs();
  if (options.help) {
    process.stdout.write(HELP_TEXT);
    return;
  }

  const bootLogger = createServerLogger({
    serverName: SERVER_NAME,
    level: options.debug ? 'debug' : 'info',
  });

  try {
    const config = await loadRuntimeConfig(options, process.env);
    const logger = createServerLogger({ serverName: SERVER_NAME, level: config.logging.level });
    await startServices(options, config, logger);
  } catch (err) {
    const errorMessage = err instanceof Error ? err.message : String(err);
    bootLogger.error('startup_failed', { error: errorMessage });
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});
