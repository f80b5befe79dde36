/**
 * HTTP API: Hono routes for the parameter spec REST API, the OpenAPI
 * document with its Swagger UI page and the MCP streamable HTTP endpoint.
 *
 * Design:
 * - Single `createHttpApp()` factory builds the full Hono app.
 * - Every rule lives in the engine; routes only translate requests and
 *   errors to HTTP.
 * - Record bodies are rendered by `renderSpecJson` so limits keep three
 *   decimals on the wire.
 *
 * @packageDocumentation
 */

import path from 'node:path';
import { Hono, type Context } from 'hono';
import { cors } from 'hono/cors';
import { swaggerUI } from '@hono/swagger-ui';
import type { HttpBindings } from '@hono/node-server';
import { RESPONSE_ALREADY_SENT } from '@hono/node-server/utils/response';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';

import type { ParameterSpecEngine } from '../../specs/engine.js';
import { ParameterSpecError } from '../../specs/errors.js';
import { renderSpecJson, renderSpecListJson } from '../../specs/format.js';
import { safeReadTextFileIfExists } from '../../utils/safe-fs.js';
import { defaultDocsRoot } from '../api-docs.js';
import { createServerLogger, type ServerLogger } from '../logging.js';
import { createSpecMcpServer } from '../mcp/server.js';

// ============================================================================
// Messages
// ============================================================================

export const INVALID_JSON_MESSAGE = 'Invalid JSON format';
export const UNSUPPORTED_MEDIA_TYPE_MESSAGE =
  'Unsupported Media Type. Content-Type must be application/json';
export const INTERNAL_ERROR_MESSAGE = 'Internal server error';
export const NOT_FOUND_MESSAGE = 'Not found';

// ============================================================================
// Dependencies
// ============================================================================

/**
 * Hono environment: the Node adapter exposes the raw request and response.
 */
export interface HttpAppEnv {
  Bindings: HttpBindings;
}

export interface HttpAppDeps {
  engine: ParameterSpecEngine;
  logger?: ServerLogger | undefined;
  /** Directory holding static/ and docs/. Defaults to the package root. */
  docsRoot?: string | undefined;
}

const JSON_HEADERS = { 'Content-Type': 'application/json' };

function isJsonContentType(header: string | undefined): boolean {
  return (header ?? '').trim().toLowerCase().startsWith('application/json');
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Status for a rejected add: 409 for a duplicate key, 400 otherwise.
 */
export function statusForSpecError(error: ParameterSpecError): 400 | 409 {
  return error.code === 'DUPLICATE_KEY' ? 409 : 400;
}

// ============================================================================
// App Factory
// ============================================================================

export function createHttpApp(deps: HttpAppDeps): Hono<HttpAppEnv> {
  const { engine } = deps;
  const logger = deps.logger ?? createServerLogger({ serverName: 'http' });
  const docsRoot = deps.docsRoot ?? defaultDocsRoot();
  const app = new Hono<HttpAppEnv>();

  // ── CORS ──
  app.use('/api/*', cors());
  app.use('/static/*', cors());

  // ── Error handling ──
  app.onError((err, c) => {
    if (err instanceof ParameterSpecError) {
      return c.json({ error: err.message }, statusForSpecError(err));
    }
    logger.error('request_failed', {
      method: c.req.method,
      path: c.req.path,
      error: err.message,
    });
    return c.json({ error: INTERNAL_ERROR_MESSAGE }, 500);
  });

  app.notFound((c) => c.json({ error: NOT_FOUND_MESSAGE }, 404));

  // ── Health ──
  app.get('/api/health', (c) => c.json({ status: 'ok' }));

  // ── Parameter specs ──
  app.get('/api/parameter-specs', async (c) => {
    const specs = await engine.listAll();
    return c.body(renderSpecListJson(specs), 200, JSON_HEADERS);
  });

  app.post('/api/parameter-specs', async (c) => {
    if (!isJsonContentType(c.req.header('Content-Type'))) {
      return c.json({ error: UNSUPPORTED_MEDIA_TYPE_MESSAGE }, 415);
    }

    let body: unknown;
    try {
      body = await c.req.json();
    } catch (error) {
      logger.debug('invalid_json', {
        error: error instanceof Error ? error.message : String(error),
      });
      return c.json({ error: INVALID_JSON_MESSAGE }, 400);
    }
    if (!isJsonObject(body)) {
      return c.json({ error: INVALID_JSON_MESSAGE }, 400);
    }

    const created = await engine.add(body);
    return c.body(renderSpecJson(created), 201, JSON_HEADERS);
  });

  // ── OpenAPI document ──
  app.get('/static/openapi.yaml', async (c) => {
    const text = await safeReadTextFileIfExists(path.join(docsRoot, 'static', 'openapi.yaml'));
    if (text === undefined) {
      return c.json({ error: NOT_FOUND_MESSAGE }, 404);
    }
    return c.body(text, 200, { 'Content-Type': 'application/yaml; charset=utf-8' });
  });

  // ── Swagger UI ──
  app.get('/docs', swaggerUI({ url: '/static/openapi.yaml' }));

  // ── MCP (streamable HTTP, stateless) ──
  const mcpLogger = logger.child('mcp');
  const handleMcp = async (c: Context<HttpAppEnv>): Promise<Response> => {
    const { incoming, outgoing } = c.env;
    const server = createSpecMcpServer({ engine, logger: mcpLogger, docsRoot });
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

    outgoing.on('close', () => {
      transport
        .close()
        .then(() => server.close())
        .catch((error: unknown) => {
          mcpLogger.error('request_failed', {
            path: c.req.path,
            error: error instanceof Error ? error.message : String(error),
          });
        });
    });

    await server.connect(transport);
    await transport.handleRequest(incoming, outgoing);
    return RESPONSE_ALREADY_SENT;
  };
  app.all('/mcp', handleMcp);
  app.all('/mcp/', handleMcp);

  return app;
}
