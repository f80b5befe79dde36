/**
 * EQP Spec MCP Server.
 *
 * Exposes the parameter spec engine to agents as two tools and publishes the
 * API documentation as resources. The tools run the same validation as the
 * REST API; only the result formatting differs.
 *
 * @packageDocumentation
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ReadResourceRequestSchema,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';

import { renderSpecJson, renderSpecListJson } from '../../specs/format.js';
import { ParameterSpecError } from '../../specs/errors.js';
import { createServerLogger } from '../logging.js';
import { API_DOC_RESOURCES, ApiDocNotFoundError, defaultDocsRoot, readApiDoc } from '../api-docs.js';
import { SPEC_SERVER_NAME, SPEC_TOOLS, type SpecMcpServerConfig } from './types.js';

/**
 * Message returned for faults that are not the caller's doing.
 */
const INTERNAL_ERROR_MESSAGE = 'Internal server error';

function textResult(text: string, isError = false): CallToolResult {
  return {
    content: [{ type: 'text', text }],
    ...(isError ? { isError: true } : {}),
  };
}

function errorResult(message: string): CallToolResult {
  return textResult(JSON.stringify({ error: message }), true);
}

/**
 * Creates and configures the eqp-spec MCP server.
 *
 * The returned server is not connected; pass it a transport.
 *
 * @param config - Server configuration.
 * @returns The configured server.
 */
export function createSpecMcpServer(config: SpecMcpServerConfig): Server {
  const { engine } = config;
  const logger = config.logger ?? createServerLogger({ serverName: SPEC_SERVER_NAME });
  const docsRoot = config.docsRoot ?? defaultDocsRoot();

  const server = new Server(
    { name: SPEC_SERVER_NAME, version: '1.0.0' },
    { capabilities: { tools: {}, resources: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, () => {
    return Promise.resolve({ tools: SPEC_TOOLS });
  });

  server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
    const { name, arguments: args } = request.params;
    logger.debug('tool_call', { name });

    try {
      switch (name) {
        case 'list_parameter_specs': {
          const specs = await engine.listAll();
          return textResult(renderSpecListJson(specs, { pretty: true }));
        }
        case 'add_parameter_spec': {
          const created = await engine.add(args ?? {});
          return textResult(renderSpecJson(created, { pretty: true }));
        }
        default:
          return errorResult(`Unknown tool: ${name}`);
      }
    } catch (error) {
      if (error instanceof ParameterSpecError) {
        return errorResult(error.message);
      }
      logger.error('request_failed', {
        tool: name,
        error: error instanceof Error ? error.message : String(error),
      });
      return errorResult(INTERNAL_ERROR_MESSAGE);
    }
  });

  server.setRequestHandler(ListResourcesRequestSchema, () => {
    return Promise.resolve({
      resources: API_DOC_RESOURCES.map(({ uri, name, description, mimeType }) => ({
        uri,
        name,
        description,
        mimeType,
      })),
    });
  });

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const { uri } = request.params;
    try {
      const { resource, text } = await readApiDoc(uri, docsRoot);
      return { contents: [{ uri, mimeType: resource.mimeType, text }] };
    } catch (error) {
      if (error instanceof ApiDocNotFoundError) {
        throw new McpError(ErrorCode.InvalidParams, error.message);
      }
      throw error;
    }
  });

  return server;
}

/**
 * Starts the eqp-spec MCP server on stdio.
 *
 * @param config - Server configuration.
 */
export async function startStdioSpecServer(config: SpecMcpServerConfig): Promise<void> {
  const server = createSpecMcpServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
