/**
 * Types for the eqp-spec MCP server.
 *
 * @packageDocumentation
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ParameterSpecEngine } from '../../specs/engine.js';
import type { ServerLogger } from '../logging.js';

/**
 * Name the server reports during MCP initialization.
 */
export const SPEC_SERVER_NAME = 'eqp-spec-server';

/**
 * Server configuration options.
 */
export interface SpecMcpServerConfig {
  /** Engine every tool call goes through. */
  engine: ParameterSpecEngine;
  /** Logger for tool calls and failures. */
  logger?: ServerLogger | undefined;
  /** Directory the api-docs resources are read from. Defaults to the package root. */
  docsRoot?: string | undefined;
}

/**
 * Tool definitions returned from tools/list.
 */
export const SPEC_TOOLS: Tool[] = [
  {
    name: 'list_parameter_specs',
    description: 'List all EQP parameter specifications',
    inputSchema: {
      type: 'object',
      properties: {},
      required: [],
    },
  },
  {
    name: 'add_parameter_spec',
    description:
      'Add a new EQP parameter specification. ' +
      'Limits are rounded to 3 decimals and must satisfy LSL < LCL < CL < UCL < USL; ' +
      'tool_name + parameter_name must be unique (case-insensitive).',
    inputSchema: {
      type: 'object',
      properties: {
        tool_name: { type: 'string', description: 'Tool/machine name (1-100 characters)' },
        parameter_name: { type: 'string', description: 'Parameter name (1-100 characters)' },
        usl: { type: 'number', description: 'Upper Specification Limit' },
        lsl: { type: 'number', description: 'Lower Specification Limit' },
        ucl: { type: 'number', description: 'Upper Control Limit' },
        lcl: { type: 'number', description: 'Lower Control Limit' },
        cl: { type: 'number', description: 'Center Line' },
      },
      required: ['tool_name', 'parameter_name', 'usl', 'lsl', 'ucl', 'lcl', 'cl'],
    },
  },
];
