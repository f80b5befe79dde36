/**
 * EQP Spec MCP server package.
 *
 * @packageDocumentation
 */

export { createSpecMcpServer, startStdioSpecServer } from './server.js';
export { SPEC_SERVER_NAME, SPEC_TOOLS, type SpecMcpServerConfig } from './types.js';
