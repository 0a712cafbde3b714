/**
 * makegate MCP Server — exports and stdio entry point.
 */

export { createServer, SERVER_NAME, SERVER_VERSION, TARGETS_URI } from './server.js';
export { createServerContext, loadServerContext, runTarget } from './context.js';
export type { ServerContext, ContextOverrides, TargetRun } from './context.js';
export { describeTarget, formatRun, formatDuration } from './format.js';

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { MakegateConfig } from '../types/index.js';
import { createServer } from './server.js';
import { loadServerContext } from './context.js';

/**
 * Start the MCP server on stdio transport.
 * Called from CLI: `makegate serve`
 */
export async function startStdioServer(config: MakegateConfig): Promise<void> {
  const context = await loadServerContext(config);
  const server = createServer(context);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
