/**
 * makegate — library entry point.
 *
 * Usage:
 *   import { parseFile, buildCatalog, createExecutionEngine } from 'makegate';
 *   import type { BuildRules, ExecutionResult } from 'makegate';
 */

export * from './types/index.js';
export * from './errors.js';
export * from './parser/index.js';
export * from './catalog/index.js';
export * from './executor/index.js';
export * from './output/index.js';
export { resolveConfig, splitList, ENV } from './config/index.js';
export type { ConfigFlags } from './config/index.js';
export {
  createServer, createServerContext, loadServerContext, runTarget, startStdioServer,
  describeTarget, formatRun, formatDuration, SERVER_NAME, SERVER_VERSION, TARGETS_URI,
} from './mcp/index.js';
export type { ServerContext, ContextOverrides, TargetRun } from './mcp/index.js';
export { createLogger, setLogLevel, isLogLevel } from './logger.js';
