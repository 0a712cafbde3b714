/**
 * makegate MCP Server — Model Context Protocol front door.
 *
 * Tools:
 *   <target>  — one per exposed Makefile target; runs `make <target>`
 *               Arguments: variables (object of strings), timeout (seconds)
 *
 * Resources:
 *   makegate://targets — exposed targets grouped by category (JSON)
 *
 * Progress: when the caller sends a progress token, a 0/1 notification goes
 * out once make has started and a 1/1 notification once it has finished.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ServerNotification } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ExecutionEvent, Target } from '../types/index.js';
import { listCatalog } from '../catalog/index.js';
import { RECOMMENDED_MAX_TIMEOUT_SECONDS } from '../executor/index.js';
import { createLogger } from '../logger.js';
import { toError } from '../errors.js';
import { runTarget, type ServerContext } from './context.js';
import { describeTarget, formatRun } from './format.js';

const log = createLogger('mcp');

export const SERVER_NAME = 'makegate';
export const SERVER_VERSION = '0.3.0';
export const TARGETS_URI = 'makegate://targets';

/** The parts of the SDK's handler context this server uses */
interface ToolCallContext {
  _meta?: { progressToken?: string | number };
  sendNotification(notification: ServerNotification): Promise<void>;
}

function progressReporter(target: string, extra: ToolCallContext): (event: ExecutionEvent) => void {
  const progressToken = extra._meta?.progressToken;
  if (progressToken === undefined) return () => {};

  const send = (progress: number, message: string) => {
    extra
      .sendNotification({
        method: 'notifications/progress',
        params: { progressToken, progress, total: 1, message },
      })
      .catch((err: unknown) => {
        log.debug({ target, err: toError(err).message }, 'could not send progress notification');
      });
  };

  return (event) => {
    switch (event.type) {
      case 'started':
        send(0, `${target}: started (pid ${event.pid})`);
        break;
      case 'output':
        break;
      default:
        send(1, `${target}: ${event.type}`);
    }
  };
}

function registerTarget(server: McpServer, context: ServerContext, target: Target): void {
  const { defaultTimeoutSeconds } = context.config;
  server.tool(
    target.name,
    describeTarget(target),
    {
      variables: z.record(z.string())
        .describe("Make variables to pass through the environment (e.g. {\"DEBUG\": \"1\"})")
        .optional(),
      timeout: z.number().int().positive()
        .describe(`Timeout in seconds (default: ${defaultTimeoutSeconds}, max recommended: ${RECOMMENDED_MAX_TIMEOUT_SECONDS})`)
        .optional(),
    },
    async ({ variables, timeout }, extra) => {
      const run = await runTarget(
        context,
        { target: target.name, variables, timeoutSeconds: timeout },
        progressReporter(target.name, extra),
      );
      return {
        content: [{ type: 'text', text: formatRun(run) }],
        isError: run.result.status !== 'succeeded',
      };
    },
  );
}

// ─── Server setup ────────────────────────────────────────────────────

export function createServer(context: ServerContext): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  for (const target of context.catalog.entries) {
    registerTarget(server, context, target);
  }
  log.info({ tools: context.catalog.entries.length }, 'registered Makefile targets as tools');

  // ── Resource: makegate://targets ──
  server.resource(
    'targets',
    TARGETS_URI,
    { description: 'Exposed Makefile targets grouped by category', mimeType: 'application/json' },
    async () => {
      const groups = listCatalog(context.catalog).map(g => ({
        category: g.category ?? null,
        targets: g.targets.map(t => ({
          name: t.name,
          description: t.description ?? '',
          dependencies: t.dependencies,
        })),
      }));
      return {
        contents: [{ uri: TARGETS_URI, mimeType: 'application/json', text: JSON.stringify(groups, null, 2) }],
      };
    },
  );

  return server;
}
