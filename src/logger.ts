/**
 * makegate — Logging.
 * All logs go to stderr: stdout carries the MCP stdio transport.
 */

import pino, { type Logger } from 'pino';
import type { LogLevel } from './types/index.js';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some(l => l === value);
}

function initialLevel(): LogLevel {
  const raw = process.env.MAKEGATE_LOG_LEVEL?.toLowerCase() ?? '';
  return isLogLevel(raw) ? raw : 'info';
}

export const logger: Logger = pino(
  { name: 'makegate', level: initialLevel() },
  pino.destination(2),
);

// pino children copy the level at creation, so keep them to re-level later
const children: Logger[] = [];

/** Logger scoped to one module, e.g. `createLogger('executor')`. */
export function createLogger(module: string): Logger {
  const child = logger.child({ module });
  children.push(child);
  return child;
}

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
  for (const child of children) child.level = level;
}
