/**
 * makegate — Configuration resolution.
 *
 * Resolution order (highest to lowest priority):
 *   1. Explicit CLI flags
 *   2. MAKEGATE_* environment variables
 *   3. Defaults
 *
 * The merged record is validated once with zod; anything invalid is reported
 * together in a ConfigError.
 */

import { tmpdir } from 'node:os';
import { z } from 'zod';
import type { MakegateConfig } from '../types/index.js';
import { ConfigError } from '../errors.js';

export const ENV = {
  makefile: 'MAKEGATE_MAKEFILE',
  allowedTargets: 'MAKEGATE_ALLOWED_TARGETS',
  logLevel: 'MAKEGATE_LOG_LEVEL',
  maxOutputChars: 'MAKEGATE_MAX_OUTPUT_CHARS',
  writeToFile: 'MAKEGATE_WRITE_TO_FILE',
  tempDir: 'MAKEGATE_TEMP_DIR',
  defaultTimeoutSeconds: 'MAKEGATE_DEFAULT_TIMEOUT',
  makeCommand: 'MAKEGATE_MAKE_COMMAND',
} as const;

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);
const FALSY = new Set(['0', 'false', 'no', 'off', '']);

const configSchema = z.object({
  makefile: z.string().min(1).default('Makefile'),
  allowedTargets: z.array(z.string().min(1)).default([]),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  maxOutputChars: z.coerce.number().int().min(0).default(0),
  writeToFile: z.boolean().default(false),
  tempDir: z.string().min(1).default(tmpdir()),
  defaultTimeoutSeconds: z.coerce.number().int().positive().default(300),
  makeCommand: z.string().trim().min(1).default('make'),
});

/** Values as they come from the command line; all optional */
export interface ConfigFlags {
  makefile?: string;
  allowedTargets?: string[];
  logLevel?: string;
  maxOutputChars?: string | number;
  writeToFile?: boolean;
  tempDir?: string;
  defaultTimeoutSeconds?: string | number;
  makeCommand?: string;
}

/** `"test, build,,deploy"` → `['test', 'build', 'deploy']` */
export function splitList(raw: string): string[] {
  return raw.split(',').map(s => s.trim()).filter(Boolean);
}

function parseBoolean(raw: string, key: string, issues: string[]): boolean | undefined {
  const v = raw.trim().toLowerCase();
  if (TRUTHY.has(v)) return true;
  if (FALSY.has(v)) return false;
  issues.push(`${key}: expected a boolean (1/0, true/false, yes/no, on/off), got "${raw}"`);
  return undefined;
}

function fromEnv(env: NodeJS.ProcessEnv, issues: string[]): ConfigFlags {
  const out: ConfigFlags = {};
  const get = (key: string) => {
    const v = env[key];
    return v === undefined || v.trim() === '' ? undefined : v.trim();
  };

  const makefile = get(ENV.makefile);
  if (makefile) out.makefile = makefile;
  const allowed = get(ENV.allowedTargets);
  if (allowed) out.allowedTargets = splitList(allowed);
  const level = get(ENV.logLevel);
  if (level) out.logLevel = level.toLowerCase();
  const maxChars = get(ENV.maxOutputChars);
  if (maxChars) out.maxOutputChars = maxChars;
  const writeToFile = env[ENV.writeToFile];
  if (writeToFile !== undefined) {
    const parsed = parseBoolean(writeToFile, ENV.writeToFile, issues);
    if (parsed !== undefined) out.writeToFile = parsed;
  }
  const tempDir = get(ENV.tempDir);
  if (tempDir) out.tempDir = tempDir;
  const timeout = get(ENV.defaultTimeoutSeconds);
  if (timeout) out.defaultTimeoutSeconds = timeout;
  const makeCommand = get(ENV.makeCommand);
  if (makeCommand) out.makeCommand = makeCommand;
  return out;
}

function pick<K extends keyof ConfigFlags>(key: K, ...sources: ConfigFlags[]): ConfigFlags[K] {
  for (const source of sources) {
    if (source[key] !== undefined) return source[key];
  }
  return undefined;
}

/**
 * Merge flags over environment over defaults and validate the result.
 */
export function resolveConfig(flags: ConfigFlags = {}, env: NodeJS.ProcessEnv = process.env): MakegateConfig {
  const issues: string[] = [];
  const fromEnvironment = fromEnv(env, issues);
  const merged: ConfigFlags = {
    makefile: pick('makefile', flags, fromEnvironment),
    allowedTargets: flags.allowedTargets?.length ? flags.allowedTargets : fromEnvironment.allowedTargets,
    logLevel: pick('logLevel', flags, fromEnvironment),
    maxOutputChars: pick('maxOutputChars', flags, fromEnvironment),
    writeToFile: pick('writeToFile', flags, fromEnvironment),
    tempDir: pick('tempDir', flags, fromEnvironment),
    defaultTimeoutSeconds: pick('defaultTimeoutSeconds', flags, fromEnvironment),
    makeCommand: pick('makeCommand', flags, fromEnvironment),
  };

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      issues.push(`${issue.path.join('.') || 'config'}: ${issue.message}`);
    }
  }
  if (issues.length > 0 || !parsed.success) throw new ConfigError(issues);
  return parsed.data;
}
