/**
 * makegate — Server context.
 * Everything a front door needs, built once at startup: parsed rules, the
 * catalog, the output session and the execution engine.
 */

import type {
  BuildRules, Catalog, ExecutionListener, ExecutionRequest, ExecutionResult,
  MakeCommand, MakegateConfig, ProcessedOutput,
} from '../types/index.js';
import { parseFile } from '../parser/index.js';
import { buildCatalog, checkAllowList } from '../catalog/index.js';
import { createExecutionEngine, parseMakeCommand, type ExecutionEngine } from '../executor/index.js';
import { createOutputSession, processOutput, type OutputSession } from '../output/index.js';
import { AllowListError } from '../errors.js';
import { createLogger } from '../logger.js';

const log = createLogger('context');

export interface ServerContext {
  config: MakegateConfig;
  rules: BuildRules;
  catalog: Catalog;
  session: OutputSession;
  engine: ExecutionEngine;
}

export interface ContextOverrides {
  command?: MakeCommand;
  workingDirectory?: string;
  killGraceMs?: number;
  session?: OutputSession;
}

/**
 * Build a context from already-parsed rules. Throws AllowListError when the
 * allow-list names targets the Makefile does not define.
 */
export function createServerContext(
  config: MakegateConfig,
  rules: BuildRules,
  overrides: ContextOverrides = {},
): ServerContext {
  if (config.allowedTargets.length > 0) {
    const check = checkAllowList(rules, config.allowedTargets);
    if (check.missing.length > 0) {
      throw new AllowListError(check.missing, rules.targets.map(t => t.name).sort());
    }
    if (check.hidden.length > 0) {
      log.warn({ targets: check.hidden }, 'allow-list includes undocumented or @internal/@skip targets; they will not be exposed');
    }
    if (check.exposed.length === 0) {
      log.warn({ allowList: config.allowedTargets }, 'no targets will be exposed after applying the allow-list');
    }
    log.info({ count: config.allowedTargets.length }, 'allow-list active');
  }

  const catalog = buildCatalog(rules, config.allowedTargets);
  const session = overrides.session ?? createOutputSession(config.tempDir);
  const engine = createExecutionEngine({
    catalog,
    command: overrides.command ?? parseMakeCommand(config.makeCommand),
    defaultTimeoutSeconds: config.defaultTimeoutSeconds,
    workingDirectory: overrides.workingDirectory,
    killGraceMs: overrides.killGraceMs,
  });
  return { config, rules, catalog, session, engine };
}

export async function loadServerContext(config: MakegateConfig, overrides: ContextOverrides = {}): Promise<ServerContext> {
  const rules = await parseFile(config.makefile);
  return createServerContext(config, rules, overrides);
}

export interface TargetRun {
  result: ExecutionResult;
  /** Absent when no process ran (rejected requests, spawn failures) */
  output?: ProcessedOutput;
}

function processRan(result: ExecutionResult): boolean {
  return result.exitCode !== undefined || result.status === 'timed_out';
}

/**
 * Execute one request and post-process its output with the configured limits.
 */
export async function runTarget(
  context: ServerContext,
  request: ExecutionRequest,
  onEvent?: ExecutionListener,
): Promise<TargetRun> {
  const result = await context.engine.execute(request, onEvent);
  if (!processRan(result)) return { result };

  const output = await processOutput(
    result.output,
    result.target,
    { maxOutputChars: context.config.maxOutputChars, writeToFile: context.config.writeToFile },
    context.session,
  );
  return { result, output };
}
