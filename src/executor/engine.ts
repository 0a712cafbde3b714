/**
 * makegate — Execution engine.
 *
 * Gates a request through the catalog, runs `make -f <Makefile> <target>`,
 * and folds every outcome into an ExecutionResult. `execute` never rejects:
 * unknown targets, filtered targets, bad requests, spawn failures, timeouts
 * and non-zero exits are all statuses.
 */

import { stat } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type {
  Catalog, ExecutionListener, ExecutionEvent, ExecutionRequest, ExecutionResult,
  ExecutionStatus, MakeCommand, RejectionReason,
} from '../types/index.js';
import { checkTarget } from '../catalog/index.js';
import { createLogger } from '../logger.js';
import { errorCode, toError } from '../errors.js';
import { runProcess, type ProcessOutcome } from './process.js';

const log = createLogger('executor');

export const DEFAULT_TIMEOUT_SECONDS = 300;

/** Longer timeouts are accepted, with a warning */
export const RECOMMENDED_MAX_TIMEOUT_SECONDS = 3600;

const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const DEFAULT_MAKE_COMMAND: MakeCommand = { file: 'make', args: [] };

export interface EngineOptions {
  catalog: Catalog;
  command?: MakeCommand;
  defaultTimeoutSeconds?: number;
  /** Defaults to the Makefile's directory */
  workingDirectory?: string;
  killGraceMs?: number;
}

export interface ExecutionEngine {
  readonly catalog: Catalog;
  execute(request: ExecutionRequest, onEvent?: ExecutionListener): Promise<ExecutionResult>;
}

const REJECTION_TEXT: Record<RejectionReason, string> = {
  undocumented: "it has no '##' description",
  internal: 'it is marked @internal',
  skip: 'it is marked @skip',
  not_in_allow_list: 'it is not in the allow-list',
};

/** Split a command line such as `make` or `gmake -s` into file and args. */
export function parseMakeCommand(commandLine: string): MakeCommand {
  const [file, ...args] = commandLine.trim().split(/\s+/);
  return file ? { file, args } : DEFAULT_MAKE_COMMAND;
}

function emit(listener: ExecutionListener | undefined, event: ExecutionEvent): void {
  if (!listener) return;
  try {
    listener(event);
  } catch (err) {
    log.warn({ event: event.type, err: toError(err).message }, 'execution listener threw; ignoring');
  }
}

function describeSpawnFailure(command: MakeCommand, err: Error): string {
  switch (errorCode(err)) {
    case 'ENOENT':
      return `Failed to start '${command.file}': command not found. Is make installed and on PATH?`;
    case 'EACCES':
      return `Failed to start '${command.file}': permission denied`;
    default:
      return `Failed to start '${command.file}': ${err.message}`;
  }
}

async function checkDirectory(path: string): Promise<string | undefined> {
  try {
    const info = await stat(path);
    return info.isDirectory() ? undefined : `Working directory is not a directory: ${path}`;
  } catch (err) {
    return errorCode(err) === 'ENOENT'
      ? `Working directory does not exist: ${path}`
      : `Working directory is not accessible: ${path} (${toError(err).message})`;
  }
}

export function createExecutionEngine(options: EngineOptions): ExecutionEngine {
  const { catalog } = options;
  const command = options.command ?? DEFAULT_MAKE_COMMAND;
  const defaultTimeout = options.defaultTimeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
  const makefile = resolve(catalog.file);
  const defaultCwd = options.workingDirectory ?? dirname(makefile);

  async function run(request: ExecutionRequest, onEvent: ExecutionListener | undefined): Promise<ExecutionResult> {
    const started = Date.now();
    const startedAt = new Date(started).toISOString();
    const { target } = request;

    const result = (status: ExecutionStatus, output: string, exitCode?: number): ExecutionResult =>
      Object.freeze({
        target,
        status,
        ...(exitCode !== undefined ? { exitCode } : {}),
        output,
        durationMs: Date.now() - started,
        startedAt,
      });

    // ── Gate ──
    const check = checkTarget(catalog, target);
    if (check.verdict === 'not_found') {
      const available = catalog.entries.map(t => t.name).sort().join(', ') || 'none';
      log.warn({ target }, 'rejected: target not found');
      return result('not_found', `Target '${target}' not found. Available targets: ${available}`);
    }
    if (check.verdict === 'not_allowed') {
      log.warn({ target, reason: check.reason }, 'rejected: target not allowed');
      return result('not_allowed', `Target '${target}' cannot be executed: ${REJECTION_TEXT[check.reason]}.`);
    }

    // ── Request checks ──
    const timeoutSeconds = request.timeoutSeconds ?? defaultTimeout;
    if (!Number.isFinite(timeoutSeconds) || timeoutSeconds <= 0) {
      return result('failed', `Timeout must be a positive number of seconds, got: ${timeoutSeconds}`);
    }
    if (timeoutSeconds > RECOMMENDED_MAX_TIMEOUT_SECONDS) {
      log.warn({ target, timeoutSeconds }, `very long timeout (recommended max ${RECOMMENDED_MAX_TIMEOUT_SECONDS}s)`);
    }

    const variables = request.variables ?? {};
    const badName = Object.keys(variables).find(name => !VARIABLE_NAME.test(name));
    if (badName !== undefined) {
      return result('failed', `Invalid variable name: '${badName}'`);
    }

    const cwd = request.cwd ? resolve(request.cwd) : defaultCwd;
    const cwdProblem = await checkDirectory(cwd);
    if (cwdProblem) return result('failed', cwdProblem);

    // ── Run ──
    const args = [...command.args, '-f', makefile, target];
    log.info({ target, cwd, timeoutSeconds, command: [command.file, ...args].join(' ') }, 'executing target');

    const outcome: ProcessOutcome = await runProcess(command.file, args, {
      cwd,
      env: { ...process.env, ...variables },
      timeoutMs: timeoutSeconds * 1000,
      killGraceMs: options.killGraceMs,
      onSpawn: pid => emit(onEvent, { type: 'started', target, pid }),
      onOutput: chunk => emit(onEvent, { type: 'output', target, chunk }),
    });

    let final: ExecutionResult;
    switch (outcome.kind) {
      case 'spawn_failed': {
        const message = describeSpawnFailure(command, outcome.error);
        log.error({ target, err: outcome.error.message }, 'spawn failed');
        final = result('failed', outcome.output + message);
        emit(onEvent, { type: 'failed', target, result: final });
        return final;
      }
      case 'timed_out':
        final = result('timed_out', outcome.output);
        log.warn({ target, timeoutSeconds, durationMs: final.durationMs }, 'target timed out');
        emit(onEvent, { type: 'timed_out', target, result: final });
        return final;
      case 'exited': {
        const status: ExecutionStatus = outcome.exitCode === 0 ? 'succeeded' : 'failed';
        final = result(status, outcome.output, outcome.exitCode);
        log.info({ target, exitCode: outcome.exitCode, durationMs: final.durationMs }, `target ${status}`);
        emit(onEvent, { type: status === 'succeeded' ? 'completed' : 'failed', target, result: final });
        return final;
      }
    }
  }

  return {
    catalog,
    async execute(request, onEvent) {
      try {
        return await run(request, onEvent);
      } catch (err) {
        log.error({ target: request.target, err: toError(err).message }, 'unexpected execution error');
        const failed: ExecutionResult = {
          target: request.target,
          status: 'failed',
          output: `Unexpected error during execution: ${toError(err).message}`,
          durationMs: 0,
          startedAt: new Date().toISOString(),
        };
        return Object.freeze(failed);
      }
    },
  };
}
