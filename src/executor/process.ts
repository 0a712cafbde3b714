/**
 * makegate — Child process runner.
 *
 * Spawns one command in its own process group, merges stdout and stderr into
 * a single chunk list in arrival order, and races the process against a
 * wall-clock timer. On timeout the whole group gets SIGKILL so grandchildren
 * started by recipes do not outlive the call.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { constants } from 'node:os';
import { createLogger } from '../logger.js';
import { toError } from '../errors.js';

const log = createLogger('process');

/** setTimeout fires immediately above this, so longer timeouts are clamped */
const MAX_TIMER_MS = 2_147_483_647;

export const DEFAULT_KILL_GRACE_MS = 5_000;

export interface RunProcessOptions {
  cwd: string;
  env: NodeJS.ProcessEnv;
  timeoutMs: number;
  /**
   * How long to wait for the output pipes to close after the process exits
   * (or after the group was killed) before returning anyway.
   */
  killGraceMs?: number;
  /** Called synchronously after a successful spawn, before any output */
  onSpawn?: (pid: number) => void;
  onOutput?: (chunk: string) => void;
}

export type ProcessOutcome =
  | { kind: 'exited'; exitCode: number; signal: NodeJS.Signals | null; output: string }
  | { kind: 'timed_out'; output: string }
  | { kind: 'spawn_failed'; error: Error; output: string };

/** Exit code for a process that died from a signal, shell style (128 + n). */
export function signalExitCode(signal: NodeJS.Signals): number {
  const entry = Object.entries(constants.signals).find(([name]) => name === signal);
  return 128 + (entry?.[1] ?? 0);
}

function killGroup(child: ChildProcess): void {
  const pid = child.pid;
  if (pid === undefined) return;
  try {
    process.kill(-pid, 'SIGKILL');
  } catch (err) {
    // Group already gone; fall back to the direct child
    log.debug({ pid, err: toError(err).message }, 'process group kill failed');
    try {
      child.kill('SIGKILL');
    } catch (inner) {
      log.debug({ pid, err: toError(inner).message }, 'child kill failed');
    }
  }
}

/**
 * Run `file args...` and resolve once it has finished, timed out, or failed
 * to start. Never rejects.
 */
export function runProcess(file: string, args: string[], options: RunProcessOptions): Promise<ProcessOutcome> {
  const killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;

  return new Promise<ProcessOutcome>((resolve) => {
    const chunks: string[] = [];
    let settled = false;
    let timedOut = false;
    let exit: { code: number | null; signal: NodeJS.Signals | null } | null = null;
    let timer: ReturnType<typeof setTimeout> | undefined;
    let graceTimer: ReturnType<typeof setTimeout> | undefined;

    const finish = (outcome: ProcessOutcome) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      clearTimeout(graceTimer);
      resolve(outcome);
    };

    const settle = () => {
      const output = chunks.join('');
      if (timedOut) {
        finish({ kind: 'timed_out', output });
        return;
      }
      const code = exit?.code ?? null;
      const signal = exit?.signal ?? null;
      const exitCode = code ?? (signal ? signalExitCode(signal) : 1);
      finish({ kind: 'exited', exitCode, signal, output });
    };

    let child: ChildProcess;
    try {
      // detached: own process group, so -pid reaches every descendant.
      // stdin ignored: a background grandchild holding a writable stdin would
      // keep the pipes open long after make returns.
      child = spawn(file, args, {
        cwd: options.cwd,
        env: options.env,
        detached: true,
        stdio: ['ignore', 'pipe', 'pipe'],
      });
    } catch (err) {
      finish({ kind: 'spawn_failed', error: toError(err), output: '' });
      return;
    }

    const collect = (chunk: string) => {
      chunks.push(chunk);
      options.onOutput?.(chunk);
    };
    child.stdout?.setEncoding('utf8');
    child.stderr?.setEncoding('utf8');
    child.stdout?.on('data', collect);
    child.stderr?.on('data', collect);

    child.on('error', (err: Error) => {
      // Spawn failures (ENOENT, EACCES) arrive here without an 'exit'
      if (exit === null && !timedOut) {
        finish({ kind: 'spawn_failed', error: err, output: chunks.join('') });
        return;
      }
      log.debug({ err: err.message }, 'child process error after exit');
    });

    child.on('exit', (code, signal) => {
      exit = { code, signal };
      if (timedOut) return;
      clearTimeout(timer);
      // Output may still be buffered; wait for 'close', but not forever
      graceTimer = setTimeout(() => {
        log.warn({ pid: child.pid }, 'output pipes still open after exit; returning without them');
        child.stdout?.destroy();
        child.stderr?.destroy();
        settle();
      }, killGraceMs);
    });

    child.on('close', settle);

    if (child.pid !== undefined) {
      options.onSpawn?.(child.pid);
      timer = setTimeout(() => {
        timedOut = true;
        log.warn({ pid: child.pid, timeoutMs: options.timeoutMs }, 'timeout reached; killing process group');
        killGroup(child);
        graceTimer = setTimeout(() => {
          log.warn({ pid: child.pid }, 'process group did not close after SIGKILL');
          settle();
        }, killGraceMs);
      }, Math.min(Math.max(options.timeoutMs, 0), MAX_TIMER_MS));
    }
  });
}
