import { describe, it, expect, beforeAll, vi } from 'vitest';
import { fileURLToPath } from 'node:url';
import { join, resolve } from 'node:path';
import { readFileSync, realpathSync } from 'node:fs';
import { parseFile } from '../src/parser/parse-file.js';
import { buildCatalog } from '../src/catalog/catalog.js';
import { createExecutionEngine, parseMakeCommand, DEFAULT_MAKE_COMMAND } from '../src/executor/engine.js';
import { signalExitCode } from '../src/executor/process.js';
import type { Catalog, ExecutionEvent, MakeCommand } from '../src/types/index.js';

const FIXTURES = fileURLToPath(new URL('./fixtures/', import.meta.url));
const MAKEFILE = join(FIXTURES, 'exec.mk');
const FAKE_MAKE: MakeCommand = { file: process.execPath, args: [join(FIXTURES, 'fake-make.mjs')] };

let catalog: Catalog;

beforeAll(async () => {
  catalog = buildCatalog(await parseFile(MAKEFILE));
});

function engine(overrides: { command?: MakeCommand; killGraceMs?: number } = {}) {
  return createExecutionEngine({ catalog, command: FAKE_MAKE, ...overrides });
}

/** Alive and not a zombie waiting to be reaped */
function isRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
  } catch {
    return false;
  }
  if (process.platform !== 'linux') return true;
  try {
    const stat = readFileSync(`/proc/${pid}/stat`, 'utf-8');
    return stat.charAt(stat.lastIndexOf(')') + 2) !== 'Z';
  } catch {
    return false;
  }
}

function recorder() {
  const events: ExecutionEvent[] = [];
  return { events, listener: (event: ExecutionEvent) => { events.push(event); } };
}

// ─── Helpers ─────────────────────────────────────────────────────────

describe('parseMakeCommand', () => {
  it('splits a command line into file and args', () => {
    expect(parseMakeCommand('gmake -s')).toEqual({ file: 'gmake', args: ['-s'] });
    expect(parseMakeCommand('  make  ')).toEqual({ file: 'make', args: [] });
  });

  it('falls back to make for a blank line', () => {
    expect(parseMakeCommand('   ')).toBe(DEFAULT_MAKE_COMMAND);
  });
});

describe('signalExitCode', () => {
  it('adds the signal number to 128', () => {
    expect(signalExitCode('SIGKILL')).toBe(137);
    expect(signalExitCode('SIGTERM')).toBe(143);
  });
});

// ─── Gate ────────────────────────────────────────────────────────────

describe('execute: rejected requests', () => {
  it('reports unknown targets with the available list', async () => {
    const { events, listener } = recorder();
    const result = await engine().execute({ target: 'nope' }, listener);
    expect(result.status).toBe('not_found');
    expect(result.output).toBe(
      "Target 'nope' not found. Available targets: args, echo-var, fail, huge, loud, ok, orphan, signal, slow, where",
    );
    expect(result.exitCode).toBeUndefined();
    expect(events).toEqual([]);
  });

  it('refuses internal and undocumented targets', async () => {
    const secret = await engine().execute({ target: 'secret' });
    expect(secret.status).toBe('not_allowed');
    expect(secret.output).toBe("Target 'secret' cannot be executed: it is marked @internal.");

    const helper = await engine().execute({ target: 'helper' });
    expect(helper.output).toBe("Target 'helper' cannot be executed: it has no '##' description.");
  });

  it('refuses targets outside the allow-list', async () => {
    const limited = createExecutionEngine({ catalog: buildCatalog(catalog.rules, ['ok']), command: FAKE_MAKE });
    const result = await limited.execute({ target: 'fail' });
    expect(result.status).toBe('not_allowed');
    expect(result.output).toBe("Target 'fail' cannot be executed: it is not in the allow-list.");
  });

  it('validates timeout, variable names and working directory before spawning', async () => {
    const e = engine();
    const { events, listener } = recorder();

    expect((await e.execute({ target: 'ok', timeoutSeconds: 0 }, listener)).output)
      .toBe('Timeout must be a positive number of seconds, got: 0');
    expect((await e.execute({ target: 'ok', variables: { '1BAD': 'x' } }, listener)).output)
      .toBe("Invalid variable name: '1BAD'");
    expect((await e.execute({ target: 'ok', cwd: '/definitely/not/here' }, listener)).output)
      .toBe('Working directory does not exist: /definitely/not/here');
    expect((await e.execute({ target: 'ok', cwd: MAKEFILE }, listener)).output)
      .toBe(`Working directory is not a directory: ${MAKEFILE}`);
    expect(events).toEqual([]);
  });
});

// ─── Runs ────────────────────────────────────────────────────────────

describe('execute: runs', () => {
  it('runs a target and emits started, output and completed', async () => {
    const { events, listener } = recorder();
    const result = await engine().execute({ target: 'ok' }, listener);

    expect(result).toMatchObject({ target: 'ok', status: 'succeeded', exitCode: 0, output: 'ok\n' });
    expect(Object.isFrozen(result)).toBe(true);
    expect(Number.isNaN(Date.parse(result.startedAt))).toBe(false);

    expect(events[0]).toMatchObject({ type: 'started', target: 'ok' });
    expect(events.at(-1)).toEqual({ type: 'completed', target: 'ok', result });
    const chunks = events.flatMap(e => (e.type === 'output' ? [e.chunk] : []));
    expect(chunks.join('')).toBe('ok\n');
  });

  it('passes -f and the target after the command arguments', async () => {
    const command = { file: process.execPath, args: [...FAKE_MAKE.args, '-s'] };
    const result = await engine({ command }).execute({ target: 'args' });
    expect(JSON.parse(result.output)).toEqual(['-s', '-f', resolve(MAKEFILE), 'args']);
  });

  it('runs in the Makefile directory by default', async () => {
    const result = await engine().execute({ target: 'where' });
    expect(result.output.trim()).toBe(realpathSync(FIXTURES));
  });

  it('passes variables through the environment', async () => {
    const result = await engine().execute({ target: 'echo-var', variables: { GREETING: 'hello world' } });
    expect(result.output).toBe('GREETING=hello world\n');
  });

  it('reports a non-zero exit as failed with merged output', async () => {
    const { events, listener } = recorder();
    const result = await engine().execute({ target: 'fail' }, listener);
    expect(result.status).toBe('failed');
    expect(result.exitCode).toBe(2);
    expect(result.output).toContain('partial\n');
    expect(result.output).toContain('boom\n');
    expect(events.at(-1)?.type).toBe('failed');
  });

  it('maps death by signal to 128 + signal number', async () => {
    const result = await engine().execute({ target: 'signal' });
    expect(result.status).toBe('failed');
    expect(result.exitCode).toBe(143);
  });

  it('keeps all output', async () => {
    const result = await engine().execute({ target: 'loud' });
    expect(result.output).toBe('x'.repeat(5000));
  });

  it('drains both streams past the pipe buffer', async () => {
    const result = await engine().execute({ target: 'huge' });
    const size = 1 << 20;
    expect(result.status).toBe('succeeded');
    expect(result.output).toHaveLength(2 * size);
    expect(result.output.match(/y/g)?.length).toBe(size);
    expect(result.output.match(/z/g)?.length).toBe(size);
  });

  it('ignores listeners that throw', async () => {
    const result = await engine().execute({ target: 'ok' }, () => {
      throw new Error('listener failure');
    });
    expect(result.status).toBe('succeeded');
  });
});

describe('execute: timeouts', () => {
  it('kills the whole process group on timeout', async () => {
    const { events, listener } = recorder();
    const result = await engine({ killGraceMs: 5_000 }).execute({ target: 'orphan', timeoutSeconds: 1 }, listener);

    expect(result.status).toBe('timed_out');
    expect(result.exitCode).toBeUndefined();
    // The grandchild holds the output pipes; they only close this soon if it died too
    expect(result.durationMs).toBeLessThan(4_000);
    expect(events.at(-1)).toEqual({ type: 'timed_out', target: 'orphan', result });

    const started = events[0];
    if (started?.type !== 'started') throw new Error('expected a started event');
    const grandchild = Number(result.output.match(/^grandchild (\d+)$/m)?.[1]);
    expect(Number.isInteger(grandchild)).toBe(true);

    await vi.waitFor(() => {
      expect(isRunning(started.pid)).toBe(false);
      expect(isRunning(grandchild)).toBe(false);
    }, { timeout: 3_000, interval: 50 });
  });

  it('times out a long-running target with a short grace period', async () => {
    const result = await engine({ killGraceMs: 200 }).execute({ target: 'slow', timeoutSeconds: 0.5 });
    expect(result.status).toBe('timed_out');
  });
});

describe('execute: spawn failures', () => {
  it('reports a missing make binary', async () => {
    const { events, listener } = recorder();
    const command = { file: '/nonexistent/make-binary', args: [] };
    const result = await engine({ command }).execute({ target: 'ok' }, listener);

    expect(result.status).toBe('failed');
    expect(result.exitCode).toBeUndefined();
    expect(result.output).toBe(
      "Failed to start '/nonexistent/make-binary': command not found. Is make installed and on PATH?",
    );
    expect(events.map(e => e.type)).toEqual(['failed']);
  });
});
