/**
 * makegate — Output post-processing.
 *
 * Persists full output to a per-session log directory when enabled and
 * truncates what goes back to the caller. A failed write never fails the
 * call: the caller still gets the in-band text.
 */

import { randomBytes } from 'node:crypto';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { OutputArtifact, OutputSettings, ProcessedOutput } from '../types/index.js';
import { createLogger } from '../logger.js';
import { errorCode, toError } from '../errors.js';

const log = createLogger('output');

// ─── Session ─────────────────────────────────────────────────────────

export interface OutputSession {
  /** Random id, fixed for the lifetime of the server */
  readonly id: string;
  readonly directory: string;
  /** Create the directory on first use; concurrent callers share one mkdir */
  ensureDirectory(): Promise<string>;
}

export function createOutputSession(tempDir: string, id: string = randomBytes(4).toString('hex')): OutputSession {
  const directory = join(tempDir, `makegate-${id}`);
  let pending: Promise<string> | undefined;

  return {
    id,
    directory,
    ensureDirectory() {
      if (!pending) {
        pending = mkdir(directory, { recursive: true }).then(
          () => {
            log.info({ directory }, 'created output directory');
            return directory;
          },
          (err: unknown) => {
            // retried on the next call
            pending = undefined;
            throw err;
          },
        );
      }
      return pending;
    },
  };
}

// ─── Artifact ────────────────────────────────────────────────────────

/**
 * Write `content` to `<session dir>/<target>-<epoch ms>.log`, adding `-1`, `-2`...
 * when a file of that name already exists.
 */
export async function writeArtifact(
  session: OutputSession,
  target: string,
  content: string,
  now: number = Date.now(),
): Promise<OutputArtifact> {
  const directory = await session.ensureDirectory();
  for (let attempt = 0; ; attempt++) {
    const name = attempt === 0 ? `${target}-${now}.log` : `${target}-${now}-${attempt}.log`;
    const path = join(directory, name);
    try {
      await writeFile(path, content, { encoding: 'utf-8', flag: 'wx' });
      return { path };
    } catch (err) {
      if (errorCode(err) !== 'EEXIST') throw err;
    }
  }
}

// ─── Truncation ──────────────────────────────────────────────────────

export function truncationNote(shown: number, total: number, artifact?: OutputArtifact): string {
  let note = `\n\n[output truncated: showing ${shown} of ${total} characters]`;
  if (artifact) note += `\n[full output: ${artifact.path}]`;
  return note;
}

/** `max`, or one less when that would split a surrogate pair. */
function cutPoint(raw: string, max: number): number {
  const last = raw.charCodeAt(max - 1);
  return last >= 0xd800 && last <= 0xdbff ? max - 1 : max;
}

/**
 * Decide what text to hand back for one execution, persisting the full
 * output first when `writeToFile` is on.
 */
export async function processOutput(
  raw: string,
  target: string,
  settings: OutputSettings,
  session: OutputSession,
): Promise<ProcessedOutput> {
  let artifact: OutputArtifact | undefined;
  let persistError: string | undefined;

  if (settings.writeToFile) {
    try {
      artifact = await writeArtifact(session, target, raw);
      log.info({ target, path: artifact.path }, 'wrote full output');
    } catch (err) {
      persistError = toError(err).message;
      log.error({ target, err: persistError }, 'failed to write output file');
    }
  }

  const max = settings.maxOutputChars;
  const truncated = max > 0 && raw.length > max;
  let text = raw;
  if (truncated) {
    const cut = cutPoint(raw, max);
    text = raw.slice(0, cut) + truncationNote(cut, raw.length, artifact);
  }

  return {
    text,
    ...(artifact ? { artifact } : {}),
    truncated,
    originalLength: raw.length,
    ...(persistError !== undefined ? { persistError } : {}),
  };
}
