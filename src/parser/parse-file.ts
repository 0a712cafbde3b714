/**
 * makegate — File-level parser.
 * Turns Makefile text into ordered targets and category labels.
 */

import { readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { Stats } from 'node:fs';
import type { BuildRules, Target } from '../types/index.js';
import { BuildRulesNotFoundError, BuildRulesReadError, errorCode, toError } from '../errors.js';
import { createLogger } from '../logger.js';
import { parseLine } from './parse-line.js';
import { exposedTargets, hiddenTargets } from './rules.js';

const log = createLogger('parser');

/** Names make looks for, in its own search order. */
const DEFAULT_MAKEFILES = ['GNUmakefile', 'makefile', 'Makefile'];

interface LogicalLine {
  text: string;
  /** 1-indexed line where the logical line starts */
  line: number;
}

/** Join backslash-continued physical lines the way make reads them. */
function logicalLines(content: string): LogicalLine[] {
  const physical = content.split(/\r?\n/);
  const out: LogicalLine[] = [];
  let i = 0;
  while (i < physical.length) {
    const start = i;
    let text = physical[i];
    while (text.endsWith('\\') && i + 1 < physical.length) {
      i++;
      text = text.slice(0, -1).trimEnd() + ' ' + physical[i].trimStart();
    }
    out.push({ text, line: start + 1 });
    i++;
  }
  return out;
}

/**
 * Parse Makefile text. Never throws; lines that are not recognized are skipped.
 */
export function parseString(content: string, file: string = 'Makefile'): BuildRules {
  const lines = logicalLines(content);
  const phony = new Set<string>();
  for (const { text } of lines) {
    const parsed = parseLine(text);
    if (parsed.kind === 'phony') parsed.names.forEach(n => phony.add(n));
  }

  const byName = new Map<string, Target>();
  const categories: string[] = [];
  let currentCategory: string | undefined;

  for (const { text, line } of lines) {
    const parsed = parseLine(text);

    if (parsed.kind === 'category') {
      currentCategory = parsed.label;
      if (!categories.includes(parsed.label)) categories.push(parsed.label);
      continue;
    }
    if (parsed.kind !== 'rule') continue;

    const existing = byName.get(parsed.name);

    if (parsed.description === undefined) {
      if (existing) {
        // make merges prerequisites of repeated headers; the description stays
        for (const dep of parsed.dependencies) {
          if (!existing.dependencies.includes(dep)) existing.dependencies.push(dep);
        }
        continue;
      }
      byName.set(parsed.name, {
        name: parsed.name,
        category: currentCategory,
        dependencies: parsed.dependencies,
        visibility: 'public',
        phony: phony.has(parsed.name),
        line,
      });
      continue;
    }

    // Map.set keeps the first insertion position: first position, last content
    byName.set(parsed.name, {
      name: parsed.name,
      description: parsed.description,
      category: currentCategory,
      dependencies: parsed.dependencies,
      visibility: parsed.visibility,
      phony: phony.has(parsed.name),
      line,
    });
  }

  return {
    file,
    targets: [...byName.values()],
    categories,
    phony: [...phony],
  };
}

/**
 * Resolve a user-supplied path to a Makefile. A directory is searched for
 * GNUmakefile, makefile and Makefile, in that order.
 */
export async function resolveRulesFile(path: string): Promise<string> {
  let info: Stats;
  try {
    info = await stat(path);
  } catch (err) {
    if (errorCode(err) === 'ENOENT') throw new BuildRulesNotFoundError(path);
    throw new BuildRulesReadError(path, toError(err).message);
  }
  if (info.isFile()) return path;
  if (!info.isDirectory()) throw new BuildRulesReadError(path, 'not a regular file');

  for (const name of DEFAULT_MAKEFILES) {
    const candidate = join(path, name);
    try {
      if ((await stat(candidate)).isFile()) return candidate;
    } catch (err) {
      if (errorCode(err) !== 'ENOENT') throw new BuildRulesReadError(candidate, toError(err).message);
    }
  }
  throw new BuildRulesNotFoundError(join(path, 'Makefile'));
}

/**
 * Read and parse a Makefile (or a directory containing one).
 */
export async function parseFile(path: string): Promise<BuildRules> {
  const file = await resolveRulesFile(path);
  let content: string;
  try {
    content = await readFile(file, 'utf-8');
  } catch (err) {
    throw new BuildRulesReadError(file, toError(err).message);
  }

  const rules = parseString(content, file);
  const exposed = exposedTargets(rules).length;
  const hidden = hiddenTargets(rules).length;
  log.info({ file, targets: rules.targets.length, exposed, hidden }, 'parsed Makefile');
  if (exposed === 0) {
    log.warn({ file }, "no documented targets found; add '## Description' comments to expose targets");
  }
  return rules;
}
