/**
 * makegate — Line-level Makefile parser.
 * Classifies one logical line (continuations already joined) as a category
 * header, a .PHONY list, a rule header, or something else.
 */

import type { TargetVisibility } from '../types/index.js';

// ─── Patterns ────────────────────────────────────────────────────────

const NAME = String.raw`[A-Za-z0-9_][A-Za-z0-9_-]*`;

/** `## Category: Build` (one or two hashes) */
const CATEGORY = /^##?\s*Category:\s*(.*?)\s*$/;

const PHONY = /^\.PHONY\s*:(.*)$/;

/**
 * `name:` or `name::` followed by anything except `=` or a third colon,
 * which would make it a `:=` / `::=` / `:::=` assignment.
 */
const RULE = new RegExp(String.raw`^(${NAME})\s*(?:::|:)(?![:=])(.*)$`);

/** Prerequisite tokens worth reporting: plain file or target names */
const DEPENDENCY = /^[\w./+-]+$/;

const VISIBILITY_MARKER = /^@(internal|skip)(?:\s+|$)/;

// ─── Result ──────────────────────────────────────────────────────────

export type ParsedLine =
  | { kind: 'category'; label: string }
  | { kind: 'phony'; names: string[] }
  | {
      kind: 'rule';
      name: string;
      dependencies: string[];
      /** Undefined when the header has no `##` comment */
      description?: string;
      visibility: TargetVisibility;
    }
  | { kind: 'other' };

const OTHER: ParsedLine = { kind: 'other' };

// ─── Helpers ─────────────────────────────────────────────────────────

/**
 * Split a `@internal` / `@skip` marker off a description.
 * `"@internal Deploy"` → `{ visibility: 'internal', description: 'Deploy' }`
 */
export function splitVisibility(raw: string): { visibility: TargetVisibility; description: string } {
  const m = raw.match(VISIBILITY_MARKER);
  if (!m) return { visibility: 'public', description: raw };
  const visibility: TargetVisibility = m[1] === 'internal' ? 'internal' : 'skip';
  return { visibility, description: raw.slice(m[0].length).trim() };
}

/** Whitespace-split prerequisites, minus variable references and assignments. */
export function extractDependencies(raw: string): string[] {
  return raw.split(/\s+/).filter(token => token.length > 0 && DEPENDENCY.test(token));
}

// ─── Main parser ─────────────────────────────────────────────────────

export function parseLine(line: string): ParsedLine {
  // Recipe lines belong to the rule above and are never headers
  if (line.startsWith('\t')) return OTHER;

  const trimmed = line.trim();
  if (trimmed.startsWith('#')) {
    const cat = trimmed.match(CATEGORY);
    if (cat && cat[1]) return { kind: 'category', label: cat[1] };
    return OTHER;
  }

  const phony = line.match(PHONY);
  if (phony) return { kind: 'phony', names: extractDependencies(phony[1]) };

  const rule = line.match(RULE);
  if (!rule) return OTHER;

  const name = rule[1];
  const rest = rule[2];
  const hash = rest.indexOf('#');
  const head = hash === -1 ? rest : rest.slice(0, hash);
  const comment = hash === -1 ? undefined : rest.slice(hash);

  // `target: deps ; recipe`: prerequisites stop at the semicolon
  const semi = head.indexOf(';');
  const dependencies = extractDependencies(semi === -1 ? head : head.slice(0, semi));

  if (comment === undefined || !comment.startsWith('##')) {
    return { kind: 'rule', name, dependencies, visibility: 'public' };
  }

  const { visibility, description } = splitVisibility(comment.slice(2).trim());
  return { kind: 'rule', name, dependencies, description, visibility };
}
