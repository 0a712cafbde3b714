/**
 * makegate — Catalog and gatekeeper.
 * Applies visibility and the allow-list to parsed targets and decides, per
 * name, whether a tool call may run it.
 */

import type { BuildRules, Catalog, CatalogGroup, Target, TargetCheck } from '../types/index.js';
import { exposedTargets, findTarget } from '../parser/index.js';

/** Deep-frozen copy, so later edits to the parse cannot reach the gate. */
function snapshot(rules: BuildRules): BuildRules {
  const targets = rules.targets.map(t => {
    const copy: Target = { ...t, dependencies: [...t.dependencies] };
    Object.freeze(copy.dependencies);
    return Object.freeze(copy);
  });
  const categories = [...rules.categories];
  const phony = [...rules.phony];
  Object.freeze(targets);
  Object.freeze(categories);
  Object.freeze(phony);
  return Object.freeze({ file: rules.file, targets, categories, phony });
}

/**
 * Build the exposed view of a parse. An empty allow-list admits every
 * documented public target.
 */
export function buildCatalog(rules: BuildRules, allowList: Iterable<string> = []): Catalog {
  const frozen = snapshot(rules);
  const allowed = new Set(allowList);
  const entries = exposedTargets(frozen).filter(t => allowed.size === 0 || allowed.has(t.name));
  return Object.freeze({
    file: frozen.file,
    rules: frozen,
    allowList: allowed,
    entries: Object.freeze(entries),
  });
}

/**
 * Classify a requested name: allowed, unknown, or known but filtered out.
 */
export function checkTarget(catalog: Catalog, name: string): TargetCheck {
  const target = findTarget(catalog.rules, name);
  if (!target) return { verdict: 'not_found' };
  if (target.description === undefined) return { verdict: 'not_allowed', target, reason: 'undocumented' };
  if (target.visibility !== 'public') return { verdict: 'not_allowed', target, reason: target.visibility };
  if (catalog.allowList.size > 0 && !catalog.allowList.has(name)) {
    return { verdict: 'not_allowed', target, reason: 'not_in_allow_list' };
  }
  return { verdict: 'allowed', target };
}

export function isAllowed(catalog: Catalog, name: string): boolean {
  return checkTarget(catalog, name).verdict === 'allowed';
}

/**
 * Exposed entries grouped by category in first-seen order; uncategorized
 * entries come last in a group without a category.
 */
export function listCatalog(catalog: Catalog): CatalogGroup[] {
  const groups = new Map<string, Target[]>();
  const uncategorized: Target[] = [];
  for (const target of catalog.entries) {
    if (target.category === undefined) {
      uncategorized.push(target);
      continue;
    }
    const group = groups.get(target.category);
    if (group) group.push(target);
    else groups.set(target.category, [target]);
  }

  const out: CatalogGroup[] = [...groups].map(([category, targets]) => ({ category, targets }));
  if (uncategorized.length > 0) out.push({ targets: uncategorized });
  return out;
}

// ─── Allow-list diagnostics ──────────────────────────────────────────

export interface AllowListCheck {
  /** Allow-listed names with no rule header at all */
  missing: string[];
  /** Allow-listed names that exist but are undocumented, @internal or @skip */
  hidden: string[];
  /** Names that end up exposed */
  exposed: string[];
}

export function checkAllowList(rules: BuildRules, allowList: Iterable<string>): AllowListCheck {
  const names = [...new Set(allowList)];
  const exposedNames = new Set(exposedTargets(rules).map(t => t.name));

  const missing: string[] = [];
  const hidden: string[] = [];
  const exposed: string[] = [];
  for (const name of names) {
    const target = findTarget(rules, name);
    if (!target) missing.push(name);
    else if (exposedNames.has(name)) exposed.push(name);
    else hidden.push(name);
  }
  return { missing: missing.sort(), hidden: hidden.sort(), exposed };
}
