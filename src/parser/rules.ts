/**
 * Queries over a parsed BuildRules.
 */

import type { BuildRules, Target } from '../types/index.js';

export function findTarget(rules: BuildRules, name: string): Target | undefined {
  return rules.targets.find(t => t.name === name);
}

/** Targets with a `##` description, whatever their visibility. */
export function documentedTargets(rules: BuildRules): Target[] {
  return rules.targets.filter(t => t.description !== undefined);
}

/** Documented public targets: the ones eligible for exposure. */
export function exposedTargets(rules: BuildRules): Target[] {
  return documentedTargets(rules).filter(t => t.visibility === 'public');
}

/** Documented targets marked `@internal` or `@skip`. */
export function hiddenTargets(rules: BuildRules): Target[] {
  return documentedTargets(rules).filter(t => t.visibility !== 'public');
}
