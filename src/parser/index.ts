/**
 * makegate Parser — Public API
 */

export { parseFile, parseString, resolveRulesFile } from './parse-file.js';
export { parseLine, splitVisibility, extractDependencies } from './parse-line.js';
export type { ParsedLine } from './parse-line.js';
export { findTarget, documentedTargets, exposedTargets, hiddenTargets } from './rules.js';
