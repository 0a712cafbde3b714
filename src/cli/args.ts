/**
 * makegate CLI — argument helpers for `run`.
 */

import { InvalidArgumentError } from 'commander';
import type { ExecutionResult } from '../types/index.js';

/** Exit status used for a run that hit its timeout, as timeout(1) does */
export const TIMEOUT_EXIT_CODE = 124;
/** Exit status for requests the gate turned away */
export const REJECTED_EXIT_CODE = 2;

/**
 * Commander reducer for repeated `--var KEY=VALUE`. The value may itself
 * contain `=`; only the first one splits.
 */
export function collectAssignment(raw: string, previous: Record<string, string>): Record<string, string> {
  const eq = raw.indexOf('=');
  if (eq <= 0) throw new InvalidArgumentError(`Expected KEY=VALUE, got "${raw}".`);
  return { ...previous, [raw.slice(0, eq)]: raw.slice(eq + 1) };
}

export function exitCodeFor(result: ExecutionResult): number {
  switch (result.status) {
    case 'succeeded':
      return 0;
    case 'timed_out':
      return TIMEOUT_EXIT_CODE;
    case 'not_found':
    case 'not_allowed':
      return REJECTED_EXIT_CODE;
    case 'failed':
      return result.exitCode === undefined || result.exitCode === 0 ? 1 : result.exitCode;
  }
}
