/**
 * Text rendering for tool descriptions and tool-call responses.
 */

import type { Target } from '../types/index.js';
import type { TargetRun } from './context.js';

/** `[Testing] Run tests (depends on: build, lint)` */
export function describeTarget(target: Target): string {
  let text = target.description ?? '';
  if (target.category) text = `[${target.category}] ${text}`;
  if (target.dependencies.length > 0) text += ` (depends on: ${target.dependencies.join(', ')})`;
  return text;
}

export function formatDuration(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

/**
 * Response text for one tool call. Rejected calls are reported as errors and
 * never carry an exit code, so nobody mistakes them for a run.
 */
export function formatRun({ result, output }: TargetRun): string {
  if (result.status === 'not_found' || result.status === 'not_allowed') {
    return `Error: ${result.output}`;
  }

  const lines = [`Target: ${result.target}`, `Status: ${result.status}`];
  if (result.exitCode !== undefined) lines.push(`Exit Code: ${result.exitCode}`);
  lines.push(`Duration: ${formatDuration(result.durationMs)}`);
  if (output?.artifact) lines.push(`Full output written to: ${output.artifact.path}`);
  if (output?.persistError) lines.push(`Note: could not write output file: ${output.persistError}`);

  const body = output ? output.text : result.output;
  return body ? `${lines.join('\n')}\n\n${body}` : lines.join('\n');
}
