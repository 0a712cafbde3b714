/**
 * makegate — Core type definitions.
 * Shared by the parser, catalog, executor, output manager and MCP front door.
 */

// ─── Declarations ────────────────────────────────────────────────────

export type TargetVisibility = 'public' | 'internal' | 'skip';

export interface Target {
  name: string;
  /** Text after `##`. Undefined when the rule header carries no `##` comment. */
  description?: string;
  /** Label of the nearest preceding `Category:` header */
  category?: string;
  /** Prerequisites as written. Informational only; make resolves them. */
  dependencies: string[];
  visibility: TargetVisibility;
  /** Listed in a `.PHONY:` line */
  phony: boolean;
  /** 1-indexed line of the declaration currently describing this target */
  line: number;
}

export interface BuildRules {
  file: string;
  /** Every rule header, in first-occurrence order */
  targets: Target[];
  /** Category labels in first-seen order */
  categories: string[];
  phony: string[];
}

// ─── Catalog ─────────────────────────────────────────────────────────

export interface Catalog {
  readonly file: string;
  readonly rules: BuildRules;
  /** Empty means every public, documented target is allowed */
  readonly allowList: ReadonlySet<string>;
  readonly entries: readonly Target[];
}

export interface CatalogGroup {
  /** Undefined for the trailing group of uncategorized targets */
  category?: string;
  targets: Target[];
}

export type RejectionReason = 'undocumented' | 'internal' | 'skip' | 'not_in_allow_list';

export type TargetCheck =
  | { verdict: 'allowed'; target: Target }
  | { verdict: 'not_found' }
  | { verdict: 'not_allowed'; target: Target; reason: RejectionReason };

// ─── Execution ───────────────────────────────────────────────────────

export interface ExecutionRequest {
  target: string;
  /** Passed to make through the child's environment */
  variables?: Record<string, string>;
  timeoutSeconds?: number;
  /** Defaults to the directory holding the Makefile */
  cwd?: string;
}

export type ExecutionStatus = 'succeeded' | 'failed' | 'timed_out' | 'not_found' | 'not_allowed';

export interface ExecutionResult {
  readonly target: string;
  readonly status: ExecutionStatus;
  /** Only set when a process ran to completion */
  readonly exitCode?: number;
  /** Combined stdout/stderr, or a descriptive message when nothing ran */
  readonly output: string;
  readonly durationMs: number;
  /** ISO-8601 */
  readonly startedAt: string;
}

export type TerminalEventType = 'completed' | 'failed' | 'timed_out';

export type ExecutionEvent =
  | { type: 'started'; target: string; pid: number }
  | { type: 'output'; target: string; chunk: string }
  | { type: TerminalEventType; target: string; result: ExecutionResult };

export type ExecutionListener = (event: ExecutionEvent) => void;

export interface MakeCommand {
  file: string;
  /** Inserted before `-f <Makefile> <target>` */
  args: string[];
}

// ─── Output ──────────────────────────────────────────────────────────

export interface OutputArtifact {
  path: string;
}

export interface OutputSettings {
  /** 0 = unlimited */
  maxOutputChars: number;
  writeToFile: boolean;
}

export interface ProcessedOutput {
  text: string;
  artifact?: OutputArtifact;
  truncated: boolean;
  originalLength: number;
  /** Set when `writeToFile` was requested but the write failed */
  persistError?: string;
}

// ─── Configuration ───────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface MakegateConfig {
  makefile: string;
  allowedTargets: string[];
  logLevel: LogLevel;
  maxOutputChars: number;
  writeToFile: boolean;
  tempDir: string;
  defaultTimeoutSeconds: number;
  makeCommand: string;
}
