/**
 * Errors raised at the edges (file loading, configuration, server startup).
 * The execution engine never throws these; its failures are result statuses.
 */

export class MakegateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class BuildRulesNotFoundError extends MakegateError {
  constructor(readonly path: string) {
    super(`Makefile not found: ${path}`);
  }
}

export class BuildRulesReadError extends MakegateError {
  constructor(readonly path: string, reason: string) {
    super(`Failed to read ${path}: ${reason}`);
  }
}

export class AllowListError extends MakegateError {
  constructor(readonly missing: string[], available: string[]) {
    super(
      `Allowed targets not found in Makefile: ${missing.join(', ')}. ` +
      `Available targets: ${available.length > 0 ? available.join(', ') : 'none'}`,
    );
  }
}

export class ConfigError extends MakegateError {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
  }
}

/** Narrow an unknown thrown value to an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/** The `code` of a Node system error (ENOENT, EACCES, ...), if any. */
export function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    const { code } = err;
    if (typeof code === 'string') return code;
  }
  return undefined;
}
