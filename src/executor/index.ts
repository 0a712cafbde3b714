export {
  createExecutionEngine, parseMakeCommand,
  DEFAULT_TIMEOUT_SECONDS, RECOMMENDED_MAX_TIMEOUT_SECONDS, DEFAULT_MAKE_COMMAND,
} from './engine.js';
export type { EngineOptions, ExecutionEngine } from './engine.js';
export { runProcess, signalExitCode, DEFAULT_KILL_GRACE_MS } from './process.js';
export type { RunProcessOptions, ProcessOutcome } from './process.js';
