export { createOutputSession, processOutput, writeArtifact, truncationNote } from './output.js';
export type { OutputSession } from './output.js';
