export { runImport, UNCATEGORIZED } from './run-import.js';
export type { ImportInput, ImportOutput } from './types.js';
