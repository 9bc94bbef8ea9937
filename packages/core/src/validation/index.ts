/**
 * Validation module: tribe split and row consistency checks.
 */

export { validateTribeSplit, validateRow } from './validate.js';
export type { TribeSplit, ValidationResult } from './validate.js';
