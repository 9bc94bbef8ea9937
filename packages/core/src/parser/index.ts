export { RAIFFEISEN_PROFILE } from './raiffeisen.js';
export { CREDITAS_PROFILE } from './creditas.js';
export { GENERIC_PROFILE } from './generic.js';
export { BANK_PROFILES, DETECTION_ORDER, getSupportedProfiles } from './profiles.js';
export { detectFormat, matchHeaderRow } from './detect.js';
export type { FormatDetection } from './detect.js';
export { buildColumnPlan, mapRow } from './map-row.js';
export type { ColumnPlan, MappedRow } from './map-row.js';
export type { BankProfile, ColumnMapping, ColumnTarget, DraftRow, FieldTransform } from './types.js';
