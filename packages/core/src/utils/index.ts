export { stripBom, decodeStatement, splitCsv, isBlankRow } from './csv.js';
export type { DecodedStatement } from './csv.js';
export { parseAmount, parseForeignAmount, parseCurrency, formatAmount } from './czech-number.js';
export { parseDate, parseDateValue, formatIsoDate, isValidDate } from './date-parse.js';
export type { DateFormatHint } from './date-parse.js';
export { normalizeHeader, foldCase } from './normalize.js';
export { hashContent, generateBatchId } from './hash.js';
