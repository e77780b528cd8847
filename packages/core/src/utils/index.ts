export { generateTxnId, resolveCollisions } from './txn-id.js';
export { normalizeDescription, descriptionTokens, leadingTokenKey } from './normalize.js';
export { parseAmount, formatAmount, displayAmount } from './amount.js';
export { parseDateText, inferDateOrder, formatIsoDate, buildUtcDate, isValidDate } from './date-parse.js';
export type { DateOrder } from './date-parse.js';
export { parseCsv, toCsv, stripBom } from './csv.js';
