export { resolveColumnMapping, COLUMN_KEYWORDS, HEADER_SIMILARITY_THRESHOLD } from './resolve.js';
