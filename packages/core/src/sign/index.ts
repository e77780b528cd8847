/**
 * Sign module: debit/credit polarity detection and correction.
 */

export { detectSourceSign } from './detect.js';
export { inferSignConvention, applySignConvention, normalizeSigns } from './normalize.js';
export type { SignNormalizationOptions, SignNormalizationResult } from './normalize.js';
