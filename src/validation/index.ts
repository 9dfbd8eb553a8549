/**
 * Semantic validation
 */

export { Validator, validateNodes, MAX_NESTING_DEPTH } from './Validator.js';
export type { ValidatorOptions } from './Validator.js';
export { METRIC_UNITS } from './units.js';
