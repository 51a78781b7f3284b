export { evaluate, evaluateMany, selectCandidate, sortByRecency } from './selector.js';
export type { SelectOptions } from './selector.js';
export { evaluateImage, qualifyingLanguages } from './evaluator.js';
export { resolveCrop } from './crop.js';
export { parseProductContext, parseNutritionInsight } from './schema.js';
export type { ParsedProduct, SkippedRecord } from './schema.js';
export { buildImageRecord, findNutrientMentions, findNutrientPairs } from './mentions.js';
export * from './types.js';
