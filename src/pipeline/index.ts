export { normalize, cleanText, normalizeText, denormalizeText, removeAccents } from "./normalize";
export {
  normalizeMeasurement,
  denormalizeMeasurement,
  parseQuantity,
  normalizeUnit,
  formatQuantity,
} from "./measurements";
export { segment } from "./segment";
export { extractIngredients, parseIngredientLine, quantityToFloat } from "./ingredients";
export { extractMetadata, PLACEHOLDER_TITLE } from "./metadata";
export {
  normalizeIngredients,
  normalizeQuantity,
  scaleIngredients,
  mergeIngredients,
  formatIngredient,
} from "./ingredientService";
export { extractRecipe, mergeInstructionLines } from "./extract";
export type { ExtractDeps } from "./extract";
export { processFile } from "./process";
export type { ProcessDeps } from "./process";
export { validateRecipe } from "./validate";
export { emit, slugify } from "./emit";
export type { EmitOptions, IndexEntry } from "./emit";
export { renderMarkdown } from "./markdown";
export * from "./types";
