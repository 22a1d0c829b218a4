import { LoadOptions, loadInput, readOcr } from "../adapters";
import { silentLogger } from "../lib/logger";
import { noopMetrics } from "../lib/metrics";
import { ExtractDeps, extractRecipe } from "./extract";
import { ProcessResult } from "./types";
import { validateRecipe } from "./validate";

export type ProcessDeps = ExtractDeps & LoadOptions;

/**
 * Reads one file and turns it into a validated recipe. Failures come back as
 * `{ ok: false }` so a batch can count them and carry on.
 */
export async function processFile(inputPath: string, deps: ProcessDeps = {}): Promise<ProcessResult> {
  const logger = deps.logger ?? silentLogger;
  const metrics = deps.metrics ?? noopMetrics;
  const loadOptions = { ...deps, logger };

  let source = await loadInput(inputPath, loadOptions);
  if (source.kind === "pdf" && !source.meta.failure && !source.text) {
    logger.info(`${inputPath}: no embedded text, trying OCR`);
    metrics.increment("ocr_fallbacks");
    source = await readOcr(inputPath, loadOptions);
  }

  if (!source.text.trim()) {
    metrics.increment("files_failed");
    return { ok: false, reason: source.meta.failure ?? "no text extracted", source };
  }

  const recipe = extractRecipe(source.text, deps);
  const missingIngredients = recipe.ingredients.length === 0;
  const missingInstructions = recipe.instructions.length === 0;

  if (missingIngredients && missingInstructions) {
    metrics.increment("files_failed");
    return { ok: false, reason: `${recipe.title}: Missing ingredients and instructions`, source };
  }

  const warnings: string[] = [];
  if (missingIngredients) {
    warnings.push(`${recipe.title}: Missing ingredients`);
  }
  if (missingInstructions) {
    warnings.push(`${recipe.title}: Missing instructions`);
  }

  const validation = validateRecipe(recipe);
  if (!validation.ok) {
    metrics.increment("files_failed");
    return { ok: false, reason: `${recipe.title}: ${validation.errors.join("; ")}`, source };
  }

  metrics.increment("files_processed");
  return { ok: true, recipe, warnings, source };
}
