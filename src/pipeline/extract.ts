import { DEFAULT_CONFIG, IngestConfig } from "../config";
import { Logger, silentLogger } from "../lib/logger";
import { MetricsRecorder, noopMetrics } from "../lib/metrics";
import { extractIngredients } from "./ingredients";
import { normalizeIngredients } from "./ingredientService";
import { extractMetadata } from "./metadata";
import { cleanText } from "./normalize";
import { segment } from "./segment";
import { Recipe } from "./types";

export type ExtractDeps = {
  logger?: Logger;
  metrics?: MetricsRecorder;
  config?: Pick<IngestConfig, "defaultUnit" | "maxIngredientNameLength">;
};

const STEP_MARKER = /^(?:\d+[.)](?:\s+|$)|[-*•·]\s*|(?:paso|step)\s*\d+\s*[:.)-]?\s*)/i;
const TERMINAL_PUNCTUATION = /[.!?:;]$/;
const TITLE_PREFIX = /^(?:t[ií]tulo|title):\s*/i;

/**
 * Joins soft-wrapped lines into one string per step. A marker line
 * ("1.", "-", "Paso 2") always opens a step; any other line continues the
 * previous step when the block is numbered or the previous line has no
 * terminal punctuation.
 */
export function mergeInstructionLines(lines: string[]): string[] {
  const usesMarkers = lines.some((line) => STEP_MARKER.test(line));
  const steps: string[] = [];

  for (const line of lines) {
    const hasMarker = STEP_MARKER.test(line);
    const body = line.replace(STEP_MARKER, "").trim();
    if (!body) {
      continue;
    }

    const last = steps.length - 1;
    const continues =
      !hasMarker && last >= 0 && (usesMarkers || !TERMINAL_PUNCTUATION.test(steps[last]));
    if (continues) {
      steps[last] = `${steps[last]} ${body}`;
    } else {
      steps.push(body);
    }
  }

  return steps;
}

export function extractRecipe(text: string, deps: ExtractDeps = {}): Recipe {
  const logger = deps.logger ?? silentLogger;
  const metrics = deps.metrics ?? noopMetrics;
  const config = deps.config ?? DEFAULT_CONFIG;

  const cleaned = cleanText(text);
  const sections = segment(cleaned);
  const metadata = extractMetadata(cleaned);

  const ingredientBlock = sections.ingredients
    .filter((line) => line.replace(TITLE_PREFIX, "").trim() !== metadata.title)
    .join("\n");
  const parsed = extractIngredients(ingredientBlock);
  const ingredients = normalizeIngredients(parsed, {
    defaultUnit: config.defaultUnit,
    maxNameLength: config.maxIngredientNameLength,
  });
  if (ingredients.length < parsed.length) {
    logger.debug(
      `${metadata.title}: dropped ${parsed.length - ingredients.length} ingredient line(s) as noise`,
    );
  }

  const instructions = mergeInstructionLines(sections.instructions);
  const notes =
    metadata.notes ?? (sections.notes.length > 0 ? sections.notes.join("\n") : null);

  metrics.increment("recipes_extracted");
  metrics.increment("ingredients_parsed", ingredients.length);
  metrics.increment("instructions_parsed", instructions.length);

  return {
    title: metadata.title,
    metadata: { ...metadata, notes },
    ingredients,
    instructions,
    tags: metadata.tags,
  };
}
