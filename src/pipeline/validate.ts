import Ajv, { ErrorObject } from "ajv";

import recipeSchema from "./data/recipe.schema.json";
import { Recipe, ValidationResult } from "./types";

function toJsonPathSegment(segment: string): string {
  if (/^\d+$/.test(segment)) {
    return `[${segment}]`;
  }
  if (/^[A-Za-z_$][A-Za-z0-9_$]*$/.test(segment)) {
    return `.${segment}`;
  }
  return `['${segment.replace(/'/g, "\\'")}']`;
}

function toJsonPath(instancePath: string, missingProperty?: string): string {
  const parts = instancePath
    .split("/")
    .filter(Boolean)
    .map((part) => part.replace(/~1/g, "/").replace(/~0/g, "~"));

  let jsonPath = "$";
  for (const part of parts) {
    jsonPath += toJsonPathSegment(part);
  }
  if (missingProperty) {
    jsonPath += toJsonPathSegment(missingProperty);
  }
  return jsonPath;
}

function formatAjvError(error: ErrorObject): string {
  const missing: unknown = error.params.missingProperty;
  const location = toJsonPath(error.instancePath, typeof missing === "string" ? missing : undefined);
  return `${location} ${error.message ?? "is invalid"}`.trim();
}

const validateSchema = new Ajv({ allErrors: true, strict: false }).compile(recipeSchema);

export function validateRecipe(recipe: Recipe): ValidationResult {
  if (validateSchema(recipe)) {
    return { ok: true, errors: [] };
  }
  return { ok: false, errors: (validateSchema.errors ?? []).map(formatAjvError) };
}
