import { formatIngredient } from "./ingredientService";
import { Recipe, RecipeMetadata } from "./types";

function minutes(value: number): string {
  return `${value} minutos`;
}

function metadataLines(metadata: RecipeMetadata): string[] {
  const lines: string[] = [];
  if (metadata.url) {
    lines.push(`Fuente: [${metadata.url}](${metadata.url})`);
  }
  if (metadata.servings !== null) {
    lines.push(`Porciones: ${metadata.servings}`);
  }
  if (metadata.calories !== null) {
    lines.push(`Calorías: ${metadata.calories}`);
  }
  if (metadata.type) {
    lines.push(`Tipo: ${metadata.type}`);
  }
  if (metadata.tags.length > 0) {
    lines.push(`Etiquetas: ${metadata.tags.join(", ")}`);
  }
  lines.push(`Estado: ${metadata.made ? "Hecho" : "No hecho"}`);
  if (metadata.date) {
    lines.push(`Fecha: ${metadata.date}`);
  }
  if (metadata.difficulty) {
    lines.push(`Dificultad: ${metadata.difficulty}`);
  }
  if (metadata.prepTimeMin !== null) {
    lines.push(`Tiempo de preparación: ${minutes(metadata.prepTimeMin)}`);
  }
  if (metadata.cookTimeMin !== null) {
    lines.push(`Tiempo de cocción: ${minutes(metadata.cookTimeMin)}`);
  }
  if (metadata.totalTimeMin !== null) {
    lines.push(`Tiempo total: ${minutes(metadata.totalTimeMin)}`);
  }
  if (metadata.notes) {
    lines.push(`Notas: ${metadata.notes}`);
  }
  return lines;
}

/**
 * Markdown view of a recipe: title, a metadata list, the ingredients with
 * fractional quantities and numbered steps. Empty sections are left out.
 */
export function renderMarkdown(recipe: Recipe): string {
  const lines = [`# ${recipe.title}`, "", "## Metadatos"];
  lines.push(...metadataLines(recipe.metadata).map((line) => `- ${line}`), "");

  if (recipe.ingredients.length > 0) {
    lines.push("## Ingredientes");
    lines.push(...recipe.ingredients.map((ingredient) => `- ${formatIngredient(ingredient)}`), "");
  }

  if (recipe.instructions.length > 0) {
    lines.push("## Instrucciones");
    lines.push(...recipe.instructions.map((step, index) => `${index + 1}. ${step}`), "");
  }

  return lines.join("\n");
}
