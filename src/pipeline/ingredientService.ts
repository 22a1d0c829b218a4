import { RecipeValidationError } from "../errors";
import { formatQuantity } from "./measurements";
import { Ingredient, Measurement, RawIngredientInput } from "./types";

export const DEFAULT_FILLER_UNIT = "unidad";
export const DEFAULT_MAX_NAME_LENGTH = 100;

type IngredientInput = {
  name: string;
  quantity?: number;
  unit?: string | null;
};

export type NormalizeIngredientsOptions = {
  defaultUnit?: string;
  maxNameLength?: number;
};

function toIngredientInput(raw: RawIngredientInput): IngredientInput {
  if ("nombre" in raw) {
    return { name: raw.nombre, quantity: raw.cantidad, unit: raw.unidad };
  }
  return { name: raw.name, quantity: raw.quantity, unit: raw.unit };
}

function roundQuantity(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

/**
 * Canonical ingredient list from Spanish- or English-keyed records. Names
 * that are empty or longer than `maxNameLength` are extraction noise and are
 * dropped.
 */
export function normalizeIngredients(
  raw: RawIngredientInput[],
  options: NormalizeIngredientsOptions = {},
): Ingredient[] {
  const defaultUnit = options.defaultUnit ?? DEFAULT_FILLER_UNIT;
  const maxNameLength = options.maxNameLength ?? DEFAULT_MAX_NAME_LENGTH;
  const ingredients: Ingredient[] = [];

  for (const entry of raw) {
    const input = toIngredientInput(entry);
    const name = input.name.replace(/\s+/g, " ").trim();
    if (!name || name.length > maxNameLength) {
      continue;
    }
    const quantity =
      typeof input.quantity === "number" && Number.isFinite(input.quantity) ? input.quantity : 1;
    const unit = (input.unit ?? "").trim().toLowerCase() || defaultUnit;
    ingredients.push({ name, quantity, unit });
  }

  return ingredients;
}

export function normalizeQuantity(quantity: number, unit: string): Measurement {
  const lowered = unit.toLowerCase();

  if (["ml", "milliliter", "milliliters"].includes(lowered)) {
    return quantity >= 1000
      ? { quantity: roundQuantity(quantity / 1000), unit: "l" }
      : { quantity: roundQuantity(quantity), unit: "ml" };
  }
  if (["l", "liter", "liters"].includes(lowered)) {
    return quantity < 1
      ? { quantity: roundQuantity(quantity * 1000), unit: "ml" }
      : { quantity: roundQuantity(quantity), unit: "l" };
  }
  if (["g", "gram", "grams"].includes(lowered)) {
    return quantity >= 1000
      ? { quantity: roundQuantity(quantity / 1000), unit: "kg" }
      : { quantity: roundQuantity(quantity), unit: "g" };
  }
  if (["kg", "kilogram", "kilograms"].includes(lowered)) {
    return quantity < 1
      ? { quantity: roundQuantity(quantity * 1000), unit: "g" }
      : { quantity: roundQuantity(quantity), unit: "kg" };
  }
  if (["pcs", "piece", "pieces"].includes(lowered)) {
    return { quantity: roundQuantity(quantity), unit: "pcs" };
  }

  return { quantity: roundQuantity(quantity), unit: lowered };
}

export function scaleIngredients(ingredients: Ingredient[], factor: number): Ingredient[] {
  if (!Number.isFinite(factor) || factor <= 0) {
    throw new RecipeValidationError("Scaling factor must be positive");
  }

  return ingredients.map((ingredient) => ({
    name: ingredient.name,
    ...normalizeQuantity(ingredient.quantity * factor, ingredient.unit),
  }));
}

/**
 * One entry per (case-insensitive name, unit) pair with the quantities
 * summed. The first spelling of a name wins and groups keep input order.
 */
export function mergeIngredients(ingredients: Ingredient[]): Ingredient[] {
  const groups = new Map<string, { name: string; unit: string; total: number }>();

  for (const ingredient of ingredients) {
    const key = `${ingredient.name.toLowerCase()}\u0000${ingredient.unit}`;
    const group = groups.get(key);
    if (group) {
      group.total += ingredient.quantity;
    } else {
      groups.set(key, { name: ingredient.name, unit: ingredient.unit, total: ingredient.quantity });
    }
  }

  return [...groups.values()].map((group) => ({
    name: group.name,
    ...normalizeQuantity(group.total, group.unit),
  }));
}

export function formatIngredient(ingredient: Ingredient): string {
  if (ingredient.quantity <= 0) {
    return ingredient.name;
  }
  return `${formatQuantity(ingredient.quantity)} ${ingredient.unit} ${ingredient.name}`;
}
