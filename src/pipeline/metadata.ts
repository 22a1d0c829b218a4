import { removeAccents } from "./normalize";
import { RecipeMetadata, RecipeType } from "./types";

export const PLACEHOLDER_TITLE = "Receta generada";

type Rule<T> = {
  pattern: RegExp;
  read: (match: RegExpMatchArray) => T | undefined;
};

function firstMatch<T>(text: string, rules: Rule<T>[]): T | undefined {
  for (const { pattern, read } of rules) {
    const match = text.match(pattern);
    if (!match) {
      continue;
    }
    const value = read(match);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

function readInteger(raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const value = Number.parseInt(raw, 10);
  return Number.isSafeInteger(value) ? value : undefined;
}

const group =
  (index: number) =>
  (match: RegExpMatchArray): number | undefined =>
    readInteger(match[index]);

const TIME_UNIT = "(minutos?|minutes?|mins?|horas?|hours?|hrs?|h)";
// "2 horas 15 min", "1h30min" and "1h30"
const TIME_VALUE = `(\\d+)\\s*${TIME_UNIT}(?:\\b|(?=\\d))(?:\\s*(\\d+)\\s*(?:minutos?|minutes?|mins?|m)\\b|(?<=h)(\\d+)\\b)?`;

function readMinutes(match: RegExpMatchArray): number | undefined {
  const amount = readInteger(match[1]);
  if (amount === undefined) {
    return undefined;
  }
  const isHours = /^h/i.test(match[2] ?? "");
  const extra = readInteger(match[3] ?? match[4]) ?? 0;
  return isHours ? amount * 60 + extra : amount;
}

function timeRules(labels: string[]): Rule<number>[] {
  return labels.map((label) => ({
    pattern: new RegExp(`\\b${label}:\\s*${TIME_VALUE}`, "i"),
    read: readMinutes,
  }));
}

const URL_RULES: Rule<string>[] = [
  { pattern: /\b(?:url|fuente|source):\s*(https?:\/\/\S+)/i, read: (match) => match[1] },
  { pattern: /https?:\/\/\S+/, read: (match) => match[0] },
];

const SERVINGS_RULES: Rule<number>[] = [
  { pattern: /\b(?:porciones|raciones|serves?|servings|rinde|yield):?\s*(\d+)/i, read: group(1) },
  {
    pattern: /\bpara\s+(\d+)\s+(?:personas|porciones|raciones|servings|people)\b/i,
    read: group(1),
  },
  { pattern: /\b(\d+)\s+(?:porciones|raciones|personas|servings)\b/i, read: group(1) },
];

const CALORIE_RULES: Rule<number>[] = [
  { pattern: /\bcalor(?:[ií]as?|ies):?\s*(\d+)/i, read: group(1) },
  { pattern: /\b(\d+)\s*calor(?:[ií]as?|ies)/i, read: group(1) },
  { pattern: /\bkcal:?\s*(\d+)/i, read: group(1) },
  { pattern: /\b(\d+)\s*kcal\b/i, read: group(1) },
];

const RECIPE_TYPES: Record<string, RecipeType> = {
  desayuno: "Breakfast",
  breakfast: "Breakfast",
  almuerzo: "Lunch",
  comida: "Lunch",
  lunch: "Lunch",
  cena: "Dinner",
  dinner: "Dinner",
  postre: "Dessert",
  dessert: "Dessert",
  snack: "Snack",
  merienda: "Snack",
  aperitivo: "Snack",
  bebida: "Drink",
  drink: "Drink",
  otro: "Other",
  other: "Other",
};

/** Unrecognised names collapse to "Other". */
export function toRecipeType(raw: string): RecipeType {
  const key = removeAccents(raw.trim().toLowerCase());
  return Object.prototype.hasOwnProperty.call(RECIPE_TYPES, key) ? RECIPE_TYPES[key] : "Other";
}

const TYPE_RULES: Rule<RecipeType>[] = [
  {
    pattern: /\b(?:tipo(?: de comida)?|categor[ií]a|type|category|course):[ \t]*(.+)/i,
    read: (match) => (match[1].trim() ? toRecipeType(match[1]) : undefined),
  },
];

function splitTags(raw: string): string[] {
  return raw
    .split(",")
    .map((tag) => tag.trim().toLowerCase())
    .filter(Boolean);
}

const TAG_RULES: Rule<string[]>[] = [
  {
    pattern: /\b(?:tags|etiquetas|palabras clave|keywords):[ \t]*(.+)/i,
    read: (match) => splitTags(match[1]),
  },
];

const MADE_RULES: Rule<boolean>[] = [
  { pattern: /\b(?:hecho|made):\s*(?:s[ií]|yes|true|x|1)(?![A-Za-z0-9])/i, read: () => true },
  {
    pattern: /\b(?:estado|status):\s*(?:completado|hecho|done|completed)(?![A-Za-z0-9])/i,
    read: () => true,
  },
  { pattern: /✓\s*(?:hecho|completado|done)/i, read: () => true },
];

const DATE_RULES: Rule<string>[] = [
  { pattern: /\b(?:date|fecha):\s*(\d{4}-\d{2}-\d{2})/i, read: (match) => match[1] },
  {
    pattern: /\b(?:date|fecha):\s*(\d{2})\/(\d{2})\/(\d{4})/i,
    read: (match) => `${match[3]}-${match[2]}-${match[1]}`,
  },
];

const DIFFICULTY_RULES: Rule<string>[] = [
  {
    pattern: /\b(?:dificultad|nivel|difficulty):[ \t]*(.+)/i,
    read: (match) => match[1].trim().toLowerCase() || undefined,
  },
];

const PREP_TIME_RULES = timeRules([
  "tiempo de preparaci[oó]n",
  "prep(?:aration)? time",
  "preparaci[oó]n",
]);
const COOK_TIME_RULES = timeRules(["tiempo de cocci[oó]n", "cook(?:ing)? time", "cocci[oó]n"]);
const TOTAL_TIME_RULES = timeRules(["tiempo total", "total time", "tiempo"]);

const NOTES_RULES: Rule<string>[] = ["notas", "notes", "consejos"].map((label) => ({
  pattern: new RegExp(`\\b${label}:\\s*([\\s\\S]+?)(?:\\n\\s*\\n|$)`, "i"),
  read: (match: RegExpMatchArray) => match[1].trim() || undefined,
}));

const SOURCE_LINE = /^[ \t]*(?:fuentes?|sources?|origen|adapted from|adaptado de):[ \t]*(.+)$/gim;
const BRACKETED_SOURCE = /\[(?:source|fuente)[^\]]*\][ \t]*(.+)/gi;

function extractSources(text: string): string[] {
  const found = [...text.matchAll(SOURCE_LINE), ...text.matchAll(BRACKETED_SOURCE)]
    .map((match) => match[1].trim())
    .filter(Boolean);
  return [...new Set(found)];
}

function extractTitle(text: string): string {
  const lines = text.split("\n").map((line) => line.trim());
  for (const line of lines.slice(0, 5)) {
    const title = line.replace(/^(?:t[ií]tulo|title):\s*/i, "").trim();
    if (title) {
      return title;
    }
  }
  return lines.find(Boolean) ?? PLACEHOLDER_TITLE;
}

function positiveOrNull(value: number | undefined): number | null {
  return value !== undefined && value > 0 ? value : null;
}

/**
 * Reads recipe metadata out of free text. Every field is present in the
 * result; fields that were not found are null (or empty, or false).
 */
export function extractMetadata(text: string): RecipeMetadata {
  const prepTimeMin = firstMatch(text, PREP_TIME_RULES) ?? null;
  const cookTimeMin = firstMatch(text, COOK_TIME_RULES) ?? null;
  let totalTimeMin = firstMatch(text, TOTAL_TIME_RULES) ?? null;
  if (totalTimeMin === null) {
    const prep = prepTimeMin ?? 0;
    const cook = cookTimeMin ?? 0;
    if (prep > 0 || cook > 0) {
      totalTimeMin = prep + cook;
    }
  }

  return {
    title: extractTitle(text) || PLACEHOLDER_TITLE,
    url: firstMatch(text, URL_RULES) ?? null,
    servings: positiveOrNull(firstMatch(text, SERVINGS_RULES)),
    calories: positiveOrNull(firstMatch(text, CALORIE_RULES)),
    type: firstMatch(text, TYPE_RULES) ?? null,
    tags: [...new Set(firstMatch(text, TAG_RULES) ?? [])],
    made: firstMatch(text, MADE_RULES) ?? false,
    date: firstMatch(text, DATE_RULES) ?? null,
    difficulty: firstMatch(text, DIFFICULTY_RULES) ?? null,
    prepTimeMin,
    cookTimeMin,
    totalTimeMin,
    notes: firstMatch(text, NOTES_RULES) ?? null,
    sources: extractSources(text),
  };
}
