import { numericQuantity } from "numeric-quantity";
import ingredientUnits from "./data/ingredientUnits.json";
import { replaceUnicodeFractions } from "./normalize";
import { ParsedIngredientLine } from "./types";

const INGREDIENT_UNITS: Record<string, string> = ingredientUnits;

const FRACTION_GLYPHS = "½¼¾⅓⅔⅛⅜⅝⅞⅕⅖⅗⅘⅙⅚";

/** Placeholder unit for counted items ("2 huevos"). */
export const ITEM_UNIT = "u";

const NUMBER = `(?:\\d*\\s?[${FRACTION_GLYPHS}]|\\d+\\s+\\d+\\/\\d+|\\d*\\/\\d+|\\d+(?:[.,]\\d+)?)`;
const RANGE_TAIL = `(?:\\s*[-–]\\s*|\\s+(?:o|or|to)\\s+)\\d+(?:[.,\\/]\\d+)?`;
const QUANTITY_REGEX = new RegExp(`^(${NUMBER}(?:${RANGE_TAIL})?)\\s+(.*)$`, "i");
const LOOSE_QUANTITY_REGEX = new RegExp(`^([0-9${FRACTION_GLYPHS}/.\\s]+)\\s+(.*)$`);
const GLUED_UNIT_REGEX = /^(\d+(?:[.,]\d+)?)([a-záéíóúñ]+)\.?(?=\s|$)/i;

const LEADING_BULLETS = /^[-*•·\s]+/;
const LIST_MARKER = /^\d+[.)](?:\s+|$)/;
const STEP_MARKER = /^(?:\.|instrucciones?:|pasos?:|preparaci[oó]n:|steps?:|instructions?:)/i;
const LEADING_OPTIONAL = /^(?:opcional|optional)\b\s*[:-]?\s*/i;
const OPTIONAL_ASIDE = /^(?:opcional|optional)$/i;
const LEADING_ARTICLE = /^(?:de|la|el|los|las|un|una|unos|unas|of|the)\s+/i;
const TO_TASTE_PHRASES = ["al gusto", "to taste"];
const CONJUNCTION = /\s+(?:y|and)\s+/i;

function lookupUnit(token: string): string | undefined {
  const key = token.toLowerCase().replace(/\.$/, "");
  return Object.prototype.hasOwnProperty.call(INGREDIENT_UNITS, key)
    ? INGREDIENT_UNITS[key]
    : undefined;
}

/**
 * Converts the quantity token of an ingredient line. Ranges and alternatives
 * ("2-3", "2 o 3") keep their first value; anything unreadable is 0.
 */
export function quantityToFloat(token: string): number {
  const first = replaceUnicodeFractions(token.trim().toLowerCase())
    .split(/–|-|\bo\b|\bor\b|\bto\b/)[0]
    .trim()
    .replace(/^(\d+),(\d+)$/, "$1.$2");

  if (!first || /\/0+$/.test(first)) {
    return 0;
  }
  const value = numericQuantity(first, { round: false });
  return Number.isNaN(value) ? 0 : value;
}

function splitQuantity(text: string): { quantity: number; rest: string } {
  const match = text.match(QUANTITY_REGEX) ?? text.match(LOOSE_QUANTITY_REGEX);
  if (!match) {
    return { quantity: 0, rest: text };
  }
  return { quantity: quantityToFloat(match[1]), rest: match[2] };
}

function stripLeadingDe(text: string): string {
  return /^de\s/i.test(text) ? text.slice(3).trim() : text;
}

function cleanName(raw: string): string {
  let name = stripLeadingDe(raw.trim());
  for (const phrase of TO_TASTE_PHRASES) {
    if (name.toLowerCase().endsWith(phrase)) {
      name = name.slice(0, -phrase.length).trim();
    }
  }
  return name.replace(/[\s,;:-]+$/, "").replace(/\s+/g, " ").trim();
}

/**
 * Parses one ingredient line. Usually yields a single entry; "sal y
 * pimienta" yields one per conjunct and unusable lines yield none.
 */
export function parseIngredientLine(line: string): ParsedIngredientLine[] {
  let text = line.trim().replace(LEADING_BULLETS, "");
  const listed = text.match(LIST_MARKER);
  if (listed) {
    // "1) 200 g harina" is a numbered ingredient; "1. Mezclar todo" is a step.
    text = text.slice(listed[0].length);
    if (!QUANTITY_REGEX.test(text) && !GLUED_UNIT_REGEX.test(text)) {
      return [];
    }
  }
  if (!text || STEP_MARKER.test(text)) {
    return [];
  }

  const asides = [...text.matchAll(/\(([^)]*)\)/g)].map((match) => match[1].trim());
  let optional = asides.some((aside) => OPTIONAL_ASIDE.test(aside));
  text = text.replace(/\([^)]*\)/g, " ").replace(/\s+/g, " ").trim();

  if (LEADING_OPTIONAL.test(text)) {
    optional = true;
    text = text.replace(LEADING_OPTIONAL, "").trim();
  }

  const glued = text.match(GLUED_UNIT_REGEX);
  if (glued && lookupUnit(glued[2])) {
    text = `${glued[1]} ${text.slice(glued[1].length)}`;
  }

  const { quantity, rest } = splitQuantity(text);
  const remainder = stripLeadingDe(rest.trim());
  const tokens = remainder.split(/\s+/).filter(Boolean);
  const matchedUnit = tokens.length > 0 ? lookupUnit(tokens[0]) : undefined;

  const unit = matchedUnit ?? (quantity > 0 ? ITEM_UNIT : "");
  const name = cleanName(matchedUnit ? tokens.slice(1).join(" ") : remainder);

  return name
    .split(CONJUNCTION)
    .map((part) => part.trim().replace(LEADING_ARTICLE, "").trim())
    .filter(Boolean)
    .map((part) => ({ quantity, unit, name: part, optional }));
}

export function extractIngredients(block: string): ParsedIngredientLine[] {
  return block
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean)
    .flatMap((line) => parseIngredientLine(line));
}
