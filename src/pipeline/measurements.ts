import { numericQuantity } from "numeric-quantity";
import { MeasurementError, UnrecognizedUnitError } from "../errors";
import { replaceUnicodeFractions } from "./normalize";
import { Measurement, UnitCategory } from "./types";

/** Multiplicative factors onto grams (weight) and millilitres (volume). */
const UNIT_CONVERSIONS: Record<UnitCategory, Record<string, number>> = {
  weight: {
    gram: 1,
    kilogram: 1000,
    ounce: 28.35,
    pound: 453.59,
  },
  volume: {
    milliliter: 1,
    liter: 1000,
    teaspoon: 4.93,
    tablespoon: 14.79,
    cup: 236.59,
    quart: 946.35,
    gallon: 3785.41,
  },
  count: {
    piece: 1,
    whole: 1,
    slice: 1,
    clove: 1,
  },
  other: {
    pinch: 1,
    "to taste": 1,
    "as needed": 1,
  },
};

const UNIT_ABBREVIATIONS: Record<string, string> = {
  g: "gram",
  gr: "gram",
  kg: "kilogram",
  oz: "ounce",
  lb: "pound",
  ml: "milliliter",
  l: "liter",
  tsp: "teaspoon",
  tbsp: "tablespoon",
  qt: "quart",
  gal: "gallon",
  pc: "piece",
  pcs: "piece",
  gramo: "gram",
  kilo: "kilogram",
  kilogramo: "kilogram",
  libra: "pound",
  onza: "ounce",
  mililitro: "milliliter",
  litro: "liter",
  taza: "cup",
  cucharada: "tablespoon",
  cda: "tablespoon",
  cucharadita: "teaspoon",
  cdta: "teaspoon",
  pieza: "piece",
  unidad: "piece",
  u: "piece",
  rebanada: "slice",
  diente: "clove",
  pizca: "pinch",
  unidades: "piece",
  "al gusto": "to taste",
};

const CATEGORIES: UnitCategory[] = ["weight", "volume", "count", "other"];

function hasOwn(table: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(table, key);
}

const RANGE_REGEX = /^(\d+(?:\.\d+)?)-(\d+(?:\.\d+)?)$/;
const MIXED_WITH_UNIT_REGEX = /^(\d+\s+\d+\/\d+)\s+(.+)$/;
const ZERO_DENOMINATOR = /\/0+$/;

const MAX_DENOMINATOR = 8;

function toNumber(token: string, source: string): number {
  if (ZERO_DENOMINATOR.test(token)) {
    throw new MeasurementError(`Invalid quantity format: ${source}`);
  }
  const value = numericQuantity(replaceUnicodeFractions(token), { round: false });
  if (Number.isNaN(value)) {
    throw new MeasurementError(`Invalid quantity format: ${source}`);
  }
  return value;
}

/**
 * Parses a standalone quantity. Ranges such as "3-4" average to 3.5.
 */
export function parseQuantity(input: string): number {
  const value = input.trim();

  const range = value.match(RANGE_REGEX);
  if (range) {
    return (toNumber(range[1], input) + toNumber(range[2], input)) / 2;
  }

  return toNumber(value, input);
}

export function normalizeUnit(input: string): { unit: string; category: UnitCategory } {
  const lowered = input.trim().toLowerCase();
  const singular = lowered.length > 1 && lowered.endsWith("s") ? lowered.slice(0, -1) : lowered;

  for (const candidate of [singular, lowered]) {
    const unit = hasOwn(UNIT_ABBREVIATIONS, candidate) ? UNIT_ABBREVIATIONS[candidate] : candidate;
    const category = CATEGORIES.find((name) => hasOwn(UNIT_CONVERSIONS[name], unit));
    if (category) {
      return { unit, category };
    }
  }

  throw new UnrecognizedUnitError(input);
}

/**
 * Converts "1 1/2 cups" style strings to a canonical quantity and unit.
 * Weights come back in grams and volumes in millilitres.
 */
export function normalizeMeasurement(measurement: string): Measurement {
  const trimmed = measurement.trim();
  if (!trimmed) {
    throw new MeasurementError("Empty measurement string");
  }

  let quantity: number;
  let unitText: string;

  const mixedWithUnit = trimmed.match(MIXED_WITH_UNIT_REGEX);
  if (mixedWithUnit) {
    quantity = toNumber(mixedWithUnit[1], trimmed);
    unitText = mixedWithUnit[2];
  } else {
    const [quantityText, ...rest] = trimmed.split(/\s+/);
    try {
      quantity = parseQuantity(quantityText);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new MeasurementError(`Invalid quantity in measurement: ${detail}`);
    }
    unitText = rest.join(" ");
  }

  if (!unitText) {
    return { quantity, unit: "" };
  }

  const { unit, category } = normalizeUnit(unitText);
  if (category === "weight") {
    return { quantity: quantity * UNIT_CONVERSIONS.weight[unit], unit: "g" };
  }
  if (category === "volume") {
    return { quantity: quantity * UNIT_CONVERSIONS.volume[unit], unit: "ml" };
  }
  return { quantity, unit };
}

type Fraction = { numerator: number; denominator: number };

/**
 * Closest fraction to `value` whose denominator does not exceed
 * `maxDenominator`, found through its continued-fraction expansion.
 */
export function limitDenominator(value: number, maxDenominator = MAX_DENOMINATOR): Fraction {
  let p0 = 0;
  let q0 = 1;
  let p1 = 1;
  let q1 = 0;
  let remainder = value;

  for (;;) {
    const whole = Math.floor(remainder);
    const q2 = q0 + whole * q1;
    if (q2 > maxDenominator) {
      break;
    }
    [p0, q0, p1, q1] = [p1, q1, p0 + whole * p1, q2];
    const fractional = remainder - whole;
    if (fractional < 1e-9) {
      return { numerator: p1, denominator: q1 };
    }
    remainder = 1 / fractional;
  }

  const k = Math.floor((maxDenominator - q0) / q1);
  const lower = { numerator: p0 + k * p1, denominator: q0 + k * q1 };
  const upper = { numerator: p1, denominator: q1 };
  const distance = (fraction: Fraction) =>
    Math.abs(fraction.numerator / fraction.denominator - value);
  return distance(upper) <= distance(lower) ? upper : lower;
}

/**
 * Renders a quantity as an integer or a fraction with a denominator of at
 * most 8: 2.5 -> "2 1/2", 0.333 -> "1/3".
 */
export function formatQuantity(value: number): string {
  if (Number.isInteger(value)) {
    return String(value);
  }
  if (!Number.isFinite(value) || value < 0) {
    return String(value);
  }

  const { numerator, denominator } = limitDenominator(value);
  if (denominator === 1) {
    return String(numerator);
  }
  if (numerator < denominator) {
    return `${numerator}/${denominator}`;
  }
  const whole = Math.floor(numerator / denominator);
  const rest = numerator % denominator;
  return rest === 0 ? String(whole) : `${whole} ${rest}/${denominator}`;
}

/** Inverse of normalizeMeasurement: 473.18 ml as "cup" reads "2 cup". */
export function denormalizeMeasurement(quantity: number, unit: string): string {
  if (!unit) {
    return String(quantity);
  }

  const normalized = normalizeUnit(unit);
  let value = quantity;
  if (normalized.category === "weight" || normalized.category === "volume") {
    value /= UNIT_CONVERSIONS[normalized.category][normalized.unit];
  }

  return `${formatQuantity(value)} ${normalized.unit}`;
}
