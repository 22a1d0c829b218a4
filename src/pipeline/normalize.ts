import { Line, NormalizedText } from "./types";

const UNICODE_FRACTIONS: Record<string, string> = {
  "½": "1/2",
  "¼": "1/4",
  "¾": "3/4",
  "⅓": "1/3",
  "⅔": "2/3",
  "⅕": "1/5",
  "⅖": "2/5",
  "⅗": "3/5",
  "⅘": "4/5",
  "⅙": "1/6",
  "⅚": "5/6",
  "⅛": "1/8",
  "⅜": "3/8",
  "⅝": "5/8",
  "⅞": "7/8",
};

const SPECIAL_CHARACTERS: Array<[RegExp, string]> = [
  [/⁄/g, "/"],
  [/[–—]/g, "-"],
  [/…/g, "..."],
  [/[“”]/g, '"'],
  [/[‘’]/g, "'"],
];

const COOKING_ABBREVIATIONS: Record<string, string> = {
  tbsp: "tablespoon",
  tsp: "teaspoon",
  oz: "ounce",
  lb: "pound",
  qt: "quart",
  gal: "gallon",
  min: "minute",
  hr: "hour",
  temp: "temperature",
  approx: "approximately",
  "approx.": "approximately",
  appx: "approximately",
  "appx.": "approximately",
  "w/": "with",
  "w/o": "without",
  etc: "etcetera",
  "etc.": "etcetera",
  "i.e.": "that is",
  "e.g.": "for example",
  vs: "versus",
  "vs.": "versus",
};

// Words kept exactly as written; everything else is lowercased.
const COOKING_TERMS = new Set([
  "bechamel",
  "béchamel",
  "bouillon",
  "brunoise",
  "chiffonade",
  "confit",
  "consomme",
  "consommé",
  "coulis",
  "emulsify",
  "julienne",
  "mirepoix",
  "parboil",
  "poach",
  "puree",
  "purée",
  "roux",
  "sauté",
  "sautée",
  "sautéed",
  "simmer",
  "temper",
  "zest",
]);

export function normalize(input: string): NormalizedText {
  const normalized = input.replace(/\r\n?/g, "\n");
  const lines: Line[] = normalized.split("\n").map((text, index) => ({
    n: index + 1,
    text,
  }));

  return {
    fullText: normalized,
    lines,
  };
}

export function replaceUnicodeFractions(text: string): string {
  let result = text;
  for (const [glyph, ascii] of Object.entries(UNICODE_FRACTIONS)) {
    // "1½" reads as the mixed number "1 1/2"
    result = result.replace(new RegExp(`(\\d)${glyph}`, "g"), `$1 ${ascii}`);
    result = result.replaceAll(glyph, ascii);
  }
  return result;
}

export function removeAccents(text: string): string {
  return text.normalize("NFD").replace(/[\u0300-\u036f]/g, "");
}

/**
 * Canonical unicode, punctuation and spacing. Line structure is kept so the
 * result can still be segmented.
 */
export function cleanText(text: string): string {
  let result = replaceUnicodeFractions(text).normalize("NFKC");
  for (const [pattern, replacement] of SPECIAL_CHARACTERS) {
    result = result.replace(pattern, replacement);
  }

  return normalize(result)
    .lines.map((line) => line.text.replace(/[ \t\u00a0]+/g, " ").trim())
    .join("\n");
}

function expandAbbreviations(words: string[]): string[] {
  return words.map((word) => COOKING_ABBREVIATIONS[word.toLowerCase()] ?? word);
}

function preserveCookingTerms(words: string[]): string[] {
  return words.map((word) => {
    const bare = word.toLowerCase().replace(/[.,;:!?]+$/, "");
    return COOKING_TERMS.has(bare) ? word : word.toLowerCase();
  });
}

/** Full normalization used for free text such as instruction steps. */
export function normalizeText(text: string): string {
  if (!text) {
    return "";
  }

  const flattened = cleanText(text).replace(/°/g, " degrees ").replace(/\s+/g, " ").trim();
  if (!flattened) {
    return "";
  }

  return preserveCookingTerms(expandAbbreviations(flattened.split(" "))).join(" ");
}

function capitalizeFirst(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

export function denormalizeText(text: string): string {
  if (!text) {
    return "";
  }

  return text
    .split("\n")
    .map((line) => line.split(". ").map(capitalizeFirst).join(". "))
    .join("\n");
}
