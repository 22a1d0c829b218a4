import { normalize } from "./normalize";
import { SectionName, Sections } from "./types";

const SECTION_KEYWORDS: Record<SectionName, string[]> = {
  ingredients: ["ingredientes", "ingrediente", "ingredients", "ingredient"],
  instructions: [
    "paso a paso",
    "pasos",
    "paso",
    "preparación",
    "preparacion",
    "elaboración",
    "elaboracion",
    "instrucciones",
    "instrucción",
    "instruccion",
    "instructions",
    "instruction",
    "steps",
    "step",
    "directions",
    "method",
    "método",
    "metodo",
  ],
  notes: [
    "notas",
    "nota",
    "notes",
    "note",
    "tips",
    "tip",
    "consejos",
    "consejo",
    "sugerencias",
    "sugerencia",
  ],
};

const SECTION_ORDER: SectionName[] = ["ingredients", "instructions", "notes"];

const MARKER_EDGES = /^[\s\-*=#]+|[\s\-*=#]+$/g;

function headerPattern(keywords: string[]): RegExp {
  const alternatives = keywords.join("|");
  // "Ingredientes", "Ingredientes (4 personas):", "Ingredientes para 4 personas".
  // A keyword followed by a colon and a value ("Preparación: 20 min") is content.
  return new RegExp(
    `^(?:${alternatives})(?=$|[\\s(:])(?:\\s*\\([^)]*\\))?(?:\\s+[^:().,;!?]{1,40})?\\s*:?$`,
    "i",
  );
}

const HEADER_PATTERNS: Array<[SectionName, RegExp]> = SECTION_ORDER.map((name) => [
  name,
  headerPattern(SECTION_KEYWORDS[name]),
]);

const NUMBERED_LINE = /^\d+[.)]/;
const BULLETED_LINE = /^[•\-*]/;
const NOTE_PREFIX = /^(?:nota|tip|consejo|sugerencia|note)s?:/i;

/** Section a header line opens, or undefined when the line is content. */
export function headerSection(line: string): SectionName | undefined {
  const bare = line.replace(MARKER_EDGES, "");
  if (!bare) {
    return undefined;
  }
  const match = HEADER_PATTERNS.find(([, pattern]) => pattern.test(bare));
  return match?.[0];
}

function emptySections(): Sections {
  return { ingredients: [], instructions: [], notes: [] };
}

function splitByHeaders(lines: string[]): { sections: Sections; sawHeader: boolean } {
  const sections = emptySections();
  let current: SectionName | undefined;
  let sawHeader = false;

  for (const line of lines) {
    const header = headerSection(line);
    if (header) {
      current = header;
      sawHeader = true;
      continue;
    }
    if (current && line) {
      sections[current].push(line);
    }
  }

  return { sections, sawHeader };
}

function splitByLayout(lines: string[]): Sections {
  const sections = emptySections();
  let current: SectionName = "ingredients";

  for (const line of lines) {
    if (!line) {
      continue;
    }
    if (NUMBERED_LINE.test(line) || BULLETED_LINE.test(line)) {
      current = "instructions";
    }
    if (NOTE_PREFIX.test(line)) {
      current = "notes";
    }
    sections[current].push(line);
  }

  return sections;
}

function dedupe(lines: string[]): string[] {
  return [...new Set(lines.filter(Boolean))];
}

/**
 * Splits recipe text into ingredient, instruction and note lines. Header
 * lines drive the split; text without any recognised header is split by
 * layout instead (numbered or bulleted lines start the instructions).
 */
export function segment(text: string): Sections {
  const lines = normalize(text).lines.map((line) => line.text.trim());
  const byHeaders = splitByHeaders(lines);
  const sections = byHeaders.sawHeader ? byHeaders.sections : splitByLayout(lines);

  return {
    ingredients: dedupe(sections.ingredients),
    instructions: dedupe(sections.instructions),
    notes: dedupe(sections.notes),
  };
}
