export type Line = { n: number; text: string };

export type NormalizedText = {
  fullText: string;
  lines: Line[];
};

export type SectionName = "ingredients" | "instructions" | "notes";

export type Sections = Record<SectionName, string[]>;

export type ParsedIngredientLine = {
  /** 0 means the line carried no quantity. */
  quantity: number;
  unit: string;
  name: string;
  optional: boolean;
};

export type Ingredient = {
  name: string;
  quantity: number;
  unit: string;
};

export type SpanishIngredientInput = {
  nombre: string;
  cantidad?: number;
  unidad?: string | null;
};

export type EnglishIngredientInput = {
  name: string;
  quantity?: number;
  unit?: string | null;
};

export type RawIngredientInput = SpanishIngredientInput | EnglishIngredientInput;

export type UnitCategory = "weight" | "volume" | "count" | "other";

export type Measurement = {
  quantity: number;
  unit: string;
};

export type RecipeType = "Breakfast" | "Lunch" | "Dinner" | "Dessert" | "Snack" | "Drink" | "Other";

export type RecipeMetadata = {
  title: string;
  url: string | null;
  servings: number | null;
  calories: number | null;
  type: RecipeType | null;
  tags: string[];
  made: boolean;
  date: string | null;
  difficulty: string | null;
  prepTimeMin: number | null;
  cookTimeMin: number | null;
  totalTimeMin: number | null;
  notes: string | null;
  sources: string[];
};

export type Recipe = {
  title: string;
  metadata: RecipeMetadata;
  ingredients: Ingredient[];
  instructions: string[];
  tags: string[];
};

export type ValidationResult = {
  ok: boolean;
  errors: string[];
};

export type SourceKind = "text" | "pdf" | "ocr" | "docx";

export type AdapterOutput = {
  kind: SourceKind;
  text: string;
  meta: {
    sourcePath: string;
    /** Set when extraction degraded to empty text. */
    failure?: string;
  };
};

export type ProcessResult =
  | { ok: true; recipe: Recipe; warnings: string[]; source: AdapterOutput }
  | { ok: false; reason: string; source?: AdapterOutput };
