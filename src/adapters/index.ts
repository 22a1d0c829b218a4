import path from "path";
import { readTxt } from "./txt";
import { readDocx } from "./docx";
import { readPdf } from "./pdf";
import { OcrOptions, readOcr } from "./ocr";
import { AdapterOutput, SourceKind } from "../pipeline/types";

export { readTxt, looksBinary, sniffBom } from "./txt";
export { readDocx } from "./docx";
export { readPdf } from "./pdf";
export { readOcr, createTesseractEngine, bundledLangPath, DEFAULT_OCR_LANGUAGE } from "./ocr";
export { createPdfRasterizer, DEFAULT_RASTER_SCALE } from "./rasterize";
export type { OcrEngine, OcrOptions, PageRasterizer } from "./ocr";
export type { ReadOptions } from "./result";

const DEFAULT_EXTENSIONS: Record<SourceKind, string[]> = {
  text: [".txt", ".text", ".md", ".markdown", ".rst", ".log", ".csv", ".json", ".xml", ".html", ".htm"],
  pdf: [".pdf"],
  ocr: [".jpg", ".jpeg", ".png", ".bmp", ".tiff", ".tif", ".gif", ".webp"],
  docx: [".docx"],
};

const SOURCE_KINDS: SourceKind[] = ["text", "pdf", "ocr", "docx"];

export interface ExtractorRegistry {
  register(extension: string, kind: SourceKind): void;
  /** Unknown extensions read as text. */
  kindFor(inputPath: string): SourceKind;
  supports(inputPath: string): boolean;
  supportedExtensions(): string[];
}

function normalizeExtension(extension: string): string {
  const lowered = extension.trim().toLowerCase();
  return lowered.startsWith(".") ? lowered : `.${lowered}`;
}

export function createExtractorRegistry(): ExtractorRegistry {
  const kinds = new Map<string, SourceKind>();
  for (const kind of SOURCE_KINDS) {
    for (const extension of DEFAULT_EXTENSIONS[kind]) {
      kinds.set(extension, kind);
    }
  }

  return {
    register(extension, kind) {
      kinds.set(normalizeExtension(extension), kind);
    },
    kindFor(inputPath) {
      return kinds.get(path.extname(inputPath).toLowerCase()) ?? "text";
    },
    supports(inputPath) {
      return kinds.has(path.extname(inputPath).toLowerCase());
    },
    supportedExtensions() {
      return [...kinds.keys()].sort();
    },
  };
}

export type LoadOptions = OcrOptions & {
  registry?: ExtractorRegistry;
};

export async function loadInput(inputPath: string, options: LoadOptions = {}): Promise<AdapterOutput> {
  const registry = options.registry ?? createExtractorRegistry();

  switch (registry.kindFor(inputPath)) {
    case "pdf":
      return readPdf(inputPath, options);
    case "ocr":
      return readOcr(inputPath, options);
    case "docx":
      return readDocx(inputPath, options);
    case "text":
      return readTxt(inputPath, options);
  }
}
