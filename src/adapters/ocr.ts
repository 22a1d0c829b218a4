import { promises as fs } from "fs";
import path from "path";
import { silentLogger } from "../lib/logger";
import { AdapterOutput } from "../pipeline/types";
import { createPdfRasterizer } from "./rasterize";
import { degraded, ReadOptions } from "./result";

export const DEFAULT_OCR_LANGUAGE = "spa";

export interface OcrEngine {
  recognize(image: Buffer, language: string): Promise<string>;
}

/** Renders every page of a PDF to an image buffer. */
export interface PageRasterizer {
  rasterize(pdfPath: string): Promise<Buffer[]>;
}

export type OcrOptions = ReadOptions & {
  engine?: OcrEngine;
  rasterizer?: PageRasterizer;
  language?: string;
  langPath?: string;
};

/** Model directory inside the @tesseract.js-data packages. */
const TRAINED_DATA_DIR = "4.0.0_best_int";

/**
 * Trained data directory of an installed `@tesseract.js-data/<language>`
 * package. Throws when the package is missing, so tesseract.js never falls
 * back to downloading the model.
 */
export function bundledLangPath(language: string): string {
  if (language.includes("+")) {
    throw new Error(`combined languages (${language}) need RECIPE_OCR_LANG_PATH`);
  }
  let manifest: string;
  try {
    manifest = require.resolve(`@tesseract.js-data/${language}/package.json`);
  } catch (error) {
    throw new Error(`no trained data for "${language}"; install @tesseract.js-data/${language}`, {
      cause: error,
    });
  }
  return path.join(path.dirname(manifest), TRAINED_DATA_DIR);
}

/**
 * tesseract.js engine. A worker is created per image and always terminated.
 * Trained data comes from `langPath` when set, else from the language's
 * @tesseract.js-data package.
 */
export function createTesseractEngine(langPath?: string): OcrEngine {
  return {
    async recognize(image, language) {
      const dataPath = langPath ?? bundledLangPath(language);
      const { createWorker } = await import("tesseract.js");
      const worker = await createWorker(language, undefined, { langPath: dataPath, cacheMethod: "none" });

      try {
        const { data } = await worker.recognize(image);
        return data.text;
      } finally {
        await worker.terminate();
      }
    },
  };
}

async function loadImages(inputPath: string, rasterizer: PageRasterizer): Promise<Buffer[]> {
  if (path.extname(inputPath).toLowerCase() !== ".pdf") {
    return [await fs.readFile(inputPath)];
  }
  return rasterizer.rasterize(inputPath);
}

export async function readOcr(inputPath: string, options: OcrOptions = {}): Promise<AdapterOutput> {
  const logger = options.logger ?? silentLogger;
  const language = options.language ?? DEFAULT_OCR_LANGUAGE;
  const engine = options.engine ?? createTesseractEngine(options.langPath);

  let images: Buffer[];
  try {
    images = await loadImages(inputPath, options.rasterizer ?? createPdfRasterizer());
  } catch (error) {
    return degraded("ocr", inputPath, "could not load images", error, logger);
  }

  const blocks: string[] = [];
  for (const [index, image] of images.entries()) {
    try {
      const text = (await engine.recognize(image, language)).trim();
      if (text) {
        blocks.push(text);
      }
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      logger.warn(`OCR failed for image ${index + 1} of ${inputPath}: ${detail}`);
    }
  }

  if (blocks.length === 0) {
    return degraded("ocr", inputPath, "no text recognised", undefined, logger);
  }

  return {
    kind: "ocr",
    text: blocks.join("\n\n"),
    meta: {
      sourcePath: inputPath,
    },
  };
}
