import { promises as fs } from "fs";
import type { Canvas, SKRSContext2D } from "@napi-rs/canvas";
import type { PageRasterizer } from "./ocr";

/** 200 dpi; PDF user space is 72 units per inch. */
export const DEFAULT_RASTER_SCALE = 200 / 72;

type CanvasAndContext = {
  canvas: Canvas;
  context: SKRSContext2D;
};

/**
 * pdf.js creates scratch canvases (image masks, patterns) through this
 * factory. Its own Node factory needs the `canvas` package, which is not
 * installed.
 */
function createCanvasFactory(createCanvas: typeof import("@napi-rs/canvas").createCanvas) {
  return {
    create(width: number, height: number): CanvasAndContext {
      const canvas = createCanvas(width, height);
      return { canvas, context: canvas.getContext("2d") };
    },
    reset(target: CanvasAndContext, width: number, height: number): void {
      target.canvas.width = width;
      target.canvas.height = height;
    },
    destroy(target: CanvasAndContext): void {
      target.canvas.width = 0;
      target.canvas.height = 0;
    },
  };
}

/**
 * Renders each PDF page to a PNG with pdf.js onto @napi-rs/canvas. Both
 * libraries load on first use.
 */
export function createPdfRasterizer(scale = DEFAULT_RASTER_SCALE): PageRasterizer {
  return {
    async rasterize(pdfPath) {
      const data = new Uint8Array(await fs.readFile(pdfPath));
      const { createCanvas, DOMMatrix, ImageData, Path2D } = await import("@napi-rs/canvas");
      // pdf.js expects the browser drawing globals.
      for (const [name, value] of Object.entries({ DOMMatrix, ImageData, Path2D })) {
        if (!(name in globalThis)) {
          Object.defineProperty(globalThis, name, { value, writable: true, configurable: true });
        }
      }
      const pdfjs = await import("pdfjs-dist");

      const params = {
        data,
        canvasFactory: createCanvasFactory(createCanvas),
        isEvalSupported: false,
      };
      const pdf = await pdfjs.getDocument(params).promise;

      const images: Buffer[] = [];
      try {
        for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
          const page = await pdf.getPage(pageNumber);
          const viewport = page.getViewport({ scale });
          const canvas = createCanvas(Math.ceil(viewport.width), Math.ceil(viewport.height));
          await page.render({ canvasContext: canvas.getContext("2d"), viewport }).promise;
          images.push(canvas.toBuffer("image/png"));
          page.cleanup();
        }
      } finally {
        await pdf.destroy();
      }
      return images;
    },
  };
}
