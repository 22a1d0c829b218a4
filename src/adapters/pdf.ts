import { promises as fs } from "fs";
import pdfParse from "pdf-parse";
import { AdapterOutput } from "../pipeline/types";
import { degraded, ReadOptions } from "./result";

/**
 * Embedded text of a PDF, pages separated by a blank line. pdf-parse renders
 * a page that fails as an empty string. A scanned PDF yields "" without a
 * failure; callers decide whether to try OCR.
 *
 * pdf-parse bundles pdf.js 1.10, which copies the input into a new Buffer and
 * then reads objects from that copy's backing ArrayBuffer at offset 0. Node
 * serves copies under 4 KiB from its shared pool, so files that small fail
 * with "bad XRef entry".
 */
export async function readPdf(inputPath: string, options: ReadOptions = {}): Promise<AdapterOutput> {
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(inputPath);
  } catch (error) {
    return degraded("pdf", inputPath, "unreadable file", error, options.logger);
  }

  try {
    const result = await pdfParse(buffer);
    return {
      kind: "pdf",
      text: result.text.trim(),
      meta: {
        sourcePath: inputPath,
      },
    };
  } catch (error) {
    return degraded("pdf", inputPath, "invalid PDF", error, options.logger);
  }
}
