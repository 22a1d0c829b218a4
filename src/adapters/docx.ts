import { promises as fs } from "fs";
import mammoth from "mammoth";
import { AdapterOutput } from "../pipeline/types";
import { degraded, ReadOptions } from "./result";

export async function readDocx(inputPath: string, options: ReadOptions = {}): Promise<AdapterOutput> {
  try {
    const buffer = await fs.readFile(inputPath);
    const result = await mammoth.extractRawText({ buffer });
    return {
      kind: "docx",
      text: result.value,
      meta: {
        sourcePath: inputPath,
      },
    };
  } catch (error) {
    return degraded("docx", inputPath, "unreadable document", error, options.logger);
  }
}
