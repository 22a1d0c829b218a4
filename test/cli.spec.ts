import { afterEach, beforeEach, describe, it } from "node:test";
import assert from "node:assert/strict";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { convert, ingest, scale } from "../src/cli";
import { DEFAULT_CONFIG } from "../src/config";
import { UnrecognizedUnitError } from "../src/errors";
import { createLogger } from "../src/lib/logger";
import { CounterMetrics } from "../src/lib/metrics";
import type { Recipe } from "../src/pipeline";
import type { OcrEngine } from "../src/adapters";
import { blankPdf, PAN_TOSTADO, TORTILLA } from "./fixtures";

function captureLogger() {
  const stdoutMessages: string[] = [];
  const stderrMessages: string[] = [];
  const logger = createLogger("info", {
    log: (message: unknown) => stdoutMessages.push(String(message)),
    error: (message: unknown) => stderrMessages.push(String(message)),
  });
  return { logger, stdoutMessages, stderrMessages };
}

describe("cli ingest", () => {
  let tempDir: string;
  let previousExitCode: typeof process.exitCode;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "recipe-cli-"));
    previousExitCode = process.exitCode;
  });

  afterEach(async () => {
    process.exitCode = previousExitCode;
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("ingests a directory, skipping unreadable and unsupported files", async () => {
    const inputDir = path.join(tempDir, "in");
    const outDir = path.join(tempDir, "out");
    await fs.mkdir(inputDir);
    await fs.writeFile(path.join(inputDir, "tortilla.txt"), TORTILLA, "utf-8");
    await fs.writeFile(path.join(inputDir, "pan.txt"), PAN_TOSTADO, "utf-8");
    await fs.writeFile(path.join(inputDir, "basura.txt"), Buffer.from([0x41, 0, 0, 0, 0, 0x42]));
    await fs.writeFile(path.join(inputDir, "notas.xyz"), "Sin extensión conocida", "utf-8");
    const binaryPath = path.join(inputDir, "basura.txt");

    const { logger, stdoutMessages, stderrMessages } = captureLogger();
    const metrics = new CounterMetrics();

    const summary = await ingest([inputDir], outDir, { config: { ...DEFAULT_CONFIG }, logger, metrics });

    assert.deepEqual(summary, { filesFound: 3, failed: 1, emitted: 2 });
    assert.deepEqual(stderrMessages, [
      `Warning: Could not extract text from ${binaryPath} (binary content)`,
      `Warning: Skipped ${binaryPath}: binary content`,
      "Warning: Pan tostado: Missing ingredients",
    ]);
    assert.deepEqual(stdoutMessages, [
      "Files found: 3\nFailed: 1\nEmitted: 2",
      `Ingested 2 recipe(s) into ${outDir}.`,
    ]);
    assert.equal(metrics.get("files_processed"), 2);
    assert.equal(metrics.get("files_failed"), 1);
    assert.equal(process.exitCode, previousExitCode);

    const indexRaw = await fs.readFile(path.join(outDir, "index.json"), "utf-8");
    const indexPayload = JSON.parse(indexRaw) as Array<{ slug: string; path: string }>;
    assert.deepEqual(
      indexPayload.map((entry) => entry.slug),
      ["pan-tostado", "tortilla-de-patatas"],
    );

    const recipeRaw = await fs.readFile(path.join(outDir, indexPayload[1].path), "utf-8");
    const recipe = JSON.parse(recipeRaw) as Recipe;
    assert.equal(recipe.title, "Tortilla de patatas");
    assert.equal(recipe.ingredients.length, 3);
  });

  it("writes Markdown beside the JSON on request", async () => {
    const inputPath = path.join(tempDir, "tortilla.txt");
    const outDir = path.join(tempDir, "out");
    await fs.writeFile(inputPath, TORTILLA, "utf-8");

    await ingest([inputPath], outDir, {
      config: { ...DEFAULT_CONFIG },
      logger: captureLogger().logger,
      markdown: true,
    });

    const markdown = await fs.readFile(path.join(outDir, "recipes", "tortilla-de-patatas.md"), "utf-8");
    assert.equal(markdown.split("\n")[0], "# Tortilla de patatas");
    assert.ok(markdown.includes("\n## Ingredientes\n- 4 u huevos\n- 500 g patatas\n- Sal\n"));
  });

  it("rasterizes scanned PDFs for OCR without an injected rasterizer", async () => {
    const inputPath = path.join(tempDir, "escaneo.pdf");
    const outDir = path.join(tempDir, "out");
    await fs.writeFile(inputPath, blankPdf());
    const images: Buffer[] = [];
    const ocrEngine: OcrEngine = {
      recognize: async (image) => {
        images.push(image);
        return PAN_TOSTADO;
      },
    };
    const metrics = new CounterMetrics();

    const summary = await ingest([inputPath], outDir, {
      config: { ...DEFAULT_CONFIG },
      logger: captureLogger().logger,
      metrics,
      ocrEngine,
    });

    assert.deepEqual(summary, { filesFound: 1, failed: 0, emitted: 1 });
    assert.equal(images.length, 1);
    assert.equal(images[0].toString("latin1", 1, 4), "PNG");
    assert.equal(metrics.get("ocr_fallbacks"), 1);
  });

  it("prints a skip summary and fails when nothing is emitted", async () => {
    const missingPath = path.join(tempDir, "no-existe.txt");
    const outDir = path.join(tempDir, "out");
    const { logger, stdoutMessages } = captureLogger();

    const summary = await ingest([missingPath], outDir, { config: { ...DEFAULT_CONFIG }, logger });

    assert.deepEqual(summary, { filesFound: 0, failed: 1, emitted: 0 });
    assert.deepEqual(stdoutMessages.slice(-2), ["Skip summary:", "- missing input: 1"]);
    assert.equal(process.exitCode, 1);
  });
});

describe("cli scale", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "recipe-scale-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("scales and renormalises ingredient quantities", async () => {
    const inputPath = path.join(tempDir, "tortilla.txt");
    await fs.writeFile(inputPath, TORTILLA, "utf-8");
    const { logger, stdoutMessages } = captureLogger();

    const lines = await scale(inputPath, 2, { config: { ...DEFAULT_CONFIG }, logger });

    assert.deepEqual(lines, ["8 u huevos", "1 kg patatas", "Sal"]);
    assert.deepEqual(stdoutMessages, lines);
  });

  it("merges duplicate ingredients on request", async () => {
    const inputPath = path.join(tempDir, "masa.txt");
    await fs.writeFile(
      inputPath,
      ["Masa", "Ingredientes", "200 g harina", "300 g harina", "Pasos", "Amasar."].join("\n"),
      "utf-8",
    );

    const lines = await scale(inputPath, 1, {
      config: { ...DEFAULT_CONFIG },
      logger: captureLogger().logger,
      merge: true,
    });

    assert.deepEqual(lines, ["500 g harina"]);
  });
});

describe("cli convert", () => {
  it("prints the normalised measurement", () => {
    const { logger, stdoutMessages } = captureLogger();

    assert.equal(convert("2 1/3 cups", logger), "552.04 ml");
    assert.deepEqual(stdoutMessages, ["552.04 ml"]);
  });

  it("rejects unknown units", () => {
    const { logger } = captureLogger();

    assert.throws(() => convert("3 zorks", logger), UnrecognizedUnitError);
  });
});
