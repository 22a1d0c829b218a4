#!/usr/bin/env node
import { promises as fs, Stats } from "fs";
import path from "path";
import { Command } from "commander";
import dotenv from "dotenv";

import {
  createExtractorRegistry,
  createPdfRasterizer,
  ExtractorRegistry,
  OcrEngine,
  PageRasterizer,
} from "./adapters";
import { IngestConfig, loadConfig } from "./config";
import { createLogger, Logger } from "./lib/logger";
import { CounterMetrics } from "./lib/metrics";
import {
  emit,
  formatIngredient,
  mergeIngredients,
  normalizeMeasurement,
  processFile,
  Recipe,
  scaleIngredients,
} from "./pipeline";

type Runtime = {
  config: IngestConfig;
  logger: Logger;
};

export type IngestOptions = Partial<Runtime> & {
  metrics?: CounterMetrics;
  registry?: ExtractorRegistry;
  ocrEngine?: OcrEngine;
  rasterizer?: PageRasterizer;
  /** Also write a Markdown rendering beside each recipe. */
  markdown?: boolean;
};

export type IngestSummary = {
  filesFound: number;
  failed: number;
  emitted: number;
};

function createRuntime(): Runtime {
  dotenv.config();
  const config = loadConfig();
  return { config, logger: createLogger(config.logLevel) };
}

async function collectInputs(
  inputs: string[],
  registry: ExtractorRegistry,
  logger: Logger,
): Promise<{ files: string[]; missing: string[] }> {
  const files: string[] = [];
  const missing: string[] = [];

  for (const input of inputs) {
    let stats: Stats;
    try {
      stats = await fs.stat(input);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      logger.error(`Cannot read ${input}: ${detail}`);
      missing.push(input);
      continue;
    }

    if (!stats.isDirectory()) {
      files.push(input);
      continue;
    }

    const entries = await fs.readdir(input, { withFileTypes: true });
    for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
      if (entry.isFile() && registry.supports(entry.name)) {
        files.push(path.join(input, entry.name));
      }
    }
  }

  return { files, missing };
}

export async function ingest(
  inputs: string[],
  outDir: string,
  options: IngestOptions = {},
): Promise<IngestSummary> {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createLogger(config.logLevel);
  const metrics = options.metrics ?? new CounterMetrics();
  const registry = options.registry ?? createExtractorRegistry();
  const rasterizer = options.rasterizer ?? createPdfRasterizer();

  const { files, missing } = await collectInputs(inputs, registry, logger);
  const recipes: Recipe[] = [];
  const skipReasons = new Map<string, number>();

  const recordSkip = (reason: string) => {
    skipReasons.set(reason, (skipReasons.get(reason) ?? 0) + 1);
  };

  if (missing.length > 0) {
    skipReasons.set("missing input", missing.length);
  }

  for (const file of files) {
    const result = await processFile(file, {
      logger,
      metrics,
      config,
      registry,
      engine: options.ocrEngine,
      rasterizer,
      language: config.ocrLanguage,
      langPath: config.ocrLangPath,
    });

    if (!result.ok) {
      logger.warn(`Skipped ${file}: ${result.reason}`);
      recordSkip(result.source?.text.trim() ? "no recipe found" : "no text extracted");
      continue;
    }

    for (const warning of result.warnings) {
      logger.warn(warning);
    }
    recipes.push(result.recipe);
  }

  await emit(recipes, outDir, { markdown: options.markdown });

  const summary: IngestSummary = {
    filesFound: files.length,
    failed: files.length - recipes.length + missing.length,
    emitted: recipes.length,
  };

  logger.info(
    [
      `Files found: ${summary.filesFound}`,
      `Failed: ${summary.failed}`,
      `Emitted: ${summary.emitted}`,
    ].join("\n"),
  );
  logger.info(`Ingested ${summary.emitted} recipe(s) into ${outDir}.`);
  logger.debug(`Metrics: ${JSON.stringify(metrics.snapshot())}`);

  if (summary.emitted === 0) {
    const sortedReasons = [...skipReasons.entries()].sort((a, b) => b[1] - a[1]);
    logger.info("Skip summary:");
    if (sortedReasons.length === 0) {
      logger.info("- No skip reasons recorded.");
    } else {
      for (const [reason, count] of sortedReasons) {
        logger.info(`- ${reason}: ${count}`);
      }
    }
    process.exitCode = 1;
  }

  return summary;
}

export async function scale(
  inputPath: string,
  factor: number,
  options: Partial<Runtime> & { merge?: boolean } = {},
): Promise<string[]> {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createLogger(config.logLevel);

  const result = await processFile(inputPath, {
    logger,
    config,
    rasterizer: createPdfRasterizer(),
    language: config.ocrLanguage,
    langPath: config.ocrLangPath,
  });
  if (!result.ok) {
    logger.error(`Cannot scale ${inputPath}: ${result.reason}`);
    process.exitCode = 1;
    return [];
  }

  const scaled = scaleIngredients(result.recipe.ingredients, factor);
  const lines = (options.merge ? mergeIngredients(scaled) : scaled).map(formatIngredient);
  for (const line of lines) {
    logger.info(line);
  }
  return lines;
}

export function convert(measurement: string, logger: Logger): string {
  const { quantity, unit } = normalizeMeasurement(measurement);
  const rounded = String(Math.round(quantity * 100) / 100);
  const rendered = unit ? `${rounded} ${unit}` : rounded;
  logger.info(rendered);
  return rendered;
}

const program = new Command();

if (require.main === module) {
  program.name("recipe-ingest").description("Extract structured recipes from text, PDF and image files");

  program
    .command("ingest")
    .argument("<inputs...>", "Files or directories to ingest")
    .requiredOption("--out <outDir>", "Output directory")
    .option("--markdown", "Also write a Markdown file per recipe")
    .action(async (inputs: string[], options: { out: string; markdown?: boolean }) => {
      await ingest(inputs, options.out, { ...createRuntime(), markdown: options.markdown });
    });

  program
    .command("scale")
    .argument("<input>", "Recipe file")
    .requiredOption("--factor <factor>", "Scaling factor")
    .option("--merge", "Merge duplicate ingredients after scaling")
    .action(async (input: string, options: { factor: string; merge?: boolean }) => {
      await scale(input, Number(options.factor), { ...createRuntime(), merge: options.merge });
    });

  program
    .command("convert")
    .argument("<measurement>", 'Measurement such as "1 1/2 cups"')
    .action((measurement: string) => {
      convert(measurement, createRuntime().logger);
    });

  program.parseAsync(process.argv).catch((error) => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
}
