import Ajv, { JSONSchemaType } from "ajv";

import { ConfigError } from "./errors";
import { LOG_LEVELS, LogLevel } from "./lib/logger";

export type IngestConfig = {
  ocrLanguage: string;
  ocrLangPath?: string;
  defaultUnit: string;
  maxIngredientNameLength: number;
  logLevel: LogLevel;
};

const ENV_KEYS: Record<keyof IngestConfig, string> = {
  ocrLanguage: "RECIPE_OCR_LANG",
  ocrLangPath: "RECIPE_OCR_LANG_PATH",
  defaultUnit: "RECIPE_DEFAULT_UNIT",
  maxIngredientNameLength: "RECIPE_MAX_INGREDIENT_NAME",
  logLevel: "RECIPE_LOG_LEVEL",
};

const configSchema: JSONSchemaType<IngestConfig> = {
  type: "object",
  properties: {
    ocrLanguage: { type: "string", minLength: 1, default: "spa" },
    ocrLangPath: { type: "string", minLength: 1, nullable: true },
    defaultUnit: { type: "string", minLength: 1, default: "unidad" },
    maxIngredientNameLength: { type: "integer", minimum: 1, default: 100 },
    logLevel: { type: "string", enum: [...LOG_LEVELS], default: "info" },
  },
  required: ["ocrLanguage", "defaultUnit", "maxIngredientNameLength", "logLevel"],
  additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true, coerceTypes: true, useDefaults: true });
const validateConfig = ajv.compile(configSchema);

export const DEFAULT_CONFIG: Readonly<IngestConfig> = {
  ocrLanguage: "spa",
  defaultUnit: "unidad",
  maxIngredientNameLength: 100,
  logLevel: "info",
};

function isConfigField(field: string): field is keyof IngestConfig {
  return Object.prototype.hasOwnProperty.call(ENV_KEYS, field);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): IngestConfig {
  const candidate: Record<string, unknown> = {};
  for (const [field, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey]?.trim();
    if (value) {
      candidate[field] = value;
    }
  }

  if (validateConfig(candidate)) {
    return candidate;
  }

  const problems = (validateConfig.errors ?? []).map((error) => {
    const field = error.instancePath.replace(/^\//, "");
    const envKey = isConfigField(field) ? ENV_KEYS[field] : field || "config";
    return `${envKey} ${error.message ?? "is invalid"}`;
  });
  throw new ConfigError(problems);
}
