import { fileURLToPath } from "node:url";
import { z } from "zod";

import type { ScoreModel, ScoreOptions } from "./core/scoreModel.js";
import type { LogFormat, LogLevel } from "./logging/logger.js";

export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL("../data/catalog.json", import.meta.url));

const optionalWeight = z.coerce.number().finite().optional();

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  NODE_ENV: z.string().optional(),
  LOG_LEVEL: z
    .string()
    .transform((s) => s.toLowerCase())
    .pipe(z.enum(["debug", "info", "warn", "error", "fatal"]))
    .default("info"),
  LOG_FORMAT: z
    .string()
    .transform((s) => s.toLowerCase())
    .pipe(z.enum(["json", "pretty"]))
    .optional(),
  CATALOG_PATH: z.string().min(1).default(DEFAULT_CATALOG_PATH),
  MAX_RESULTS: z.coerce.number().int().min(0).max(1000).default(200),
  FUZZY_ADJACENCY_BONUS: optionalWeight,
  FUZZY_CAMEL_BONUS: optionalWeight,
  FUZZY_SEPARATOR_BONUS: optionalWeight,
  FUZZY_LEADING_LETTER_PENALTY: optionalWeight,
  FUZZY_MAX_LEADING_LETTER_PENALTY: optionalWeight,
  FUZZY_UNMATCHED_LETTER_PENALTY: optionalWeight,
});

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  logFormat: LogFormat;
  catalogPath: string;
  maxResults: number;
  scoring: ScoreOptions;
}

export class ConfigError extends Error {
  override readonly name = "ConfigError";

  constructor(readonly issues: Array<{ variable: string; message: string }>) {
    super(`invalid environment: ${issues.map((i) => `${i.variable}: ${i.message}`).join("; ")}`);
  }
}

/** Parses the process environment. Empty strings count as unset. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") present[key] = value;
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => ({ variable: issue.path.join("."), message: issue.message })),
    );
  }

  const e = parsed.data;
  const scoring: { -readonly [K in keyof ScoreModel]?: ScoreModel[K] } = {};
  if (e.FUZZY_ADJACENCY_BONUS !== undefined) scoring.adjacencyBonus = e.FUZZY_ADJACENCY_BONUS;
  if (e.FUZZY_CAMEL_BONUS !== undefined) scoring.camelBonus = e.FUZZY_CAMEL_BONUS;
  if (e.FUZZY_SEPARATOR_BONUS !== undefined) scoring.separatorBonus = e.FUZZY_SEPARATOR_BONUS;
  if (e.FUZZY_LEADING_LETTER_PENALTY !== undefined) scoring.leadingLetterPenalty = e.FUZZY_LEADING_LETTER_PENALTY;
  if (e.FUZZY_MAX_LEADING_LETTER_PENALTY !== undefined) scoring.maxLeadingLetterPenalty = e.FUZZY_MAX_LEADING_LETTER_PENALTY;
  if (e.FUZZY_UNMATCHED_LETTER_PENALTY !== undefined) scoring.unmatchedLetterPenalty = e.FUZZY_UNMATCHED_LETTER_PENALTY;

  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    logFormat: e.LOG_FORMAT ?? (e.NODE_ENV === "production" ? "json" : "pretty"),
    catalogPath: e.CATALOG_PATH,
    maxResults: e.MAX_RESULTS,
    scoring,
  };
}
