import { z } from "zod";

import { ConfigurationError } from "../errors.js";
import { DEFAULT_SCORE_MODEL, type ScoreModel, type ScoreOptions } from "../scoreModel.js";

const weight = z.number({ invalid_type_error: "must be a number" }).finite("must be finite");

const scoreModelSchema = z
  .object({
    adjacencyBonus: weight,
    camelBonus: weight,
    separatorBonus: weight,
    leadingLetterPenalty: weight,
    maxLeadingLetterPenalty: weight,
    unmatchedLetterPenalty: weight,
  })
  .strict()
  .refine((m) => m.maxLeadingLetterPenalty <= m.leadingLetterPenalty, {
    path: ["maxLeadingLetterPenalty"],
    message: "must be less than or equal to leadingLetterPenalty",
  });

/**
 * Merges `options` over the defaults and validates the result.
 * Throws ConfigurationError; invalid weights are never corrected.
 */
export function createScoreModel(options: ScoreOptions = {}): ScoreModel {
  const merged: Record<string, unknown> = { ...DEFAULT_SCORE_MODEL };
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) merged[key] = value;
  }

  const parsed = scoreModelSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => ({
        path: issue.path.length ? issue.path.join(".") : "$",
        message: issue.message,
      })),
    );
  }
  return Object.freeze(parsed.data);
}
