import { describe, expect, it } from "vitest";
import { ConfigurationError, DEFAULT_SCORE_MODEL, createScoreModel, type ScoreOptions } from "../../index.js";

describe("createScoreModel", () => {
  it("returns the defaults when given nothing", () => {
    expect(createScoreModel()).toEqual({
      adjacencyBonus: 5,
      camelBonus: 10,
      separatorBonus: 10,
      leadingLetterPenalty: -3,
      maxLeadingLetterPenalty: -9,
      unmatchedLetterPenalty: -1,
    });
  });

  it("merges overrides and freezes the result", () => {
    const model = createScoreModel({ separatorBonus: 15, maxLeadingLetterPenalty: -6, camelBonus: undefined });
    expect(model.separatorBonus).toBe(15);
    expect(model.maxLeadingLetterPenalty).toBe(-6);
    expect(model.camelBonus).toBe(DEFAULT_SCORE_MODEL.camelBonus);
    expect(Object.isFrozen(model)).toBe(true);
  });

  it("accepts a cap equal to a single leading penalty", () => {
    expect(createScoreModel({ leadingLetterPenalty: -3, maxLeadingLetterPenalty: -3 }).maxLeadingLetterPenalty).toBe(-3);
  });

  it("rejects a cap weaker than the leading penalty", () => {
    let caught: unknown;
    try {
      createScoreModel({ leadingLetterPenalty: -3, maxLeadingLetterPenalty: -1 });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({
      code: "INVALID_SCORE_MODEL",
      issues: [{ path: "maxLeadingLetterPenalty", message: "must be less than or equal to leadingLetterPenalty" }],
    });
  });

  it("rejects non-finite weights", () => {
    expect(() => createScoreModel({ adjacencyBonus: Number.NaN })).toThrow(ConfigurationError);
    expect(() => createScoreModel({ camelBonus: Number.POSITIVE_INFINITY })).toThrow("camelBonus: must be finite");
  });

  it("rejects unknown weights passed from untyped callers", () => {
    const options: ScoreOptions = JSON.parse('{"adjacencyBonuss": 4}');
    expect(() => createScoreModel(options)).toThrow(ConfigurationError);
  });
});
