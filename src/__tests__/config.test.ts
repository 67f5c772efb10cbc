import { describe, expect, it } from "vitest";
import { ConfigError, DEFAULT_CATALOG_PATH, loadConfig } from "../config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      logLevel: "info",
      logFormat: "pretty",
      catalogPath: DEFAULT_CATALOG_PATH,
      maxResults: 200,
      scoring: {},
    });
  });

  it("points the default catalog at the data directory", () => {
    expect(DEFAULT_CATALOG_PATH.replace(/\\/g, "/")).toMatch(/\/data\/catalog\.json$/);
  });

  it("logs JSON in production unless told otherwise", () => {
    expect(loadConfig({ NODE_ENV: "production" }).logFormat).toBe("json");
    expect(loadConfig({ NODE_ENV: "production", LOG_FORMAT: "Pretty" }).logFormat).toBe("pretty");
  });

  it("parses values and weight overrides", () => {
    const config = loadConfig({
      PORT: "8080",
      LOG_LEVEL: "DEBUG",
      MAX_RESULTS: "0",
      CATALOG_PATH: "/tmp/items.json",
      FUZZY_SEPARATOR_BONUS: "15",
      FUZZY_MAX_LEADING_LETTER_PENALTY: "-6",
    });

    expect(config).toMatchObject({ port: 8080, logLevel: "debug", maxResults: 0, catalogPath: "/tmp/items.json" });
    expect(config.scoring).toEqual({ separatorBonus: 15, maxLeadingLetterPenalty: -6 });
  });

  it("treats blank variables as unset", () => {
    expect(loadConfig({ PORT: "  ", FUZZY_CAMEL_BONUS: "" })).toMatchObject({ port: 3000, scoring: {} });
  });

  it("reports every invalid variable", () => {
    let caught: unknown;
    try {
      loadConfig({ PORT: "http", LOG_LEVEL: "verbose", MAX_RESULTS: "5000", FUZZY_CAMEL_BONUS: "lots" });
    } catch (e) {
      caught = e;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const variables = caught instanceof ConfigError ? caught.issues.map((i) => i.variable).sort() : [];
    expect(variables).toEqual(["FUZZY_CAMEL_BONUS", "LOG_LEVEL", "MAX_RESULTS", "PORT"]);
  });
});
