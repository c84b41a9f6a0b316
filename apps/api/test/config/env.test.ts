import { describe, expect, it } from "vitest";
import {
  ConfigError,
  DEFAULT_SCORING_PATH,
  loadConfig
} from "../../src/config/env.js";

describe("loadConfig", () => {
  it("falls back to defaults when nothing is set", () => {
    const cfg = loadConfig({});
    expect(cfg).toEqual({
      port: 3000,
      preset: "ESPN",
      defaultRounds: 16,
      scoringPath: DEFAULT_SCORING_PATH
    });
    expect(DEFAULT_SCORING_PATH.endsWith("standard.json")).toBe(true);
  });

  it("loads values when present", () => {
    const cfg = loadConfig({
      PORT: "4000",
      LEAGUE_PRESET: "yahoo",
      DRAFT_ROUNDS: "15",
      SCORING_PATH: "/tmp/scoring.json"
    });
    expect(cfg).toEqual({
      port: 4000,
      preset: "YAHOO",
      defaultRounds: 15,
      scoringPath: "/tmp/scoring.json"
    });
  });

  it("validates port and rounds as positive integers", () => {
    expect(() => loadConfig({ PORT: "not-a-number" })).toThrow(ConfigError);
    expect(() => loadConfig({ PORT: "-1" })).toThrow(ConfigError);
    expect(() => loadConfig({ DRAFT_ROUNDS: "0" })).toThrow(ConfigError);
    expect(() => loadConfig({ DRAFT_ROUNDS: "2.5" })).toThrow(ConfigError);
  });

  it("rejects unknown presets", () => {
    expect(() => loadConfig({ LEAGUE_PRESET: "CBS" })).toThrow(ConfigError);
  });
});
