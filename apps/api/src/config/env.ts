import { fileURLToPath } from "url";
import { isPositionPresetName, type PositionPresetName } from "@gridiron-draft/core";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const DEFAULT_PORT = 3000;
export const DEFAULT_ROUNDS = 16;
export const DEFAULT_PRESET: PositionPresetName = "ESPN";
export const DEFAULT_SCORING_PATH = fileURLToPath(
  new URL("../../data/scoring/standard.json", import.meta.url)
);

function parsePositiveInt(key: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${key} must be a positive integer, received: ${value}`);
  }
  return parsed;
}

function parsePreset(value: string | undefined): PositionPresetName {
  if (value === undefined || value.trim() === "") return DEFAULT_PRESET;
  const normalized = value.trim().toUpperCase();
  if (!isPositionPresetName(normalized)) {
    throw new ConfigError(
      `LEAGUE_PRESET must be one of DEFAULT, ESPN, YAHOO, received: ${value}`
    );
  }
  return normalized;
}

export type ApiConfig = {
  port: number;
  preset: PositionPresetName;
  defaultRounds: number;
  scoringPath: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const port = parsePositiveInt("PORT", env.PORT, DEFAULT_PORT);
  const preset = parsePreset(env.LEAGUE_PRESET);
  const defaultRounds = parsePositiveInt("DRAFT_ROUNDS", env.DRAFT_ROUNDS, DEFAULT_ROUNDS);
  const scoringPath = env.SCORING_PATH?.trim() || DEFAULT_SCORING_PATH;
  return { port, preset, defaultRounds, scoringPath };
}
