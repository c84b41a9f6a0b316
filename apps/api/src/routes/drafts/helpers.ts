import {
  isPositionPresetName,
  type Player,
  type PositionPresetName
} from "@gridiron-draft/core";
import { validationError } from "../../errors.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parsePlayer(value: unknown, field = "player"): Player {
  if (!isRecord(value)) {
    throw validationError(`${field} must be an object`, [field]);
  }
  const { id, position, injured_reserve } = value;
  if (typeof position !== "string" || !position.trim()) {
    throw validationError(`${field}.position is required`, [`${field}.position`]);
  }
  let injured = false;
  if (injured_reserve !== undefined) {
    if (typeof injured_reserve !== "boolean") {
      throw validationError(`${field}.injured_reserve must be a boolean`, [
        `${field}.injured_reserve`
      ]);
    }
    injured = injured_reserve;
  }
  let playerId: string | undefined;
  if (id !== undefined) {
    if (typeof id !== "string" || !id.trim()) {
      throw validationError(`${field}.id must be a non-empty string`, [`${field}.id`]);
    }
    playerId = id.trim();
  }
  return {
    position: position.trim(),
    injured_reserve: injured,
    ...(playerId !== undefined ? { id: playerId } : {})
  };
}

export function parsePlayers(value: unknown, field: string): Player[] {
  if (value === undefined) return [];
  const list = Array.isArray(value) ? value : [value];
  return list.map((item, i) => parsePlayer(item, `${field}[${i}]`));
}

export function parseTeamIndex(value: unknown, field: string): number {
  if (typeof value === "string" && !value.trim()) {
    throw validationError(`${field} must be a team index`, [field]);
  }
  const parsed = typeof value === "string" ? Number(value) : value;
  if (typeof parsed !== "number" || !Number.isInteger(parsed) || parsed < 0) {
    throw validationError(`${field} must be a team index`, [field]);
  }
  return parsed;
}

export function parseCreateDraftBody(body: unknown): {
  teams: string[];
  rounds?: number;
  preset?: PositionPresetName;
  counts?: Record<string, number>;
} {
  if (!isRecord(body)) throw validationError("Body must be an object");
  const { teams, rounds, preset, counts } = body;

  if (
    !Array.isArray(teams) ||
    !teams.every((name): name is string => typeof name === "string" && name.trim() !== "")
  ) {
    throw validationError("teams must be a list of team names", ["teams"]);
  }
  let roundCount: number | undefined;
  if (rounds !== undefined) {
    if (typeof rounds !== "number" || !Number.isInteger(rounds) || rounds <= 0) {
      throw validationError("rounds must be a positive integer", ["rounds"]);
    }
    roundCount = rounds;
  }
  let presetName: PositionPresetName | undefined;
  if (preset !== undefined) {
    if (typeof preset !== "string" || !isPositionPresetName(preset)) {
      throw validationError("preset must be one of DEFAULT, ESPN, YAHOO", ["preset"]);
    }
    presetName = preset;
  }

  let slotCounts: Record<string, number> | undefined;
  if (counts !== undefined) {
    if (!isRecord(counts)) throw validationError("counts must be an object", ["counts"]);
    slotCounts = {};
    for (const [code, count] of Object.entries(counts)) {
      if (typeof count !== "number") {
        throw validationError("counts must map position codes to numbers", ["counts"]);
      }
      slotCounts[code] = count;
    }
  }

  return {
    teams: teams.map((name) => name.trim()),
    ...(roundCount !== undefined ? { rounds: roundCount } : {}),
    ...(presetName !== undefined ? { preset: presetName } : {}),
    ...(slotCounts ? { counts: slotCounts } : {})
  };
}
