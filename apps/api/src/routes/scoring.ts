import express from "express";
import type { Router } from "express";
import { Positions, positionPresets, type PositionPresetName } from "@gridiron-draft/core";
import { validationError } from "../errors.js";
import {
  hasScoringCategory,
  rankStatLines,
  type PointScheme,
  type StatLine
} from "../domain/scoring.js";
import { defaultSlotCounts } from "../services/draftRoom.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseStatLine(value: unknown, index: number, positions: Positions): StatLine {
  const field = `rows[${index}]`;
  if (!isRecord(value)) throw validationError(`${field} must be an object`, [field]);
  const { name, position, team, opponent, home, stats } = value;
  if (typeof name !== "string" || typeof position !== "string" || typeof team !== "string") {
    throw validationError(`${field} needs name, position and team`, [field]);
  }
  if (!hasScoringCategory(position, positions)) {
    throw validationError(`${field}.position has no scoring category`, [`${field}.position`]);
  }
  if (!isRecord(stats)) throw validationError(`${field}.stats must be an object`, [field]);

  const numbers: Record<string, number> = {};
  for (const [key, raw] of Object.entries(stats)) {
    if (typeof raw !== "number" || !Number.isFinite(raw)) {
      throw validationError(`${field}.stats.${key} must be a number`, [field]);
    }
    numbers[key] = raw;
  }
  return {
    name,
    position,
    team,
    ...(typeof opponent === "string" ? { opponent } : {}),
    ...(typeof home === "boolean" ? { home } : {}),
    stats: numbers
  };
}

export function buildRankHandler(scheme: PointScheme, preset: PositionPresetName) {
  const positions = new Positions(defaultSlotCounts[preset], positionPresets[preset]);
  return function handleRank(
    req: express.Request,
    res: express.Response,
    next: express.NextFunction
  ) {
    try {
      const rows = req.body?.rows;
      if (!Array.isArray(rows)) throw validationError("rows must be a list", ["rows"]);
      const ranked = rankStatLines(
        rows.map((row, i) => parseStatLine(row, i, positions)),
        scheme,
        positions
      );
      res.json({ rankings: ranked });
    } catch (err) {
      next(err);
    }
  };
}

export function createScoringRouter(scheme: PointScheme, preset: PositionPresetName): Router {
  const router = express.Router();
  router.get("/", (_req, res) => {
    res.json({ preset, scheme: scheme.toJSON() });
  });
  router.post("/rank", buildRankHandler(scheme, preset));
  return router;
}
