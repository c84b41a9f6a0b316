import fs from "fs";
import type { Positions } from "@gridiron-draft/core";

export type ScoringErrorCode = "INVALID_SCHEME" | "UNKNOWN_CATEGORY" | "UNKNOWN_STATISTIC";

export class ScoringError extends Error {
  constructor(
    message: string,
    public code: ScoringErrorCode,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ScoringError";
  }
}

export const OFFENSE_CATEGORY = "OFF";
export const KICKER_CATEGORY = "K";
export const DEFENSE_CATEGORY = "D/ST";

export type PointTable = Record<string, Record<string, number>>;

/**
 * Point values per statistic, grouped by category (`OFF`, `K`, `D/ST`, ...).
 * Lookups for a category or statistic the table does not define throw instead of
 * returning `undefined`.
 */
export class PointScheme {
  private readonly table: Map<string, Map<string, number>>;

  constructor(table: PointTable) {
    this.table = new Map(
      Object.entries(table).map(([category, stats]) => [category, new Map(Object.entries(stats))])
    );
  }

  categories(): string[] {
    return [...this.table.keys()];
  }

  has(category: string, statistic: string): boolean {
    return this.table.get(category)?.has(statistic) ?? false;
  }

  points(category: string, statistic: string): number {
    const stats = this.table.get(category);
    if (!stats) {
      throw new ScoringError("Unknown scoring category", "UNKNOWN_CATEGORY", { category });
    }
    const value = stats.get(statistic);
    if (value === undefined) {
      throw new ScoringError("Unknown statistic for category", "UNKNOWN_STATISTIC", {
        category,
        statistic
      });
    }
    return value;
  }

  entries(): Array<[category: string, statistic: string, points: number]> {
    const result: Array<[string, string, number]> = [];
    for (const [category, stats] of this.table) {
      for (const [statistic, points] of stats) result.push([category, statistic, points]);
    }
    return result;
  }

  toJSON(): PointTable {
    const result: PointTable = {};
    for (const [category, stats] of this.table) result[category] = Object.fromEntries(stats);
    return result;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parsePointScheme(raw: unknown): PointScheme {
  if (!isRecord(raw)) {
    throw new ScoringError("Point scheme must be an object", "INVALID_SCHEME");
  }
  const table: PointTable = {};
  for (const [category, stats] of Object.entries(raw)) {
    if (!isRecord(stats)) {
      throw new ScoringError("Category must map statistics to points", "INVALID_SCHEME", {
        category
      });
    }
    table[category] = {};
    for (const [statistic, points] of Object.entries(stats)) {
      if (typeof points !== "number" || !Number.isFinite(points)) {
        throw new ScoringError("Points must be finite numbers", "INVALID_SCHEME", {
          category,
          statistic
        });
      }
      table[category][statistic] = points;
    }
  }
  return new PointScheme(table);
}

export function loadPointScheme(filePath: string): PointScheme {
  const raw = fs.readFileSync(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    throw new ScoringError("Point scheme file is not valid JSON", "INVALID_SCHEME", {
      path: filePath,
      cause: err instanceof Error ? err.message : String(err)
    });
  }
  return parsePointScheme(parsed);
}

function scoringCategory(position: string, positions: Positions): string | null {
  if (positions.offense.includes(position)) return OFFENSE_CATEGORY;
  if (position === positions.kicker) return KICKER_CATEGORY;
  if (position === positions.dst) return DEFENSE_CATEGORY;
  return null;
}

export function hasScoringCategory(position: string, positions: Positions): boolean {
  return scoringCategory(position, positions) !== null;
}

export function categoryForPosition(position: string, positions: Positions): string {
  const category = scoringCategory(position, positions);
  if (category !== null) return category;
  throw new ScoringError("Position has no scoring category", "UNKNOWN_CATEGORY", { position });
}

export function scoreStatLine(
  scheme: PointScheme,
  category: string,
  stats: Record<string, number>
): number {
  let total = 0;
  for (const [statistic, value] of Object.entries(stats)) {
    if (!scheme.has(category, statistic)) continue;
    total += scheme.points(category, statistic) * value;
  }
  return Math.round(total * 100) / 100;
}

export type StatLine = {
  name: string;
  position: string;
  team: string;
  opponent?: string;
  home?: boolean;
  stats: Record<string, number>;
};

export type RankedStatLine = StatLine & {
  category: string;
  points: number;
};

export function rankStatLines(
  rows: StatLine[],
  scheme: PointScheme,
  positions: Positions
): RankedStatLine[] {
  return rows
    .map((row) => {
      const category = categoryForPosition(row.position, positions);
      return { ...row, category, points: scoreStatLine(scheme, category, row.stats) };
    })
    .sort((a, b) => b.points - a.points || a.name.localeCompare(b.name));
}
