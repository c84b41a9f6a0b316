export type Player = {
  position: string;
  injured_reserve: boolean;
  id?: string;
};

export type PositionPreset = {
  name: string;
  offense: readonly string[];
  flex: string;
  dst: string;
  kicker: string;
  bench: string;
  injured_reserve: string;
};

export const QUARTERBACK = "QB";

export const positionPresets = {
  DEFAULT: {
    name: "DEFAULT",
    offense: ["QB", "WR", "RB", "TE"],
    flex: "FLEX",
    dst: "DST",
    kicker: "K",
    bench: "BN",
    injured_reserve: "IR"
  },
  ESPN: {
    name: "ESPN",
    offense: ["QB", "RB", "WR", "TE"],
    flex: "FLEX",
    dst: "D/ST",
    kicker: "K",
    bench: "BN",
    injured_reserve: "IR"
  },
  YAHOO: {
    name: "YAHOO",
    offense: ["QB", "WR", "RB", "TE"],
    flex: "W-R-T",
    dst: "DEF",
    kicker: "K",
    bench: "BN",
    injured_reserve: "IR"
  }
} as const satisfies Record<string, PositionPreset>;

export type PositionPresetName = keyof typeof positionPresets;

export type PositionErrorCode = "INVALID_SCHEMA" | "UNKNOWN_POSITION" | "INVALID_PLAYER";

export class PositionError extends Error {
  constructor(
    message: string,
    public code: PositionErrorCode,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "PositionError";
  }
}

export function isPositionPresetName(name: string): name is PositionPresetName {
  return Object.prototype.hasOwnProperty.call(positionPresets, name);
}

export function samePlayer(a: Player, b: Player): boolean {
  if (a.id !== undefined || b.id !== undefined) return a.id === b.id;
  return a.position === b.position && a.injured_reserve === b.injured_reserve;
}

/**
 * Roster position schema: the canonical position codes of a league convention and the
 * number of roster slots allotted to each.
 *
 * Eligibility by destination slot:
 * - natural position: players listed at that position
 * - flex: any offense position except QB
 * - bench: everyone
 * - IR: players flagged `injured_reserve`
 */
export class Positions {
  readonly offense: readonly string[];
  readonly flex: string;
  readonly dst: string;
  readonly kicker: string;
  readonly bench: string;
  readonly injured_reserve: string;
  readonly preset: string;

  private readonly counts: ReadonlyMap<string, number>;

  constructor(counts: Record<string, number>, preset: PositionPreset = positionPresets.DEFAULT) {
    this.preset = preset.name;
    this.offense = [...preset.offense];
    this.flex = preset.flex;
    this.dst = preset.dst;
    this.kicker = preset.kicker;
    this.bench = preset.bench;
    this.injured_reserve = preset.injured_reserve;

    const canonical = this.positions;
    if (new Set(canonical).size !== canonical.length) {
      throw new PositionError("Preset declares duplicate position codes", "INVALID_SCHEMA", {
        positions: canonical
      });
    }

    const keys = Object.keys(counts);
    const missing = canonical.filter((code) => !keys.includes(code));
    const unexpected = keys.filter((key) => !canonical.includes(key));
    if (missing.length || unexpected.length) {
      throw new PositionError(
        "Schema keys must match the canonical position codes",
        "INVALID_SCHEMA",
        { missing, unexpected }
      );
    }

    const invalid = canonical.filter((code) => {
      const count = counts[code];
      return !Number.isInteger(count) || count < 0;
    });
    if (invalid.length) {
      throw new PositionError(
        "Slot counts must be non-negative integers",
        "INVALID_SCHEMA",
        { positions: invalid }
      );
    }

    this.counts = new Map(canonical.map((code) => [code, counts[code]]));
  }

  static fromPreset(name: PositionPresetName, counts: Record<string, number>): Positions {
    return new Positions(counts, positionPresets[name]);
  }

  get positions(): string[] {
    return [
      ...this.offense,
      this.flex,
      this.dst,
      this.kicker,
      this.bench,
      this.injured_reserve
    ];
  }

  get schema(): Record<string, number> {
    return Object.fromEntries(this.counts);
  }

  /** Total number of roster slots across all positions. */
  get size(): number {
    let total = 0;
    for (const count of this.counts.values()) total += count;
    return total;
  }

  has(position: string): boolean {
    return this.counts.has(position);
  }

  slots(position: string): number {
    const count = this.counts.get(position);
    if (count === undefined) {
      throw new PositionError("Unknown position code", "UNKNOWN_POSITION", { position });
    }
    return count;
  }

  flexable(position: string): boolean {
    if (!this.has(position)) {
      throw new PositionError("Unknown position code", "UNKNOWN_POSITION", { position });
    }
    return this.offense.includes(position) && position !== QUARTERBACK;
  }

  moveable(player: Player, destination: string): boolean {
    this.validate(player);
    if (!this.has(destination)) {
      throw new PositionError("Unknown position code", "UNKNOWN_POSITION", {
        position: destination
      });
    }

    return (
      destination === this.bench ||
      destination === player.position ||
      (player.injured_reserve && destination === this.injured_reserve) ||
      (this.flexable(player.position) && destination === this.flex)
    );
  }

  validate(...players: Player[]): void {
    for (const player of players) {
      if (!this.has(player.position)) {
        throw new PositionError("Player position is not part of the schema", "INVALID_PLAYER", {
          position: player.position,
          ...(player.id !== undefined ? { player_id: player.id } : {})
        });
      }
    }
  }

  describe(): string {
    const width = Math.max(...this.positions.map((code) => code.length));
    return this.positions
      .map((code) => `${code.padEnd(width)}  ${this.slots(code)}`)
      .join("\n");
  }
}
