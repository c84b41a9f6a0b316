import { PositionError, Positions, samePlayer, type Player } from "./positions.js";

export type Slot = Player | null;

export type TransactionSummary = {
  added: Player[];
  dropped: Player[];
};

export type RosterSnapshot = {
  positions: Positions;
  slots: Record<string, Slot[]>;
};

export type SlotLocation = {
  position: string;
  index: number;
};

export type RosterErrorCode =
  | "ILLEGAL_MOVE"
  | "MISSING_REPLACEMENT"
  | "PLAYER_NOT_FOUND"
  | "SNAPSHOT_MISMATCH";

export class RosterError extends Error {
  constructor(
    message: string,
    public code: RosterErrorCode,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "RosterError";
  }
}

function isPlayerList(value: Player | readonly Player[]): value is readonly Player[] {
  return Array.isArray(value);
}

function toList(players: Player | readonly Player[] | undefined): Player[] {
  if (players === undefined) return [];
  return isPlayerList(players) ? [...players] : [players];
}

function describePlayer(player: Player): Record<string, unknown> {
  return player.id !== undefined
    ? { player_id: player.id, position: player.position }
    : { position: player.position, injured_reserve: player.injured_reserve };
}

/**
 * A single team's roster. Every position code owns a fixed-length array of slots sized by
 * the schema; slots hold a player or `null`.
 */
export class Roster {
  readonly positions: Positions;
  private slots: Map<string, Slot[]>;

  constructor(positions: Positions, ...players: Player[]) {
    this.positions = positions;
    this.slots = new Map(
      positions.positions.map((code) => [code, new Array<Slot>(positions.slots(code)).fill(null)])
    );
    this.add(...players);
  }

  /** Read-only copy of the slots for one position. */
  slotsFor(position: string): Slot[] {
    return [...this.array(position)];
  }

  entries(): Array<[string, Slot[]]> {
    return this.positions.positions.map((code) => [code, this.slotsFor(code)]);
  }

  players(): Player[] {
    const result: Player[] = [];
    for (const slots of this.slots.values()) {
      for (const slot of slots) if (slot) result.push(slot);
    }
    return result;
  }

  occupied(position?: string): number {
    if (position !== undefined) {
      return this.array(position).filter((slot) => slot !== null).length;
    }
    return this.players().length;
  }

  vacancies(position: string): number {
    return this.array(position).filter((slot) => slot === null).length;
  }

  includes(player: Player): boolean {
    return this.findAnywhere(player) !== null;
  }

  /**
   * Finds the slot holding a player, searching its natural position, then flex, bench
   * and injured reserve.
   */
  locate(player: Player): SlotLocation | null {
    const searched = new Set<string>();
    for (const position of [
      player.position,
      this.positions.flex,
      this.positions.bench,
      this.positions.injured_reserve
    ]) {
      if (searched.has(position)) continue;
      searched.add(position);
      const index = this.array(position).findIndex((slot) => slot && samePlayer(slot, player));
      if (index >= 0) return { position, index };
    }
    return null;
  }

  add(...players: Player[]): Player[] {
    this.positions.validate(...players);

    const added: Player[] = [];
    for (const player of players) {
      // an id names one player, who holds at most one slot
      if (player.id !== undefined && this.includes(player)) continue;
      const { flex, bench } = this.positions;
      let destination: string;
      if (this.vacancies(player.position) > 0) {
        destination = player.position;
      } else if (this.positions.flexable(player.position) && this.vacancies(flex) > 0) {
        destination = flex;
      } else if (this.vacancies(bench) > 0) {
        destination = bench;
      } else {
        continue;
      }

      const slots = this.array(destination);
      slots[slots.indexOf(null)] = player;
      added.push(player);
    }
    return added;
  }

  drop(...players: Player[]): Player[] {
    this.positions.validate(...players);

    const dropped: Player[] = [];
    for (const player of players) {
      const location = this.locate(player);
      if (!location) {
        throw new RosterError("Player is not on this roster", "PLAYER_NOT_FOUND", {
          ...describePlayer(player),
          dropped: dropped.length
        });
      }
      this.array(location.position)[location.index] = null;
      dropped.push(player);
    }
    return dropped;
  }

  move(player: Player, destination: string, options: { replace?: Player } = {}): void {
    const { replace } = options;
    if (!this.positions.moveable(player, destination)) {
      throw new RosterError("Player is not eligible for that slot", "ILLEGAL_MOVE", {
        ...describePlayer(player),
        destination
      });
    }

    const source = this.locate(player);
    if (!source) {
      throw new RosterError("Player is not on this roster", "PLAYER_NOT_FOUND", describePlayer(player));
    }
    if (source.position === destination) return;

    const target = this.array(destination);
    let targetIndex: number;
    if (replace) {
      this.positions.validate(replace);
      targetIndex = target.findIndex((slot) => slot && samePlayer(slot, replace));
      if (targetIndex < 0) {
        throw new RosterError("Replacement is not in the destination slot", "PLAYER_NOT_FOUND", {
          ...describePlayer(replace),
          destination
        });
      }
      if (!this.positions.moveable(replace, source.position)) {
        throw new RosterError("Replacement is not eligible for the vacated slot", "ILLEGAL_MOVE", {
          ...describePlayer(replace),
          destination: source.position
        });
      }
    } else {
      targetIndex = target.indexOf(null);
      if (targetIndex < 0) {
        throw new RosterError(
          "Destination is full and no replacement was given",
          "MISSING_REPLACEMENT",
          { destination }
        );
      }
    }

    this.array(source.position)[source.index] = replace ?? null;
    target[targetIndex] = player;
  }

  transaction(
    options: { add?: Player | readonly Player[]; drop?: Player | readonly Player[] } = {}
  ): TransactionSummary {
    const added = this.add(...toList(options.add));
    const dropped = this.drop(...toList(options.drop));
    return { added, dropped };
  }

  /**
   * Trades with another roster: this roster gains `add` and loses `drop`, the other roster
   * gains `drop` and loses `add`. Steps run in sequence; a failure part-way leaves the
   * earlier steps applied.
   */
  trade(
    other: Roster,
    options: { add: Player | readonly Player[]; drop: Player | readonly Player[] }
  ): Map<Roster, TransactionSummary> {
    const add = toList(options.add);
    const drop = toList(options.drop);
    const summary = new Map<Roster, TransactionSummary>();
    summary.set(this, this.transaction({ add, drop }));
    summary.set(other, other.transaction({ add: drop, drop: add }));
    return summary;
  }

  snapshot(): RosterSnapshot {
    const slots: Record<string, Slot[]> = {};
    for (const [code, array] of this.slots) slots[code] = [...array];
    return { positions: this.positions, slots };
  }

  restore(snapshot: RosterSnapshot): void {
    if (snapshot.positions !== this.positions) {
      throw new RosterError("Snapshot belongs to a different schema", "SNAPSHOT_MISMATCH");
    }
    this.slots = new Map(
      this.positions.positions.map((code) => [code, [...(snapshot.slots[code] ?? [])]])
    );
  }

  toString(): string {
    return this.entries()
      .flatMap(([code, slots]) =>
        slots.map((slot, i) => `${code}[${i}] ${slot ? (slot.id ?? slot.position) : "-"}`)
      )
      .join("\n");
  }

  private findAnywhere(player: Player): SlotLocation | null {
    for (const [position, slots] of this.slots) {
      const index = slots.findIndex((slot) => slot && samePlayer(slot, player));
      if (index >= 0) return { position, index };
    }
    return null;
  }

  private array(position: string): Slot[] {
    const slots = this.slots.get(position);
    if (slots) return slots;
    throw new PositionError("Unknown position code", "UNKNOWN_POSITION", { position });
  }
}
