import {
  buildDraftBoard,
  getSnakeSeatForPick,
  roundForPick,
  snakeSequence,
  type PickSlot
} from "./draftOrder.js";
import type { Player } from "./positions.js";
import type { Roster } from "./roster.js";

export type DraftPick = PickSlot & {
  team_index: number;
  player: Player;
};

export type DraftErrorCode =
  | "INVALID_INPUT"
  | "PICK_OUT_OF_RANGE"
  | "DRAFT_EXHAUSTED"
  | "PLACEMENT_FAILED"
  | "INCONSISTENT_STATE";

export class DraftError extends Error {
  constructor(
    message: string,
    public code: DraftErrorCode,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "DraftError";
  }
}

/**
 * Multi-round snake draft over a fixed, ordered set of rosters. Odd rounds pick in roster
 * order, even rounds in reverse. Picks are undone strictly last-in, first-out.
 */
export class SnakeDraft {
  readonly rosters: readonly Roster[];
  readonly nrounds: number;

  private remaining: PickSlot[] = [];
  private grid: Array<Array<Player | null>> = [];
  private completed = 0;

  constructor(rosters: readonly Roster[], nrounds: number) {
    if (rosters.length === 0) {
      throw new DraftError("A draft needs at least one roster", "INVALID_INPUT");
    }
    if (!Number.isInteger(nrounds) || nrounds <= 0) {
      throw new DraftError("Round count must be a positive integer", "INVALID_INPUT", {
        nrounds
      });
    }
    this.rosters = [...rosters];
    this.nrounds = nrounds;
    this.reset();
  }

  get nteams(): number {
    return this.rosters.length;
  }

  /** Total number of picks in the draft. */
  get volume(): number {
    return this.nrounds * this.nteams;
  }

  /** Number of completed picks. */
  get length(): number {
    return this.completed;
  }

  get exhausted(): boolean {
    return this.remaining.length === 0;
  }

  /** Copy of the results grid, rows by round and columns by roster. */
  get results(): Array<Array<Player | null>> {
    return this.grid.map((row) => [...row]);
  }

  get board(): number[][] {
    return buildDraftBoard(this.nteams, this.nrounds);
  }

  getRound(pick: number): number {
    this.requirePick(pick);
    return roundForPick(this.nteams, pick);
  }

  getTeamIndex(pick: number): number {
    this.requirePick(pick);
    return getSnakeSeatForPick(this.nteams, pick) - 1;
  }

  getTeam(pick: number): Roster {
    return this.rosters[this.getTeamIndex(pick)];
  }

  peek(): PickSlot | null {
    const next = this.remaining[0];
    return next ? { ...next } : null;
  }

  push(player: Player): DraftPick {
    const next = this.remaining[0];
    if (!next) {
      throw new DraftError("No picks remain in the draft", "DRAFT_EXHAUSTED", {
        volume: this.volume
      });
    }

    const teamIndex = this.getTeamIndex(next.pick_number);
    const added = this.rosters[teamIndex].add(player);
    if (!added.includes(player)) {
      throw new DraftError("Player could not be placed on the roster", "PLACEMENT_FAILED", {
        ...next,
        team_index: teamIndex,
        position: player.position
      });
    }

    this.grid[next.round_number - 1][teamIndex] = player;
    this.completed += 1;
    this.remaining.shift();

    return { ...next, team_index: teamIndex, player };
  }

  pop(): DraftPick | null {
    if (this.completed === 0) return null;

    const next = this.remaining[0];
    const pickNumber = next ? next.pick_number - 1 : this.volume;
    const roundNumber = this.getRound(pickNumber);
    const teamIndex = this.getTeamIndex(pickNumber);

    const player = this.grid[roundNumber - 1][teamIndex];
    if (!player) {
      throw new DraftError("No player recorded for the last pick", "INCONSISTENT_STATE", {
        round_number: roundNumber,
        pick_number: pickNumber,
        team_index: teamIndex
      });
    }

    let dropped: Player[];
    try {
      dropped = this.rosters[teamIndex].drop(player);
    } catch (err: unknown) {
      throw new DraftError("Drafted player is missing from its roster", "INCONSISTENT_STATE", {
        round_number: roundNumber,
        pick_number: pickNumber,
        team_index: teamIndex,
        cause: err instanceof Error ? err.message : String(err)
      });
    }
    if (!dropped.includes(player)) {
      throw new DraftError("Drafted player could not be dropped", "INCONSISTENT_STATE", {
        round_number: roundNumber,
        pick_number: pickNumber,
        team_index: teamIndex
      });
    }

    this.grid[roundNumber - 1][teamIndex] = null;
    this.completed -= 1;
    this.remaining.unshift({ round_number: roundNumber, pick_number: pickNumber });

    return { round_number: roundNumber, pick_number: pickNumber, team_index: teamIndex, player };
  }

  /** Clears the results and restarts the pick order. Rosters are left as they are. */
  reset(): void {
    this.completed = 0;
    this.remaining = snakeSequence(this.nteams, this.nrounds);
    this.grid = Array.from({ length: this.nrounds }, () =>
      new Array<Player | null>(this.nteams).fill(null)
    );
  }

  picks(): DraftPick[] {
    const made: DraftPick[] = [];
    for (let pick = 1; pick <= this.completed; pick += 1) {
      const round = this.getRound(pick);
      const teamIndex = this.getTeamIndex(pick);
      const player = this.grid[round - 1][teamIndex];
      if (player) {
        made.push({ round_number: round, pick_number: pick, team_index: teamIndex, player });
      }
    }
    return made;
  }

  private requirePick(pick: number) {
    if (!Number.isInteger(pick) || pick < 1 || pick > this.volume) {
      throw new DraftError("Pick number is outside the draft", "PICK_OUT_OF_RANGE", {
        pick,
        volume: this.volume
      });
    }
  }
}
