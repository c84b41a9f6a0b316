import { randomUUID } from "crypto";
import {
  Positions,
  Roster,
  SnakeDraft,
  positionPresets,
  type DraftPick,
  type PickSlot,
  type Player,
  type PositionPresetName,
  type Slot
} from "@gridiron-draft/core";
import { AppError, notFoundError, validationError } from "../errors.js";
import { buildPickLog, log } from "../logger.js";
import { executeTrade, type TradeSummary } from "../domain/trades.js";

export const defaultSlotCounts: Record<PositionPresetName, Record<string, number>> = {
  DEFAULT: { QB: 1, WR: 2, RB: 2, TE: 1, FLEX: 1, DST: 1, K: 1, BN: 7, IR: 1 },
  ESPN: { QB: 1, RB: 2, WR: 2, TE: 1, FLEX: 1, "D/ST": 1, K: 1, BN: 7, IR: 1 },
  YAHOO: { QB: 1, WR: 3, RB: 2, TE: 1, "W-R-T": 1, DEF: 1, K: 1, BN: 6, IR: 2 }
};

export type CreateDraftInput = {
  teams: string[];
  rounds?: number;
  preset?: PositionPresetName;
  counts?: Record<string, number>;
};

export type DraftSnapshot = {
  id: string;
  preset: PositionPresetName;
  rounds: number;
  volume: number;
  completed: number;
  next: PickSlot | null;
  teams: Array<{ name: string; roster: Record<string, Slot[]> }>;
  results: Array<Array<Player | null>>;
  board: number[][];
};

export type PickResult = {
  pick: DraftPick;
  next: PickSlot | null;
};

type DraftEntry = {
  id: string;
  preset: PositionPresetName;
  teams: string[];
  rosters: Roster[];
  draft: SnakeDraft;
  traded: boolean;
};

/**
 * In-memory registry of live drafts. Every mutation runs synchronously, so requests
 * handled on the event loop never interleave inside a draft.
 */
export class DraftRoom {
  private readonly drafts = new Map<string, DraftEntry>();

  constructor(
    private readonly defaults: { preset: PositionPresetName; rounds: number },
    private readonly newId: () => string = randomUUID
  ) {}

  createDraft(input: CreateDraftInput): DraftSnapshot {
    if (!input.teams.length) {
      throw validationError("At least one team is required", ["teams"]);
    }
    if (new Set(input.teams).size !== input.teams.length) {
      throw validationError("Team names must be unique", ["teams"]);
    }

    const preset = input.preset ?? this.defaults.preset;
    const positions = new Positions(
      input.counts ?? defaultSlotCounts[preset],
      positionPresets[preset]
    );
    const rosters = input.teams.map(() => new Roster(positions));
    const draft = new SnakeDraft(rosters, input.rounds ?? this.defaults.rounds);

    const entry: DraftEntry = {
      id: this.newId(),
      preset,
      teams: [...input.teams],
      rosters,
      draft,
      traded: false
    };
    this.drafts.set(entry.id, entry);
    log({
      level: "info",
      msg: "draft_created",
      draft_id: entry.id,
      preset,
      teams: entry.teams.length,
      rounds: draft.nrounds
    });
    return this.describe(entry);
  }

  getDraft(id: string): DraftSnapshot {
    return this.describe(this.require(id));
  }

  listDrafts(): string[] {
    return [...this.drafts.keys()];
  }

  submitPick(id: string, player: Player): PickResult {
    const entry = this.require(id);
    if (player.id !== undefined) {
      const holder = entry.rosters.findIndex((roster) => roster.includes(player));
      if (holder >= 0) {
        throw new AppError("PLAYER_ALREADY_DRAFTED", 409, "Player has already been drafted", {
          player_id: player.id,
          team_index: holder
        });
      }
    }

    const pick = entry.draft.push(player);
    log(buildPickLog({ msg: "draft_pick", draft_id: id, ...pick }));
    return { pick, next: entry.draft.peek() };
  }

  undoPick(id: string): PickResult {
    const entry = this.require(id);
    if (entry.traded) {
      throw new AppError("DRAFT_LOCKED", 409, "Picks cannot be undone after a trade");
    }
    const pick = entry.draft.pop();
    if (!pick) {
      throw new AppError("NOTHING_TO_UNDO", 409, "No picks have been made");
    }
    log(buildPickLog({ msg: "draft_undo", draft_id: id, ...pick }));
    return { pick, next: entry.draft.peek() };
  }

  /** Clears the results and empties every roster. */
  resetDraft(id: string): DraftSnapshot {
    const entry = this.require(id);
    for (const roster of entry.rosters) roster.drop(...roster.players());
    entry.draft.reset();
    entry.traded = false;
    log({ level: "info", msg: "draft_reset", draft_id: id });
    return this.describe(entry);
  }

  movePlayer(
    id: string,
    teamIndex: number,
    input: { player: Player; destination: string; replace?: Player }
  ): DraftSnapshot {
    const entry = this.require(id);
    const roster = this.rosterAt(entry, teamIndex);
    roster.move(input.player, input.destination, { replace: input.replace });
    log({
      level: "info",
      msg: "roster_move",
      draft_id: id,
      team_index: teamIndex,
      destination: input.destination
    });
    return this.describe(entry);
  }

  trade(
    id: string,
    input: { from: number; to: number; add: Player[]; drop: Player[] }
  ): TradeSummary {
    const entry = this.require(id);
    if (!entry.draft.exhausted) {
      throw new AppError("DRAFT_IN_PROGRESS", 409, "Trades open once the draft is complete");
    }
    if (input.from === input.to) {
      throw validationError("A team cannot trade with itself", ["from", "to"]);
    }
    const summary = executeTrade(this.rosterAt(entry, input.from), this.rosterAt(entry, input.to), {
      add: input.add,
      drop: input.drop
    });
    entry.traded = true;
    log({
      level: "info",
      msg: "draft_trade",
      draft_id: id,
      from: input.from,
      to: input.to,
      received: summary.roster.added.length,
      sent: summary.roster.dropped.length
    });
    return summary;
  }

  private rosterAt(entry: DraftEntry, teamIndex: number): Roster {
    const roster = entry.rosters[teamIndex];
    if (!Number.isInteger(teamIndex) || !roster) {
      throw notFoundError("TEAM_NOT_FOUND", "Team not found");
    }
    return roster;
  }

  private require(id: string): DraftEntry {
    const entry = this.drafts.get(id);
    if (!entry) throw notFoundError("DRAFT_NOT_FOUND", "Draft not found");
    return entry;
  }

  private describe(entry: DraftEntry): DraftSnapshot {
    const { draft } = entry;
    return {
      id: entry.id,
      preset: entry.preset,
      rounds: draft.nrounds,
      volume: draft.volume,
      completed: draft.length,
      next: draft.peek(),
      teams: entry.teams.map((name, i) => ({
        name,
        roster: Object.fromEntries(entry.rosters[i].entries())
      })),
      results: draft.results,
      board: draft.board
    };
  }
}
