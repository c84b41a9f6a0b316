import { describe, expect, it } from "vitest";
import { Positions, Roster, type Player } from "@gridiron-draft/core";
import { TradeError, executeTrade } from "../../src/domain/trades.js";

const positions = new Positions({
  QB: 1,
  WR: 1,
  RB: 1,
  TE: 1,
  FLEX: 0,
  DST: 0,
  K: 0,
  BN: 0,
  IR: 0
});

function player(id: string, position: string): Player {
  return { id, position, injured_reserve: false };
}

function tradeErrorOf(fn: () => unknown): TradeError {
  try {
    fn();
  } catch (err) {
    if (err instanceof TradeError) return err;
    throw err;
  }
  throw new Error("expected a TradeError");
}

describe("executeTrade", () => {
  it("swaps players between both rosters", () => {
    const qb1 = player("qb1", "QB");
    const wr1 = player("wr1", "WR");
    const qb2 = player("qb2", "QB");
    const rb2 = player("rb2", "RB");
    const mine = new Roster(positions, qb1, wr1);
    const theirs = new Roster(positions, qb2, rb2);

    const summary = executeTrade(mine, theirs, { add: [rb2], drop: [wr1] });

    expect(summary).toEqual({
      roster: { added: [rb2], dropped: [wr1] },
      other: { added: [wr1], dropped: [rb2] }
    });
    expect(mine.slotsFor("RB")).toEqual([rb2]);
    expect(mine.slotsFor("WR")).toEqual([null]);
    expect(theirs.slotsFor("WR")).toEqual([wr1]);
    expect(theirs.slotsFor("RB")).toEqual([null]);
  });

  it("restores both rosters when a traded player is missing", () => {
    const wr1 = player("wr1", "WR");
    const mine = new Roster(positions, wr1);
    const theirs = new Roster(positions, player("rb2", "RB"));

    const err = tradeErrorOf(() =>
      executeTrade(mine, theirs, { add: [player("rb9", "RB")], drop: [wr1] })
    );

    expect(err.code).toBe("TRADE_REJECTED");
    expect(err.details?.cause_code).toBe("PLAYER_NOT_FOUND");
    expect(mine.slotsFor("WR")).toEqual([wr1]);
    expect(theirs.occupied()).toBe(1);
  });

  it("restores both rosters when an incoming player has no room", () => {
    const qb1 = player("qb1", "QB");
    const wr1 = player("wr1", "WR");
    const qb2 = player("qb2", "QB");
    const mine = new Roster(positions, qb1, wr1);
    const theirs = new Roster(positions, qb2);

    const err = tradeErrorOf(() => executeTrade(mine, theirs, { add: [qb2], drop: [wr1] }));

    expect(err.details).toEqual({ unplaced: ["qb2"] });
    expect(mine.slotsFor("QB")).toEqual([qb1]);
    expect(mine.slotsFor("WR")).toEqual([wr1]);
    expect(theirs.slotsFor("QB")).toEqual([qb2]);
    expect(theirs.slotsFor("WR")).toEqual([null]);
  });
});
