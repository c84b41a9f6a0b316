import { describe, expect, it } from "vitest";
import { Positions, type Player } from "./positions.js";
import { Roster } from "./roster.js";
import { DraftError, SnakeDraft } from "./snakeDraft.js";

const counts = { QB: 1, WR: 2, RB: 2, TE: 1, FLEX: 1, DST: 1, K: 1, BN: 6, IR: 1 };

function makeRosters(n: number, schema: Record<string, number> = counts): Roster[] {
  const positions = new Positions(schema);
  return Array.from({ length: n }, () => new Roster(positions));
}

function players(n: number): Player[] {
  const codes = ["QB", "WR", "RB", "TE", "DST", "K"];
  return Array.from({ length: n }, (_, i) => ({
    id: `p${i + 1}`,
    position: codes[i % codes.length],
    injured_reserve: false
  }));
}

function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof DraftError) return err.code;
    throw err;
  }
  return undefined;
}

describe("SnakeDraft", () => {
  it("rejects empty drafts and bad round counts", () => {
    expect(errorCode(() => new SnakeDraft([], 2))).toBe("INVALID_INPUT");
    expect(errorCode(() => new SnakeDraft(makeRosters(2), 0))).toBe("INVALID_INPUT");
    expect(errorCode(() => new SnakeDraft(makeRosters(2), 1.5))).toBe("INVALID_INPUT");
  });

  it("reverses team order every other round", () => {
    const rosters = makeRosters(4);
    const draft = new SnakeDraft(rosters, 3);
    const order = Array.from({ length: 12 }, (_, i) => draft.getTeamIndex(i + 1));
    expect(order).toEqual([0, 1, 2, 3, 3, 2, 1, 0, 0, 1, 2, 3]);
    expect(draft.getTeam(5)).toBe(rosters[3]);
  });

  it("maps picks to rounds and rejects picks outside the draft", () => {
    const draft = new SnakeDraft(makeRosters(4), 3);
    expect([1, 4, 5, 12].map((pick) => draft.getRound(pick))).toEqual([1, 1, 2, 3]);
    expect(errorCode(() => draft.getRound(0))).toBe("PICK_OUT_OF_RANGE");
    expect(errorCode(() => draft.getRound(13))).toBe("PICK_OUT_OF_RANGE");
    expect(errorCode(() => draft.getTeam(13))).toBe("PICK_OUT_OF_RANGE");
  });

  it("fills a 2-team, 2-round draft in snake order", () => {
    const [teamA, teamB] = makeRosters(2);
    const draft = new SnakeDraft([teamA, teamB], 2);
    const [p1, p2, p3, p4] = players(4);

    expect(draft.peek()).toEqual({ round_number: 1, pick_number: 1 });
    expect(draft.push(p1)).toEqual({ round_number: 1, pick_number: 1, team_index: 0, player: p1 });
    expect(draft.push(p2)).toEqual({ round_number: 1, pick_number: 2, team_index: 1, player: p2 });
    expect(draft.push(p3)).toEqual({ round_number: 2, pick_number: 3, team_index: 1, player: p3 });
    expect(draft.push(p4)).toEqual({ round_number: 2, pick_number: 4, team_index: 0, player: p4 });

    expect(draft.results).toEqual([
      [p1, p2],
      [p4, p3]
    ]);
    expect(teamA.players()).toEqual([p1, p4]);
    expect(teamB.players()).toEqual([p2, p3]);
    expect(draft.peek()).toBeNull();
    expect(draft.exhausted).toBe(true);
    expect(draft.length).toBe(4);
  });

  it("refuses to push once every pick is made", () => {
    const draft = new SnakeDraft(makeRosters(1), 1);
    draft.push(players(1)[0]);
    expect(errorCode(() => draft.push(players(2)[1]))).toBe("DRAFT_EXHAUSTED");
  });

  it("keeps the pick open when the roster has no room", () => {
    const schema = { ...counts, QB: 1, WR: 0, RB: 0, TE: 0, FLEX: 0, DST: 0, K: 0, BN: 0, IR: 0 };
    const draft = new SnakeDraft(makeRosters(1, schema), 2);
    draft.push({ id: "qb1", position: "QB", injured_reserve: false });

    expect(errorCode(() => draft.push({ id: "qb2", position: "QB", injured_reserve: false }))).toBe(
      "PLACEMENT_FAILED"
    );
    expect(draft.peek()).toEqual({ round_number: 2, pick_number: 2 });
    expect(draft.length).toBe(1);
  });

  it("refuses a player id the roster already holds", () => {
    const draft = new SnakeDraft(makeRosters(1), 2);
    const wr = { id: "wr1", position: "WR", injured_reserve: false };
    draft.push(wr);

    expect(errorCode(() => draft.push({ ...wr }))).toBe("PLACEMENT_FAILED");
    expect(draft.getTeam(2).occupied("WR")).toBe(1);
    expect(draft.length).toBe(1);
  });

  it("returns null when there is nothing to undo", () => {
    const draft = new SnakeDraft(makeRosters(2), 2);
    expect(draft.pop()).toBeNull();
  });

  it("undoes the last pick and repeats it on the next push", () => {
    const rosters = makeRosters(3);
    const draft = new SnakeDraft(rosters, 2);
    const pool = players(5);
    pool.forEach((p) => draft.push(p));

    expect(draft.pop()).toEqual({ round_number: 2, pick_number: 5, team_index: 1, player: pool[4] });
    expect(rosters[1].includes(pool[4])).toBe(false);
    expect(draft.peek()).toEqual({ round_number: 2, pick_number: 5 });

    const replacement = { id: "x1", position: "K", injured_reserve: false };
    expect(draft.push(replacement).team_index).toBe(1);
    expect(draft.results[1]).toEqual([null, replacement, pool[3]]);
  });

  it("undoes across the round boundary", () => {
    const draft = new SnakeDraft(makeRosters(3), 2);
    const pool = players(4);
    pool.forEach((p) => draft.push(p));

    expect(draft.pop()?.pick_number).toBe(4);
    expect(draft.pop()).toEqual({ round_number: 1, pick_number: 3, team_index: 2, player: pool[2] });
    expect(draft.peek()).toEqual({ round_number: 1, pick_number: 3 });
  });

  it("returns to the reset state after pushing and popping every pick", () => {
    const rosters = makeRosters(4);
    const draft = new SnakeDraft(rosters, 3);
    const pool = players(12);
    pool.forEach((p) => draft.push(p));

    const undone: Player[] = [];
    for (let i = 0; i < 12; i += 1) {
      const pick = draft.pop();
      if (pick) undone.push(pick.player);
    }

    expect(undone).toEqual([...pool].reverse());
    expect(draft.length).toBe(0);
    expect(draft.peek()).toEqual({ round_number: 1, pick_number: 1 });
    expect(draft.results.flat().every((cell) => cell === null)).toBe(true);
    expect(rosters.every((roster) => roster.occupied() === 0)).toBe(true);
    expect(draft.pop()).toBeNull();
  });

  it("flags a roster that lost a drafted player", () => {
    const rosters = makeRosters(2);
    const draft = new SnakeDraft(rosters, 1);
    const [p1] = players(1);
    draft.push(p1);
    rosters[0].drop(p1);

    expect(errorCode(() => draft.pop())).toBe("INCONSISTENT_STATE");
    expect(draft.length).toBe(1);
  });

  it("resets idempotently", () => {
    const draft = new SnakeDraft(makeRosters(2), 2);
    players(3).forEach((p) => draft.push(p));

    draft.reset();
    const once = { results: draft.results, length: draft.length, next: draft.peek() };
    draft.reset();
    expect({ results: draft.results, length: draft.length, next: draft.peek() }).toEqual(once);
    expect(once).toEqual({
      results: [
        [null, null],
        [null, null]
      ],
      length: 0,
      next: { round_number: 1, pick_number: 1 }
    });
  });

  it("lists completed picks in order and exposes the board", () => {
    const draft = new SnakeDraft(makeRosters(2), 2);
    const pool = players(3);
    pool.forEach((p) => draft.push(p));

    expect(draft.picks().map((pick) => [pick.pick_number, pick.team_index])).toEqual([
      [1, 0],
      [2, 1],
      [3, 1]
    ]);
    expect(draft.board).toEqual([
      [1, 2],
      [4, 3]
    ]);
    expect(draft.volume).toBe(4);
  });
});
