import type { Player, Roster, TransactionSummary } from "@gridiron-draft/core";

export class TradeError extends Error {
  constructor(
    message: string,
    public code: "TRADE_REJECTED",
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "TradeError";
  }
}

export type TradeSummary = {
  roster: TransactionSummary;
  other: TransactionSummary;
};

function missing(expected: Player[], actual: Player[]): Player[] {
  return expected.filter((player) => !actual.includes(player));
}

/**
 * All-or-nothing trade between two rosters. Outgoing players leave both rosters before
 * incoming players are placed, so a full roster can still swap like for like. Any failure
 * restores both rosters to their state before the trade.
 */
export function executeTrade(
  roster: Roster,
  other: Roster,
  options: { add: Player[]; drop: Player[] }
): TradeSummary {
  const { add, drop } = options;
  const before = roster.snapshot();
  const otherBefore = other.snapshot();

  const rollback = (reason: string, details: Record<string, unknown>): never => {
    roster.restore(before);
    other.restore(otherBefore);
    throw new TradeError(reason, "TRADE_REJECTED", details);
  };

  let summary: TradeSummary;
  try {
    const dropped = roster.drop(...drop);
    const otherDropped = other.drop(...add);
    const added = roster.add(...add);
    const otherAdded = other.add(...drop);
    summary = {
      roster: { added, dropped },
      other: { added: otherAdded, dropped: otherDropped }
    };
  } catch (err: unknown) {
    return rollback("Trade could not be applied", {
      cause: err instanceof Error ? err.message : String(err),
      ...(err instanceof Error && "code" in err ? { cause_code: err.code } : {})
    });
  }

  const unplaced = [...missing(add, summary.roster.added), ...missing(drop, summary.other.added)];
  if (unplaced.length) {
    return rollback("Not every traded player fits the receiving roster", {
      unplaced: unplaced.map((player) => player.id ?? player.position)
    });
  }
  return summary;
}
