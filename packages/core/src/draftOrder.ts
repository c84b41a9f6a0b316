export type PickSlot = {
  round_number: number;
  pick_number: number;
};

export class DraftOrderError extends Error {
  constructor(
    message: string,
    public code: "INVALID_INPUT",
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "DraftOrderError";
  }
}

function requirePositiveInteger(name: string, value: number) {
  if (!Number.isInteger(value) || value <= 0) {
    throw new DraftOrderError(`${name} must be a positive integer`, "INVALID_INPUT", {
      [name]: value
    });
  }
}

export function roundForPick(seatCount: number, pickNumber: number): number {
  requirePositiveInteger("seatCount", seatCount);
  requirePositiveInteger("pickNumber", pickNumber);
  return Math.ceil(pickNumber / seatCount);
}

export function getSnakeSeatForPick(seatCount: number, pickNumber: number): number {
  requirePositiveInteger("seatCount", seatCount);
  requirePositiveInteger("pickNumber", pickNumber);

  const roundIndex = Math.floor((pickNumber - 1) / seatCount); // 0-based round
  const indexInRound = (pickNumber - 1) % seatCount; // 0-based position within round

  const forward = roundIndex % 2 === 0;
  if (forward) {
    return indexInRound + 1; // seats are 1-based
  }
  return seatCount - indexInRound;
}

export function snakeSequence(seatCount: number, rounds: number): PickSlot[] {
  requirePositiveInteger("seatCount", seatCount);
  requirePositiveInteger("rounds", rounds);
  return Array.from({ length: seatCount * rounds }, (_, i) => ({
    round_number: Math.floor(i / seatCount) + 1,
    pick_number: i + 1
  }));
}

/**
 * Absolute pick numbers laid out by round (rows) and seat (columns), e.g. for 3 seats:
 * `[[1, 2, 3], [6, 5, 4]]`.
 */
export function buildDraftBoard(seatCount: number, rounds: number): number[][] {
  const board = Array.from({ length: rounds }, () => new Array<number>(seatCount).fill(0));
  for (const { round_number, pick_number } of snakeSequence(seatCount, rounds)) {
    board[round_number - 1][getSnakeSeatForPick(seatCount, pick_number) - 1] = pick_number;
  }
  return board;
}
