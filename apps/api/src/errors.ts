import {
  DraftError,
  DraftOrderError,
  PositionError,
  RosterError
} from "@gridiron-draft/core";
import { ScoringError } from "./domain/scoring.js";
import { TradeError } from "./domain/trades.js";

export type ErrorDetails = Record<string, unknown>;

export class AppError extends Error {
  constructor(
    public code: string,
    public status: number,
    message: string,
    public details?: ErrorDetails
  ) {
    super(message);
    this.name = "AppError";
  }
}

export function validationError(message: string, fields?: string[]) {
  return new AppError("VALIDATION_ERROR", 400, message, fields ? { fields } : undefined);
}

export function notFoundError(code: string, message: string) {
  return new AppError(code, 404, message);
}

const domainStatus: Record<string, number> = {
  INVALID_SCHEMA: 400,
  INVALID_INPUT: 400,
  INVALID_PLAYER: 400,
  UNKNOWN_POSITION: 400,
  INVALID_SCHEME: 400,
  PICK_OUT_OF_RANGE: 400,
  PLAYER_NOT_FOUND: 404,
  UNKNOWN_CATEGORY: 404,
  UNKNOWN_STATISTIC: 404,
  ILLEGAL_MOVE: 409,
  MISSING_REPLACEMENT: 409,
  SNAPSHOT_MISMATCH: 409,
  DRAFT_EXHAUSTED: 409,
  PLACEMENT_FAILED: 409,
  TRADE_REJECTED: 409,
  INCONSISTENT_STATE: 500
};

/** Converts errors raised by the roster/draft/scoring domain into an AppError. */
export function mapDomainError(err: unknown): AppError | null {
  if (err instanceof AppError) return err;
  if (
    err instanceof PositionError ||
    err instanceof RosterError ||
    err instanceof DraftError ||
    err instanceof DraftOrderError ||
    err instanceof ScoringError ||
    err instanceof TradeError
  ) {
    return new AppError(err.code, domainStatus[err.code] ?? 400, err.message, err.details);
  }
  return null;
}

export function errorBody(err: AppError | Error) {
  if (err instanceof AppError) {
    return {
      error: {
        code: err.code,
        message: err.message,
        ...(err.details ? { details: err.details } : {})
      }
    };
  }
  return { error: { code: "INTERNAL_ERROR", message: "Unexpected error" } };
}
