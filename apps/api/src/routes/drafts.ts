import express from "express";
import type { Router } from "express";
import { validationError } from "../errors.js";
import type { DraftRoom } from "../services/draftRoom.js";
import {
  parseCreateDraftBody,
  parsePlayer,
  parsePlayers,
  parseTeamIndex
} from "./drafts/helpers.js";

type Handler = (
  req: express.Request,
  res: express.Response,
  next: express.NextFunction
) => void;

function draftIdOf(req: express.Request): string {
  const id = String(req.params.id ?? "").trim();
  if (!id) throw validationError("Invalid draft id", ["id"]);
  return id;
}

export function buildCreateDraftHandler(room: DraftRoom): Handler {
  return function handleCreateDraft(req, res, next) {
    try {
      const draft = room.createDraft(parseCreateDraftBody(req.body));
      res.status(201).json({ draft });
    } catch (err) {
      next(err);
    }
  };
}

export function buildGetDraftHandler(room: DraftRoom): Handler {
  return function handleGetDraft(req, res, next) {
    try {
      res.json({ draft: room.getDraft(draftIdOf(req)) });
    } catch (err) {
      next(err);
    }
  };
}

export function buildSubmitPickHandler(room: DraftRoom): Handler {
  return function handleSubmitPick(req, res, next) {
    try {
      const draftId = draftIdOf(req);
      const player = parsePlayer(req.body?.player);
      res.status(201).json(room.submitPick(draftId, player));
    } catch (err) {
      next(err);
    }
  };
}

export function buildUndoPickHandler(room: DraftRoom): Handler {
  return function handleUndoPick(req, res, next) {
    try {
      res.json(room.undoPick(draftIdOf(req)));
    } catch (err) {
      next(err);
    }
  };
}

export function buildResetDraftHandler(room: DraftRoom): Handler {
  return function handleResetDraft(req, res, next) {
    try {
      res.json({ draft: room.resetDraft(draftIdOf(req)) });
    } catch (err) {
      next(err);
    }
  };
}

export function buildMovePlayerHandler(room: DraftRoom): Handler {
  return function handleMovePlayer(req, res, next) {
    try {
      const draftId = draftIdOf(req);
      const teamIndex = parseTeamIndex(req.params.team, "team");
      const destination = req.body?.destination;
      if (typeof destination !== "string" || !destination.trim()) {
        throw validationError("destination is required", ["destination"]);
      }
      const replace =
        req.body?.replace === undefined ? undefined : parsePlayer(req.body.replace, "replace");
      const draft = room.movePlayer(draftId, teamIndex, {
        player: parsePlayer(req.body?.player),
        destination: destination.trim(),
        replace
      });
      res.json({ draft });
    } catch (err) {
      next(err);
    }
  };
}

export function buildTradeHandler(room: DraftRoom): Handler {
  return function handleTrade(req, res, next) {
    try {
      const draftId = draftIdOf(req);
      const summary = room.trade(draftId, {
        from: parseTeamIndex(req.body?.from, "from"),
        to: parseTeamIndex(req.body?.to, "to"),
        add: parsePlayers(req.body?.add, "add"),
        drop: parsePlayers(req.body?.drop, "drop")
      });
      res.json({ trade: summary });
    } catch (err) {
      next(err);
    }
  };
}

export function createDraftsRouter(room: DraftRoom): Router {
  const router = express.Router();
  router.post("/", buildCreateDraftHandler(room));
  router.get("/:id", buildGetDraftHandler(room));
  router.post("/:id/picks", buildSubmitPickHandler(room));
  router.delete("/:id/picks/last", buildUndoPickHandler(room));
  router.post("/:id/reset", buildResetDraftHandler(room));
  router.post("/:id/teams/:team/moves", buildMovePlayerHandler(room));
  router.post("/:id/trades", buildTradeHandler(room));
  return router;
}
