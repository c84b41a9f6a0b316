import express from "express";
import type { Router } from "express";
import type { DraftRoom } from "../services/draftRoom.js";

export function buildHealthHandler(room: Pick<DraftRoom, "listDrafts">) {
  return function healthHandler(_req: unknown, res: { json: (body: unknown) => void }) {
    res.json({ ok: true, service: "draft-room", drafts: room.listDrafts().length });
  };
}

export function createHealthRouter(room: DraftRoom): Router {
  const router = express.Router();
  router.get("/", buildHealthHandler(room));
  return router;
}
