import express from "express";
import type { Express } from "express";
import { createHealthRouter } from "./routes/health.js";
import { createDraftsRouter } from "./routes/drafts.js";
import { createScoringRouter } from "./routes/scoring.js";
import { AppError, errorBody, mapDomainError } from "./errors.js";
import { buildRequestLog, deriveDraftContext, isTestRuntime, log } from "./logger.js";
import { loadConfig, type ApiConfig } from "./config/env.js";
import { loadPointScheme, type PointScheme } from "./domain/scoring.js";
import { DraftRoom } from "./services/draftRoom.js";

export function createServer(deps?: {
  config?: ApiConfig;
  room?: DraftRoom;
  scheme?: PointScheme;
}): Express {
  const app = express();
  const config = deps?.config ?? loadConfig();
  const room =
    deps?.room ?? new DraftRoom({ preset: config.preset, rounds: config.defaultRounds });
  const scheme = deps?.scheme ?? loadPointScheme(config.scoringPath);
  app.use(express.json());

  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      log(
        buildRequestLog({
          method: req.method,
          path: req.originalUrl ?? req.url,
          status: res.statusCode,
          duration_ms: Date.now() - start
        })
      );
    });
    next();
  });

  app.use("/health", createHealthRouter(room));
  app.use("/drafts", createDraftsRouter(room));
  app.use("/scoring", createScoringRouter(scheme, config.preset));
  app.get("/", (_req, res) => {
    res.json({ ok: true, service: "draft-room" });
  });
  app.use((_req, res) => {
    res.status(404).json(errorBody(new AppError("NOT_FOUND", 404, "Not found")));
  });

  app.use(
    (
      err: unknown,
      req: express.Request,
      res: express.Response,
      _next: express.NextFunction
    ) => {
      void _next;
      const appErr = mapDomainError(err) ?? undefined;
      const status = appErr?.status ?? bodyParserStatus(err) ?? 500;
      const message =
        appErr?.message ?? (err instanceof Error ? err.message : "Unexpected error");
      // 4xx are client errors (expected sometimes); 5xx are server errors.
      const level = status >= 500 ? "error" : "info";
      const path = req.originalUrl ?? req.url;
      log({
        level,
        msg: "request_error",
        method: req.method,
        path,
        status,
        code: appErr?.code ?? (status < 500 ? "INVALID_BODY" : "INTERNAL_ERROR"),
        error: message,
        error_name: err instanceof Error ? err.name : undefined,
        error_stack:
          (status >= 500 && !isTestRuntime()) || process.env.LOG_STACK === "1"
            ? err instanceof Error
              ? err.stack
              : undefined
            : undefined,
        ...deriveDraftContext(path)
      });
      if (appErr) {
        res.status(status).json(errorBody(appErr));
        return;
      }
      if (status < 500) {
        res.status(status).json(errorBody(new AppError("INVALID_BODY", status, message)));
        return;
      }
      res.status(500).json(errorBody(err instanceof Error ? err : new Error(String(err))));
    }
  );
  return app;
}

// express.json() rejects malformed bodies with an error carrying a 4xx `status`.
function bodyParserStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("status" in err)) return undefined;
  const status = err.status;
  return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
}
