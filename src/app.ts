import cors from "cors";
import express, { type Response } from "express";
import type { Logger } from "pino";
import { z } from "zod";
import type { AnnotationSession } from "./annotationSession.js";
import {
  AnnotationError,
  CandidateFrequencyError,
  InvalidTokenError,
  RowIndexError
} from "./errors.js";
import { dispatchCommand, renderSessionView } from "./services/commandService.js";
import { buildReviewIndex, DEFAULT_REVIEW_LIMIT } from "./services/reviewIndex.js";
import type { SessionCommand } from "./types.js";

export const EXPORT_FILENAME = "标注结果.csv";

export type AppOptions = {
  session: AnnotationSession;
  logger: Logger;
  reviewLimit?: number;
};

const toggleSchema = z.object({
  token: z
    .string()
    .min(1)
    .max(200)
    .regex(/^\S+$/, "Token must not contain whitespace.")
});

const navigateSchema = z.object({
  delta: z.number().int()
});

const jumpSchema = z.object({
  index: z.number().int().min(0)
});

const reviewQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(5000).optional()
});

function statusForError(error: unknown): number {
  if (
    error instanceof z.ZodError ||
    error instanceof RowIndexError ||
    error instanceof InvalidTokenError
  ) {
    return 400;
  }
  if (error instanceof CandidateFrequencyError) {
    return 422;
  }
  return 500;
}

export function createApp(options: AppOptions): express.Express {
  const { session, logger } = options;
  const reviewLimit = options.reviewLimit ?? DEFAULT_REVIEW_LIMIT;
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: "64kb" }));

  function sendError(res: Response, error: unknown, fallback: string): Response {
    const status = statusForError(error);
    if (error instanceof z.ZodError) {
      return res.status(status).json({
        error: "Invalid request body.",
        issues: error.issues
      });
    }

    if (status >= 500) {
      logger.error({ err: error }, fallback);
    } else {
      logger.warn({ err: error }, fallback);
    }
    return res.status(status).json({
      error: error instanceof Error ? error.message : fallback,
      code: error instanceof AnnotationError ? error.code : undefined
    });
  }

  function runCommand(res: Response, command: SessionCommand, fallback: string): Response {
    try {
      return res.json(dispatchCommand(session, command));
    } catch (error) {
      return sendError(res, error, fallback);
    }
  }

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true, now: new Date().toISOString() });
  });

  app.get("/api/session/state", (_req, res) => {
    try {
      return res.json(renderSessionView(session));
    } catch (error) {
      return sendError(res, error, "Failed to load the current row.");
    }
  });

  app.post("/api/session/toggle", (req, res) => {
    const parsed = toggleSchema.safeParse(req.body);
    if (!parsed.success) {
      return sendError(res, parsed.error, "Invalid request body.");
    }
    return runCommand(res, { type: "toggle", token: parsed.data.token }, "Failed to toggle candidate.");
  });

  app.post("/api/session/not-a-word", (_req, res) => {
    return runCommand(res, { type: "toggle-not-a-word" }, "Failed to toggle not-a-word.");
  });

  app.post("/api/session/navigate", (req, res) => {
    const parsed = navigateSchema.safeParse(req.body);
    if (!parsed.success) {
      return sendError(res, parsed.error, "Invalid request body.");
    }
    return runCommand(res, { type: "navigate", delta: parsed.data.delta }, "Failed to change row.");
  });

  app.post("/api/session/jump", (req, res) => {
    const parsed = jumpSchema.safeParse(req.body);
    if (!parsed.success) {
      return sendError(res, parsed.error, "Invalid request body.");
    }
    return runCommand(res, { type: "jump", index: parsed.data.index }, "Failed to jump to row.");
  });

  app.post("/api/session/save", (_req, res) => {
    try {
      const view = dispatchCommand(session, { type: "save" });
      return res.json({
        ok: true,
        savedAt: new Date().toISOString(),
        view
      });
    } catch (error) {
      return sendError(res, error, "Failed to save progress.");
    }
  });

  app.get("/api/session/review", (req, res) => {
    const parsed = reviewQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return sendError(res, parsed.error, "Invalid review query.");
    }
    return res.json({
      entries: buildReviewIndex(session.store, parsed.data.limit ?? reviewLimit),
      progress: session.getProgressSummary()
    });
  });

  app.get("/api/session/export", (_req, res) => {
    try {
      const csv = session.export();
      res.setHeader(
        "Content-Disposition",
        `attachment; filename="annotations.csv"; filename*=UTF-8''${encodeURIComponent(EXPORT_FILENAME)}`
      );
      res.setHeader("Content-Type", "text/csv; charset=utf-8");
      res.setHeader("Cache-Control", "no-store");
      return res.send(csv);
    } catch (error) {
      return sendError(res, error, "Failed to export annotations.");
    }
  });

  return app;
}
