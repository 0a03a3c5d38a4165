/**
 * Review API.
 *
 * Handles:
 * - /api/health, /api/status
 * - /api/talks - Known talks
 * - /api/talks/:talkId/documents/* - Upload, scan, highlight, sanitize
 * - /api/talks/:talkId/pending, /findings - Review queue
 * - /api/talks/:talkId/decisions/* - Decisions and their history
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import { createLogger, type Logger } from "@talkguard/core";
import type { TalkPrivacyService } from "@talkguard/pii";
import { handleError } from "./errors";
import { registerDocumentRoutes } from "./routes/documents";
import { registerReviewRoutes } from "./routes/review";

export interface ReviewAppState {
  service: TalkPrivacyService;
  startedAt: number;
  logger?: Logger;
}

export function createReviewApp(state: ReviewAppState): Hono {
  const app = new Hono();
  const log = state.logger ?? createLogger("api");

  // Request logging (enable with DEBUG=1)
  if (process.env.DEBUG) {
    app.use("*", logger());
  }

  // CORS for the review UI dev server
  app.use(
    "/api/*",
    cors({
      origin: ["http://localhost:5173", "http://127.0.0.1:5173"],
      credentials: true
    })
  );

  app.onError((error, c) => handleError(error, c, log));

  app.get("/api/health", (c) => c.json({ status: "ok" }));

  app.get("/api/status", (c) => {
    const uptimeSeconds = Math.max(
      0,
      Math.floor((Date.now() - state.startedAt) / 1000)
    );
    return c.json({
      status: "ok",
      component: "review-api",
      uptime_seconds: uptimeSeconds,
      detector: state.service.detectorName
    });
  });

  app.get("/api/talks", async (c) => {
    return c.json({ talks: await state.service.listTalks() });
  });

  registerDocumentRoutes(app, state);
  registerReviewRoutes(app, state);

  return app;
}
