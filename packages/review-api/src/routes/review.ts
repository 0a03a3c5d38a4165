/**
 * Review routes: pending findings, decisions and their history.
 *
 * @module routes/review
 */

import type { Hono } from "hono";
import { z } from "zod";
import { REVIEW_STATUSES } from "@talkguard/pii";
import type { ReviewAppState } from "../app";
import {
  decisionToDict,
  findingToDict,
  snapshotToDict
} from "../dict-converters";
import { readBody } from "../errors";

const DecisionBodySchema = z.object({
  entity_id: z.string().min(1),
  status: z.enum(REVIEW_STATUSES),
  replacement_text: z.string().optional(),
  note: z.string().optional(),
  decided_at: z.string().optional()
});

export function registerReviewRoutes(app: Hono, state: ReviewAppState): void {
  /**
   * GET /api/talks/:talkId/pending
   *
   * Findings still awaiting a decision, in document order, with reviewer
   * recommendations.
   */
  app.get("/api/talks/:talkId/pending", async (c) => {
    const pending = await state.service.getPending(c.req.param("talkId"));
    return c.json({
      talk_id: pending.talkId,
      findings: pending.findings.map(findingToDict),
      recommendations: pending.recommendations
    });
  });

  app.get("/api/talks/:talkId/findings", async (c) => {
    const talkId = c.req.param("talkId");
    const findings = await state.service.listFindings(talkId);
    return c.json({ talk_id: talkId, findings: findings.map(findingToDict) });
  });

  /**
   * POST /api/talks/:talkId/decisions
   *
   * Record a decision. `applied` is false when an entry with a later
   * `decided_at` already exists; the new entry is then kept for audit only.
   */
  app.post("/api/talks/:talkId/decisions", async (c) => {
    const talkId = c.req.param("talkId");
    const body = await readBody(c, DecisionBodySchema);

    const outcome = await state.service.decide(talkId, {
      entityId: body.entity_id,
      status: body.status,
      replacementText: body.replacement_text,
      note: body.note,
      decidedAt: body.decided_at
    });
    return c.json(
      {
        recorded: decisionToDict(outcome.recorded),
        current: decisionToDict(outcome.current),
        applied: outcome.applied
      },
      201
    );
  });

  app.get("/api/talks/:talkId/decisions", async (c) => {
    const snapshot = await state.service.current(c.req.param("talkId"));
    return c.json(snapshotToDict(snapshot));
  });

  app.get("/api/talks/:talkId/decisions/history", async (c) => {
    const talkId = c.req.param("talkId");
    const history = await state.service.history(talkId, c.req.query("entity_id"));
    return c.json({ talk_id: talkId, decisions: history.map(decisionToDict) });
  });
}
