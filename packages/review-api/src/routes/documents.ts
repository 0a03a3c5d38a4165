/**
 * Document routes.
 *
 * Provides endpoints for:
 * - Uploading (and scanning) documents of a talk
 * - Listing a talk's documents
 * - Highlight segments and sanitized output per document
 *
 * @module routes/documents
 */

import type { Hono } from "hono";
import { z } from "zod";
import type { ReviewAppState } from "../app";
import {
  documentToDict,
  sanitizedToDict,
  scanResultToDict,
  segmentToDict
} from "../dict-converters";
import { readBody } from "../errors";

const DocumentBodySchema = z.object({
  text: z.string(),
  language: z.string().min(1).optional()
});

const DocumentBatchSchema = z.object({
  documents: z
    .array(
      z.object({
        document_id: z.string().min(1),
        text: z.string(),
        language: z.string().min(1).optional()
      })
    )
    .min(1)
});

export function registerDocumentRoutes(app: Hono, state: ReviewAppState): void {
  /**
   * PUT /api/talks/:talkId/documents/:documentId
   *
   * Store and scan one document. Replacing the text creates a new version.
   * Responds 503 when the detector is unavailable; nothing is stored then.
   */
  app.put("/api/talks/:talkId/documents/:documentId", async (c) => {
    const { talkId, documentId } = c.req.param();
    const body = await readBody(c, DocumentBodySchema);

    const result = await state.service.scanDocument(talkId, {
      documentId,
      text: body.text,
      language: body.language
    });
    if (result.status === "detection_unavailable") {
      return c.json(scanResultToDict(result), 503);
    }
    return c.json(scanResultToDict(result));
  });

  /**
   * POST /api/talks/:talkId/documents
   *
   * Scan several documents. Every document gets its own result; a detector
   * failure only marks the affected document.
   */
  app.post("/api/talks/:talkId/documents", async (c) => {
    const talkId = c.req.param("talkId");
    const body = await readBody(c, DocumentBatchSchema);

    const results = await state.service.scanDocuments(
      talkId,
      body.documents.map((d) => ({
        documentId: d.document_id,
        text: d.text,
        language: d.language
      }))
    );
    return c.json({ results: results.map(scanResultToDict) });
  });

  app.get("/api/talks/:talkId/documents", async (c) => {
    const talkId = c.req.param("talkId");
    const documents = await state.service.listDocuments(talkId);
    return c.json({ talk_id: talkId, documents: documents.map(documentToDict) });
  });

  app.get("/api/talks/:talkId/documents/:documentId/highlight", async (c) => {
    const { talkId, documentId } = c.req.param();
    const segments = await state.service.highlight(talkId, documentId);
    return c.json({
      talk_id: talkId,
      document_id: documentId,
      segments: segments.map(segmentToDict)
    });
  });

  /**
   * GET /api/talks/:talkId/documents/:documentId/sanitized
   *
   * Responds 409 with `entity_ids` while any entity in the document is
   * still pending.
   */
  app.get("/api/talks/:talkId/documents/:documentId/sanitized", async (c) => {
    const { talkId, documentId } = c.req.param();
    const sanitized = await state.service.sanitize(talkId, documentId);
    return c.json(sanitizedToDict(sanitized));
  });
}
