import { beforeEach, describe, expect, it } from "vitest";
import type { Hono } from "hono";
import {
  InMemoryTalkRepository,
  TalkPrivacyService,
  type DetectedSpan,
  type EntityDetector
} from "@talkguard/pii";
import { createReviewApp } from "../src";

const DOC1 = "Alice Smith called Bob.";

/**
 * Reports "Alice Smith" and "Bob" wherever they occur; can be switched to
 * a detector that never answers.
 */
class NameDetector implements EntityDetector {
  readonly name = "names";
  stalled = false;

  async detect(text: string): Promise<DetectedSpan[]> {
    if (this.stalled) {
      return new Promise<DetectedSpan[]>(() => {});
    }
    const spans: DetectedSpan[] = [];
    for (const [name, confidence] of [
      ["Alice Smith", 0.95],
      ["Bob", 0.6]
    ] as const) {
      const start = text.indexOf(name);
      if (start !== -1) {
        spans.push({ start, end: start + name.length, category: "PERSON", confidence });
      }
    }
    return spans.sort((a, b) => a.start - b.start);
  }
}

function json(body: unknown): RequestInit {
  return {
    body: JSON.stringify(body),
    headers: { "Content-Type": "application/json" }
  };
}

describe("review API", () => {
  let detector: NameDetector;
  let app: Hono;

  beforeEach(() => {
    detector = new NameDetector();
    const service = new TalkPrivacyService({
      repository: new InMemoryTalkRepository(),
      detector,
      timeoutMs: 20
    });
    app = createReviewApp({ service, startedAt: Date.now() });
  });

  const upload = (documentId: string, text: string) =>
    app.request(`/api/talks/t1/documents/${documentId}`, { method: "PUT", ...json({ text }) });

  const decide = (body: Record<string, unknown>) =>
    app.request("/api/talks/t1/decisions", { method: "POST", ...json(body) });

  it("GET /api/health", async () => {
    const res = await app.request("/api/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok" });
  });

  it("GET /api/status names the detector", async () => {
    const res = await app.request("/api/status");
    expect(await res.json()).toMatchObject({
      status: "ok",
      component: "review-api",
      detector: "names"
    });
  });

  it("PUT a document scans it", async () => {
    const res = await upload("d1", DOC1);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: "scanned",
      talk_id: "t1",
      document_id: "d1",
      detector: "names",
      pending_count: 2,
      created: ["ent_1", "ent_2"],
      extended: [],
      skipped_overlaps: 0,
      dropped_overlaps: [],
      ambiguous: []
    });
  });

  it("PUT responds 503 when detection is unavailable", async () => {
    detector.stalled = true;

    const res = await upload("d1", DOC1);

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({
      status: "detection_unavailable",
      talk_id: "t1",
      document_id: "d1",
      reason: "names timed out after 20 ms"
    });

    const pending = await app.request("/api/talks/t1/pending");
    expect(await pending.json()).toEqual({
      talk_id: "t1",
      findings: [],
      recommendations: ["No personal data detected"]
    });
  });

  it("PUT rejects a body without text", async () => {
    const res = await app.request("/api/talks/t1/documents/d1", {
      method: "PUT",
      ...json({ language: "de" })
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Invalid request",
      code: "INVALID_REQUEST",
      issues: ["text: Required"]
    });
  });

  it("POST scans several documents", async () => {
    const res = await app.request("/api/talks/t1/documents", {
      method: "POST",
      ...json({
        documents: [
          { document_id: "d1", text: DOC1 },
          { document_id: "d2", text: "Nobody here." }
        ]
      })
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      results: [
        { status: "scanned", document_id: "d1" },
        { status: "scanned", document_id: "d2" }
      ]
    });

    const list = await app.request("/api/talks/t1/documents");
    expect(await list.json()).toMatchObject({
      documents: [
        { document_id: "d1", order: 0, char_count: 23 },
        { document_id: "d2", order: 1, char_count: 12 }
      ]
    });
  });

  it("GET pending lists findings with recommendations", async () => {
    await upload("d1", DOC1);

    const res = await app.request("/api/talks/t1/pending");
    expect(await res.json()).toEqual({
      talk_id: "t1",
      findings: [
        {
          entity_id: "ent_1",
          category: "PERSON",
          sample_occurrence_text: "Alice Smith",
          confidence: 0.95,
          occurrence_count: 1,
          status: "PENDING",
          sensitivity: "medium",
          description: "Person name",
          suggestion: "Check whether this is a private individual"
        },
        {
          entity_id: "ent_2",
          category: "PERSON",
          sample_occurrence_text: "Bob",
          confidence: 0.6,
          occurrence_count: 1,
          status: "PENDING",
          sensitivity: "medium",
          description: "Person name",
          suggestion: "Check whether this is a private individual"
        }
      ],
      recommendations: ["Check person names for relevance and anonymize where needed"]
    });
  });

  it("sanitized output is refused while findings are pending", async () => {
    await upload("d1", DOC1);

    const res = await app.request("/api/talks/t1/documents/d1/sanitized");

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({
      error: "2 unreviewed entities: ent_1, ent_2",
      code: "UNREVIEWED_ENTITIES",
      entity_ids: ["ent_1", "ent_2"]
    });
  });

  it("decisions drive the sanitized output", async () => {
    await upload("d1", DOC1);

    const edited = await decide({
      entity_id: "ent_1",
      status: "EDITED",
      replacement_text: "[PARTICIPANT_1]"
    });
    expect(edited.status).toBe(201);
    expect(await edited.json()).toMatchObject({
      recorded: {
        decision_id: "dec_1",
        entity_id: "ent_1",
        status: "EDITED",
        resolved_replacement: "[PARTICIPANT_1]",
        supersedes: null
      },
      applied: true
    });
    await decide({ entity_id: "ent_2", status: "ACCEPTED_KEEP" });

    const res = await app.request("/api/talks/t1/documents/d1/sanitized");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      document_id: "d1",
      source_version: expect.any(String),
      ledger_version: 2,
      text: "[PARTICIPANT_1] called Bob.",
      applied_diff: [
        {
          entity_id: "ent_1",
          start: 0,
          end: 11,
          original_text: "Alice Smith",
          replacement_text: "[PARTICIPANT_1]"
        }
      ],
      residue_warnings: []
    });
  });

  it("invalid decisions are rejected with 400", async () => {
    await upload("d1", DOC1);

    const missing = await decide({ entity_id: "ent_1", status: "EDITED" });
    expect(missing.status).toBe(400);
    expect(await missing.json()).toEqual({
      error: "Replacement text is required for EDITED",
      code: "INVALID_DECISION",
      entity_id: "ent_1"
    });

    const unknownStatus = await decide({ entity_id: "ent_1", status: "MAYBE" });
    expect(unknownStatus.status).toBe(400);
    expect(await unknownStatus.json()).toMatchObject({ code: "INVALID_REQUEST" });
  });

  it("history keeps superseded decisions", async () => {
    await upload("d1", DOC1);
    await decide({ entity_id: "ent_1", status: "ACCEPTED_REDACT", decided_at: "2024-05-01T10:00:00Z" });
    await decide({ entity_id: "ent_1", status: "ACCEPTED_KEEP", decided_at: "2024-05-01T11:00:00Z" });
    await decide({ entity_id: "ent_2", status: "ACCEPTED_KEEP" });

    const all = await app.request("/api/talks/t1/decisions/history");
    expect(await all.json()).toMatchObject({
      decisions: [
        { decision_id: "dec_1", status: "ACCEPTED_REDACT" },
        { decision_id: "dec_2", status: "ACCEPTED_KEEP", supersedes: "dec_1" },
        { decision_id: "dec_3", entity_id: "ent_2" }
      ]
    });

    const one = await app.request("/api/talks/t1/decisions/history?entity_id=ent_2");
    expect(await one.json()).toMatchObject({ decisions: [{ decision_id: "dec_3" }] });

    const current = await app.request("/api/talks/t1/decisions");
    expect(await current.json()).toMatchObject({
      talk_id: "t1",
      version: 3,
      decisions: {
        ent_1: { decision_id: "dec_2", status: "ACCEPTED_KEEP" },
        ent_2: { decision_id: "dec_3" }
      }
    });
  });

  it("highlight segments cover the document", async () => {
    await upload("d1", DOC1);

    const res = await app.request("/api/talks/t1/documents/d1/highlight");
    expect(await res.json()).toMatchObject({
      document_id: "d1",
      segments: [
        { kind: "finding", text: "Alice Smith", entity_id: "ent_1", status: "PENDING" },
        { kind: "text", text: " called " },
        { kind: "finding", text: "Bob", entity_id: "ent_2" },
        { kind: "text", text: "." }
      ]
    });
  });

  it("unknown documents and talks are 404", async () => {
    const doc = await app.request("/api/talks/t1/documents/nope/sanitized");
    expect(doc.status).toBe(404);
    expect(await doc.json()).toEqual({
      error: "Unknown document: nope",
      code: "NOT_FOUND",
      kind: "document",
      id: "nope"
    });

    const talk = await app.request("/api/talks/.hidden/pending");
    expect(talk.status).toBe(404);
  });

  it("GET /api/talks lists talks with stored data", async () => {
    await upload("d1", DOC1);

    const res = await app.request("/api/talks");
    expect(await res.json()).toEqual({ talks: ["t1"] });
  });
});
