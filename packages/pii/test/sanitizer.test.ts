import { describe, expect, it } from "vitest";
import {
  EntityPartition,
  NormalizationConflict,
  ReplacementResolver,
  ReviewLedger,
  UnreviewedEntities,
  highlightSegments,
  maskSpans,
  residueCheck,
  sanitizeDocument,
  type EntityCategory,
  type TalkDocument
} from "../src";

function setup(text: string, version = "v1") {
  const document: TalkDocument = {
    documentId: "d1",
    version,
    text,
    language: "en",
    order: 0,
    scannedAt: "2024-05-01T12:00:00.000Z"
  };
  const partition = new EntityPartition();
  const resolver = new ReplacementResolver();
  const ledger = new ReviewLedger({ talkId: "t1", entities: partition, resolver });

  const add = (rawText: string, category: EntityCategory, from = 0, occurrenceVersion = version) => {
    const start = text.indexOf(rawText, from);
    return partition.createEntity(category, {
      documentId: "d1",
      documentVersion: occurrenceVersion,
      start,
      end: start + rawText.length,
      rawText,
      confidence: 0.9,
      superseded: false
    });
  };

  const sanitize = () =>
    sanitizeDocument({
      document,
      entities: partition.list(),
      snapshot: ledger.current(),
      resolver
    });

  return { document, partition, ledger, add, sanitize };
}

describe("sanitizeDocument", () => {
  it("replaces redacted spans and leaves kept ones alone", () => {
    const { add, ledger, sanitize } = setup("Call Bob at +49 30 1234567.");
    const bob = add("Bob", "PERSON");
    const phone = add("+49 30 1234567", "PHONE");
    ledger.decide(bob.entityId, "ACCEPTED_KEEP");
    ledger.decide(phone.entityId, "ACCEPTED_REDACT");

    const result = sanitize();

    expect(result.text).toBe("Call Bob at [PHONE].");
    expect(result.appliedDiff).toEqual([
      {
        entityId: "ent_2",
        start: 12,
        end: 26,
        originalText: "+49 30 1234567",
        replacementText: "[PHONE]"
      }
    ]);
    expect(result.residueWarnings).toEqual([]);
    expect(result.ledgerVersion).toBe(2);
    expect(result.sourceVersion).toBe("v1");
  });

  it("applies one replacement to every occurrence of an entity", () => {
    const { partition, add, ledger, sanitize } = setup("Bob and Bob");
    const bob = add("Bob", "PERSON");
    partition.addOccurrence(bob.entityId, {
      documentId: "d1",
      documentVersion: "v1",
      start: 8,
      end: 11,
      rawText: "Bob",
      confidence: 0.9,
      superseded: false
    });
    ledger.decide(bob.entityId, "EDITED", { replacementText: "Robert" });

    const result = sanitize();

    expect(result.text).toBe("Robert and Robert");
    expect(result.appliedDiff.map((d) => [d.start, d.end])).toEqual([
      [0, 3],
      [8, 11]
    ]);
  });

  it("refuses to emit anything while entities are pending", () => {
    const { add, ledger, sanitize } = setup("Alice met Bob");
    const alice = add("Alice", "PERSON");
    add("Bob", "PERSON");
    ledger.decide(alice.entityId, "ACCEPTED_REDACT");

    expect(sanitize).toThrow(UnreviewedEntities);
    try {
      sanitize();
    } catch (error) {
      if (!(error instanceof UnreviewedEntities)) throw error;
      expect(error.entityIds).toEqual(["ent_2"]);
      expect(error.message).toBe("1 unreviewed entities: ent_2");
    }
  });

  it("warns about personal data no finding covers", () => {
    const { add, ledger, sanitize } = setup("Alice Smith mailed alice@example.org.");
    const alice = add("Alice Smith", "PERSON");
    ledger.decide(alice.entityId, "ACCEPTED_REDACT");

    const result = sanitize();

    expect(result.text).toBe("[PERSON] mailed alice@example.org.");
    expect(result.residueWarnings).toEqual([
      "1 email-like string not covered by any finding. Review sanitized output."
    ]);
  });

  it("rejects occurrences that do not belong to the document version", () => {
    const { add, ledger, sanitize } = setup("Alice met Bob", "v2");
    const alice = add("Alice", "PERSON", 0, "v1");
    ledger.decide(alice.entityId, "ACCEPTED_REDACT");

    expect(sanitize).toThrow(NormalizationConflict);
  });

  it("a document without findings passes through unchanged", () => {
    const { sanitize } = setup("Nothing personal here.");

    const result = sanitize();
    expect(result.text).toBe("Nothing personal here.");
    expect(result.appliedDiff).toEqual([]);
    expect(result.ledgerVersion).toBe(0);
  });
});

describe("residue check", () => {
  it("counts matches per pattern", () => {
    expect(residueCheck("call 030 1234567 or 0171 2345678")).toEqual([
      "2 phone-like strings not covered by any finding. Review sanitized output."
    ]);
  });

  it("masked spans are ignored", () => {
    const text = "mail a@b.de now";
    expect(maskSpans(text, [{ start: 5, end: 11 }])).toBe("mail        now");
    expect(residueCheck(maskSpans(text, [{ start: 5, end: 11 }]))).toEqual([]);
  });
});

describe("highlightSegments", () => {
  it("splits the document into text and findings", () => {
    const { document, partition, add, ledger } = setup("Alice Smith called Bob.");
    const alice = add("Alice Smith", "PERSON");
    add("Bob", "PERSON");
    ledger.decide(alice.entityId, "EDITED", { replacementText: "[PARTICIPANT_1]" });

    expect(
      highlightSegments(document, partition.list(), (id) => ledger.statusOf(id))
    ).toEqual([
      {
        kind: "finding",
        text: "Alice Smith",
        entityId: "ent_1",
        category: "PERSON",
        sensitivity: "medium",
        status: "EDITED",
        start: 0,
        end: 11
      },
      { kind: "text", text: " called " },
      {
        kind: "finding",
        text: "Bob",
        entityId: "ent_2",
        category: "PERSON",
        sensitivity: "medium",
        status: "PENDING",
        start: 19,
        end: 22
      },
      { kind: "text", text: "." }
    ]);
  });
});
