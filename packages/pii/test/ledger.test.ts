import { beforeEach, describe, expect, it } from "vitest";
import {
  EntityPartition,
  InvalidDecision,
  KeyedMutex,
  ReplacementResolver,
  ReviewLedger,
  type Occurrence
} from "../src";

const NOW = new Date("2024-05-01T12:00:00.000Z");

function occurrence(rawText: string, start: number, documentId = "d1"): Occurrence {
  return {
    documentId,
    documentVersion: "v1",
    start,
    end: start + rawText.length,
    rawText,
    confidence: 0.9,
    superseded: false
  };
}

describe("ReviewLedger", () => {
  let partition: EntityPartition;
  let ledger: ReviewLedger;

  beforeEach(() => {
    partition = new EntityPartition();
    partition.createEntity("PERSON", occurrence("Alice Smith", 0));
    partition.createEntity("EMAIL", occurrence("a@b.de", 20));
    ledger = new ReviewLedger({
      talkId: "t1",
      entities: partition,
      resolver: new ReplacementResolver(),
      now: () => NOW
    });
  });

  describe("validation", () => {
    it("rejects unknown entities", () => {
      expect(() => ledger.decide("ent_99", "ACCEPTED_REDACT")).toThrow(
        new InvalidDecision("Unknown entity: ent_99")
      );
    });

    it("requires replacement text for EDITED", () => {
      expect(() => ledger.decide("ent_1", "EDITED")).toThrow(
        "Replacement text is required for EDITED"
      );
    });

    it("rejects replacement text for ACCEPTED_KEEP", () => {
      expect(() =>
        ledger.decide("ent_1", "ACCEPTED_KEEP", { replacementText: "x" })
      ).toThrow("Replacement text is not allowed for ACCEPTED_KEEP");
    });

    it("rejects blank replacement text", () => {
      expect(() => ledger.decide("ent_1", "EDITED", { replacementText: "  " })).toThrow(
        "Replacement text must not be empty"
      );
    });

    it("rejects unparseable timestamps", () => {
      expect(() =>
        ledger.decide("ent_1", "ACCEPTED_REDACT", { decidedAt: "yesterday-ish" })
      ).toThrow("Invalid decidedAt: yesterday-ish");
    });

    it("a rejected decision leaves no trace", () => {
      expect(() => ledger.decide("ent_1", "EDITED")).toThrow();
      expect(ledger.version).toBe(0);
      expect(ledger.history()).toEqual([]);
    });
  });

  it("resolves the category mask for a plain redaction", () => {
    const { recorded, applied } = ledger.decide("ent_2", "ACCEPTED_REDACT");

    expect(applied).toBe(true);
    expect(recorded).toEqual({
      decisionId: "dec_1",
      sequence: 1,
      entityId: "ent_2",
      status: "ACCEPTED_REDACT",
      resolvedReplacement: "[EMAIL]",
      decidedAt: "2024-05-01T12:00:00.000Z",
      recordedAt: "2024-05-01T12:00:00.000Z"
    });
    expect(Object.isFrozen(recorded)).toBe(true);
  });

  it("keeps the reviewer's replacement and note", () => {
    const { recorded } = ledger.decide("ent_1", "EDITED", {
      replacementText: "[PARTICIPANT_1]",
      note: "speaker asked for it"
    });

    expect(recorded.replacementText).toBe("[PARTICIPANT_1]");
    expect(recorded.resolvedReplacement).toBe("[PARTICIPANT_1]");
    expect(recorded.reviewerNote).toBe("speaker asked for it");
  });

  it("a later decision supersedes the current one", () => {
    ledger.decide("ent_1", "ACCEPTED_REDACT", { decidedAt: "2024-05-01T10:00:00Z" });
    const { recorded, current, applied } = ledger.decide("ent_1", "ACCEPTED_KEEP", {
      decidedAt: "2024-05-01T11:00:00Z"
    });

    expect(applied).toBe(true);
    expect(current).toBe(recorded);
    expect(recorded.supersedes).toBe("dec_1");
    expect(ledger.statusOf("ent_1")).toBe("ACCEPTED_KEEP");
    expect(ledger.history("ent_1").map((d) => d.status)).toEqual([
      "ACCEPTED_REDACT",
      "ACCEPTED_KEEP"
    ]);
  });

  it("an older decision is logged but does not win", () => {
    ledger.decide("ent_1", "ACCEPTED_REDACT", { decidedAt: "2024-05-01T10:00:00Z" });
    const { recorded, current, applied } = ledger.decide("ent_1", "ACCEPTED_KEEP", {
      decidedAt: "2024-05-01T09:00:00Z"
    });

    expect(applied).toBe(false);
    expect(recorded.supersedes).toBeUndefined();
    expect(current.decisionId).toBe("dec_1");
    expect(ledger.statusOf("ent_1")).toBe("ACCEPTED_REDACT");
    expect(ledger.version).toBe(2);
  });

  it("equal timestamps fall back to log order", () => {
    ledger.decide("ent_1", "ACCEPTED_REDACT");
    const { applied } = ledger.decide("ent_1", "ACCEPTED_KEEP");

    expect(applied).toBe(true);
    expect(ledger.statusOf("ent_1")).toBe("ACCEPTED_KEEP");
  });

  it("PENDING reopens a finding", () => {
    ledger.decide("ent_1", "ACCEPTED_REDACT", { decidedAt: "2024-05-01T10:00:00Z" });
    ledger.decide("ent_1", "PENDING", { decidedAt: "2024-05-01T11:00:00Z" });

    expect(ledger.getPending(new Map([["d1", 0]])).map((e) => e.entityId)).toEqual([
      "ent_1",
      "ent_2"
    ]);
  });

  it("pending entities are ordered by document, then offset", () => {
    partition.createEntity("PERSON", occurrence("Bob", 0, "d0"));

    const order = new Map([
      ["d0", 0],
      ["d1", 1]
    ]);
    expect(ledger.getPending(order).map((e) => e.entityId)).toEqual([
      "ent_3",
      "ent_1",
      "ent_2"
    ]);
  });

  it("snapshots do not change after later decisions", () => {
    const before = ledger.current();
    ledger.decide("ent_1", "ACCEPTED_REDACT");

    expect(before.version).toBe(0);
    expect(before.decisions.size).toBe(0);
    expect(ledger.current().decisions.get("ent_1")?.status).toBe("ACCEPTED_REDACT");
  });

  it("the current index can be rebuilt from the log", () => {
    ledger.decide("ent_1", "ACCEPTED_REDACT", { decidedAt: "2024-05-01T10:00:00Z" });
    ledger.decide("ent_1", "ACCEPTED_KEEP", { decidedAt: "2024-05-01T09:00:00Z" });
    ledger.decide("ent_2", "EDITED", { replacementText: "[CONTACT]" });

    const restored = new ReviewLedger({
      talkId: "t1",
      entities: partition,
      resolver: new ReplacementResolver(),
      log: [...ledger.history()].reverse()
    });

    expect(restored.version).toBe(3);
    expect(restored.current().decisions).toEqual(ledger.current().decisions);

    ledger.rebuildIndex();
    expect(ledger.statusOf("ent_1")).toBe("ACCEPTED_REDACT");
    expect(ledger.statusOf("ent_2")).toBe("EDITED");
  });
});

describe("KeyedMutex", () => {
  it("runs tasks for one key one at a time, in order", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const task = (label: string) => async () => {
      events.push(`${label}:start`);
      await new Promise((resolve) => setTimeout(resolve, 5));
      events.push(`${label}:end`);
      return label;
    };

    const results = await Promise.all([
      mutex.runExclusive("t1", task("a")),
      mutex.runExclusive("t1", task("b"))
    ]);

    expect(results).toEqual(["a", "b"]);
    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end"]);
    expect(mutex.isLocked("t1")).toBe(false);
  });

  it("releases the key when a task fails", async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive("t1", () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    await expect(mutex.runExclusive("t1", () => "next")).resolves.toBe("next");
  });

  it("does not serialize different keys", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const slow = mutex.runExclusive("t1", async () => {
      await gate;
      events.push("t1");
    });
    await mutex.runExclusive("t2", () => {
      events.push("t2");
    });
    release();
    await slow;

    expect(events).toEqual(["t2", "t1"]);
  });
});
