/**
 * HTTP client for a running review API.
 *
 * Responses are validated so that a server of a different version fails
 * with a clear message instead of printing undefined fields.
 */

import { z } from "zod";

const StatusSchema = z.enum(["PENDING", "ACCEPTED_REDACT", "ACCEPTED_KEEP", "EDITED"]);

export const ScanResponseSchema = z.discriminatedUnion("status", [
  z.object({
    status: z.literal("scanned"),
    talk_id: z.string(),
    document_id: z.string(),
    version: z.string(),
    detector: z.string(),
    pending_count: z.number(),
    created: z.array(z.string()),
    extended: z.array(z.string()),
    skipped_overlaps: z.number(),
    dropped_overlaps: z.array(
      z.object({ category: z.string(), text: z.string(), start: z.number(), end: z.number() })
    ),
    ambiguous: z.array(
      z.object({
        text: z.string(),
        entity_ids: z.array(z.string()),
        created_entity_id: z.string()
      })
    )
  }),
  z.object({
    status: z.literal("detection_unavailable"),
    talk_id: z.string(),
    document_id: z.string(),
    reason: z.string()
  })
]);

export const FindingSchema = z.object({
  entity_id: z.string(),
  category: z.string(),
  sample_occurrence_text: z.string(),
  confidence: z.number(),
  occurrence_count: z.number(),
  status: StatusSchema,
  sensitivity: z.enum(["low", "medium", "high", "critical"])
});

export const PendingResponseSchema = z.object({
  talk_id: z.string(),
  findings: z.array(FindingSchema),
  recommendations: z.array(z.string())
});

export const DecisionSchema = z.object({
  decision_id: z.string(),
  sequence: z.number(),
  entity_id: z.string(),
  status: StatusSchema,
  resolved_replacement: z.string().nullable(),
  reviewer_note: z.string().nullable(),
  decided_at: z.string(),
  supersedes: z.string().nullable()
});

export const DecisionResponseSchema = z.object({
  recorded: DecisionSchema,
  current: DecisionSchema,
  applied: z.boolean()
});

export const HistoryResponseSchema = z.object({
  talk_id: z.string(),
  decisions: z.array(DecisionSchema)
});

export const SanitizedResponseSchema = z.object({
  document_id: z.string(),
  source_version: z.string(),
  ledger_version: z.number(),
  text: z.string(),
  applied_diff: z.array(z.object({ entity_id: z.string() })),
  residue_warnings: z.array(z.string())
});

const ErrorBodySchema = z.object({
  error: z.string(),
  code: z.string().optional(),
  entity_ids: z.array(z.string()).optional()
});

export type ScanResponse = z.infer<typeof ScanResponseSchema>;
export type Finding = z.infer<typeof FindingSchema>;
export type PendingResponse = z.infer<typeof PendingResponseSchema>;
export type Decision = z.infer<typeof DecisionSchema>;
export type DecisionResponse = z.infer<typeof DecisionResponseSchema>;
export type HistoryResponse = z.infer<typeof HistoryResponseSchema>;
export type SanitizedResponse = z.infer<typeof SanitizedResponseSchema>;

export class ApiError extends Error {
  override readonly name = "ApiError";

  constructor(
    readonly status: number,
    message: string,
    readonly code?: string,
    readonly entityIds: string[] = []
  ) {
    super(message);
  }
}

export interface DecisionRequest {
  entityId: string;
  status: string;
  replacementText?: string;
  note?: string;
}

export class ReviewClient {
  constructor(
    readonly baseUrl: string,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  private async call<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    init: RequestInit = {},
    acceptStatuses: number[] = []
  ): Promise<T> {
    let res: Response;
    try {
      res = await this.fetchImpl(`${this.baseUrl}${path}`, init);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(
        `Review API not reachable at ${this.baseUrl} (${message}). Is \`talkguard serve\` running?`,
        { cause: error }
      );
    }

    const body: unknown = await res.json().catch(() => null);
    if (!res.ok && !acceptStatuses.includes(res.status)) {
      const parsed = ErrorBodySchema.safeParse(body);
      if (parsed.success) {
        throw new ApiError(res.status, parsed.data.error, parsed.data.code, parsed.data.entity_ids);
      }
      throw new ApiError(res.status, `Request failed with status ${res.status}`);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new Error(`Unexpected response from ${path}: ${parsed.error.issues[0]?.message ?? "invalid body"}`);
    }
    return parsed.data;
  }

  private static json(method: string, body: unknown): RequestInit {
    return {
      method,
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body)
    };
  }

  scanDocument(
    talkId: string,
    documentId: string,
    text: string,
    language?: string
  ): Promise<ScanResponse> {
    return this.call(
      `/api/talks/${encodeURIComponent(talkId)}/documents/${encodeURIComponent(documentId)}`,
      ScanResponseSchema,
      ReviewClient.json("PUT", { text, language }),
      [503]
    );
  }

  pending(talkId: string): Promise<PendingResponse> {
    return this.call(`/api/talks/${encodeURIComponent(talkId)}/pending`, PendingResponseSchema);
  }

  decide(talkId: string, request: DecisionRequest): Promise<DecisionResponse> {
    return this.call(
      `/api/talks/${encodeURIComponent(talkId)}/decisions`,
      DecisionResponseSchema,
      ReviewClient.json("POST", {
        entity_id: request.entityId,
        status: request.status,
        replacement_text: request.replacementText,
        note: request.note
      })
    );
  }

  sanitized(talkId: string, documentId: string): Promise<SanitizedResponse> {
    return this.call(
      `/api/talks/${encodeURIComponent(talkId)}/documents/${encodeURIComponent(documentId)}/sanitized`,
      SanitizedResponseSchema
    );
  }

  history(talkId: string, entityId?: string): Promise<HistoryResponse> {
    const query = entityId ? `?entity_id=${encodeURIComponent(entityId)}` : "";
    return this.call(
      `/api/talks/${encodeURIComponent(talkId)}/decisions/history${query}`,
      HistoryResponseSchema
    );
  }
}
