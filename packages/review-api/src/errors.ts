/**
 * Error responses.
 *
 * Domain errors map to status codes by their `code`; request bodies that
 * fail validation are rejected with 400 and the list of issues.
 */

import type { Context } from "hono";
import type { z } from "zod";
import {
  InvalidDecision,
  NotFound,
  UnreviewedEntities,
  isPiiError
} from "@talkguard/pii";
import type { Logger } from "@talkguard/core";

export class RequestValidationError extends Error {
  override readonly name = "RequestValidationError";

  constructor(readonly issues: string[]) {
    super(`Invalid request: ${issues.join("; ")}`);
  }
}

/**
 * Parse and validate a JSON body.
 *
 * @throws RequestValidationError
 */
export async function readBody<T>(
  c: Context,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch {
    throw new RequestValidationError(["body: must be valid JSON"]);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new RequestValidationError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "body"}: ${issue.message}`
      )
    );
  }
  return parsed.data;
}

export function handleError(error: Error, c: Context, logger: Logger): Response {
  if (error instanceof RequestValidationError) {
    return c.json(
      { error: "Invalid request", code: "INVALID_REQUEST", issues: error.issues },
      400
    );
  }

  if (isPiiError(error)) {
    const body = { error: error.message, code: error.code };
    if (error instanceof UnreviewedEntities) {
      return c.json({ ...body, entity_ids: error.entityIds }, 409);
    }
    if (error instanceof InvalidDecision) {
      return c.json({ ...body, entity_id: error.entityId ?? null }, 400);
    }
    if (error instanceof NotFound) {
      return c.json({ ...body, kind: error.kind, id: error.id }, 404);
    }
    switch (error.code) {
      case "DETECTION_UNAVAILABLE":
        return c.json(body, 503);
      case "NORMALIZATION_CONFLICT":
      case "TALK_HALTED":
        return c.json(body, 500);
      default:
        return c.json(body, 400);
    }
  }

  logger.error(`${c.req.method} ${c.req.path} failed: ${error.message}`);
  return c.json({ error: "Internal server error", code: "INTERNAL" }, 500);
}
