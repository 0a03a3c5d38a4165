import { Command, InvalidArgumentError } from "commander";
import { clientFor, report, type CliContext } from "../context";
import { formatOutcome } from "../format";

const STATUS_ALIASES: Record<string, string> = {
  redact: "ACCEPTED_REDACT",
  keep: "ACCEPTED_KEEP",
  edit: "EDITED",
  edited: "EDITED",
  pending: "PENDING",
  reopen: "PENDING"
};

/**
 * Accepts the status names and short aliases (redact, keep, edit, reopen).
 */
export function parseStatus(value: string): string {
  const upper = value.toUpperCase();
  if (["PENDING", "ACCEPTED_REDACT", "ACCEPTED_KEEP", "EDITED"].includes(upper)) {
    return upper;
  }
  const alias = STATUS_ALIASES[value.toLowerCase()];
  if (!alias) {
    throw new InvalidArgumentError(
      "Expected one of redact, keep, edit, reopen (or ACCEPTED_REDACT, ACCEPTED_KEEP, EDITED, PENDING)."
    );
  }
  return alias;
}

export function decideCommand(ctx: CliContext): Command {
  return new Command("decide")
    .description("Record a review decision for an entity")
    .argument("<talkId>", "Talk ID")
    .argument("<entityId>", "Entity ID (see `talkguard pending`)")
    .argument("<status>", "redact | keep | edit | reopen", parseStatus)
    .option("-r, --replacement <text>", "Replacement text (required for edit)")
    .option("-n, --note <text>", "Reviewer note")
    .option("-H, --host <host>", "Review API host")
    .option("-p, --port <port>", "Review API port")
    .action(
      (
        talkId: string,
        entityId: string,
        status: string,
        options: { replacement?: string; note?: string; host?: string; port?: string }
      ) =>
        report(ctx, async () => {
          const outcome = await clientFor(ctx, options).decide(talkId, {
            entityId,
            status,
            replacementText: options.replacement,
            note: options.note
          });
          for (const line of formatOutcome(ctx.colors, outcome)) {
            ctx.print(line);
          }
        })
    );
}
