import { writeFileSync } from "fs";
import { Command } from "commander";
import { ApiError } from "../client";
import { clientFor, type CliContext } from "../context";

export function sanitizeCommand(ctx: CliContext): Command {
  return new Command("sanitize")
    .description("Print (or write) a document with all decisions applied")
    .argument("<talkId>", "Talk ID")
    .argument("<documentId>", "Document ID")
    .option("-o, --output <file>", "Write the sanitized text to a file")
    .option("-H, --host <host>", "Review API host")
    .option("-p, --port <port>", "Review API port")
    .action(
      async (
        talkId: string,
        documentId: string,
        options: { output?: string; host?: string; port?: string }
      ) => {
        const { colors } = ctx;
        try {
          const sanitized = await clientFor(ctx, options).sanitized(talkId, documentId);

          for (const warning of sanitized.residue_warnings) {
            ctx.printError(colors.yellow(`Warning: ${warning}`));
          }
          if (options.output) {
            writeFileSync(options.output, sanitized.text);
            ctx.print(
              colors.green(
                `Wrote ${options.output} (${sanitized.applied_diff.length} replacements, ledger version ${sanitized.ledger_version})`
              )
            );
          } else {
            ctx.print(sanitized.text);
          }
        } catch (error) {
          if (error instanceof ApiError && error.code === "UNREVIEWED_ENTITIES") {
            ctx.printError(colors.red(`Cannot sanitize ${documentId}: review pending first`));
            for (const entityId of error.entityIds) {
              ctx.printError(`  ${colors.blue(entityId)}`);
            }
          } else {
            ctx.printError(
              colors.red(`Error: ${error instanceof Error ? error.message : String(error)}`)
            );
          }
          ctx.setExitCode(1);
        }
      }
    );
}
