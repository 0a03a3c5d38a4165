import { readFileSync } from "fs";
import { basename, extname } from "path";
import { Command } from "commander";
import { clientFor, report, type CliContext } from "../context";
import { formatScan } from "../format";

export function scanCommand(ctx: CliContext): Command {
  return new Command("scan")
    .description("Upload a document to a talk and scan it for personal data")
    .argument("<talkId>", "Talk ID")
    .argument("<file>", "Text file to scan")
    .option("-d, --document <id>", "Document ID (default: file name without extension)")
    .option("-l, --language <tag>", "Language of the text (default: configured language)")
    .option("-H, --host <host>", "Review API host")
    .option("-p, --port <port>", "Review API port")
    .action(
      (
        talkId: string,
        file: string,
        options: { document?: string; language?: string; host?: string; port?: string }
      ) =>
        report(ctx, async () => {
          const text = readFileSync(file, "utf-8");
          const documentId = options.document ?? basename(file, extname(file));

          const result = await clientFor(ctx, options).scanDocument(
            talkId,
            documentId,
            text,
            options.language
          );
          for (const line of formatScan(ctx.colors, result)) {
            ctx.print(line);
          }
          if (result.status === "detection_unavailable") {
            ctx.setExitCode(2);
          }
        })
    );
}
