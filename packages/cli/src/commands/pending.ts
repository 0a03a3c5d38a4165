import { Command } from "commander";
import { clientFor, report, type CliContext } from "../context";
import { formatFinding } from "../format";

export function pendingCommand(ctx: CliContext): Command {
  return new Command("pending")
    .description("List findings that still need a decision")
    .argument("<talkId>", "Talk ID")
    .option("-H, --host <host>", "Review API host")
    .option("-p, --port <port>", "Review API port")
    .action((talkId: string, options: { host?: string; port?: string }) =>
      report(ctx, async () => {
        const { colors } = ctx;
        const pending = await clientFor(ctx, options).pending(talkId);

        if (pending.findings.length === 0) {
          ctx.print(colors.green(`No pending findings in ${talkId}`));
          return;
        }

        ctx.print(colors.cyan(`Pending findings in ${talkId} (${pending.findings.length})`));
        ctx.print(colors.gray("-".repeat(60)));
        for (const finding of pending.findings) {
          ctx.print(formatFinding(colors, finding));
        }
        ctx.print("");
        for (const recommendation of pending.recommendations) {
          ctx.print(`${colors.cyan("->")} ${recommendation}`);
        }
      })
    );
}
