import { Command } from "commander";
import { clientFor, report, type CliContext } from "../context";
import { formatDecision } from "../format";

export function historyCommand(ctx: CliContext): Command {
  return new Command("history")
    .description("Show the decision log of a talk, superseded entries included")
    .argument("<talkId>", "Talk ID")
    .option("-e, --entity <entityId>", "Only decisions for this entity")
    .option("-H, --host <host>", "Review API host")
    .option("-p, --port <port>", "Review API port")
    .action((talkId: string, options: { entity?: string; host?: string; port?: string }) =>
      report(ctx, async () => {
        const history = await clientFor(ctx, options).history(talkId, options.entity);
        if (history.decisions.length === 0) {
          ctx.print(ctx.colors.gray("No decisions recorded"));
          return;
        }
        for (const decision of history.decisions) {
          ctx.print(formatDecision(ctx.colors, decision));
        }
      })
    );
}
