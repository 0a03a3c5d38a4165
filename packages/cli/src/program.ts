import { Command } from "commander";
import { decideCommand } from "./commands/decide";
import { historyCommand } from "./commands/history";
import { pendingCommand } from "./commands/pending";
import { sanitizeCommand } from "./commands/sanitize";
import { scanCommand } from "./commands/scan";
import { serveCommand } from "./commands/serve";
import { defaultContext, type CliContext } from "./context";

export function createProgram(overrides: Partial<CliContext> = {}): Command {
  const ctx: CliContext = { ...defaultContext(), ...overrides };

  return new Command("talkguard")
    .description("Review and redact personal data in talk documents")
    .version("0.1.0")
    .addCommand(serveCommand(ctx))
    .addCommand(scanCommand(ctx))
    .addCommand(pendingCommand(ctx))
    .addCommand(decideCommand(ctx))
    .addCommand(sanitizeCommand(ctx))
    .addCommand(historyCommand(ctx));
}

export type { CliContext } from "./context";
export { ApiError, ReviewClient } from "./client";
