import { Command } from "commander";
import { setLogLevel } from "@talkguard/core";
import { startReviewServer } from "@talkguard/review-api";
import type { CliContext } from "../context";

export function serveCommand(ctx: CliContext): Command {
  return new Command("serve")
    .description("Start the review API")
    .option("-H, --host <host>", "Host to bind")
    .option("-p, --port <port>", "Port to bind")
    .action((options: { host?: string; port?: string }) => {
      const config = ctx.loadConfig();
      setLogLevel(config.logLevel);

      const port = options.port ? Number.parseInt(options.port, 10) : config.server.port;
      if (!Number.isInteger(port) || port < 1 || port > 65535) {
        ctx.printError(ctx.colors.red(`Invalid port: ${options.port}`));
        ctx.setExitCode(1);
        return;
      }

      const server = startReviewServer({
        config: {
          ...config,
          server: { host: options.host ?? config.server.host, port }
        }
      });
      ctx.print(ctx.colors.cyan(`Review API at ${server.url}`));

      const shutdown = () => {
        server.close().then(
          () => process.exit(0),
          (error: unknown) => {
            ctx.printError(
              ctx.colors.red(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`)
            );
            process.exit(1);
          }
        );
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    });
}
