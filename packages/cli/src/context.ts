import pc from "picocolors";
import { loadConfig, type Config } from "@talkguard/core";
import { ReviewClient } from "./client";
import type { Colors } from "./format";

/**
 * What commands need from the outside world. Tests replace the pieces.
 */
export interface CliContext {
  fetch: typeof fetch;
  colors: Colors;
  print: (line: string) => void;
  printError: (line: string) => void;
  setExitCode: (code: number) => void;
  loadConfig: () => Config;
}

export function defaultContext(): CliContext {
  return {
    fetch,
    colors: pc,
    print: (line) => console.log(line),
    printError: (line) => console.error(line),
    setExitCode: (code) => {
      process.exitCode = code;
    },
    loadConfig: () => loadConfig()
  };
}

export interface ServerOptions {
  host?: string;
  port?: string;
}

/**
 * Client for the server named on the command line, or in configuration.
 */
export function clientFor(ctx: CliContext, options: ServerOptions): ReviewClient {
  const needsConfig = options.host === undefined || options.port === undefined;
  const server = needsConfig ? ctx.loadConfig().server : undefined;
  const host = options.host ?? server?.host ?? "127.0.0.1";
  const port = options.port ?? String(server?.port ?? 8430);
  return new ReviewClient(`http://${host}:${port}`, ctx.fetch);
}

/**
 * Run a command body, reporting failures instead of throwing.
 */
export async function report(ctx: CliContext, task: () => Promise<void>): Promise<void> {
  try {
    await task();
  } catch (error) {
    ctx.printError(
      ctx.colors.red(`Error: ${error instanceof Error ? error.message : String(error)}`)
    );
    ctx.setExitCode(1);
  }
}
