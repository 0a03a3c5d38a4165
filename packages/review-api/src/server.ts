/**
 * Node server bootstrap for the review API.
 */

import { serve } from "@hono/node-server";
import { createLogger, type Config, type Logger } from "@talkguard/core";
import {
  createServiceFromConfig,
  type TalkPrivacyService
} from "@talkguard/pii";
import { createReviewApp } from "./app";

export interface ReviewServerOptions {
  config: Config;
  /** Defaults to a service wired from `config` */
  service?: TalkPrivacyService;
  logger?: Logger;
}

export interface ReviewServer {
  readonly url: string;
  close(): Promise<void>;
}

export function startReviewServer(options: ReviewServerOptions): ReviewServer {
  const { config } = options;
  const log = options.logger ?? createLogger("server");
  const service = options.service ?? createServiceFromConfig(config);
  const app = createReviewApp({ service, startedAt: Date.now(), logger: log });

  const { host, port } = config.server;
  const url = `http://${host}:${port}`;
  const server = serve({ fetch: app.fetch, hostname: host, port }, (info) => {
    log.info(
      `Review API listening on http://${host}:${info.port} (detector: ${service.detectorName}, data: ${config.dataDir})`
    );
  });

  return {
    url,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      })
  };
}
