import { serve } from "@hono/node-server";

import type { ResolvedGatewayConfig } from "../config/defaults.js";
import type { Logger } from "../logging/logger.js";
import type { SessionStore } from "../sessions/store.js";
import { createGatewayApp } from "./app.js";

export interface StartGatewayOptions {
  config: ResolvedGatewayConfig;
  store: SessionStore;
  logger: Logger;
  redactTokens?: boolean;
}

/** Bind the gateway app to a Node HTTP server. */
export function startGateway(options: StartGatewayOptions): ReturnType<typeof serve> {
  const { config, store, logger, redactTokens } = options;
  const app = createGatewayApp({
    store,
    logger,
    publicBaseUrl: config.publicBaseUrl,
    redactTokens,
  });

  return serve(
    { fetch: app.fetch, port: config.port, hostname: config.host },
    (info) => {
      logger.info(`Gateway listening on http://${info.address}:${info.port}`);
    },
  );
}
