/**
 * Inventory daemon - HTTP API server.
 *
 * Hono app exposing the inventory provider under /api/containers.
 */

import { serve } from "@hono/node-server";
import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import type { InventoryConfig } from "../config.js";
import { logger } from "../logger.js";
import { InventoryProvider, type ProviderContext } from "../provider/inventory-provider.js";
import { createContainersRouter } from "./routes/containers.js";

export function createApp(provider: InventoryProvider): Hono {
  const app = new Hono();

  app.get("/health", (c) => c.json({ status: "ok" }));
  app.route("/api/containers", createContainersRouter(provider));

  app.notFound((c) => c.json({ error: "Not found" }, 404));

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }
    logger.error(`[daemon] Unhandled error on ${c.req.method} ${c.req.path}: ${err.message}`);
    return c.json({ error: "Internal server error" }, 500);
  });

  return app;
}

export interface DaemonHandle {
  close(): Promise<void>;
}

export function startDaemon(config: InventoryConfig): DaemonHandle {
  const provider = new InventoryProvider({ captureStateTimestamps: config.captureStateTimestamps });
  const context: ProviderContext = {
    post: () => {},
    result: (code) => {
      logger.info(`[daemon] Provider lifecycle: ${code}`);
    },
  };
  provider.load(context);

  const app = createApp(provider);
  const server = serve({ fetch: app.fetch, hostname: config.host, port: config.port });
  logger.info(`[daemon] Listening on http://${config.host}:${config.port}`);

  return {
    close: () =>
      new Promise<void>((resolve, reject) => {
        provider.unload(context);
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
