// Server mode: Hono on @hono/node-server with periodic regeneration

import { serve } from "@hono/node-server";
import type { AppConfig } from "../config/env.js";
import { initScheduler, stopScheduler } from "../scheduler/index.js";
import { logger } from "../logger/index.js";
import { createApp } from "./router.js";


export async function startServer(config: AppConfig): Promise<void> {
  const app = createApp();
  const server = serve({ fetch: app.fetch, port: config.port });
  logger.info("app", `storyfeed: http://127.0.0.1:${config.port}/feed.xml`);
  const shutdown = () => {
    stopScheduler();
    server.close();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
  await initScheduler(config, config.refreshInterval);
}
