// Router: Hono HTTP layer over the feeder, nothing else

import { Hono } from "hono";
import { getLatestFeed } from "../feeder/index.js";
import type { FeederResult } from "../feeder/index.js";


/** getLatest is injected so tests can serve a fixed result */
export function createApp(getLatest: () => FeederResult | null = getLatestFeed) {
  const app = new Hono();

  app.get("/feed.xml", (c) => {
    const latest = getLatest();
    if (!latest) return c.text("feed not generated yet", 503, { "Retry-After": "60" });
    return c.body(latest.xml, 200, {
      "Content-Type": "application/rss+xml; charset=utf-8",
      "Last-Modified": latest.generatedAt.toUTCString(),
    });
  });

  app.get("/health", (c) => {
    const latest = getLatest();
    return c.json({
      ok: latest != null,
      items: latest?.itemCount ?? 0,
      generatedAt: latest?.generatedAt.toISOString() ?? null,
      partial: latest?.fetchError != null,
    });
  });

  return app;
}
