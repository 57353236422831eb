import { resolve } from "node:path";
import { describe, it, expect } from "vitest";
import { DEFAULT_API_URL, loadConfig } from "../src/config/env.js";
import { ConfigError } from "../src/config/errors.js";


describe("loadConfig", () => {
  it("fills every setting with its default", () => {
    const config = loadConfig({});
    expect(config.api).toEqual({ url: DEFAULT_API_URL, perPage: 50, language: "en", timeoutMs: 10_000 });
    expect(config.channel.language).toBe("en-us");
    expect(config.channel.selfUrl).toBeUndefined();
    expect(config.outputPath).toBe(resolve("feed.xml"));
    expect(config.port).toBe(3751);
    expect(config.refreshInterval).toBe("1h");
  });

  it("reads and coerces overrides", () => {
    const config = loadConfig({
      STORIES_PER_PAGE: "25",
      FEED_OUTPUT_PATH: "/srv/feeds/stories.xml",
      FEED_SELF_URL: "https://example.com/feed.xml",
      FEED_TITLE: "Stories",
      REFRESH_INTERVAL: "6h",
      PORT: "8080",
    });
    expect(config.api.perPage).toBe(25);
    expect(config.outputPath).toBe("/srv/feeds/stories.xml");
    expect(config.channel.selfUrl).toBe("https://example.com/feed.xml");
    expect(config.channel.title).toBe("Stories");
    expect(config.refreshInterval).toBe("6h");
    expect(config.port).toBe(8080);
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ FEED_LANGUAGE: "  " }).channel.language).toBe("en-us");
  });

  it("names the invalid keys", () => {
    let caught: unknown;
    try {
      loadConfig({ STORIES_PER_PAGE: "lots", REFRESH_INTERVAL: "2h" });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError ? caught.keys : []).toEqual(["STORIES_PER_PAGE", "REFRESH_INTERVAL"]);
  });
});
