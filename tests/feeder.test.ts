import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { generateFeed, getLatestFeed, resetFeeder } from "../src/feeder/index.js";
import type { FeederConfig } from "../src/feeder/index.js";
import { FeedWriteError } from "../src/writer/index.js";
import { storyPage, stubFetch } from "./helpers/stubFetch.js";
import type { PageReply } from "./helpers/stubFetch.js";


const BUILD_DATE = new Date(Date.UTC(2026, 0, 2, 3, 4, 5));
let dir: string;


function config(replies: Record<number, PageReply>, outputPath = join(dir, "out", "feed.xml")): FeederConfig {
  return {
    api: { url: "https://api.example.test/stories", perPage: 50, language: "en", timeoutMs: 1000 },
    channel: { title: "Test Feed", link: "https://example.com", description: "Test stories", language: "en-us" },
    outputPath,
    fetchFn: stubFetch(replies).fetchFn,
    now: () => BUILD_DATE,
  };
}


beforeEach(async () => {
  resetFeeder();
  dir = await mkdtemp(join(tmpdir(), "storyfeed-feeder-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});


describe("generateFeed", () => {
  it("fetches, sanitizes, serializes and writes the feed", async () => {
    const result = await generateFeed(
      config({
        1: storyPage([{ id: 7, name: "First", content: `<div><p>Hello <b>world</b></p></div>`, issue_number: 3 }], 1),
      }),
    );
    expect(result.itemCount).toBe(1);
    expect(result.generatedAt).toBe(BUILD_DATE);
    expect(result.fetchError).toBeUndefined();
    const written = await readFile(result.outputPath, "utf-8");
    expect(written).toBe(result.xml);
    expect(written).toContain(`\n      <guid isPermaLink="false">7</guid>\n`);
    expect(written).toContain(`\n      <description>Hello world</description>\n`);
    expect(written).toContain(`\n      <content:encoded><![CDATA[<p>Hello <strong>world</strong></p>]]></content:encoded>\n`);
    expect(written).toContain(`\n      <category>Issue 3</category>\n`);
    expect(written).toContain(`\n    <lastBuildDate>Fri, 02 Jan 2026 03:04:05 GMT</lastBuildDate>\n`);
    expect(getLatestFeed()).toBe(result);
  });

  it("writes a partial feed when pagination fails midway", async () => {
    const result = await generateFeed(
      config({
        1: storyPage([{ id: 1, name: "Kept" }], 2),
        2: 503,
      }),
    );
    expect(result.itemCount).toBe(1);
    expect(result.fetchError?.page).toBe(2);
    expect(await readFile(result.outputPath, "utf-8")).toContain("<title>Kept</title>");
  });

  it("shares one run between concurrent callers", async () => {
    const cfg = config({ 1: storyPage([{ id: 1 }], 1) });
    const first = generateFeed(cfg);
    const second = generateFeed(cfg);
    expect(second).toBe(first);
    await first;
  });

  it("fails the run when the feed cannot be written", async () => {
    const blocker = join(dir, "blocker");
    await writeFile(blocker, "not a directory", "utf-8");
    const cfg = config({ 1: storyPage([{ id: 1 }], 1) }, join(blocker, "feed.xml"));
    await expect(generateFeed(cfg)).rejects.toBeInstanceOf(FeedWriteError);
    expect(getLatestFeed()).toBeNull();
  });
});
