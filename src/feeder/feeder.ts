// Feeder: one generation run, fetch → assemble → serialize → write

import { fetchAllStories } from "../fetcher/index.js";
import { buildFeed, serializeRss } from "../feed/index.js";
import type { RssChannel } from "../feed/index.js";
import { writeFeedFile } from "../writer/index.js";
import { logger } from "../logger/index.js";
import type { FeederConfig, FeederResult } from "./types.js";


/** A trigger arriving while a run is in flight joins that run */
let generating: Promise<FeederResult> | null = null;
let latest: FeederResult | null = null;


async function runOnce(config: FeederConfig): Promise<FeederResult> {
  const fetched = await fetchAllStories({
    apiUrl: config.api.url,
    perPage: config.api.perPage,
    language: config.api.language,
    timeoutMs: config.api.timeoutMs,
    fetchFn: config.fetchFn,
  });
  const generatedAt = (config.now ?? (() => new Date()))();
  const channel: RssChannel = { ...config.channel, lastBuildDate: generatedAt };
  const doc = buildFeed(fetched.stories, channel);
  const xml = serializeRss(doc);
  await writeFeedFile(config.outputPath, xml);
  logger.info("feeder", "feed generated", {
    items: doc.items.length,
    pages: fetched.pagesFetched,
    partial: fetched.error != null,
  });
  const result: FeederResult = {
    xml,
    itemCount: doc.items.length,
    outputPath: config.outputPath,
    generatedAt,
    fetchError: fetched.error,
  };
  latest = result;
  return result;
}


/** Generate and write the feed; concurrent callers share one run */
export function generateFeed(config: FeederConfig): Promise<FeederResult> {
  if (generating) return generating;
  const run = runOnce(config).finally(() => {
    generating = null;
  });
  generating = run;
  return run;
}


/** Result of the last successful run in this process */
export function getLatestFeed(): FeederResult | null {
  return latest;
}


/** Forget the cached result; used between tests */
export function resetFeeder(): void {
  generating = null;
  latest = null;
}
