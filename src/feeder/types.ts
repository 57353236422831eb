// Feeder inputs and outputs

import type { ChannelConfig } from "../config/env.js";
import type { FetchFn } from "../fetcher/index.js";
import type { StoryFetchError } from "../fetcher/index.js";


export interface FeederConfig {
  api: {
    url: string;
    perPage: number;
    language: string;
    timeoutMs: number;
  };
  channel: ChannelConfig;
  outputPath: string;
  /** Injected for tests */
  fetchFn?: FetchFn;
  /** Build timestamp source, injected for tests */
  now?: () => Date;
}


export interface FeederResult {
  xml: string;
  itemCount: number;
  outputPath: string;
  generatedAt: Date;
  /** Present when pagination stopped early; the feed holds the stories read before it */
  fetchError?: StoryFetchError;
}
