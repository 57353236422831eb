// Runtime configuration from environment variables (.env loaded by the entry point)

import { resolve } from "node:path";
import { z } from "zod";
import { VALID_INTERVALS } from "../utils/refreshInterval.js";
import type { RefreshInterval } from "../utils/refreshInterval.js";
import { ConfigError } from "./errors.js";


export const DEFAULT_API_URL =
  "https://5qlaecnhel.execute-api.us-east-1.amazonaws.com/prod/ashreinu/api/v1/unlocked/heres-my-story-archive";


const envSchema = z.object({
  STORIES_API_URL: z.string().url().default(DEFAULT_API_URL),
  STORIES_PER_PAGE: z.coerce.number().int().positive().max(500).default(50),
  STORIES_LANGUAGE: z.string().min(1).default("en"),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  FEED_OUTPUT_PATH: z.string().min(1).default("feed.xml"),
  FEED_TITLE: z.string().min(1).default("JEM.tv - Here's My Story Archive"),
  FEED_LINK: z.string().url().default("https://videos.jem.tv/hms/archive"),
  FEED_DESCRIPTION: z
    .string()
    .default("Stories from the Here's My Story archive at JEM.tv - Auto-updated hourly"),
  FEED_LANGUAGE: z.string().min(1).default("en-us"),
  FEED_SELF_URL: z.string().url().optional(),
  PORT: z.coerce.number().int().min(1).max(65535).default(3751),
  REFRESH_INTERVAL: z.enum(VALID_INTERVALS).default("1h"),
});


export interface ChannelConfig {
  title: string;
  link: string;
  description: string;
  language: string;
  selfUrl?: string;
}


export interface AppConfig {
  api: {
    url: string;
    perPage: number;
    language: string;
    timeoutMs: number;
  };
  channel: ChannelConfig;
  /** Absolute path of the generated feed file */
  outputPath: string;
  port: number;
  refreshInterval: RefreshInterval;
}


/** Empty strings count as unset so a blank line in .env falls back to the default */
function dropBlank(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") out[key] = value;
  }
  return out;
}


export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(dropBlank(env));
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join("."));
    const detail = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigError(`invalid configuration: ${detail}`, keys);
  }
  const e = parsed.data;
  return {
    api: {
      url: e.STORIES_API_URL,
      perPage: e.STORIES_PER_PAGE,
      language: e.STORIES_LANGUAGE,
      timeoutMs: e.FETCH_TIMEOUT_MS,
    },
    channel: {
      title: e.FEED_TITLE,
      link: e.FEED_LINK,
      description: e.FEED_DESCRIPTION,
      language: e.FEED_LANGUAGE,
      selfUrl: e.FEED_SELF_URL,
    },
    outputPath: resolve(e.FEED_OUTPUT_PATH),
    port: e.PORT,
    refreshInterval: e.REFRESH_INTERVAL,
  };
}
