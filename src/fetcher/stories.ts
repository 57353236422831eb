// Paginated story API: a lazy async sequence of pages, one GET per page, no retries

import { logger, errorMessage } from "../logger/index.js";
import { storyPageSchema, storySchema } from "../types/story.js";
import type { StoryRecord } from "../types/story.js";
import { StoryFetchError } from "./errors.js";


export type FetchFn = typeof fetch;


export interface StoryFetchOptions {
  apiUrl: string;
  perPage: number;
  language: string;
  timeoutMs: number;
  /** Injected for tests; defaults to the global fetch */
  fetchFn?: FetchFn;
}


export interface StoryPage {
  page: number;
  totalPages: number;
  /** Entries in the response's data array, malformed ones included */
  received: number;
  stories: StoryRecord[];
}


export interface FetchAllResult {
  stories: StoryRecord[];
  pagesFetched: number;
  /** Set when a page failed and pagination stopped early */
  error?: StoryFetchError;
}


export function buildPageUrl(apiUrl: string, page: number, perPage: number, language: string): string {
  const url = new URL(apiUrl);
  url.searchParams.set("page", String(page));
  url.searchParams.set("results_per_page", String(perPage));
  url.searchParams.set("language", language);
  return url.toString();
}


/** Keep object entries, skip anything else with a warning */
function toStories(data: unknown[], page: number): StoryRecord[] {
  const stories: StoryRecord[] = [];
  data.forEach((entry, index) => {
    const parsed = storySchema.safeParse(entry);
    if (parsed.success) {
      stories.push(parsed.data);
    } else {
      logger.warn("fetcher", "skipped malformed story", { page, index });
    }
  });
  return stories;
}


async function fetchPage(options: StoryFetchOptions, page: number): Promise<StoryPage> {
  const fetchFn = options.fetchFn ?? fetch;
  const url = buildPageUrl(options.apiUrl, page, options.perPage, options.language);
  let response: Response;
  try {
    response = await fetchFn(url, {
      headers: { Accept: "application/json" },
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (err) {
    throw new StoryFetchError(`request failed: ${errorMessage(err)}`, page);
  }
  if (!response.ok) {
    throw new StoryFetchError(`HTTP ${response.status}`, page, response.status);
  }
  let body: unknown;
  try {
    body = await response.json();
  } catch (err) {
    throw new StoryFetchError(`invalid JSON: ${errorMessage(err)}`, page, response.status);
  }
  const parsed = storyPageSchema.safeParse(body);
  if (!parsed.success) {
    throw new StoryFetchError("unexpected response shape", page, response.status);
  }
  const data = parsed.data.data ?? [];
  return {
    page,
    totalPages: parsed.data.meta?.total_pages ?? 1,
    received: data.length,
    stories: toStories(data, page),
  };
}


/**
 * Yield pages in order until a page is empty or the last page is reached.
 * Each call starts again from page 1; a failing page throws StoryFetchError.
 */
export async function* fetchStoryPages(options: StoryFetchOptions): AsyncGenerator<StoryPage, void, undefined> {
  let page = 1;
  while (true) {
    logger.debug("fetcher", "fetching page", { page });
    const result = await fetchPage(options, page);
    if (result.received === 0) return;
    yield result;
    if (page >= result.totalPages) return;
    page++;
  }
}


/** Drain every page; a failure stops pagination but keeps the stories already read */
export async function fetchAllStories(options: StoryFetchOptions): Promise<FetchAllResult> {
  const stories: StoryRecord[] = [];
  let pagesFetched = 0;
  try {
    for await (const page of fetchStoryPages(options)) {
      stories.push(...page.stories);
      pagesFetched++;
    }
  } catch (err) {
    const error = err instanceof StoryFetchError ? err : new StoryFetchError(errorMessage(err), pagesFetched + 1);
    logger.warn("fetcher", "pagination stopped early", { page: error.page, err: error.message, kept: stories.length });
    return { stories, pagesFetched, error };
  }
  logger.info("fetcher", "stories fetched", { total: stories.length, pages: pagesFetched });
  return { stories, pagesFetched };
}
