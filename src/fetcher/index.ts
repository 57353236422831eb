export { fetchStoryPages, fetchAllStories, buildPageUrl } from "./stories.js";
export type { FetchFn, StoryFetchOptions, StoryPage, FetchAllResult } from "./stories.js";
export { StoryFetchError } from "./errors.js";
