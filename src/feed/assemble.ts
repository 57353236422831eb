// Story records → RSS items, one item per story in input order

import { extractText, sanitizeHtml } from "../sanitizer/index.js";
import type { StoryRecord } from "../types/story.js";
import type { FeedDocument, RssChannel, RssItem } from "./types.js";


export const UNTITLED_STORY = "Untitled Story";
export const DESCRIPTION_MAX_LENGTH = 300;
/** Enclosures are always labelled JPEG, whatever the image actually is */
export const ENCLOSURE_TYPE = "image/jpeg";


/** Cut text longer than max code points to max - suffix.length plus suffix */
export function truncateDescription(text: string, max = DESCRIPTION_MAX_LENGTH, suffix = "..."): string {
  const chars = Array.from(text);
  if (chars.length <= max) return text;
  return chars.slice(0, max - suffix.length).join("") + suffix;
}


export function toRssItem(story: StoryRecord): RssItem {
  const item: RssItem = story.link
    ? { title: story.name || UNTITLED_STORY, link: story.link, guid: { value: story.link, isPermaLink: true } }
    : { title: story.name || UNTITLED_STORY, guid: { value: String(story.id ?? ""), isPermaLink: false } };

  const excerpt = extractText(story.description || story.content);
  if (excerpt) {
    item.description = truncateDescription(excerpt);
  }
  if (story.content) {
    item.contentEncoded = sanitizeHtml(story.content);
  }
  const image = story.image || story.thumbnail;
  if (image) {
    item.enclosure = { url: image, type: ENCLOSURE_TYPE };
  }
  if (story.issue_number) {
    item.category = `Issue ${story.issue_number}`;
  }
  return item;
}


export function buildFeed(stories: readonly StoryRecord[], channel: RssChannel): FeedDocument {
  return { channel, items: stories.map(toRssItem) };
}
