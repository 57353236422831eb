export { buildFeed, toRssItem, truncateDescription, UNTITLED_STORY, DESCRIPTION_MAX_LENGTH, ENCLOSURE_TYPE } from "./assemble.js";
export { serializeRss, escapeXml, cdata, stripInvalidXmlChars, ATOM_NS, CONTENT_NS } from "./rss.js";
export type { FeedDocument, RssChannel, RssItem, RssGuid, RssEnclosure } from "./types.js";
