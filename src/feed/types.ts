// RSS 2.0 document model: channel metadata plus ordered items

export interface RssChannel {
  title: string;
  link: string;
  description: string;
  language: string;
  lastBuildDate: Date;
  /** Public URL of the feed itself, emitted as atom:link rel="self" */
  selfUrl?: string;
}

export interface RssGuid {
  value: string;
  isPermaLink: boolean;
}

export interface RssEnclosure {
  url: string;
  type: string;
}

export interface RssItem {
  title: string;
  link?: string;
  guid: RssGuid;
  /** Plain text excerpt */
  description?: string;
  /** Sanitized HTML, emitted as content:encoded */
  contentEncoded?: string;
  enclosure?: RssEnclosure;
  category?: string;
}

export interface FeedDocument {
  channel: RssChannel;
  items: RssItem[];
}
