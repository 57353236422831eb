// FeedDocument → RSS 2.0 XML with the atom and content namespaces

import type { FeedDocument, RssChannel, RssItem } from "./types.js";


export const ATOM_NS = "http://www.w3.org/2005/Atom";
export const CONTENT_NS = "http://purl.org/rss/1.0/modules/content/";


/** Code points XML 1.0 does not allow in a document, plus DEL */
const INVALID_XML_CHARS = /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g;


export function stripInvalidXmlChars(s: string): string {
  return s.replace(INVALID_XML_CHARS, "");
}


export function escapeXml(s: string): string {
  return stripInvalidXmlChars(s)
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}


/** Wrap in CDATA; a literal ]]> is split across two sections */
export function cdata(s: string): string {
  return `<![CDATA[${stripInvalidXmlChars(s).replace(/\]\]>/g, "]]]]><![CDATA[>")}]]>`;
}


function element(indent: string, name: string, text: string): string {
  return `${indent}<${name}>${escapeXml(text)}</${name}>\n`;
}


function buildItem(item: RssItem): string {
  const pad = "      ";
  let buf = `    <item>\n`;
  buf += element(pad, "title", item.title);
  if (item.link) buf += element(pad, "link", item.link);
  buf += `${pad}<guid isPermaLink="${item.guid.isPermaLink}">${escapeXml(item.guid.value)}</guid>\n`;
  if (item.description) buf += element(pad, "description", item.description);
  if (item.contentEncoded) buf += `${pad}<content:encoded>${cdata(item.contentEncoded)}</content:encoded>\n`;
  if (item.enclosure) {
    buf += `${pad}<enclosure url="${escapeXml(item.enclosure.url)}" type="${escapeXml(item.enclosure.type)}"/>\n`;
  }
  if (item.category) buf += element(pad, "category", item.category);
  buf += `    </item>\n`;
  return buf;
}


function buildChannelHead(channel: RssChannel): string {
  const pad = "    ";
  let buf = "";
  buf += element(pad, "title", channel.title);
  buf += element(pad, "link", channel.link);
  buf += element(pad, "description", channel.description);
  buf += element(pad, "language", channel.language);
  buf += element(pad, "lastBuildDate", channel.lastBuildDate.toUTCString());
  if (channel.selfUrl) {
    buf += `${pad}<atom:link href="${escapeXml(channel.selfUrl)}" rel="self" type="application/rss+xml"/>\n`;
  }
  return buf;
}


export function serializeRss(doc: FeedDocument): string {
  const items = doc.items.map(buildItem).join("");
  return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:atom="${ATOM_NS}" xmlns:content="${CONTENT_NS}">
  <channel>
${buildChannelHead(doc.channel)}${items}  </channel>
</rss>
`;
}
