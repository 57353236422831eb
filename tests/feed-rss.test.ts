import { describe, it, expect } from "vitest";
import { buildFeed, serializeRss, cdata, escapeXml } from "../src/feed/index.js";
import type { FeedDocument } from "../src/feed/index.js";


const doc: FeedDocument = {
  channel: {
    title: "Test Feed",
    link: "https://example.com",
    description: "Stories & more",
    language: "en-us",
    lastBuildDate: new Date(Date.UTC(2026, 0, 2, 3, 4, 5)),
  },
  items: [
    {
      title: "First <one>",
      link: "https://example.com/1",
      guid: { value: "https://example.com/1", isPermaLink: true },
      description: "Plain",
      contentEncoded: "<p>Hi</p>",
      enclosure: { url: "https://example.com/a.png?x=1&y=2", type: "image/jpeg" },
      category: "Issue 3",
    },
    {
      title: "Second",
      guid: { value: "42", isPermaLink: false },
    },
  ],
};


describe("serializeRss", () => {
  it("renders an indented RSS 2.0 document", () => {
    const expected = [
      `<?xml version="1.0" encoding="UTF-8"?>`,
      `<rss version="2.0" xmlns:atom="http://www.w3.org/2005/Atom" xmlns:content="http://purl.org/rss/1.0/modules/content/">`,
      `  <channel>`,
      `    <title>Test Feed</title>`,
      `    <link>https://example.com</link>`,
      `    <description>Stories &amp; more</description>`,
      `    <language>en-us</language>`,
      `    <lastBuildDate>Fri, 02 Jan 2026 03:04:05 GMT</lastBuildDate>`,
      `    <item>`,
      `      <title>First &lt;one&gt;</title>`,
      `      <link>https://example.com/1</link>`,
      `      <guid isPermaLink="true">https://example.com/1</guid>`,
      `      <description>Plain</description>`,
      `      <content:encoded><![CDATA[<p>Hi</p>]]></content:encoded>`,
      `      <enclosure url="https://example.com/a.png?x=1&amp;y=2" type="image/jpeg"/>`,
      `      <category>Issue 3</category>`,
      `    </item>`,
      `    <item>`,
      `      <title>Second</title>`,
      `      <guid isPermaLink="false">42</guid>`,
      `    </item>`,
      `  </channel>`,
      `</rss>`,
      ``,
    ].join("\n");
    expect(serializeRss(doc)).toBe(expected);
  });

  it("adds an atom self link when configured", () => {
    const xml = serializeRss({ channel: { ...doc.channel, selfUrl: "https://example.com/feed.xml" }, items: [] });
    expect(xml).toContain(`\n    <atom:link href="https://example.com/feed.xml" rel="self" type="application/rss+xml"/>\n`);
  });

  it("renders an empty channel", () => {
    const xml = serializeRss({ channel: doc.channel, items: [] });
    expect(xml.endsWith(`    <lastBuildDate>Fri, 02 Jan 2026 03:04:05 GMT</lastBuildDate>\n  </channel>\n</rss>\n`)).toBe(true);
  });

  it("drops control characters XML cannot carry", () => {
    const xml = serializeRss(buildFeed([{ id: 1, name: "T\u0008itle", content: "<p>Hello\u000bworld</p>" }], doc.channel));
    expect(xml).not.toMatch(/[\x00-\x08\x0B\x0C\x0E-\x1F]/);
    expect(xml).toContain("      <title>Title</title>\n");
    expect(xml).toContain("      <description>Hello world</description>\n");
    expect(xml).toContain("      <content:encoded><![CDATA[<p>Helloworld</p>]]></content:encoded>\n");
  });
});


describe("cdata", () => {
  it("splits a literal section terminator", () => {
    expect(cdata("a]]>b")).toBe("<![CDATA[a]]]]><![CDATA[>b]]>");
  });

  it("drops control characters", () => {
    expect(cdata("a\u0000b\u001fc\td")).toBe("<![CDATA[abc\td]]>");
  });
});


describe("escapeXml", () => {
  it("escapes the five XML entities", () => {
    expect(escapeXml(`<a href="x">'&'</a>`)).toBe("&lt;a href=&quot;x&quot;&gt;&apos;&amp;&apos;&lt;/a&gt;");
  });

  it("drops control characters but keeps tab and newline", () => {
    expect(escapeXml("a\u0008b\u000cc\u007f\td\ne")).toBe("abc\td\ne");
  });
});
