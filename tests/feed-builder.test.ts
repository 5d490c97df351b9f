import { describe, expect, test } from "vitest";
import { escapeXml, feedText, renderFeed, sortItems } from "../src/services/feed-builder.js";
import type { FeedItem, FeedRoot } from "../src/types/feed.js";

function item(title: string, pubDate: string, extra: Partial<FeedItem> = {}): FeedItem {
  return {
    title,
    link: `https://example.com/${title.toLowerCase()}`,
    description: `About ${title}`,
    author: "writer@example.com",
    pubDate,
    ...extra,
  };
}

describe("text escaping", () => {
  test("escapes markup characters", () => {
    expect(escapeXml(`a & b <c> "d" 'e'`)).toBe("a &amp; b &lt;c&gt; &quot;d&quot; &apos;e&apos;");
  });

  test("leaves author-supplied CDATA alone", () => {
    const value = '<![CDATA[Hi <img src="IMG_SRC">]]>';
    expect(feedText(value)).toBe(value);
    expect(feedText("<![CDATA[unterminated")).toBe("&lt;![CDATA[unterminated");
  });
});

describe("sortItems", () => {
  test("puts the newest first and keeps ties in order", () => {
    const items = [
      item("Old", "Mon, 01 Jan 2024 00:00:00 +0000"),
      item("New", "Wed, 03 Jan 2024 00:00:00 +0000"),
      item("TieA", "Tue, 02 Jan 2024 00:00:00 +0000"),
      item("TieB", "Tue, 02 Jan 2024 00:00:00 +0000"),
      item("Undated", "someday"),
    ];
    expect(sortItems(items).map((entry) => entry.title)).toEqual(["New", "TieA", "TieB", "Old", "Undated"]);
  });
});

describe("renderFeed", () => {
  test("renders the channel and its items", () => {
    const root: FeedRoot = { title: "Notes", link: "https://example.com/", description: "Tom & Jerry" };
    const items = [
      item("First", "Mon, 01 Jan 2024 00:00:00 +0000", { description: "<![CDATA[Hi <b>there</b>]]>" }),
      item("Second", "Tue, 02 Jan 2024 00:00:00 +0000", { description: "x < y", sevenDate: "1.2024" }),
    ];

    const xml = renderFeed(root, items, { now: new Date(Date.UTC(2024, 0, 3, 12, 0, 0)), offsetMinutes: 0 });

    expect(xml).toBe(
      [
        "<?xml version='1.0' encoding='utf-8'?>",
        '<rss version="2.0">',
        "  <channel>",
        "    <title>Notes</title>",
        "    <link>https://example.com/</link>",
        "    <description>Tom &amp; Jerry</description>",
        "    <lastBuildDate>Wed, 03 Jan 2024 12:00:00 +0000</lastBuildDate>",
        "    <item>",
        "      <title>Second</title>",
        "      <link>https://example.com/second</link>",
        "      <description>x &lt; y</description>",
        "      <author>writer@example.com</author>",
        "      <pubDate>Tue, 02 Jan 2024 00:00:00 +0000</pubDate>",
        "      <guid>https://example.com/second</guid>",
        "    </item>",
        "    <item>",
        "      <title>First</title>",
        "      <link>https://example.com/first</link>",
        "      <description><![CDATA[Hi <b>there</b>]]></description>",
        "      <author>writer@example.com</author>",
        "      <pubDate>Mon, 01 Jan 2024 00:00:00 +0000</pubDate>",
        "      <guid>https://example.com/first</guid>",
        "    </item>",
        "  </channel>",
        "</rss>",
        "",
      ].join("\n"),
    );
  });

  test("includes optional channel fields when set", () => {
    const root: FeedRoot = {
      title: "Notes",
      link: "https://example.com/",
      description: "D",
      language: "en-us",
      copyright: " ",
    };
    const xml = renderFeed(root, [], { now: new Date(Date.UTC(2024, 0, 3, 12, 0, 0)), offsetMinutes: 0 });
    expect(xml).toContain("\n    <language>en-us</language>\n    <lastBuildDate>");
    expect(xml).not.toContain("<copyright>");
  });
});
