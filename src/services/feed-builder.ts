import { element, render, textNode, type MarkupNode } from "../domain/markup.js";
import type { FeedItem, FeedRoot } from "../types/feed.js";
import { formatRfc2822, parseRfc2822 } from "../utils/rfc2822.js";

const CDATA_OPEN = "<![CDATA[";
const CDATA_CLOSE = "]]>";

export function escapeXml(value: string): string {
  return value
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll("\"", "&quot;")
    .replaceAll("'", "&apos;");
}

function isCdata(value: string): boolean {
  const trimmed = value.trim();
  return trimmed.startsWith(CDATA_OPEN) && trimmed.endsWith(CDATA_CLOSE);
}

// Authors opt out of escaping by wrapping a value in a CDATA section themselves.
export function feedText(value: string): string {
  return isCdata(value) ? value : escapeXml(value);
}

function optionalField(tag: string, value: string | undefined): MarkupNode[] {
  if (value === undefined || value.trim() === "") {
    return [];
  }
  return [textNode(tag, feedText(value))];
}

/** Newest first; items with equal or unreadable dates keep their order. */
export function sortItems(items: readonly FeedItem[]): FeedItem[] {
  const timestamp = (item: FeedItem) => parseRfc2822(item.pubDate)?.getTime() ?? Number.NEGATIVE_INFINITY;
  return items
    .map((item, position) => ({ item, position, time: timestamp(item) }))
    .sort((a, b) => (a.time === b.time ? a.position - b.position : b.time > a.time ? 1 : -1))
    .map(({ item }) => item);
}

export function buildItemNode(item: FeedItem): MarkupNode {
  return element("item", [
    ...optionalField("title", item.title),
    ...optionalField("link", item.link),
    ...optionalField("description", item.description),
    ...optionalField("author", item.author),
    ...optionalField("pubDate", item.pubDate),
    ...optionalField("guid", item.link),
  ]);
}

interface BuildFeedOptions {
  now?: Date;
  /** Offset used for `lastBuildDate`; the host's local offset by default. */
  offsetMinutes?: number;
}

export function buildFeedTree(root: FeedRoot, items: readonly FeedItem[], options: BuildFeedOptions = {}): MarkupNode {
  const now = options.now ?? new Date();

  const channel = element("channel", [
    ...optionalField("title", root.title),
    ...optionalField("link", root.link),
    ...optionalField("description", root.description),
    ...optionalField("language", root.language),
    ...optionalField("copyright", root.copyright),
    textNode("lastBuildDate", formatRfc2822(now, options.offsetMinutes)),
    ...sortItems(items).map(buildItemNode),
  ]);

  return element("rss", [channel], { version: "2.0" });
}

export function renderFeed(root: FeedRoot, items: readonly FeedItem[], options: BuildFeedOptions = {}): string {
  return render(buildFeedTree(root, items, options));
}
