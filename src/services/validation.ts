import { decode } from "../domain/seven-date.js";
import type { FeedRoot, RecordIssue, StoredItem } from "../types/feed.js";
import { errorMessage } from "../utils/errors.js";
import { parseRfc2822 } from "../utils/rfc2822.js";
import { ITEM_TEMPLATE, ROOT_TEMPLATE } from "./item-store.js";

export const REQUIRED_ITEM_FIELDS = ["title", "link", "description", "author", "pubDate"] as const;
export const REQUIRED_ROOT_FIELDS = ["title", "link", "description"] as const;

function fieldIssue(
  record: Record<string, unknown>,
  field: string,
  placeholder: string | undefined,
): Pick<RecordIssue, "field" | "kind"> | undefined {
  const value = record[field];
  if (typeof value !== "string" || value.trim() === "") {
    return { field, kind: "missing" };
  }
  if (placeholder !== undefined && value === placeholder) {
    return { field, kind: "template" };
  }
  return undefined;
}

function placeholderFor(template: Readonly<Record<string, string>>, field: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(template, field) ? template[field] : undefined;
}

export function findItemIssues(file: string, items: readonly StoredItem[]): RecordIssue[] {
  const issues: RecordIssue[] = [];

  items.forEach((item, index) => {
    for (const field of REQUIRED_ITEM_FIELDS) {
      const issue = fieldIssue(item, field, placeholderFor(ITEM_TEMPLATE, field));
      if (issue) issues.push({ file, index, ...issue });
    }

    if (item.pubDate !== undefined && item.pubDate.trim() !== "" && !parseRfc2822(item.pubDate)) {
      issues.push({ file, index, field: "pubDate", kind: "invalid", detail: "not a date" });
    }

    if (item.sevenDate !== undefined) {
      try {
        decode(item.sevenDate);
      } catch (error) {
        issues.push({ file, index, field: "sevenDate", kind: "invalid", detail: errorMessage(error) });
      }
    }
  });

  return issues;
}

export function findRootIssues(file: string, root: FeedRoot): RecordIssue[] {
  const issues: RecordIssue[] = [];
  for (const field of REQUIRED_ROOT_FIELDS) {
    const issue = fieldIssue(root, field, placeholderFor(ROOT_TEMPLATE, field));
    if (issue) issues.push({ file, ...issue });
  }
  return issues;
}

export function describeIssue(issue: RecordIssue): string {
  const where = issue.index === undefined ? issue.file : `${issue.file} [item ${issue.index}]`;
  switch (issue.kind) {
    case "missing":
      return `${where}: "${issue.field}" is missing or blank`;
    case "template":
      return `${where}: "${issue.field}" still has its template value`;
    case "invalid":
      return `${where}: "${issue.field}" is invalid${issue.detail ? ` (${issue.detail})` : ""}`;
  }
}
