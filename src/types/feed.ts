export interface FeedItem {
  title: string;
  link: string;
  description: string;
  author: string;
  pubDate: string;
  sevenDate?: string;
  [key: string]: unknown;
}

/** An item as it sits in an items file; any field may be absent. */
export interface StoredItem {
  title?: string;
  link?: string;
  description?: string;
  author?: string;
  pubDate?: string;
  sevenDate?: string;
  [key: string]: unknown;
}

export interface FeedRoot {
  title: string;
  link: string;
  description: string;
  language?: string;
  copyright?: string;
  [key: string]: unknown;
}

export type RecordIssueKind = "missing" | "template" | "invalid";

export interface RecordIssue {
  file: string;
  /** Position in the items array; absent for the root file. */
  index?: number;
  field: string;
  kind: RecordIssueKind;
  detail?: string;
}
