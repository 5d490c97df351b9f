import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { format as formatSevenDate } from "../domain/seven-date.js";
import type { FeedItem, FeedRoot, RecordIssue, StoredItem } from "../types/feed.js";
import { FeedtreeError, FileStateError, ValidationError, errorMessage, isMissingFileError } from "../utils/errors.js";
import { formatRfc2822 } from "../utils/rfc2822.js";

export const ITEM_TEMPLATE = {
  title: "TITLE",
  link: "URL",
  description: "DESCRIPTION",
  author: "AUTHOR",
} as const;

export const ROOT_TEMPLATE = {
  title: "TITLE",
  link: "URL",
  description: "DESCRIPTION",
} as const;

// Fields stay optional here: items files are written back as they were read,
// and validation reports absent fields itself.
const feedItemSchema = z
  .object({
    title: z.string().optional(),
    link: z.string().optional(),
    description: z.string().optional(),
    author: z.string().optional(),
    pubDate: z.string().optional(),
    sevenDate: z.string().optional(),
  })
  .passthrough();

const itemsFileSchema = z.array(feedItemSchema);

const feedRootSchema = z
  .object({
    title: z.string().default(""),
    link: z.string().default(""),
    description: z.string().default(""),
    language: z.string().optional(),
    copyright: z.string().optional(),
  })
  .passthrough();

export function makeItemTemplate(date: Date, offsetMinutes?: number): FeedItem {
  return {
    ...ITEM_TEMPLATE,
    pubDate: formatRfc2822(date, offsetMinutes),
    sevenDate: formatSevenDate(date),
  };
}

/** Rendering view of a stored item: absent fields read as blank. */
export function withBlankFields(item: StoredItem): FeedItem {
  return {
    ...item,
    title: item.title ?? "",
    link: item.link ?? "",
    description: item.description ?? "",
    author: item.author ?? "",
    pubDate: item.pubDate ?? "",
  };
}

export function makeRootTemplate(): FeedRoot {
  return { ...ROOT_TEMPLATE };
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, inner]) => [key, sortKeys(inner)]),
    );
  }
  return value;
}

export function serializeRecords(value: unknown): string {
  return `${JSON.stringify(sortKeys(value), null, 4)}\n`;
}

export async function fileExists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch (error) {
    if (isMissingFileError(error)) return false;
    throw error;
  }
}

async function readJson(file: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(file, "utf8");
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new FileStateError(`The file ${file} does not exist.`);
    }
    throw error;
  }

  try {
    return JSON.parse(raw) as unknown;
  } catch (error) {
    throw new FeedtreeError(`The file ${file} is not valid JSON: ${errorMessage(error)}`);
  }
}

function toIssues(file: string, error: z.ZodError): RecordIssue[] {
  return error.issues.map((issue): RecordIssue => {
    const [first, second] = issue.path;
    const index = typeof first === "number" ? first : undefined;
    const field = typeof first === "number" ? second : first;
    return {
      file,
      index,
      field: field === undefined ? "(record)" : String(field),
      kind: "invalid",
      detail: issue.message,
    };
  });
}

export async function readItems(file: string): Promise<StoredItem[]> {
  const result = itemsFileSchema.safeParse(await readJson(file));
  if (!result.success) {
    throw new ValidationError(`The file ${file} does not hold a list of items.`, toIssues(file, result.error));
  }
  return result.data;
}

export async function readRoot(file: string): Promise<FeedRoot> {
  const result = feedRootSchema.safeParse(await readJson(file));
  if (!result.success) {
    throw new ValidationError(`The file ${file} does not hold feed metadata.`, toIssues(file, result.error));
  }
  return result.data;
}

async function writeJson(file: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  const tmpPath = `${file}.tmp`;
  await fs.writeFile(tmpPath, serializeRecords(value), "utf8");
  await fs.rename(tmpPath, file);
}

export async function writeItems(file: string, items: readonly StoredItem[]): Promise<void> {
  await writeJson(file, items);
}

export async function writeRoot(file: string, root: FeedRoot): Promise<void> {
  await writeJson(file, root);
}
