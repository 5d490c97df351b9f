import fs from "node:fs/promises";
import path from "node:path";
import type { Env } from "../config/env.js";
import { parse as parseSevenDate } from "../domain/seven-date.js";
import type { FeedItem, FeedRoot, RecordIssue } from "../types/feed.js";
import { FileStateError, ValidationError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import { renderFeed } from "./feed-builder.js";
import {
  fileExists,
  makeItemTemplate,
  makeRootTemplate,
  readItems,
  readRoot,
  withBlankFields,
  writeItems,
  writeRoot,
} from "./item-store.js";
import { collectItemFiles } from "./tree-walker.js";
import { findItemIssues, findRootIssues } from "./validation.js";

export const IMAGE_PLACEHOLDER = '<img src="IMG_SRC">';

type FeedFileNames = Pick<Env, "FEEDTREE_ITEMS_FILENAME" | "FEEDTREE_ROOT_FILENAME" | "FEEDTREE_OUTPUT_FILENAME">;

interface FeedServiceOptions {
  cwd: string;
  files: FeedFileNames;
  now?: () => Date;
  /** Pins the zone of every RFC 2822 date written; the host's offset when unset. */
  offsetMinutes?: number;
}

export interface TreeReport {
  root: FeedRoot;
  items: FeedItem[];
  files: string[];
  issues: RecordIssue[];
}

export interface MakeResult {
  outputPath: string;
  itemCount: number;
  xml: string;
}

export class FeedService {
  private readonly cwd: string;
  private readonly files: FeedFileNames;
  private readonly now: () => Date;
  private readonly offsetMinutes?: number;

  constructor(options: FeedServiceOptions) {
    this.cwd = options.cwd;
    this.files = options.files;
    this.now = options.now ?? (() => new Date());
    this.offsetMinutes = options.offsetMinutes;
  }

  get itemsPath(): string {
    return path.join(this.cwd, this.files.FEEDTREE_ITEMS_FILENAME);
  }

  get rootPath(): string {
    return path.join(this.cwd, this.files.FEEDTREE_ROOT_FILENAME);
  }

  private newItem(sevenDate?: string): FeedItem {
    if (sevenDate === undefined) {
      return makeItemTemplate(this.now(), this.offsetMinutes);
    }
    return makeItemTemplate(parseSevenDate(sevenDate), this.offsetMinutes);
  }

  async createItemsFile(sevenDate?: string): Promise<string> {
    const file = this.itemsPath;
    if (await fileExists(file)) {
      throw new FileStateError(
        `The file ${this.files.FEEDTREE_ITEMS_FILENAME} already exists.`,
        "Use the append command to add a post to an existing file.",
      );
    }
    await writeItems(file, [this.newItem(sevenDate)]);
    logger.info("items_file_created", { file });
    return file;
  }

  async appendItem(sevenDate?: string): Promise<{ file: string; count: number }> {
    const file = this.itemsPath;
    if (!(await fileExists(file))) {
      throw new FileStateError(
        `The file ${this.files.FEEDTREE_ITEMS_FILENAME} does not exist.`,
        "Use the post command to start a new items file.",
      );
    }
    const items = await readItems(file);
    items.push(this.newItem(sevenDate));
    await writeItems(file, items);
    logger.info("item_appended", { file, count: items.length });
    return { file, count: items.length };
  }

  async createRootFile(): Promise<string> {
    const file = this.rootPath;
    if (await fileExists(file)) {
      throw new FileStateError(`The file ${this.files.FEEDTREE_ROOT_FILENAME} already exists.`);
    }
    await writeRoot(file, makeRootTemplate());
    logger.info("root_file_created", { file });
    return file;
  }

  /** Wraps each description without a CDATA section into one with an empty image tag. */
  async addImagePlaceholders(file: string): Promise<number> {
    const target = path.isAbsolute(file) ? file : path.resolve(this.cwd, file);
    const items = await readItems(target);
    let changed = 0;
    for (const item of items) {
      if (item.description === undefined || item.description.includes("CDATA")) continue;
      item.description = `<![CDATA[${item.description} ${IMAGE_PLACEHOLDER}]]>`;
      changed += 1;
    }
    await writeItems(target, items);
    logger.info("image_placeholders_added", { file: target, changed });
    return changed;
  }

  async inspectTree(): Promise<TreeReport> {
    if (!(await fileExists(this.rootPath))) {
      throw new FileStateError(
        `No ${this.files.FEEDTREE_ROOT_FILENAME} in ${this.cwd}.`,
        "Run the init command at the top of the feed tree first.",
      );
    }

    const root = await readRoot(this.rootPath);
    const issues = findRootIssues(this.rootPath, root);

    const files = await collectItemFiles(this.cwd, this.files.FEEDTREE_ITEMS_FILENAME);
    const items: FeedItem[] = [];
    for (const file of files) {
      const fileItems = await readItems(file);
      issues.push(...findItemIssues(file, fileItems));
      items.push(...fileItems.map(withBlankFields));
    }

    logger.debug("items_collected", { files: files.length, items: items.length, issues: issues.length });
    return { root, items, files, issues };
  }

  /** Validates the tree and renders the feed; writes it unless `outputPath` is null. */
  async make(outputPath: string | null = path.join(this.cwd, this.files.FEEDTREE_OUTPUT_FILENAME)): Promise<MakeResult> {
    const report = await this.inspectTree();
    if (report.issues.length > 0) {
      throw new ValidationError(`Found ${report.issues.length} problem(s) in the feed tree.`, report.issues);
    }

    const xml = renderFeed(report.root, report.items, { now: this.now(), offsetMinutes: this.offsetMinutes });

    if (outputPath !== null) {
      await fs.writeFile(outputPath, xml, "utf8");
      logger.info("feed_written", { outputPath, items: report.items.length });
    }

    return { outputPath: outputPath ?? "-", itemCount: report.items.length, xml };
  }
}
