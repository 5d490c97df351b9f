import fs from "node:fs/promises";
import path from "node:path";

const SKIPPED_DIRECTORIES = new Set(["node_modules"]);

function shouldDescend(name: string): boolean {
  return !name.startsWith(".") && !SKIPPED_DIRECTORIES.has(name);
}

/** Absolute paths of every `fileName` under `rootDir`, sorted. */
export async function collectItemFiles(rootDir: string, fileName: string): Promise<string[]> {
  const absolute = path.isAbsolute(rootDir) ? rootDir : path.resolve(process.cwd(), rootDir);
  const found: string[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (shouldDescend(entry.name)) await walk(full);
        continue;
      }
      if (entry.isFile() && entry.name === fileName) {
        found.push(full);
      }
    }
  }

  await walk(absolute);
  return found.sort();
}
