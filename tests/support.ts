import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { Terminal } from "../src/commands/types.js";
import { createPalette } from "../src/utils/color.js";

export interface MemoryTerminal extends Terminal {
  stdout: string[];
  stderr: string[];
}

export function createMemoryTerminal(): MemoryTerminal {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (line) => stdout.push(line),
    err: (line) => stderr.push(line),
    palette: createPalette(false),
  };
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "feedtree-"));
}

export async function writeJsonFile(file: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, JSON.stringify(value), "utf8");
}
