import type { FeedService } from "../services/feed-service.js";
import type { Palette } from "../utils/color.js";

export interface Terminal {
  out(line: string): void;
  err(line: string): void;
  palette: Palette;
}

export interface CommandArgs {
  positionals: string[];
  date?: string;
  digital: boolean;
  out?: string;
}

export interface CommandContext {
  service: FeedService;
  terminal: Terminal;
  now: () => Date;
  /** Offset for printed RFC 2822 dates; the host's when unset. */
  offsetMinutes?: number;
}

/** Resolves to the process exit code. */
export type CommandHandler = (args: CommandArgs, ctx: CommandContext) => Promise<number>;
