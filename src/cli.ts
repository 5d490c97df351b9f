import { parseArgs } from "node:util";
import { env as processEnv, type Env } from "./config/env.js";
import { runAddImg } from "./commands/add-img.js";
import { runCheck } from "./commands/check.js";
import { runDate } from "./commands/date.js";
import { runInit } from "./commands/init.js";
import { runMake } from "./commands/make.js";
import { runAppend, runPost } from "./commands/post.js";
import type { CommandArgs, CommandContext, CommandHandler, Terminal } from "./commands/types.js";
import { describeIssue } from "./services/validation.js";
import { FeedService } from "./services/feed-service.js";
import { createPalette, detectColorSupport } from "./utils/color.js";
import { FeedtreeError, FileStateError, UsageError, ValidationError, errorMessage } from "./utils/errors.js";
import { logger } from "./utils/logger.js";

export const USAGE = `feedtree - create and maintain rss feed files

Usage:

    # In a new post directory; then edit fields in the new rss_items.json:
    feedtree post [--date D]

    # Add a post to a directory that already has rss_items.json:
    feedtree append [--date D]

    # At the top of the tree, once; then edit rss_root.json:
    feedtree init

    feedtree check                  report missing or template fields
    feedtree make [--out FILE|-]    write rss.xml from every rss_items.json below
    feedtree date [D] [--digital]   print today's date, or decode D
    feedtree add-img FILE           wrap descriptions in CDATA with an img tag

D is a day-of-year date in base 7, either 52.2024 or 2024-0052.`;

const COMMANDS = new Map<string, CommandHandler>([
  ["post", runPost],
  ["append", runAppend],
  ["init", runInit],
  ["check", runCheck],
  ["make", runMake],
  ["date", runDate],
  ["add-img", runAddImg],
]);

export interface RunCliOptions {
  cwd?: string;
  config?: Env;
  terminal?: Terminal;
  now?: () => Date;
  offsetMinutes?: number;
}

export function createTerminal(colorEnabled: boolean): Terminal {
  return {
    out: (line) => process.stdout.write(`${line}\n`),
    err: (line) => process.stderr.write(`${line}\n`),
    palette: createPalette(colorEnabled),
  };
}

function readArgv(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        date: { type: "string", short: "d" },
        digital: { type: "boolean", default: false },
        out: { type: "string", short: "o" },
        help: { type: "boolean", short: "h", default: false },
      },
    });
  } catch (error) {
    throw new UsageError(errorMessage(error));
  }
}

function parseCommandLine(argv: string[]): { command?: string; args: CommandArgs; help: boolean } {
  const parsed = readArgv(argv);
  const [command, ...positionals] = parsed.positionals;
  return {
    command,
    help: parsed.values.help === true,
    args: {
      positionals,
      date: parsed.values.date,
      digital: parsed.values.digital === true,
      out: parsed.values.out,
    },
  };
}

export function handleCliError(error: unknown, terminal: Terminal): number {
  const { palette } = terminal;

  if (error instanceof FeedtreeError) {
    logger.warn("command_failed", { kind: error.name, message: error.message });
    terminal.err(palette.red(`Error: ${error.message}`));
    if (error instanceof ValidationError) {
      for (const issue of error.issues) {
        terminal.err(palette.yellow(`  ${describeIssue(issue)}`));
      }
    }
    if (error instanceof FileStateError && error.hint) {
      terminal.err(error.hint);
    }
    if (error instanceof UsageError) {
      terminal.err(palette.dim("Run feedtree help for usage."));
    }
    return error.exitCode;
  }

  const message = errorMessage(error);
  logger.error("unhandled_error", { message });
  terminal.err(palette.red(`Error: ${message}`));
  return 1;
}

export async function runCli(argv: string[], options: RunCliOptions = {}): Promise<number> {
  const config = options.config ?? processEnv;
  const terminal =
    options.terminal ?? createTerminal(detectColorSupport(config, process.stdout.isTTY === true));
  const now = options.now ?? (() => new Date());

  try {
    const { command, args, help } = parseCommandLine(argv);

    if (command === undefined || command === "help" || help) {
      terminal.out(USAGE);
      return 0;
    }

    const handler = COMMANDS.get(command);
    if (!handler) {
      throw new UsageError(`Unknown command: ${command}`);
    }

    const ctx: CommandContext = {
      service: new FeedService({
        cwd: options.cwd ?? process.cwd(),
        files: config,
        now,
        offsetMinutes: options.offsetMinutes,
      }),
      terminal,
      now,
      offsetMinutes: options.offsetMinutes,
    };

    logger.debug("command_started", { command });
    return await handler(args, ctx);
  } catch (error) {
    return handleCliError(error, terminal);
  }
}
