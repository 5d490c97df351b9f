import path from "node:path";
import { expectArgs } from "./args.js";
import type { CommandHandler } from "./types.js";

const STDOUT_TARGET = "-";

export const runMake: CommandHandler = async (args, { service, terminal }) => {
  expectArgs("make", args, { positionals: 0, flags: ["out"] });

  if (args.out === STDOUT_TARGET) {
    const result = await service.make(null);
    terminal.out(result.xml.trimEnd());
    return 0;
  }

  const result = args.out === undefined ? await service.make() : await service.make(path.resolve(args.out));
  terminal.out(
    terminal.palette.green(`Wrote ${result.itemCount} item(s) to ${path.basename(result.outputPath)}`),
  );
  return 0;
};
