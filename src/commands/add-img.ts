import { UsageError } from "../utils/errors.js";
import { expectArgs } from "./args.js";
import type { CommandHandler } from "./types.js";

export const runAddImg: CommandHandler = async (args, { service, terminal }) => {
  expectArgs("add-img", args, { positionals: 1 });
  const [file] = args.positionals;
  if (file === undefined) {
    throw new UsageError("add-img takes exactly one items file");
  }

  const changed = await service.addImagePlaceholders(file);
  terminal.out(`Wrapped ${changed} description(s) in ${file}`);
  return 0;
};
