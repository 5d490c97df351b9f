import path from "node:path";
import { expectArgs } from "./args.js";
import type { CommandHandler } from "./types.js";

export const runInit: CommandHandler = async (args, { service, terminal }) => {
  expectArgs("init", args, { positionals: 0 });
  const file = await service.createRootFile();
  terminal.out(`Wrote feed metadata template to ${terminal.palette.bold(path.basename(file))}`);
  return 0;
};
