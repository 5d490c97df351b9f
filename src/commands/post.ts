import path from "node:path";
import { expectArgs } from "./args.js";
import type { CommandHandler } from "./types.js";

export const runPost: CommandHandler = async (args, { service, terminal }) => {
  expectArgs("post", args, { positionals: 0, flags: ["date"] });
  const file = await service.createItemsFile(args.date);
  terminal.out(`Wrote template json file to ${terminal.palette.bold(path.basename(file))}`);
  terminal.out(terminal.palette.dim("Edit its fields before running make."));
  return 0;
};

export const runAppend: CommandHandler = async (args, { service, terminal }) => {
  expectArgs("append", args, { positionals: 0, flags: ["date"] });
  const { file, count } = await service.appendItem(args.date);
  terminal.out(`Appended item ${count} to ${terminal.palette.bold(path.basename(file))}`);
  terminal.out(terminal.palette.dim("Edit its fields before running make."));
  return 0;
};
