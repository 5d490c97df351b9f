import { format, parse } from "../domain/seven-date.js";
import { formatRfc2822 } from "../utils/rfc2822.js";
import { expectArgs } from "./args.js";
import type { CommandHandler } from "./types.js";

function isoDay(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${String(date.getFullYear()).padStart(4, "0")}-${month}-${day}`;
}

export const runDate: CommandHandler = async (args, { terminal, now, offsetMinutes }) => {
  expectArgs("date", args, { positionals: 1, flags: ["digital"] });
  const [input] = args.positionals;

  if (input === undefined) {
    terminal.out(format(now(), args.digital));
    return 0;
  }

  const date = parse(input);
  terminal.out(`${isoDay(date)}  ${formatRfc2822(date, offsetMinutes)}`);
  terminal.out(terminal.palette.dim(format(date, !args.digital)));
  return 0;
};
