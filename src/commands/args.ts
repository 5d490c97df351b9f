import { UsageError } from "../utils/errors.js";
import type { CommandArgs } from "./types.js";

export type CommandFlag = "date" | "digital" | "out";

interface ArgsShape {
  /** Most positionals the command takes. */
  positionals: number;
  flags?: readonly CommandFlag[];
}

function givenFlags(args: CommandArgs): CommandFlag[] {
  const flags: CommandFlag[] = [];
  if (args.date !== undefined) flags.push("date");
  if (args.digital) flags.push("digital");
  if (args.out !== undefined) flags.push("out");
  return flags;
}

export function expectArgs(command: string, args: CommandArgs, shape: ArgsShape): void {
  if (args.positionals.length > shape.positionals) {
    throw new UsageError(
      shape.positionals === 0
        ? `${command} takes no arguments`
        : `${command} takes at most ${shape.positionals} argument(s)`,
    );
  }

  const allowed = shape.flags ?? [];
  const unexpected = givenFlags(args).find((flag) => !allowed.includes(flag));
  if (unexpected !== undefined) {
    throw new UsageError(`${command} does not take --${unexpected}`);
  }
}
