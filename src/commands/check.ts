import { describeIssue } from "../services/validation.js";
import { expectArgs } from "./args.js";
import type { CommandHandler } from "./types.js";

export const runCheck: CommandHandler = async (args, { service, terminal }) => {
  expectArgs("check", args, { positionals: 0 });
  const report = await service.inspectTree();
  const { palette } = terminal;

  if (report.issues.length === 0) {
    terminal.out(palette.green(`OK: ${report.items.length} item(s) in ${report.files.length} file(s)`));
    return 0;
  }

  for (const issue of report.issues) {
    terminal.err(palette.yellow(describeIssue(issue)));
  }
  terminal.err(palette.red(`${report.issues.length} problem(s) found`));
  return 1;
};
