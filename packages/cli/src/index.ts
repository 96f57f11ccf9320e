// @playsmith/cli — command-line shell
export { run, VERSION, EXIT_OK, EXIT_FAILURE, EXIT_USAGE } from "./main.js";
export type { RunOptions } from "./main.js";
export { parseArgs, UsageError, HELP } from "./args.js";
export type { ParsedArgs } from "./args.js";
export type { Output } from "./session.js";
