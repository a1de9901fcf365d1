export { main, parseArgs, runExpand, processIO, UsageError, type CliIO, type CliOptions } from "./cli.js";
