/**
 * @tezblock/cli — Command-line block inspector.
 *
 * @packageDocumentation
 */

export { loadConfig, ConfigSchema, parseCommand, parseBlockArgument, UsageError, USAGE } from "./config.js";
export type { CliConfig, Command, OutputFormat } from "./config.js";
export { runCommand } from "./run.js";
export type { RunOptions } from "./run.js";
export { renderBlockSummary, renderOperationHashes } from "./render.js";
