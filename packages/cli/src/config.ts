/**
 * @tezblock/cli — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod,
 * and parses the command line into a Command.
 */

import { z } from "zod";
import type { BlockId } from "@tezblock/types";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  TEZOS_RPC_URL: z.string().url().default("http://localhost:8732"),
  RPC_TIMEOUT_MS: z.coerce.number().int().min(1).default(30000),
  RPC_RETRIES: z.coerce.number().int().min(0).max(10).default(0),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("production"),
  OUTPUT: z.enum(["summary", "json"]).default("summary"),
});

export type CliConfig = z.infer<typeof ConfigSchema>;

export type OutputFormat = CliConfig["OUTPUT"];

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): CliConfig {
  return ConfigSchema.parse(env);
}

// =============================================================================
// Command line
// =============================================================================

export type Command =
  | { readonly kind: "head" }
  | { readonly kind: "block"; readonly id: BlockId }
  | { readonly kind: "operation-hashes"; readonly blockHash: string };

export const USAGE = [
  "Usage: tezblock <command>",
  "",
  "Commands:",
  "  head                       Fetch the current head block",
  "  block <level|hash>         Fetch a block by level or hash",
  "  operation-hashes <hash>    List the operation hashes of a block",
].join("\n");

/**
 * Malformed command line. The CLI prints usage and exits 2.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const LEVEL_PATTERN = /^\d+$/;

/**
 * An all-digit argument is a level; anything else is passed on as a hash.
 */
export function parseBlockArgument(arg: string): BlockId {
  if (LEVEL_PATTERN.test(arg)) {
    const level = Number(arg);
    if (Number.isSafeInteger(level)) {
      return level;
    }
  }
  return arg;
}

/**
 * Parse positional arguments (after the script path) into a Command.
 *
 * @throws {UsageError} on an unknown command or wrong argument count
 */
export function parseCommand(args: readonly string[]): Command {
  const [name, ...rest] = args;

  switch (name) {
    case "head":
      if (rest.length !== 0) {
        throw new UsageError(`"head" takes no arguments, got ${rest.length}`);
      }
      return { kind: "head" };
    case "block":
      return { kind: "block", id: parseBlockArgument(singleArgument(name, rest)) };
    case "operation-hashes":
      return { kind: "operation-hashes", blockHash: singleArgument(name, rest) };
    case undefined:
      throw new UsageError("Missing command");
    default:
      throw new UsageError(`Unknown command "${name}"`);
  }
}

function singleArgument(name: string, rest: readonly string[]): string {
  const [arg] = rest;
  if (rest.length !== 1 || arg === undefined) {
    throw new UsageError(`"${name}" expects 1 argument, got ${rest.length}`);
  }
  return arg;
}
