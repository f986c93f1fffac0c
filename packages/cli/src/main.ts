#!/usr/bin/env -S node --import tsx
/**
 * @tezblock/cli — Entry point.
 *
 * Loads config, builds the logger and an HTTP-backed BlockClient,
 * then runs the command named on the command line.
 *
 * Exit codes: 0 on success, 1 on a failed retrieval or bad config,
 * 2 on a malformed command line.
 */

import pino from "pino";
import { BlockClient } from "@tezblock/rpc";
import { loadConfig, parseCommand, UsageError, USAGE } from "./config.js";
import type { Command } from "./config.js";
import { runCommand } from "./run.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(args: readonly string[]): Promise<number> {
  let command: Command;
  try {
    command = parseCommand(args);
  } catch (error) {
    if (error instanceof UsageError) {
      process.stderr.write(`${error.message}\n\n${USAGE}\n`);
      return 2;
    }
    throw error;
  }

  const config = loadConfig();
  // stdout carries command output; logs go to stderr
  const logger =
    config.NODE_ENV === "development"
      ? pino({
          level: config.LOG_LEVEL,
          transport: { target: "pino-pretty", options: { destination: 2 } },
        })
      : pino({ level: config.LOG_LEVEL }, pino.destination(2));

  const client = BlockClient.overHttp(
    {
      baseUrl: config.TEZOS_RPC_URL,
      timeout: config.RPC_TIMEOUT_MS,
      retries: config.RPC_RETRIES,
    },
    (entry) => {
      if (entry.outcome === "ok") {
        logger.debug(entry, `${entry.operation} ${entry.path}`);
      } else {
        logger.warn(entry, `${entry.operation} ${entry.path} ${entry.outcome}`);
      }
    },
  );

  try {
    await runCommand(command, client, {
      output: config.OUTPUT,
      write: (line) => process.stdout.write(`${line}\n`),
    });
    return 0;
  } catch (err: unknown) {
    logger.error({ err }, err instanceof Error ? err.message : "command failed");
    return 1;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    // eslint-disable-next-line no-console
    console.error("Fatal startup error:", err);
    process.exitCode = 1;
  },
);
