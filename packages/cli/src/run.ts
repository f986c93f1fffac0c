/**
 * @tezblock/cli — Command execution.
 *
 * Runs one parsed Command against a BlockClient and writes its output.
 * Errors propagate to the caller; main() decides the exit code.
 */

import chalk from "chalk";
import type { ChalkInstance } from "chalk";
import { serializeBlock } from "@tezblock/rpc";
import type { BlockClient } from "@tezblock/rpc";
import type { Command, OutputFormat } from "./config.js";
import { renderBlockSummary, renderOperationHashes } from "./render.js";

export interface RunOptions {
  readonly output: OutputFormat;
  /** Receives each output line */
  readonly write: (line: string) => void;
  readonly chalk?: ChalkInstance | undefined;
}

export async function runCommand(
  command: Command,
  client: BlockClient,
  options: RunOptions,
): Promise<void> {
  const c = options.chalk ?? chalk;

  switch (command.kind) {
    case "head":
    case "block": {
      const block =
        command.kind === "head" ? await client.getHeadBlock() : await client.getBlock(command.id);
      if (options.output === "json") {
        options.write(serializeBlock(block));
      } else {
        renderBlockSummary(block, c).forEach((line) => options.write(line));
      }
      return;
    }
    case "operation-hashes": {
      const hashes = await client.getOperationHashes(command.blockHash);
      if (options.output === "json") {
        options.write(JSON.stringify(hashes));
      } else {
        renderOperationHashes(hashes, c).forEach((line) => options.write(line));
      }
      return;
    }
  }
}
