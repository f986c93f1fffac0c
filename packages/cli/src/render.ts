/**
 * @tezblock/cli — Terminal rendering.
 *
 * Human-readable summaries of decoded blocks. Every function takes the chalk
 * instance to color with, so output can be rendered without color.
 */

import chalk from "chalk";
import type { ChalkInstance } from "chalk";
import type { Block, OperationGroup } from "@tezblock/types";

function info(c: ChalkInstance, label: string, value: string): string {
  return c.gray("    → ") + c.gray(label.padEnd(12)) + c.white(value);
}

function groupLine(c: ChalkInstance, group: OperationGroup): string {
  const failed = group.contents.some((contents) => {
    const status =
      contents.kind === "unknown" ? undefined : contents.metadata?.operationResult?.status;
    return status !== undefined && status !== "applied";
  });
  const mark = failed ? c.red("    ✗ ") : c.green("    ✓ ");
  const kinds = group.contents
    .map((contents) => (contents.kind === "unknown" ? `${contents.wireKind}?` : contents.kind))
    .join(", ");
  return mark + c.white(group.hash) + "  " + c.gray(kinds);
}

/**
 * Render a block as summary lines: header facts, then one line per
 * operation group, grouped by validation pass.
 */
export function renderBlockSummary(block: Block, c: ChalkInstance = chalk): string[] {
  const { header, metadata } = block;
  const lines = [
    c.cyan.bold(`  Block ${header.level}`) + "  " + c.white(block.hash),
    info(c, "protocol", block.protocol),
    info(c, "chain", block.chainId),
    info(c, "timestamp", header.timestamp),
    info(c, "predecessor", header.predecessor),
  ];

  if (metadata.baker !== undefined) {
    lines.push(info(c, "baker", metadata.baker));
  }
  if (metadata.level !== undefined) {
    lines.push(
      info(c, "cycle", `${metadata.level.cycle} (position ${metadata.level.cyclePosition})`),
    );
  }
  if (metadata.votingPeriodKind !== undefined) {
    lines.push(info(c, "voting", metadata.votingPeriodKind));
  }

  block.operations.forEach((pass, index) => {
    lines.push(c.cyan(`  Pass ${index}`) + c.gray(`  ${pass.length} group(s)`));
    for (const group of pass) {
      lines.push(groupLine(c, group));
    }
  });

  return lines;
}

/**
 * Render an operation hash list, one hash per line with its position.
 */
export function renderOperationHashes(hashes: readonly string[], c: ChalkInstance = chalk): string[] {
  if (hashes.length === 0) {
    return [c.gray("  (no operations)")];
  }
  const width = String(hashes.length - 1).length;
  return hashes.map((hash, index) => c.gray(`  ${String(index).padStart(width)} `) + c.white(hash));
}
