/**
 * Tests for run.ts — commands against a BlockClient over a stub transport.
 */

import { describe, it, expect, vi } from "vitest";
import { Chalk } from "chalk";
import { BlockClient, TransportError, encodeBlock, serializeBlock } from "@tezblock/rpc";
import type { RpcTransport } from "@tezblock/rpc";
import { runCommand } from "../src/run.js";
import { SAMPLE_BLOCK } from "./sample-block.js";

const plain = new Chalk({ level: 0 });
const BLOCK_TEXT = JSON.stringify(encodeBlock(SAMPLE_BLOCK));

function createClient(respond: (path: string) => Promise<string>) {
  const transport = { get: vi.fn(respond) } satisfies RpcTransport;
  return { transport, client: new BlockClient({ transport }) };
}

function collect() {
  const lines: string[] = [];
  return { lines, write: (line: string) => lines.push(line) };
}

describe("runCommand", () => {
  it("prints the head block summary", async () => {
    const { transport, client } = createClient(async () => BLOCK_TEXT);
    const out = collect();

    await runCommand({ kind: "head" }, client, { output: "summary", write: out.write, chalk: plain });

    expect(transport.get).toHaveBeenCalledWith("/chains/main/blocks/head");
    expect(out.lines[0]).toBe("  Block 5  BLtestSample");
    expect(out.lines).toHaveLength(14);
  });

  it("prints a block as one canonical JSON line", async () => {
    const { transport, client } = createClient(async () => BLOCK_TEXT);
    const out = collect();

    await runCommand({ kind: "block", id: 5 }, client, { output: "json", write: out.write });

    expect(transport.get).toHaveBeenCalledWith("/chains/main/blocks/5");
    expect(out.lines).toEqual([serializeBlock(SAMPLE_BLOCK)]);
  });

  it("prints operation hashes as a JSON array", async () => {
    const { client } = createClient(async () => '[["opA"],["opB","opC"]]');
    const out = collect();

    await runCommand({ kind: "operation-hashes", blockHash: "BLtestSample" }, client, {
      output: "json",
      write: out.write,
    });

    expect(out.lines).toEqual(['["opA","opB","opC"]']);
  });

  it("prints numbered operation hashes in summary form", async () => {
    const { client } = createClient(async () => '["opA","opB"]');
    const out = collect();

    await runCommand({ kind: "operation-hashes", blockHash: "BLtestSample" }, client, {
      output: "summary",
      write: out.write,
      chalk: plain,
    });

    expect(out.lines).toEqual(["  0 opA", "  1 opB"]);
  });

  it("propagates retrieval failures and writes nothing", async () => {
    const { client } = createClient(async () => {
      throw new Error("connect ECONNREFUSED 127.0.0.1:8732");
    });
    const out = collect();

    await expect(
      runCommand({ kind: "head" }, client, { output: "summary", write: out.write }),
    ).rejects.toBeInstanceOf(TransportError);
    expect(out.lines).toEqual([]);
  });
});
