/**
 * Encoder & Archival Tests
 *
 * Verifies:
 * - decode -> encode reproduces the node JSON, including pass and content order
 * - Nonce hash variants encode back to their wire value
 * - Canonical serialization is stable and decodes back to the same block
 */

import { readFileSync } from "node:fs";
import { describe, it, expect } from "vitest";
import { decodeBlock, decodeContents } from "../src/decode.js";
import { encodeBlock, encodeContents, encodeGroupContents } from "../src/encode.js";
import { serializeBlock, deserializeBlock } from "../src/archive.js";
import type { Block } from "@tezblock/types";

const HEAD_BLOCK: unknown = JSON.parse(
  readFileSync(new URL("./fixtures/head-block.json", import.meta.url), "utf8"),
);

const MINIMAL_BLOCK: Block = {
  protocol: "PsTestProtocol",
  chainId: "NetTestChain",
  hash: "BLtestMinimal",
  header: {
    level: 2,
    proto: 1,
    predecessor: "BLtestGenesis",
    timestamp: "2020-01-01T00:00:00Z",
    validationPass: 0,
    operationsHash: "LLoaTest",
    fitness: [],
    context: "CoTest",
  },
  metadata: {
    protocol: "PsTestProtocol",
    nextProtocol: "PsTestProtocol",
    nonceHash: { kind: "hash", value: "nceTest" },
  },
  operations: [],
};

describe("encodeBlock", () => {
  it("round-trips the sample block to the exact node JSON", () => {
    expect(encodeBlock(decodeBlock(HEAD_BLOCK))).toStrictEqual(HEAD_BLOCK);
  });

  it("round-trips a domain block through the wire form", () => {
    expect(decodeBlock(encodeBlock(MINIMAL_BLOCK))).toStrictEqual(MINIMAL_BLOCK);
  });

  it("writes snake_case keys and omits absent fields", () => {
    const wire = encodeBlock(MINIMAL_BLOCK);
    expect(Object.keys(wire.header)).toEqual([
      "level",
      "proto",
      "predecessor",
      "timestamp",
      "validation_pass",
      "operations_hash",
      "fitness",
      "context",
    ]);
    expect(wire.metadata).toStrictEqual({
      protocol: "PsTestProtocol",
      next_protocol: "PsTestProtocol",
      nonce_hash: "nceTest",
    });
  });

  it("writes a raw null nonce hash back as null", () => {
    const block: Block = {
      ...MINIMAL_BLOCK,
      metadata: { ...MINIMAL_BLOCK.metadata, nonceHash: { kind: "raw", value: null } },
    };
    expect(encodeBlock(block).metadata.nonce_hash).toBeNull();
  });
});

describe("encodeContents", () => {
  it("maps manager fields back to snake_case", () => {
    expect(
      encodeContents({
        kind: "reveal",
        source: "tz1Revealer",
        fee: "1269",
        counter: "7",
        gasLimit: "10000",
        storageLimit: "0",
        publicKey: "edpkTestPublicKey",
      }),
    ).toStrictEqual({
      kind: "reveal",
      source: "tz1Revealer",
      fee: "1269",
      counter: "7",
      gas_limit: "10000",
      storage_limit: "0",
      public_key: "edpkTestPublicKey",
    });
  });

  it("inverts decodeContents for an origination with metadata", () => {
    const wire = {
      kind: "origination",
      source: "tz1Originator",
      fee: "1500",
      counter: "3",
      gas_limit: "12000",
      storage_limit: "400",
      balance: "1000000",
      delegate: "tz1Baker",
      script: { code: [{ prim: "parameter" }], storage: { prim: "Unit" } },
      metadata: {
        balance_updates: [{ kind: "contract", contract: "tz1Originator", change: "-1500" }],
        operation_result: {
          status: "applied",
          consumed_gas: "11000",
          originated_contracts: ["KT1Originated"],
        },
      },
    };
    expect(encodeGroupContents(decodeContents(wire))).toStrictEqual(wire);
  });
});

describe("encodeGroupContents", () => {
  it("writes unmodelled contents back as received", () => {
    const wire = {
      kind: "transfer_ticket",
      source: "tz1Sender",
      fee: "900",
      ticket_contents: { string: "test" },
      metadata: { operation_result: { status: "applied", consumed_gas: "1000" } },
    };
    expect(encodeGroupContents(decodeContents(wire))).toStrictEqual(wire);
  });

  it("round-trips a block holding unmodelled contents", () => {
    const block: Block = {
      ...MINIMAL_BLOCK,
      operations: [
        [
          {
            protocol: "PsTestProtocol",
            chainId: "NetTestChain",
            hash: "opTestTicket",
            branch: "BLtestGenesis",
            contents: [
              {
                kind: "unknown",
                wireKind: "transfer_ticket",
                raw: { kind: "transfer_ticket", ticket_amount: "1" },
              },
            ],
          },
        ],
      ],
    };
    expect(deserializeBlock(serializeBlock(block))).toStrictEqual(block);
  });
});

describe("serializeBlock", () => {
  it("produces sorted, whitespace-free JSON", () => {
    expect(serializeBlock(MINIMAL_BLOCK)).toBe(
      '{"chain_id":"NetTestChain","hash":"BLtestMinimal",' +
        '"header":{"context":"CoTest","fitness":[],"level":2,"operations_hash":"LLoaTest",' +
        '"predecessor":"BLtestGenesis","proto":1,"timestamp":"2020-01-01T00:00:00Z","validation_pass":0},' +
        '"metadata":{"next_protocol":"PsTestProtocol","nonce_hash":"nceTest","protocol":"PsTestProtocol"},' +
        '"operations":[],"protocol":"PsTestProtocol"}',
    );
  });

  it("deserializes back to an equal block", () => {
    const block = decodeBlock(HEAD_BLOCK);
    expect(deserializeBlock(serializeBlock(block))).toStrictEqual(block);
  });

  it("is stable across repeated serialization", () => {
    const block = decodeBlock(HEAD_BLOCK);
    expect(serializeBlock(deserializeBlock(serializeBlock(block)))).toBe(serializeBlock(block));
  });

  it("rejects archived text that is not JSON", () => {
    expect(() => deserializeBlock("{not json")).toThrow(SyntaxError);
  });
});
