/**
 * Tests for config.ts — loadConfig + command line parsing.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig, parseBlockArgument, parseCommand, UsageError } from "../src/config.js";

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("returns defaults when env is empty", () => {
    expect(loadConfig({})).toEqual({
      TEZOS_RPC_URL: "http://localhost:8732",
      RPC_TIMEOUT_MS: 30000,
      RPC_RETRIES: 0,
      LOG_LEVEL: "info",
      NODE_ENV: "production",
      OUTPUT: "summary",
    });
  });

  it("parses overridden values", () => {
    const config = loadConfig({
      TEZOS_RPC_URL: "https://rpc.example.test",
      RPC_TIMEOUT_MS: "5000",
      RPC_RETRIES: "2",
      LOG_LEVEL: "debug",
      NODE_ENV: "development",
      OUTPUT: "json",
    });

    expect(config.TEZOS_RPC_URL).toBe("https://rpc.example.test");
    expect(config.RPC_TIMEOUT_MS).toBe(5000);
    expect(config.RPC_RETRIES).toBe(2);
    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.NODE_ENV).toBe("development");
    expect(config.OUTPUT).toBe("json");
  });

  it("ignores unrelated variables", () => {
    const config = loadConfig({ PATH: "/usr/bin", HOME: "/root" });
    expect(Object.keys(config)).not.toContain("PATH");
  });

  it("throws on an invalid RPC URL", () => {
    expect(() => loadConfig({ TEZOS_RPC_URL: "not a url" })).toThrow(ZodError);
  });

  it("throws on a non-positive timeout", () => {
    expect(() => loadConfig({ RPC_TIMEOUT_MS: "0" })).toThrow(ZodError);
  });

  it("throws on an unknown output format", () => {
    expect(() => loadConfig({ OUTPUT: "yaml" })).toThrow(ZodError);
  });
});

// =============================================================================
// parseBlockArgument
// =============================================================================

describe("parseBlockArgument", () => {
  it("reads digits as a level", () => {
    expect(parseBlockArgument("732016")).toBe(732016);
    expect(parseBlockArgument("0")).toBe(0);
  });

  it("keeps anything else as a hash", () => {
    expect(parseBlockArgument("BLtestHash")).toBe("BLtestHash");
    expect(parseBlockArgument("head~2")).toBe("head~2");
    expect(parseBlockArgument("-1")).toBe("-1");
  });

  it("keeps levels beyond the safe integer range as text", () => {
    expect(parseBlockArgument("9007199254740993")).toBe("9007199254740993");
  });
});

// =============================================================================
// parseCommand
// =============================================================================

describe("parseCommand", () => {
  it("parses head", () => {
    expect(parseCommand(["head"])).toEqual({ kind: "head" });
  });

  it("parses block by level and by hash", () => {
    expect(parseCommand(["block", "10"])).toEqual({ kind: "block", id: 10 });
    expect(parseCommand(["block", "BLtestHash"])).toEqual({ kind: "block", id: "BLtestHash" });
  });

  it("parses operation-hashes", () => {
    expect(parseCommand(["operation-hashes", "BLtestHash"])).toEqual({
      kind: "operation-hashes",
      blockHash: "BLtestHash",
    });
  });

  it("rejects a missing command", () => {
    expect(() => parseCommand([])).toThrow(UsageError);
    expect(() => parseCommand([])).toThrow("Missing command");
  });

  it("rejects an unknown command", () => {
    expect(() => parseCommand(["blocks"])).toThrow('Unknown command "blocks"');
  });

  it("rejects wrong argument counts", () => {
    expect(() => parseCommand(["head", "extra"])).toThrow('"head" takes no arguments, got 1');
    expect(() => parseCommand(["block"])).toThrow('"block" expects 1 argument, got 0');
    expect(() => parseCommand(["operation-hashes", "a", "b"])).toThrow(
      '"operation-hashes" expects 1 argument, got 2',
    );
  });
});
