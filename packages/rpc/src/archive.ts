/**
 * @tezblock/rpc — Archival serialization.
 *
 * Canonical JSON (RFC 8785) of a block's wire form: sorted keys, no
 * whitespace, so byte-identical text for equal blocks.
 */

import { canonicalize } from "json-canonicalize";
import type { Block } from "@tezblock/types";
import { decodeBlock } from "./decode.js";
import { encodeBlock } from "./encode.js";

/**
 * Serialize a block to canonical wire JSON.
 */
export function serializeBlock(block: Block): string {
  return canonicalize(encodeBlock(block));
}

/**
 * Parse archived block text back into a Block.
 *
 * @throws {SyntaxError} if the text is not JSON
 * @throws {z.ZodError} if the JSON is not a block
 */
export function deserializeBlock(text: string): Block {
  return decodeBlock(JSON.parse(text));
}
