/**
 * @tezblock/rpc — Block identifier resolver.
 *
 * Turns a block level or block hash into the path segment of
 * `/chains/main/blocks/{id}`. No coercion: a float, boolean or any other
 * kind of value is rejected rather than stringified.
 */

import { InvalidIdentifierError } from "./errors.js";

export const INVALID_BLOCK_ID_MESSAGE =
  "block id must be a block level (integer) or block hash (string)";

function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "number" && !Number.isInteger(value)) return "non-integer number";
  return typeof value;
}

/**
 * Resolve a block reference to its path segment.
 *
 * Levels are not range-checked; the node rejects levels it does not have.
 *
 * @throws {InvalidIdentifierError} for anything but a safe integer or a string
 */
export function resolveBlockId(id: unknown): string {
  if (typeof id === "string") {
    return id;
  }
  if (typeof id === "number" && Number.isSafeInteger(id)) {
    return id.toString(10);
  }
  throw new InvalidIdentifierError(INVALID_BLOCK_ID_MESSAGE, {
    details: { receivedType: describeType(id) },
  });
}
