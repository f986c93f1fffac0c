/**
 * Runtime Type Guards
 *
 * Narrowing functions for block and operation values at system boundaries
 * (CLI arguments, caller input, decoded contents).
 */

import type { Contents, ManagerOperationContents, OperationKind } from "./operation.js";
import type { BlockId, DecimalString } from "./primitives.js";

// =============================================================================
// Operation guards
// =============================================================================

export const OPERATION_KINDS: readonly OperationKind[] = [
  "endorsement",
  "endorsement_with_slot",
  "seed_nonce_revelation",
  "double_endorsement_evidence",
  "double_baking_evidence",
  "activate_account",
  "proposals",
  "ballot",
  "failing_noop",
  "reveal",
  "transaction",
  "origination",
  "delegation",
  "register_global_constant",
  "set_deposits_limit",
];

export const MANAGER_OPERATION_KINDS: readonly OperationKind[] = [
  "reveal",
  "transaction",
  "origination",
  "delegation",
  "register_global_constant",
  "set_deposits_limit",
];

const KIND_SET = new Set<string>(OPERATION_KINDS);
const MANAGER_KIND_SET = new Set<string>(MANAGER_OPERATION_KINDS);

export function isOperationKind(value: unknown): value is OperationKind {
  return typeof value === "string" && KIND_SET.has(value);
}

export function isManagerOperation(contents: Contents): contents is ManagerOperationContents {
  return MANAGER_KIND_SET.has(contents.kind);
}

// =============================================================================
// Scalar guards
// =============================================================================

const DECIMAL_PATTERN = /^-?\d+$/;

export function isDecimalString(value: unknown): value is DecimalString {
  return typeof value === "string" && DECIMAL_PATTERN.test(value);
}

/**
 * True for an integer level or a string hash. Floats, NaN and every other
 * type are rejected.
 */
export function isBlockId(value: unknown): value is BlockId {
  if (typeof value === "string") return true;
  return typeof value === "number" && Number.isSafeInteger(value);
}
