/**
 * Primitive Types
 *
 * Scalar aliases shared by the block and operation models.
 *
 * Rules:
 * - Amounts and gas figures are decimal text, never numbers
 * - Hashes are the node's base58 text, never decoded
 */

/**
 * Arbitrary-precision integer carried as decimal text (e.g. "-2500000").
 */
export type DecimalString = string;

/**
 * Amount in mutez (1 tez = 1,000,000 mutez), as decimal text.
 */
export type Mutez = DecimalString;

/**
 * Base58check hash as sent by the node (block, operation, context, ...).
 */
export type Base58Hash = string;

/**
 * Address of an implicit account (tz1/tz2/tz3) or originated contract (KT1).
 */
export type Address = string;

/**
 * A block reference accepted by the RPC: a level or a block hash.
 */
export type BlockId = number | string;

/**
 * Any JSON value. Used for payloads this layer carries without interpreting
 * (Michelson scripts, nested evidence headers, opaque metadata).
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };
