/**
 * Balance Update Types
 *
 * A balance update is one ledger delta produced as a side effect of block
 * or operation processing. `change` is signed decimal text.
 */

import type { Address, Mutez } from "./primitives.js";

/**
 * Kinds seen on current protocols. Newer protocols add kinds, so the field
 * accepts any string.
 */
export type BalanceUpdateKind =
  | "contract"
  | "freezer"
  | "accumulator"
  | "burned"
  | "commitment"
  | "minted";

export interface BalanceUpdate {
  readonly kind: BalanceUpdateKind | (string & {});
  readonly change: Mutez;
  readonly contract?: Address;
  readonly delegate?: Address;

  /** Freezer bucket (deposits, fees, rewards, ...) */
  readonly category?: string;
  readonly cycle?: number;
  readonly level?: number;

  /** What produced the update (block, migration, subsidy, simulation) */
  readonly origin?: string;
}
