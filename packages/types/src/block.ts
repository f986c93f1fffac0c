/**
 * Block Types
 *
 * One decoded block: shell header, protocol metadata and the operations it
 * finalizes, grouped by validation pass.
 *
 * Rules:
 * - All records are immutable once decoded
 * - `operations[pass][index]` keeps the node's ordering exactly
 * - Timestamps stay in the node's RFC 3339 text form
 */

import type { BalanceUpdate } from "./balance.js";
import type { OperationGroup } from "./operation.js";
import type { Address, Base58Hash, DecimalString, JsonValue } from "./primitives.js";

// =============================================================================
// Header
// =============================================================================

export interface BlockHeader {
  readonly level: number;
  readonly proto: number;
  readonly predecessor: Base58Hash;
  readonly timestamp: string;
  readonly validationPass: number;
  readonly operationsHash: Base58Hash;

  /** Opaque comparison vector; compare chains, never interpret */
  readonly fitness: readonly string[];
  readonly context: Base58Hash;
  readonly priority?: number;
  readonly proofOfWorkNonce?: string;
  readonly signature?: string;
}

// =============================================================================
// Metadata
// =============================================================================

/**
 * Position of a level within the cycle and voting-period structure.
 */
export interface Level {
  readonly level: number;
  readonly levelPosition: number;
  readonly cycle: number;
  readonly cyclePosition: number;
  readonly votingPeriod: number;
  readonly votingPeriodPosition: number;
  readonly expectedCommitment: boolean;
}

export interface TestChainStatus {
  readonly status: string;
  readonly chainId?: string;
  readonly genesis?: Base58Hash;
  readonly protocol?: Base58Hash;
  readonly expiration?: string;
}

export interface MaxOperationListLength {
  readonly maxSize: number;
  readonly maxOp?: number;
}

/**
 * The block's nonce hash, whose wire shape is not fixed.
 *
 * A string is the commitment hash; anything else (including `null`) is kept
 * verbatim as `raw`. A missing `nonceHash` property means the node did not
 * send the field.
 */
export type NonceHash =
  | { readonly kind: "hash"; readonly value: Base58Hash }
  | { readonly kind: "raw"; readonly value: JsonValue };

export interface BlockMetadata {
  readonly protocol: Base58Hash;
  readonly nextProtocol: Base58Hash;
  readonly testChainStatus?: TestChainStatus;
  readonly maxOperationsTtl?: number;
  readonly maxOperationDataLength?: number;
  readonly maxBlockHeaderLength?: number;
  readonly maxOperationListLength?: readonly MaxOperationListLength[];
  readonly baker?: Address;
  readonly level?: Level;
  readonly votingPeriodKind?: string;
  readonly nonceHash?: NonceHash;
  readonly consumedGas?: DecimalString;
  readonly deactivated?: readonly Address[];
  readonly balanceUpdates?: readonly BalanceUpdate[];
}

// =============================================================================
// Block
// =============================================================================

export interface Block {
  readonly protocol: Base58Hash;
  readonly chainId: string;
  readonly hash: Base58Hash;
  readonly header: BlockHeader;
  readonly metadata: BlockMetadata;

  /** Operation groups per validation pass, in node order */
  readonly operations: readonly (readonly OperationGroup[])[];
}
