/**
 * Operation Types
 *
 * One operation group is a signed envelope holding an ordered list of
 * contents. Each content is a tagged variant over its `kind`: a variant
 * carries only the fields the node sends for that kind.
 *
 * Rules:
 * - Fields guaranteed for a kind are required on its variant
 * - Protocol-dependent fields are optional; absent means "not sent"
 * - Opaque payloads are JsonValue and pass through untouched
 * - A kind outside the modelled set decodes to UnknownContents
 */

import type { BalanceUpdate } from "./balance.js";
import type { Address, Base58Hash, DecimalString, JsonValue, Mutez } from "./primitives.js";

// =============================================================================
// Execution metadata
// =============================================================================

export type OperationStatus = "applied" | "failed" | "skipped" | "backtracked";

/**
 * A node-reported failure inside an operation result.
 */
export interface RpcErrorEntry {
  readonly kind: string;
  readonly id: string;
}

/**
 * Outcome of applying one manager operation.
 */
export interface OperationResult {
  /** Usually an OperationStatus; other values pass through as sent */
  readonly status: OperationStatus | (string & {});
  readonly consumedGas?: DecimalString;
  readonly errors?: readonly RpcErrorEntry[];
  readonly originatedContracts?: readonly Address[];
}

/**
 * Per-content execution metadata attached by the node.
 */
export interface ContentsMetadata {
  readonly balanceUpdates?: readonly BalanceUpdate[];
  readonly operationResult?: OperationResult;

  /** Endorsement slots held by the endorser */
  readonly slots?: readonly number[];

  /** Endorser (endorsement metadata only) */
  readonly delegate?: Address;
}

// =============================================================================
// Contents variants
// =============================================================================

interface ContentsBase {
  readonly metadata?: ContentsMetadata;
}

/**
 * Fields shared by every operation a manager (account holder) signs and pays for.
 */
export interface ManagerFields {
  readonly source: Address;
  readonly fee: Mutez;
  readonly counter: DecimalString;
  readonly gasLimit: DecimalString;
  readonly storageLimit: DecimalString;
}

export interface EndorsementContents extends ContentsBase {
  readonly kind: "endorsement";
  readonly level: number;
}

export interface EndorsementWithSlotContents extends ContentsBase {
  readonly kind: "endorsement_with_slot";
  readonly endorsement: JsonValue;
  readonly slot: number;
}

export interface SeedNonceRevelationContents extends ContentsBase {
  readonly kind: "seed_nonce_revelation";
  readonly level: number;
  readonly nonce: string;
}

export interface DoubleEndorsementEvidenceContents extends ContentsBase {
  readonly kind: "double_endorsement_evidence";
  readonly op1: JsonValue;
  readonly op2: JsonValue;
  readonly slot?: number;
}

export interface DoubleBakingEvidenceContents extends ContentsBase {
  readonly kind: "double_baking_evidence";
  readonly bh1: JsonValue;
  readonly bh2: JsonValue;
}

export interface ActivateAccountContents extends ContentsBase {
  readonly kind: "activate_account";
  readonly pkh: Address;
  readonly secret: string;
}

export interface ProposalsContents extends ContentsBase {
  readonly kind: "proposals";
  readonly source: Address;
  readonly period: number;
  readonly proposals: readonly Base58Hash[];
}

export type BallotVote = "yay" | "nay" | "pass";

export interface BallotContents extends ContentsBase {
  readonly kind: "ballot";
  readonly source: Address;
  readonly period: number;
  readonly proposal: Base58Hash;
  readonly ballot: BallotVote;
}

export interface FailingNoopContents extends ContentsBase {
  readonly kind: "failing_noop";
  readonly arbitrary: string;
}

export interface RevealContents extends ContentsBase, ManagerFields {
  readonly kind: "reveal";
  readonly publicKey: string;
}

export interface TransactionContents extends ContentsBase, ManagerFields {
  readonly kind: "transaction";
  readonly amount: Mutez;
  readonly destination: Address;
  readonly parameters?: JsonValue;
}

export interface OriginationContents extends ContentsBase, ManagerFields {
  readonly kind: "origination";
  readonly balance: Mutez;
  readonly delegate?: Address;

  /** Pre-Babylon manager key of the originated account */
  readonly managerPubkey?: Address;
  readonly script?: JsonValue;
}

export interface DelegationContents extends ContentsBase, ManagerFields {
  readonly kind: "delegation";

  /** Absent when the delegation is withdrawn */
  readonly delegate?: Address;
}

export interface RegisterGlobalConstantContents extends ContentsBase, ManagerFields {
  readonly kind: "register_global_constant";
  readonly value: JsonValue;
}

export interface SetDepositsLimitContents extends ContentsBase, ManagerFields {
  readonly kind: "set_deposits_limit";
  readonly limit?: Mutez;
}

/**
 * The contents of one operation, discriminated by `kind`.
 */
export type Contents =
  | EndorsementContents
  | EndorsementWithSlotContents
  | SeedNonceRevelationContents
  | DoubleEndorsementEvidenceContents
  | DoubleBakingEvidenceContents
  | ActivateAccountContents
  | ProposalsContents
  | BallotContents
  | FailingNoopContents
  | RevealContents
  | TransactionContents
  | OriginationContents
  | DelegationContents
  | RegisterGlobalConstantContents
  | SetDepositsLimitContents;

export type OperationKind = Contents["kind"];

export type ManagerOperationContents = Extract<Contents, ManagerFields>;

/**
 * Narrow `Contents` to the variant for a given kind.
 */
export type ContentsOf<K extends OperationKind> = Extract<Contents, { readonly kind: K }>;

/**
 * Contents of a kind this library does not model, kept verbatim.
 *
 * `wireKind` is the node's `kind`; `raw` is the whole record as sent.
 */
export interface UnknownContents {
  readonly kind: "unknown";
  readonly wireKind: string;
  readonly raw: Readonly<Record<string, JsonValue>>;
}

/** Any entry of a group's `contents` */
export type GroupContents = Contents | UnknownContents;

// =============================================================================
// Operation group
// =============================================================================

/**
 * One signed operation envelope as included in a block.
 */
export interface OperationGroup {
  readonly protocol: Base58Hash;
  readonly chainId: string;
  readonly hash: Base58Hash;
  readonly branch: Base58Hash;
  readonly contents: readonly GroupContents[];

  /** Absent for unsigned contents (e.g. some protocol-level evidence) */
  readonly signature?: string;
}
