/**
 * @tezblock/types — Shared domain types for decoded Tezos blocks.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Amounts stay decimal text; nothing here parses them
 */

// Scalars
export type {
  DecimalString,
  Mutez,
  Base58Hash,
  Address,
  BlockId,
  JsonValue,
} from "./primitives.js";

// Block types
export type {
  Block,
  BlockHeader,
  BlockMetadata,
  Level,
  TestChainStatus,
  MaxOperationListLength,
  NonceHash,
} from "./block.js";

// Operation types
export type {
  OperationGroup,
  Contents,
  ContentsOf,
  GroupContents,
  UnknownContents,
  OperationKind,
  ManagerFields,
  ManagerOperationContents,
  ContentsMetadata,
  OperationResult,
  OperationStatus,
  RpcErrorEntry,
  BallotVote,
  EndorsementContents,
  EndorsementWithSlotContents,
  SeedNonceRevelationContents,
  DoubleEndorsementEvidenceContents,
  DoubleBakingEvidenceContents,
  ActivateAccountContents,
  ProposalsContents,
  BallotContents,
  FailingNoopContents,
  RevealContents,
  TransactionContents,
  OriginationContents,
  DelegationContents,
  RegisterGlobalConstantContents,
  SetDepositsLimitContents,
} from "./operation.js";

// Balance updates
export type { BalanceUpdate, BalanceUpdateKind } from "./balance.js";

// Runtime type guards
export {
  OPERATION_KINDS,
  MANAGER_OPERATION_KINDS,
  isOperationKind,
  isManagerOperation,
  isDecimalString,
  isBlockId,
} from "./guards.js";
