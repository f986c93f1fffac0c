/**
 * @tezblock/rpc — Decoder.
 *
 * Validates node JSON against the wire schemas and maps it onto the
 * @tezblock/types domain records. Dispatch on `kind` selects the contents
 * variant; a key the node did not send stays absent on the result. Contents
 * of an unmodelled kind are kept verbatim as UnknownContents.
 *
 * All functions throw `ZodError` on a shape mismatch. Wrapping into
 * DecodeError happens in the client, where the operation context is known.
 */

import type {
  BalanceUpdate,
  Block,
  BlockHeader,
  BlockMetadata,
  Contents,
  ContentsMetadata,
  GroupContents,
  JsonValue,
  NonceHash,
  OperationGroup,
  OperationResult,
} from "@tezblock/types";
import { isOperationKind } from "@tezblock/types";
import {
  BlockWireSchema,
  GroupContentsWireSchema,
  OperationHashesWireSchema,
} from "./wire.js";
import type {
  WireBalanceUpdate,
  WireBlock,
  WireBlockHeader,
  WireBlockMetadata,
  WireContents,
  WireContentsMetadata,
  WireGroupContents,
  WireOperationGroup,
  WireOperationResult,
} from "./wire.js";

// =============================================================================
// Records
// =============================================================================

export function toBalanceUpdate(w: WireBalanceUpdate): BalanceUpdate {
  return {
    kind: w.kind,
    change: w.change,
    ...(w.contract !== undefined ? { contract: w.contract } : {}),
    ...(w.delegate !== undefined ? { delegate: w.delegate } : {}),
    ...(w.category !== undefined ? { category: w.category } : {}),
    ...(w.cycle !== undefined ? { cycle: w.cycle } : {}),
    ...(w.level !== undefined ? { level: w.level } : {}),
    ...(w.origin !== undefined ? { origin: w.origin } : {}),
  };
}

function toOperationResult(w: WireOperationResult): OperationResult {
  return {
    status: w.status,
    ...(w.consumed_gas !== undefined ? { consumedGas: w.consumed_gas } : {}),
    ...(w.errors !== undefined
      ? { errors: w.errors.map((e) => ({ kind: e.kind, id: e.id })) }
      : {}),
    ...(w.originated_contracts !== undefined
      ? { originatedContracts: w.originated_contracts }
      : {}),
  };
}

function toContentsMetadata(w: WireContentsMetadata): ContentsMetadata {
  return {
    ...(w.balance_updates !== undefined
      ? { balanceUpdates: w.balance_updates.map(toBalanceUpdate) }
      : {}),
    ...(w.operation_result !== undefined
      ? { operationResult: toOperationResult(w.operation_result) }
      : {}),
    ...(w.slots !== undefined ? { slots: w.slots } : {}),
    ...(w.delegate !== undefined ? { delegate: w.delegate } : {}),
  };
}

// =============================================================================
// Contents
// =============================================================================

/**
 * Map one wire contents record to its kind's variant.
 */
export function toContents(w: WireContents): Contents {
  const metadata = w.metadata !== undefined ? { metadata: toContentsMetadata(w.metadata) } : {};

  switch (w.kind) {
    case "endorsement":
      return { kind: w.kind, level: w.level, ...metadata };
    case "endorsement_with_slot":
      return { kind: w.kind, endorsement: w.endorsement, slot: w.slot, ...metadata };
    case "seed_nonce_revelation":
      return { kind: w.kind, level: w.level, nonce: w.nonce, ...metadata };
    case "double_endorsement_evidence":
      return {
        kind: w.kind,
        op1: w.op1,
        op2: w.op2,
        ...(w.slot !== undefined ? { slot: w.slot } : {}),
        ...metadata,
      };
    case "double_baking_evidence":
      return { kind: w.kind, bh1: w.bh1, bh2: w.bh2, ...metadata };
    case "activate_account":
      return { kind: w.kind, pkh: w.pkh, secret: w.secret, ...metadata };
    case "proposals":
      return {
        kind: w.kind,
        source: w.source,
        period: w.period,
        proposals: w.proposals,
        ...metadata,
      };
    case "ballot":
      return {
        kind: w.kind,
        source: w.source,
        period: w.period,
        proposal: w.proposal,
        ballot: w.ballot,
        ...metadata,
      };
    case "failing_noop":
      return { kind: w.kind, arbitrary: w.arbitrary, ...metadata };
    case "reveal":
      return { kind: w.kind, ...managerFields(w), publicKey: w.public_key, ...metadata };
    case "transaction":
      return {
        kind: w.kind,
        ...managerFields(w),
        amount: w.amount,
        destination: w.destination,
        ...(w.parameters !== undefined ? { parameters: w.parameters } : {}),
        ...metadata,
      };
    case "origination":
      return {
        kind: w.kind,
        ...managerFields(w),
        balance: w.balance,
        ...(w.delegate !== undefined ? { delegate: w.delegate } : {}),
        ...(w.managerPubkey !== undefined ? { managerPubkey: w.managerPubkey } : {}),
        ...(w.script !== undefined ? { script: w.script } : {}),
        ...metadata,
      };
    case "delegation":
      return {
        kind: w.kind,
        ...managerFields(w),
        ...(w.delegate !== undefined ? { delegate: w.delegate } : {}),
        ...metadata,
      };
    case "register_global_constant":
      return { kind: w.kind, ...managerFields(w), value: w.value, ...metadata };
    case "set_deposits_limit":
      return {
        kind: w.kind,
        ...managerFields(w),
        ...(w.limit !== undefined ? { limit: w.limit } : {}),
        ...metadata,
      };
  }
}

function isModelledWire(w: WireGroupContents): w is WireContents {
  return isOperationKind(w.kind);
}

/**
 * Map a group entry: modelled kinds to their variant, anything else to
 * UnknownContents holding the record as sent.
 */
export function toGroupContents(w: WireGroupContents): GroupContents {
  if (isModelledWire(w)) {
    return toContents(w);
  }
  return { kind: "unknown", wireKind: w.kind, raw: w };
}

interface WireManagerFields {
  readonly source: string;
  readonly fee: string;
  readonly counter: string;
  readonly gas_limit: string;
  readonly storage_limit: string;
}

function managerFields(w: WireManagerFields) {
  return {
    source: w.source,
    fee: w.fee,
    counter: w.counter,
    gasLimit: w.gas_limit,
    storageLimit: w.storage_limit,
  };
}

function toOperationGroup(w: WireOperationGroup): OperationGroup {
  return {
    protocol: w.protocol,
    chainId: w.chain_id,
    hash: w.hash,
    branch: w.branch,
    contents: w.contents.map(toGroupContents),
    ...(w.signature !== undefined ? { signature: w.signature } : {}),
  };
}

// =============================================================================
// Block
// =============================================================================

function toNonceHash(value: JsonValue): NonceHash {
  return typeof value === "string" ? { kind: "hash", value } : { kind: "raw", value };
}

function toBlockHeader(w: WireBlockHeader): BlockHeader {
  return {
    level: w.level,
    proto: w.proto,
    predecessor: w.predecessor,
    timestamp: w.timestamp,
    validationPass: w.validation_pass,
    operationsHash: w.operations_hash,
    fitness: w.fitness,
    context: w.context,
    ...(w.priority !== undefined ? { priority: w.priority } : {}),
    ...(w.proof_of_work_nonce !== undefined ? { proofOfWorkNonce: w.proof_of_work_nonce } : {}),
    ...(w.signature !== undefined ? { signature: w.signature } : {}),
  };
}

function toBlockMetadata(w: WireBlockMetadata): BlockMetadata {
  const tcs = w.test_chain_status;
  const level = w.level;

  return {
    protocol: w.protocol,
    nextProtocol: w.next_protocol,
    ...(tcs !== undefined
      ? {
          testChainStatus: {
            status: tcs.status,
            ...(tcs.chain_id !== undefined ? { chainId: tcs.chain_id } : {}),
            ...(tcs.genesis !== undefined ? { genesis: tcs.genesis } : {}),
            ...(tcs.protocol !== undefined ? { protocol: tcs.protocol } : {}),
            ...(tcs.expiration !== undefined ? { expiration: tcs.expiration } : {}),
          },
        }
      : {}),
    ...(w.max_operations_ttl !== undefined ? { maxOperationsTtl: w.max_operations_ttl } : {}),
    ...(w.max_operation_data_length !== undefined
      ? { maxOperationDataLength: w.max_operation_data_length }
      : {}),
    ...(w.max_block_header_length !== undefined
      ? { maxBlockHeaderLength: w.max_block_header_length }
      : {}),
    ...(w.max_operation_list_length !== undefined
      ? {
          maxOperationListLength: w.max_operation_list_length.map((m) => ({
            maxSize: m.max_size,
            ...(m.max_op !== undefined ? { maxOp: m.max_op } : {}),
          })),
        }
      : {}),
    ...(w.baker !== undefined ? { baker: w.baker } : {}),
    ...(level !== undefined
      ? {
          level: {
            level: level.level,
            levelPosition: level.level_position,
            cycle: level.cycle,
            cyclePosition: level.cycle_position,
            votingPeriod: level.voting_period,
            votingPeriodPosition: level.voting_period_position,
            expectedCommitment: level.expected_commitment,
          },
        }
      : {}),
    ...(w.voting_period_kind !== undefined ? { votingPeriodKind: w.voting_period_kind } : {}),
    ...(w.nonce_hash !== undefined ? { nonceHash: toNonceHash(w.nonce_hash) } : {}),
    ...(w.consumed_gas !== undefined ? { consumedGas: w.consumed_gas } : {}),
    ...(w.deactivated !== undefined ? { deactivated: w.deactivated } : {}),
    ...(w.balance_updates !== undefined
      ? { balanceUpdates: w.balance_updates.map(toBalanceUpdate) }
      : {}),
  };
}

export function toBlock(w: WireBlock): Block {
  return {
    protocol: w.protocol,
    chainId: w.chain_id,
    hash: w.hash,
    header: toBlockHeader(w.header),
    metadata: toBlockMetadata(w.metadata),
    operations: w.operations.map((pass) => pass.map(toOperationGroup)),
  };
}

// =============================================================================
// Entry points
// =============================================================================

/**
 * Decode a parsed block JSON value.
 *
 * @throws {z.ZodError} if the value does not match the block schema
 */
export function decodeBlock(json: unknown): Block {
  return toBlock(BlockWireSchema.parse(json));
}

/**
 * Decode one parsed contents JSON value.
 *
 * @throws {z.ZodError} on a missing `kind` or a missing field for a modelled kind
 */
export function decodeContents(json: unknown): GroupContents {
  return toGroupContents(GroupContentsWireSchema.parse(json));
}

/**
 * Decode an operation hash list, flattening per-pass lists in order.
 *
 * @throws {z.ZodError} if the value is not a list of hashes
 */
export function decodeOperationHashes(json: unknown): readonly string[] {
  const parsed = OperationHashesWireSchema.parse(json);
  const hashes: string[] = [];
  for (const entry of parsed) {
    if (typeof entry === "string") {
      hashes.push(entry);
    } else {
      hashes.push(...entry);
    }
  }
  return hashes;
}
