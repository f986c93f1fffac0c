/**
 * @tezblock/rpc — Encoder.
 *
 * Inverse of the decoder: maps domain records back to the node's JSON shape.
 * `decodeBlock(encodeBlock(b))` equals `b`, and `encodeBlock(decodeBlock(j))`
 * equals `j` for every field the wire schemas describe.
 */

import type {
  BalanceUpdate,
  Block,
  BlockMetadata,
  Contents,
  ContentsMetadata,
  GroupContents,
  ManagerFields,
  OperationGroup,
  OperationResult,
} from "@tezblock/types";
import type {
  WireBalanceUpdate,
  WireBlock,
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

function fromBalanceUpdate(u: BalanceUpdate): WireBalanceUpdate {
  return {
    kind: u.kind,
    change: u.change,
    ...(u.contract !== undefined ? { contract: u.contract } : {}),
    ...(u.delegate !== undefined ? { delegate: u.delegate } : {}),
    ...(u.category !== undefined ? { category: u.category } : {}),
    ...(u.cycle !== undefined ? { cycle: u.cycle } : {}),
    ...(u.level !== undefined ? { level: u.level } : {}),
    ...(u.origin !== undefined ? { origin: u.origin } : {}),
  };
}

function fromOperationResult(r: OperationResult): WireOperationResult {
  return {
    status: r.status,
    ...(r.consumedGas !== undefined ? { consumed_gas: r.consumedGas } : {}),
    ...(r.errors !== undefined
      ? { errors: r.errors.map((e) => ({ kind: e.kind, id: e.id })) }
      : {}),
    ...(r.originatedContracts !== undefined
      ? { originated_contracts: [...r.originatedContracts] }
      : {}),
  };
}

function fromContentsMetadata(m: ContentsMetadata): WireContentsMetadata {
  return {
    ...(m.balanceUpdates !== undefined
      ? { balance_updates: m.balanceUpdates.map(fromBalanceUpdate) }
      : {}),
    ...(m.operationResult !== undefined
      ? { operation_result: fromOperationResult(m.operationResult) }
      : {}),
    ...(m.slots !== undefined ? { slots: [...m.slots] } : {}),
    ...(m.delegate !== undefined ? { delegate: m.delegate } : {}),
  };
}

// =============================================================================
// Contents
// =============================================================================

function fromManagerFields(c: ManagerFields) {
  return {
    source: c.source,
    fee: c.fee,
    counter: c.counter,
    gas_limit: c.gasLimit,
    storage_limit: c.storageLimit,
  };
}

/**
 * Map one contents variant back to its wire record.
 */
export function encodeContents(c: Contents): WireContents {
  const metadata = c.metadata !== undefined ? { metadata: fromContentsMetadata(c.metadata) } : {};

  switch (c.kind) {
    case "endorsement":
      return { kind: c.kind, level: c.level, ...metadata };
    case "endorsement_with_slot":
      return { kind: c.kind, endorsement: c.endorsement, slot: c.slot, ...metadata };
    case "seed_nonce_revelation":
      return { kind: c.kind, level: c.level, nonce: c.nonce, ...metadata };
    case "double_endorsement_evidence":
      return {
        kind: c.kind,
        op1: c.op1,
        op2: c.op2,
        ...(c.slot !== undefined ? { slot: c.slot } : {}),
        ...metadata,
      };
    case "double_baking_evidence":
      return { kind: c.kind, bh1: c.bh1, bh2: c.bh2, ...metadata };
    case "activate_account":
      return { kind: c.kind, pkh: c.pkh, secret: c.secret, ...metadata };
    case "proposals":
      return {
        kind: c.kind,
        source: c.source,
        period: c.period,
        proposals: [...c.proposals],
        ...metadata,
      };
    case "ballot":
      return {
        kind: c.kind,
        source: c.source,
        period: c.period,
        proposal: c.proposal,
        ballot: c.ballot,
        ...metadata,
      };
    case "failing_noop":
      return { kind: c.kind, arbitrary: c.arbitrary, ...metadata };
    case "reveal":
      return { kind: c.kind, ...fromManagerFields(c), public_key: c.publicKey, ...metadata };
    case "transaction":
      return {
        kind: c.kind,
        ...fromManagerFields(c),
        amount: c.amount,
        destination: c.destination,
        ...(c.parameters !== undefined ? { parameters: c.parameters } : {}),
        ...metadata,
      };
    case "origination":
      return {
        kind: c.kind,
        ...fromManagerFields(c),
        balance: c.balance,
        ...(c.delegate !== undefined ? { delegate: c.delegate } : {}),
        ...(c.managerPubkey !== undefined ? { managerPubkey: c.managerPubkey } : {}),
        ...(c.script !== undefined ? { script: c.script } : {}),
        ...metadata,
      };
    case "delegation":
      return {
        kind: c.kind,
        ...fromManagerFields(c),
        ...(c.delegate !== undefined ? { delegate: c.delegate } : {}),
        ...metadata,
      };
    case "register_global_constant":
      return { kind: c.kind, ...fromManagerFields(c), value: c.value, ...metadata };
    case "set_deposits_limit":
      return {
        kind: c.kind,
        ...fromManagerFields(c),
        ...(c.limit !== undefined ? { limit: c.limit } : {}),
        ...metadata,
      };
  }
}

/**
 * Map a group entry back to its wire record. Unknown contents are written
 * back exactly as they were received.
 */
export function encodeGroupContents(c: GroupContents): WireGroupContents {
  if (c.kind === "unknown") {
    return { ...c.raw, kind: c.wireKind };
  }
  return encodeContents(c);
}

function fromOperationGroup(g: OperationGroup): WireOperationGroup {
  return {
    protocol: g.protocol,
    chain_id: g.chainId,
    hash: g.hash,
    branch: g.branch,
    contents: g.contents.map(encodeGroupContents),
    ...(g.signature !== undefined ? { signature: g.signature } : {}),
  };
}

// =============================================================================
// Block
// =============================================================================

function fromBlockMetadata(m: BlockMetadata): WireBlockMetadata {
  const tcs = m.testChainStatus;
  const level = m.level;

  return {
    protocol: m.protocol,
    next_protocol: m.nextProtocol,
    ...(tcs !== undefined
      ? {
          test_chain_status: {
            status: tcs.status,
            ...(tcs.chainId !== undefined ? { chain_id: tcs.chainId } : {}),
            ...(tcs.genesis !== undefined ? { genesis: tcs.genesis } : {}),
            ...(tcs.protocol !== undefined ? { protocol: tcs.protocol } : {}),
            ...(tcs.expiration !== undefined ? { expiration: tcs.expiration } : {}),
          },
        }
      : {}),
    ...(m.maxOperationsTtl !== undefined ? { max_operations_ttl: m.maxOperationsTtl } : {}),
    ...(m.maxOperationDataLength !== undefined
      ? { max_operation_data_length: m.maxOperationDataLength }
      : {}),
    ...(m.maxBlockHeaderLength !== undefined
      ? { max_block_header_length: m.maxBlockHeaderLength }
      : {}),
    ...(m.maxOperationListLength !== undefined
      ? {
          max_operation_list_length: m.maxOperationListLength.map((l) => ({
            max_size: l.maxSize,
            ...(l.maxOp !== undefined ? { max_op: l.maxOp } : {}),
          })),
        }
      : {}),
    ...(m.baker !== undefined ? { baker: m.baker } : {}),
    ...(level !== undefined
      ? {
          level: {
            level: level.level,
            level_position: level.levelPosition,
            cycle: level.cycle,
            cycle_position: level.cyclePosition,
            voting_period: level.votingPeriod,
            voting_period_position: level.votingPeriodPosition,
            expected_commitment: level.expectedCommitment,
          },
        }
      : {}),
    ...(m.votingPeriodKind !== undefined ? { voting_period_kind: m.votingPeriodKind } : {}),
    ...(m.nonceHash !== undefined ? { nonce_hash: m.nonceHash.value } : {}),
    ...(m.consumedGas !== undefined ? { consumed_gas: m.consumedGas } : {}),
    ...(m.deactivated !== undefined ? { deactivated: [...m.deactivated] } : {}),
    ...(m.balanceUpdates !== undefined
      ? { balance_updates: m.balanceUpdates.map(fromBalanceUpdate) }
      : {}),
  };
}

/**
 * Map a decoded block back to the node's JSON shape.
 */
export function encodeBlock(block: Block): WireBlock {
  const h = block.header;

  return {
    protocol: block.protocol,
    chain_id: block.chainId,
    hash: block.hash,
    header: {
      level: h.level,
      proto: h.proto,
      predecessor: h.predecessor,
      timestamp: h.timestamp,
      validation_pass: h.validationPass,
      operations_hash: h.operationsHash,
      fitness: [...h.fitness],
      context: h.context,
      ...(h.priority !== undefined ? { priority: h.priority } : {}),
      ...(h.proofOfWorkNonce !== undefined ? { proof_of_work_nonce: h.proofOfWorkNonce } : {}),
      ...(h.signature !== undefined ? { signature: h.signature } : {}),
    },
    metadata: fromBlockMetadata(block.metadata),
    operations: block.operations.map((pass) => pass.map(fromOperationGroup)),
  };
}
