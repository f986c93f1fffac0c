/**
 * @tezblock/rpc — Wire schemas.
 *
 * Zod schemas for the node's JSON, field names exactly as sent (snake_case).
 * Optional keys stay optional: zod omits a key the input did not carry, so
 * "absent" survives parsing. Amounts are validated as decimal text and never
 * converted to numbers.
 *
 * Each schema has a derived wire type used by the decoder and encoder.
 */

import { z } from "zod";
import { isOperationKind } from "@tezblock/types";
import type { JsonValue } from "@tezblock/types";

// =============================================================================
// Shared Schemas
// =============================================================================

/** Signed arbitrary-precision integer as text */
export const DecimalSchema = z.string().regex(/^-?\d+$/, "expected decimal integer text");

/** Unsigned arbitrary-precision integer as text */
export const UnsignedDecimalSchema = z.string().regex(/^\d+$/, "expected unsigned decimal integer text");

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

// =============================================================================
// Balance updates & results
// =============================================================================

export const BalanceUpdateWireSchema = z.object({
  kind: z.string(),
  change: DecimalSchema,
  contract: z.string().optional(),
  delegate: z.string().optional(),
  category: z.string().optional(),
  cycle: z.number().int().optional(),
  level: z.number().int().optional(),
  origin: z.string().optional(),
});

export type WireBalanceUpdate = z.infer<typeof BalanceUpdateWireSchema>;

export const RpcErrorEntryWireSchema = z.object({
  kind: z.string(),
  id: z.string(),
});

export const OperationResultWireSchema = z.object({
  status: z.string(),
  consumed_gas: UnsignedDecimalSchema.optional(),
  errors: z.array(RpcErrorEntryWireSchema).optional(),
  originated_contracts: z.array(z.string()).optional(),
});

export type WireOperationResult = z.infer<typeof OperationResultWireSchema>;

export const ContentsMetadataWireSchema = z.object({
  balance_updates: z.array(BalanceUpdateWireSchema).optional(),
  operation_result: OperationResultWireSchema.optional(),
  slots: z.array(z.number().int()).optional(),
  delegate: z.string().optional(),
});

export type WireContentsMetadata = z.infer<typeof ContentsMetadataWireSchema>;

// =============================================================================
// Contents (one object schema per kind)
// =============================================================================

const contentsBase = {
  metadata: ContentsMetadataWireSchema.optional(),
};

const managerFields = {
  ...contentsBase,
  source: z.string(),
  fee: UnsignedDecimalSchema,
  counter: UnsignedDecimalSchema,
  gas_limit: UnsignedDecimalSchema,
  storage_limit: UnsignedDecimalSchema,
};

export const ContentsWireSchema = z.discriminatedUnion("kind", [
  z.object({
    ...contentsBase,
    kind: z.literal("endorsement"),
    level: z.number().int(),
  }),
  z.object({
    ...contentsBase,
    kind: z.literal("endorsement_with_slot"),
    endorsement: JsonValueSchema,
    slot: z.number().int(),
  }),
  z.object({
    ...contentsBase,
    kind: z.literal("seed_nonce_revelation"),
    level: z.number().int(),
    nonce: z.string(),
  }),
  z.object({
    ...contentsBase,
    kind: z.literal("double_endorsement_evidence"),
    op1: JsonValueSchema,
    op2: JsonValueSchema,
    slot: z.number().int().optional(),
  }),
  z.object({
    ...contentsBase,
    kind: z.literal("double_baking_evidence"),
    bh1: JsonValueSchema,
    bh2: JsonValueSchema,
  }),
  z.object({
    ...contentsBase,
    kind: z.literal("activate_account"),
    pkh: z.string(),
    secret: z.string(),
  }),
  z.object({
    ...contentsBase,
    kind: z.literal("proposals"),
    source: z.string(),
    period: z.number().int(),
    proposals: z.array(z.string()),
  }),
  z.object({
    ...contentsBase,
    kind: z.literal("ballot"),
    source: z.string(),
    period: z.number().int(),
    proposal: z.string(),
    ballot: z.enum(["yay", "nay", "pass"]),
  }),
  z.object({
    ...contentsBase,
    kind: z.literal("failing_noop"),
    arbitrary: z.string(),
  }),
  z.object({
    ...managerFields,
    kind: z.literal("reveal"),
    public_key: z.string(),
  }),
  z.object({
    ...managerFields,
    kind: z.literal("transaction"),
    amount: UnsignedDecimalSchema,
    destination: z.string(),
    parameters: JsonValueSchema.optional(),
  }),
  z.object({
    ...managerFields,
    kind: z.literal("origination"),
    balance: UnsignedDecimalSchema,
    delegate: z.string().optional(),
    managerPubkey: z.string().optional(),
    script: JsonValueSchema.optional(),
  }),
  z.object({
    ...managerFields,
    kind: z.literal("delegation"),
    delegate: z.string().optional(),
  }),
  z.object({
    ...managerFields,
    kind: z.literal("register_global_constant"),
    value: JsonValueSchema,
  }),
  z.object({
    ...managerFields,
    kind: z.literal("set_deposits_limit"),
    limit: UnsignedDecimalSchema.optional(),
  }),
]);

export type WireContents = z.infer<typeof ContentsWireSchema>;

/** Any record whose `kind` is not one of the modelled kinds, kept whole */
export const UnknownContentsWireSchema = z
  .object({
    kind: z.string().refine((kind) => !isOperationKind(kind), "kind has a dedicated schema"),
  })
  .catchall(JsonValueSchema);

export type WireUnknownContents = z.infer<typeof UnknownContentsWireSchema>;

export const GroupContentsWireSchema = z.union([ContentsWireSchema, UnknownContentsWireSchema]);

export type WireGroupContents = z.infer<typeof GroupContentsWireSchema>;

// =============================================================================
// Operation groups
// =============================================================================

export const OperationGroupWireSchema = z.object({
  protocol: z.string(),
  chain_id: z.string(),
  hash: z.string(),
  branch: z.string(),
  contents: z.array(GroupContentsWireSchema),
  signature: z.string().optional(),
});

export type WireOperationGroup = z.infer<typeof OperationGroupWireSchema>;

// =============================================================================
// Block
// =============================================================================

export const BlockHeaderWireSchema = z.object({
  level: z.number().int(),
  proto: z.number().int(),
  predecessor: z.string(),
  timestamp: z.string(),
  validation_pass: z.number().int(),
  operations_hash: z.string(),
  fitness: z.array(z.string()),
  context: z.string(),
  priority: z.number().int().optional(),
  proof_of_work_nonce: z.string().optional(),
  signature: z.string().optional(),
});

export type WireBlockHeader = z.infer<typeof BlockHeaderWireSchema>;

export const LevelWireSchema = z.object({
  level: z.number().int(),
  level_position: z.number().int(),
  cycle: z.number().int(),
  cycle_position: z.number().int(),
  voting_period: z.number().int(),
  voting_period_position: z.number().int(),
  expected_commitment: z.boolean(),
});

export const TestChainStatusWireSchema = z.object({
  status: z.string(),
  chain_id: z.string().optional(),
  genesis: z.string().optional(),
  protocol: z.string().optional(),
  expiration: z.string().optional(),
});

export const MaxOperationListLengthWireSchema = z.object({
  max_size: z.number().int(),
  max_op: z.number().int().optional(),
});

export const BlockMetadataWireSchema = z.object({
  protocol: z.string(),
  next_protocol: z.string(),
  test_chain_status: TestChainStatusWireSchema.optional(),
  max_operations_ttl: z.number().int().optional(),
  max_operation_data_length: z.number().int().optional(),
  max_block_header_length: z.number().int().optional(),
  max_operation_list_length: z.array(MaxOperationListLengthWireSchema).optional(),
  baker: z.string().optional(),
  level: LevelWireSchema.optional(),
  voting_period_kind: z.string().optional(),
  nonce_hash: JsonValueSchema.optional(),
  consumed_gas: UnsignedDecimalSchema.optional(),
  deactivated: z.array(z.string()).optional(),
  balance_updates: z.array(BalanceUpdateWireSchema).optional(),
});

export type WireBlockMetadata = z.infer<typeof BlockMetadataWireSchema>;

export const BlockWireSchema = z.object({
  protocol: z.string(),
  chain_id: z.string(),
  hash: z.string(),
  header: BlockHeaderWireSchema,
  metadata: BlockMetadataWireSchema,
  operations: z.array(z.array(OperationGroupWireSchema)),
});

export type WireBlock = z.infer<typeof BlockWireSchema>;

// =============================================================================
// Operation hashes
// =============================================================================

/** A flat list, or the per-validation-pass lists the node returns */
export const OperationHashesWireSchema = z.union([
  z.array(z.string()),
  z.array(z.array(z.string())),
]);
