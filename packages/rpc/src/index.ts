/**
 * @tezblock/rpc — Typed block retrieval for Tezos node RPC.
 *
 * Fetches blocks and operation hash lists through an injected transport
 * and decodes them into @tezblock/types records.
 *
 * @packageDocumentation
 */

// Types
export type {
  RpcTransport,
  HttpTransportConfig,
  BlockClientConfig,
  RpcLogEntry,
  RpcOperation,
  RpcOutcome,
} from "./types.js";

// Errors
export {
  BlockRpcError,
  TransportError,
  HttpStatusError,
  DecodeError,
  InvalidIdentifierError,
} from "./errors.js";
export type { BlockRpcErrorCode } from "./errors.js";

// Identifier resolver
export { resolveBlockId, INVALID_BLOCK_ID_MESSAGE } from "./identifier.js";

// Transport
export { HttpTransport } from "./http-transport.js";

// Client
export { BlockClient, HEAD_BLOCK_PATH, blockPath, operationHashesPath } from "./client.js";

// Codec
export { decodeBlock, decodeContents, decodeOperationHashes } from "./decode.js";
export { encodeBlock, encodeContents, encodeGroupContents } from "./encode.js";
export { serializeBlock, deserializeBlock } from "./archive.js";

// Wire schemas
export {
  BlockWireSchema,
  ContentsWireSchema,
  GroupContentsWireSchema,
  UnknownContentsWireSchema,
  OperationGroupWireSchema,
  OperationHashesWireSchema,
} from "./wire.js";
export type {
  WireBlock,
  WireContents,
  WireGroupContents,
  WireOperationGroup,
  WireUnknownContents,
} from "./wire.js";
