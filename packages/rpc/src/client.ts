/**
 * @tezblock/rpc — Block Client.
 *
 * Main entry point for block retrieval.
 *
 * Provides typed methods for:
 * - The chain's current head block
 * - A block by level or hash
 * - The operation hash list of a block
 *
 * Design:
 * - Delegates to an RpcTransport for requests
 * - Each call is build path -> get -> decode, nothing shared between calls
 * - Failures are thrown as BlockRpcError subclasses with the original cause
 * - No retries, caching or batching at this layer
 * - A throwing logFn never changes the result; it surfaces as a process warning
 */

import type { Block, BlockId } from "@tezblock/types";
import { decodeBlock, decodeOperationHashes } from "./decode.js";
import { DecodeError, InvalidIdentifierError, TransportError } from "./errors.js";
import { HttpTransport } from "./http-transport.js";
import { resolveBlockId } from "./identifier.js";
import type {
  BlockClientConfig,
  HttpTransportConfig,
  RpcLogEntry,
  RpcOperation,
  RpcOutcome,
  RpcTransport,
} from "./types.js";

export const HEAD_BLOCK_PATH = "/chains/main/blocks/head";

export function blockPath(segment: string): string {
  return `/chains/main/blocks/${segment}`;
}

export function operationHashesPath(blockHash: string): string {
  return `${blockPath(blockHash)}/operation_hashes`;
}

interface RetrievalContext {
  readonly operation: RpcOperation;
  readonly path: string;
  /** Message for a transport failure */
  readonly getFailure: string;
  /** Message for a decode failure */
  readonly decodeFailure: string;
}

// =============================================================================
// Main Client
// =============================================================================

/**
 * Block retrieval client.
 *
 * Usage:
 * ```typescript
 * const client = BlockClient.overHttp({ baseUrl: "http://localhost:8732" });
 *
 * const head = await client.getHeadBlock();
 * const block = await client.getBlock(head.header.level - 1);
 * const hashes = await client.getOperationHashes(block.hash);
 * ```
 */
export class BlockClient {
  private readonly transport: RpcTransport;
  private readonly logFn: ((entry: RpcLogEntry) => void) | undefined;

  constructor(config: BlockClientConfig) {
    this.transport = config.transport;
    this.logFn = config.logFn;
  }

  /**
   * Build a client over the fetch-based HttpTransport.
   */
  static overHttp(
    config: HttpTransportConfig,
    logFn?: (entry: RpcLogEntry) => void,
  ): BlockClient {
    return new BlockClient({ transport: new HttpTransport(config), logFn });
  }

  /**
   * Get the chain's current head block.
   */
  async getHeadBlock(): Promise<Block> {
    return this.retrieve(
      {
        operation: "head_block",
        path: HEAD_BLOCK_PATH,
        getFailure: "could not get head block",
        decodeFailure: "could not decode head block",
      },
      decodeBlock,
    );
  }

  /**
   * Get a block by level (integer) or hash (string).
   *
   * @throws {InvalidIdentifierError} before any request if `id` is neither
   */
  async getBlock(id: BlockId): Promise<Block> {
    let segment: string;
    try {
      segment = resolveBlockId(id);
    } catch (error) {
      throw new InvalidIdentifierError("could not get block: invalid block id", {
        cause: error,
      });
    }

    return this.retrieve(
      {
        operation: "block",
        path: blockPath(segment),
        getFailure: `could not get block '${segment}'`,
        decodeFailure: `could not decode block '${segment}'`,
      },
      decodeBlock,
    );
  }

  /**
   * Get the hashes of every operation in a block, in validation-pass order.
   */
  async getOperationHashes(blockHash: string): Promise<readonly string[]> {
    return this.retrieve(
      {
        operation: "operation_hashes",
        path: operationHashesPath(blockHash),
        getFailure: `could not get operation hashes for block '${blockHash}'`,
        decodeFailure: `could not decode operation hashes for block '${blockHash}'`,
      },
      decodeOperationHashes,
    );
  }

  /**
   * Request a path and decode its body. The decoder only runs on a
   * successful response.
   */
  private async retrieve<T>(context: RetrievalContext, decode: (json: unknown) => T): Promise<T> {
    const start = Date.now();

    let body: string;
    try {
      body = await this.transport.get(context.path);
    } catch (error) {
      this.log(context, "transport_failure", start);
      throw new TransportError(context.getFailure, {
        cause: error,
        details: { path: context.path },
      });
    }

    let value: T;
    try {
      value = decode(JSON.parse(body));
    } catch (error) {
      this.log(context, "decode_failure", start);
      throw new DecodeError(context.decodeFailure, {
        cause: error,
        details: { path: context.path },
      });
    }

    this.log(context, "ok", start);
    return value;
  }

  private log(context: RetrievalContext, outcome: RpcOutcome, start: number): void {
    if (this.logFn === undefined) {
      return;
    }
    try {
      this.logFn({
        operation: context.operation,
        path: context.path,
        outcome,
        durationMs: Date.now() - start,
      });
    } catch (error) {
      // The retrieval outcome stands; the logger's failure goes to the process
      process.emitWarning(
        new Error(`logFn threw while logging ${context.operation}`, { cause: error }),
      );
    }
  }
}
