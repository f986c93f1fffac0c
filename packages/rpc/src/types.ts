/**
 * @tezblock/rpc — Client types.
 *
 * Types specific to the retrieval layer.
 * Domain types are imported from @tezblock/types.
 */

// =============================================================================
// Transport
// =============================================================================

/**
 * The request collaborator: resolves with the raw response body for a path
 * relative to the node's RPC root, or rejects on any transport-level failure
 * (unreachable host, non-success status, timeout).
 *
 * Implementations must be safe for concurrent calls; the client adds no
 * coordination of its own.
 */
export interface RpcTransport {
  get(path: string): Promise<string>;
}

/**
 * Configuration for the fetch-based HttpTransport.
 */
export interface HttpTransportConfig {
  /** Node RPC root (e.g., "http://localhost:8732") */
  readonly baseUrl: string;
  /** Request timeout in milliseconds (default: 30000) */
  readonly timeout?: number | undefined;
  /** Retry attempts for 5xx and network errors (default: 0) */
  readonly retries?: number | undefined;
  /** Custom fetch function (for testing or polyfills) */
  readonly fetchFn?: typeof fetch | undefined;
}

// =============================================================================
// Client
// =============================================================================

export type RpcOperation = "head_block" | "block" | "operation_hashes";

export type RpcOutcome = "ok" | "transport_failure" | "decode_failure";

/**
 * One completed retrieval, reported through `logFn`.
 */
export interface RpcLogEntry {
  readonly operation: RpcOperation;
  readonly path: string;
  readonly outcome: RpcOutcome;
  readonly durationMs: number;
}

/**
 * Configuration for BlockClient.
 */
export interface BlockClientConfig {
  /** Request collaborator (HttpTransport or any RpcTransport) */
  readonly transport: RpcTransport;
  /**
   * Receives one entry per completed retrieval. An exception it throws is
   * emitted as a process warning and does not alter the call's result.
   */
  readonly logFn?: ((entry: RpcLogEntry) => void) | undefined;
}
