/**
 * @tezblock/rpc — Error taxonomy.
 *
 * Every failure surfaces as a BlockRpcError subclass carrying a stable code,
 * an operation-specific message and the original failure as `cause`.
 */

export type BlockRpcErrorCode =
  | "TRANSPORT_FAILURE"
  | "DECODE_FAILURE"
  | "INVALID_IDENTIFIER";

/**
 * Base class for retrieval-layer errors.
 */
export class BlockRpcError extends Error {
  /** Failure class (e.g., "TRANSPORT_FAILURE") */
  readonly code: BlockRpcErrorCode;
  /** Additional context (received value type, status code, ...) */
  readonly details?: Readonly<Record<string, unknown>>;

  constructor(
    code: BlockRpcErrorCode,
    message: string,
    options?: { cause?: unknown; details?: Readonly<Record<string, unknown>> },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "BlockRpcError";
    this.code = code;
    this.details = options?.details;
  }
}

/**
 * The transport's `get` failed.
 */
export class TransportError extends BlockRpcError {
  constructor(message: string, options?: { cause?: unknown; details?: Readonly<Record<string, unknown>> }) {
    super("TRANSPORT_FAILURE", message, options);
    this.name = "TransportError";
  }
}

/**
 * The node answered with a non-success status or did not answer in time.
 * Thrown by HttpTransport; the client wraps it like any transport failure.
 */
export class HttpStatusError extends TransportError {
  /** HTTP status code (0 for timeouts and network errors) */
  readonly statusCode: number;

  constructor(message: string, statusCode: number, options?: { cause?: unknown }) {
    super(message, { ...options, details: { statusCode } });
    this.name = "HttpStatusError";
    this.statusCode = statusCode;
  }
}

/**
 * The response body did not match the expected schema.
 */
export class DecodeError extends BlockRpcError {
  constructor(message: string, options?: { cause?: unknown; details?: Readonly<Record<string, unknown>> }) {
    super("DECODE_FAILURE", message, options);
    this.name = "DecodeError";
  }
}

/**
 * A block id was neither an integer level nor a string hash.
 */
export class InvalidIdentifierError extends BlockRpcError {
  constructor(message: string, options?: { cause?: unknown; details?: Readonly<Record<string, unknown>> }) {
    super("INVALID_IDENTIFIER", message, options);
    this.name = "InvalidIdentifierError";
  }
}
