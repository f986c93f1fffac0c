/**
 * @tezblock/rpc — HTTP Transport.
 *
 * Default RpcTransport over native fetch() with:
 * - Request ID generation
 * - Timeout handling
 * - Retry logic (exponential backoff for 5xx and network errors, opt-in)
 * - Error normalization into HttpStatusError
 *
 * Returns the raw body text; decoding belongs to the client.
 */

import { HttpStatusError } from "./errors.js";
import type { HttpTransportConfig, RpcTransport } from "./types.js";

// =============================================================================
// Internal Helpers
// =============================================================================

/** Generate a simple request ID */
function generateRequestId(): string {
  return `tzb-${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

/** Sleep for the given number of milliseconds */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

interface RawResponse {
  readonly ok: boolean;
  readonly status: number;
  readonly body: string;
}

function backoff(attempt: number): number {
  return Math.min(1000 * Math.pow(2, attempt), 10000);
}

// =============================================================================
// HTTP Transport
// =============================================================================

export class HttpTransport implements RpcTransport {
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly maxRetries: number;
  private readonly fetchFn: typeof fetch;

  constructor(config: HttpTransportConfig) {
    // Strip trailing slash
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.timeout = config.timeout ?? 30000;
    this.maxRetries = config.retries ?? 0;
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
  }

  /**
   * GET a path and return the response body text.
   *
   * @throws {HttpStatusError} on non-2xx status, timeout, or network failure
   */
  async get(path: string): Promise<string> {
    const url = `${this.baseUrl}${path}`;
    const init: RequestInit = {
      method: "GET",
      headers: {
        "Accept": "application/json",
        "X-Request-Id": generateRequestId(),
      },
    };

    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      try {
        const response = await this.fetchWithTimeout(url, init);

        // 2xx → success
        if (response.ok) {
          return response.body;
        }

        // 5xx → retry with backoff
        if (response.status >= 500 && attempt < this.maxRetries) {
          lastError = new HttpStatusError(`HTTP ${response.status} for ${path}`, response.status);
          await sleep(backoff(attempt));
          continue;
        }

        if (response.status >= 500) {
          throw new HttpStatusError(
            `HTTP ${response.status} for ${path} after ${attempt + 1} attempts`,
            response.status,
          );
        }

        // 4xx and unfollowed 1xx/3xx → don't retry
        throw new HttpStatusError(`HTTP ${response.status} for ${path}`, response.status);
      } catch (error) {
        if (error instanceof HttpStatusError) {
          throw error;
        }

        // Network errors → retry
        if (attempt < this.maxRetries) {
          lastError = error instanceof Error ? error : new Error(String(error));
          await sleep(backoff(attempt));
          continue;
        }

        throw new HttpStatusError(
          error instanceof Error ? error.message : "Network error",
          0,
          { cause: error },
        );
      }
    }

    // Unreachable: the loop always returns or throws on its last attempt
    throw new HttpStatusError(lastError?.message ?? "Request failed after all retries", 0, {
      cause: lastError,
    });
  }

  /**
   * Fetch and read the body under one timeout, so a node that sends headers
   * and then stalls is aborted too.
   */
  private async fetchWithTimeout(url: string, init: RequestInit): Promise<RawResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await this.fetchFn(url, {
        ...init,
        signal: controller.signal,
      });
      const body = await response.text();
      return { ok: response.ok, status: response.status, body };
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new HttpStatusError(`Request timed out after ${this.timeout}ms`, 0, {
          cause: error,
        });
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
