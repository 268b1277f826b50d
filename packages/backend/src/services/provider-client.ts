import type { Logger } from "winston";
import { logger } from "../utils/logger";
import { RelayError, UpstreamError } from "../types/errors";
import type { MessagesRequest } from "../types/messages";

export const ANTHROPIC_VERSION = "2023-06-01";
export const ANTHROPIC_BETA = "prompt-caching-2024-07-31";

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface ProviderClientOptions {
  baseUrl: string;
  /** Bound on the wait for upstream response headers. */
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

export interface CreateMessageOptions {
  apiKey: string;
  signal?: AbortSignal;
  requestLogger?: Logger;
}

/**
 * Provider client for the Messages endpoint.
 * Each call opens one upstream request; nothing is retried.
 */
export class ProviderClient {
  private readonly defaultTimeout = 120_000; // 120 seconds for LLM responses
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: ProviderClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? this.defaultTimeout;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  /**
   * Sends a Messages request and resolves once the upstream answered with a
   * 2xx status. The body is left unread for the caller.
   *
   * @throws UpstreamError carrying the upstream status and raw body on non-2xx
   * @throws RelayError (502) on transport failure or timeout
   */
  async createMessage(body: MessagesRequest, options: CreateMessageOptions): Promise<Response> {
    const requestLogger = options.requestLogger ?? logger;
    const url = `${this.baseUrl}/v1/messages`;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    const onCallerAbort = () => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener("abort", onCallerAbort, { once: true });
    }

    requestLogger.debug("Making provider request", {
      url,
      model: body.model,
      stream: body.stream ?? false,
    });

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "POST",
        headers: this.buildHeaders(options.apiKey),
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (error) {
      options.signal?.removeEventListener("abort", onCallerAbort);
      const message = error instanceof Error ? error.message : String(error);
      requestLogger.error("Provider request failed", { error: message });
      throw new RelayError(`Failed to reach upstream: ${message}`, 502);
    } finally {
      // The timeout bounds the wait for headers only; streamed bodies may run long
      clearTimeout(timeoutId);
    }

    requestLogger.debug("ProviderClient response received", { status: response.status });

    if (!response.ok) {
      options.signal?.removeEventListener("abort", onCallerAbort);
      const errorBody = await response.text();
      requestLogger.error("Upstream returned error", {
        status: response.status,
        body: errorBody,
      });
      throw new UpstreamError(response.status, errorBody);
    }

    return response;
  }

  private buildHeaders(apiKey: string): Record<string, string> {
    return {
      "content-type": "application/json",
      "x-api-key": apiKey,
      "anthropic-version": ANTHROPIC_VERSION,
      "anthropic-beta": ANTHROPIC_BETA,
    };
  }
}
