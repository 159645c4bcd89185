/**
 * HTTP Client
 * Run-scoped connection pool behind a narrow interface so tests can inject fakes
 */

import { Readable } from "node:stream";
import type { ReadableStream } from "node:stream/web";
import { Agent, fetch } from "undici";
import { CancelledError, HttpError, NetworkError } from "../errors";
import type { HttpConfig } from "../types";

export interface HttpRequest {
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  statusText: string;
  url: string; // Final URL after redirects
  header(name: string): string | undefined;
  text(): Promise<string>;
  stream(): Readable;
}

/**
 * Transport failures surface as NetworkError (or CancelledError when the
 * caller's signal fired), from request(), text() and stream() alike.
 * Non-2xx responses are returned, not thrown.
 */
export interface HttpClient {
  request(url: string, init?: HttpRequest): Promise<HttpResponse>;
  close(): Promise<void>;
}

/**
 * Parse a Retry-After header (seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(value: string | undefined): number | undefined {
  if (!value) return undefined;

  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }

  const date = Date.parse(value);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - Date.now());
}

/**
 * Throw HttpError for any non-2xx response
 */
export function assertOk(response: HttpResponse): void {
  if (response.status >= 200 && response.status < 300) {
    return;
  }
  throw new HttpError(
    response.url,
    response.status,
    response.statusText,
    parseRetryAfter(response.header("retry-after")),
  );
}

// Undici error codes raised when a connect, headers or body timeout fires
const TIMEOUT_CODES = new Set([
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

/**
 * Error codes along the cause chain
 * Undici wraps socket errors, e.g. TypeError("terminated") caused by a SocketError
 */
function errorCodes(error: unknown): string[] {
  const codes: string[] = [];
  let current = error;
  while (current instanceof Error) {
    const code = "code" in current ? current.code : undefined;
    if (typeof code === "string") codes.push(code);
    current = current.cause;
  }
  return codes;
}

function describe(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  return error.cause instanceof Error
    ? `${error.message}: ${error.cause.message}`
    : error.message;
}

class UndiciHttpClient implements HttpClient {
  private agent: Agent;

  constructor(private config: HttpConfig) {
    // bodyTimeout is an idle timeout: it fires when no chunk arrives in time
    this.agent = new Agent({
      keepAliveTimeout: 10_000,
      connect: { timeout: config.timeout },
      headersTimeout: config.timeout,
      bodyTimeout: config.timeout,
    });
  }

  /**
   * Map an undici failure (request or body phase) to the client's errors
   */
  private transportError(
    url: string,
    error: unknown,
    signal?: AbortSignal,
  ): CancelledError | NetworkError {
    if (signal?.aborted) {
      return new CancelledError(url);
    }
    if (errorCodes(error).some((code) => TIMEOUT_CODES.has(code))) {
      return new NetworkError(
        url,
        `Timed out after ${this.config.timeout}ms`,
        true,
        { cause: error },
      );
    }
    return new NetworkError(url, describe(error), false, { cause: error });
  }

  /**
   * Body as a Node stream whose errors are already mapped
   */
  private bodyStream(
    url: string,
    body: ReadableStream | null,
    signal?: AbortSignal,
  ): Readable {
    if (!body) return Readable.from([]);

    const source = Readable.fromWeb(body);
    const fail = (error: unknown) => this.transportError(url, error, signal);

    async function* chunks() {
      try {
        for await (const chunk of source) {
          yield chunk;
        }
      } catch (error) {
        throw fail(error);
      }
    }

    const stream = Readable.from(chunks());
    // Releases the connection when the consumer gives up early
    stream.once("close", () => source.destroy());
    return stream;
  }

  async request(url: string, init: HttpRequest = {}): Promise<HttpResponse> {
    const { signal } = init;
    if (signal?.aborted) {
      throw new CancelledError(url);
    }

    const response = await fetch(url, {
      method: init.method ?? "GET",
      headers: {
        "user-agent": this.config.userAgent,
        "accept-language": this.config.acceptLanguage,
        ...init.headers,
      },
      body: init.body,
      redirect: "follow",
      // undici keeps a listener on the signal it is given until the request
      // is collected; a dependent signal keeps the run-wide one free of them
      signal: signal ? AbortSignal.any([signal]) : undefined,
      dispatcher: this.agent,
    }).catch((error: unknown) => {
      throw this.transportError(url, error, signal);
    });

    const { body } = response;
    return {
      status: response.status,
      statusText: response.statusText,
      url: response.url || url,
      header: (name) => response.headers.get(name) ?? undefined,
      text: async () => {
        try {
          return await response.text();
        } catch (error) {
          throw this.transportError(url, error, signal);
        }
      },
      stream: () => this.bodyStream(url, body, signal),
    };
  }

  async close(): Promise<void> {
    await this.agent.close();
  }
}

/**
 * Create a client for one run; call close() when the run ends
 */
export function createHttpClient(config: HttpConfig): HttpClient {
  return new UndiciHttpClient(config);
}
