import { Agent, RetryAgent, request, type Dispatcher } from "undici";
import type { FetchLike } from "./providers/provider";

// Transient upstream statuses worth another attempt.
export const RETRY_STATUS_CODES = [429, 500, 502, 503, 504];

const NULL_BODY_STATUSES = new Set([204, 205, 304]);

export type RetryOptions = {
  maxRetries?: number;
  minTimeoutMs?: number;
  maxTimeoutMs?: number;
};

/**
 * Wraps a dispatcher with exponential-backoff retries (1s, 2s, 4s by
 * default). Only idempotent methods are retried; callers bound the whole
 * sequence with their own abort signal.
 */
export function createRetryDispatcher(base: Dispatcher, opts: RetryOptions = {}): Dispatcher {
  return new RetryAgent(base, {
    maxRetries: opts.maxRetries ?? 3,
    minTimeout: opts.minTimeoutMs ?? 1_000,
    maxTimeout: opts.maxTimeoutMs ?? 10_000,
    timeoutFactor: 2,
    methods: ["GET", "HEAD"],
    statusCodes: RETRY_STATUS_CODES
  });
}

const defaultAgent = new Agent({
  connect: {
    timeout: 4_000
  }
});

export const retryingAgent = createRetryDispatcher(defaultAgent);

/**
 * `fetch`-shaped client over undici `request`, so provider calls go through
 * the given dispatcher (retries, mocks) while providers keep the standard
 * Request/Response surface.
 */
export function createHttpFetch(dispatcher: Dispatcher = retryingAgent): FetchLike {
  return async (input, init = {}) => {
    const headers: Record<string, string> = {};
    new Headers(init.headers).forEach((value, key) => {
      headers[key] = value;
    });

    const res = await request(input, {
      method: init.method === "POST" ? "POST" : "GET",
      headers,
      body: typeof init.body === "string" ? init.body : undefined,
      signal: init.signal ?? undefined,
      dispatcher
    });

    const contentType = res.headers["content-type"];
    const body = await res.body.text();

    return new Response(NULL_BODY_STATUSES.has(res.statusCode) ? null : body, {
      status: res.statusCode,
      headers: typeof contentType === "string" ? { "content-type": contentType } : {}
    });
  };
}

export const httpFetch = createHttpFetch();
