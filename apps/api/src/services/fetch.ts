import { request, type Dispatcher } from "undici";
import type { SearchResult } from "../types/routing";
import type { Cache } from "./cache";
import { collapseWhitespace, htmlToText } from "./extract";
import { retryingAgent } from "./http";
import { createLogger, errorMessage } from "./log";
import { SYNTHETIC_PROVIDER } from "./providers/synthetic";

const log = createLogger("fetch");

export type ContentFetcherOptions = {
  maxChars?: number;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
  cache?: Cache | null;
  cacheTtlSeconds?: number;
};

function cacheKey(url: string, maxChars: number) {
  return `fetchtext:v1:${maxChars}:${url}`;
}

function isFetchable(url: string): boolean {
  try {
    const { protocol } = new URL(url);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Best-effort page text. `fetchText` NEVER throws: any failure (bad scheme,
 * timeout, non-2xx, non-text body, parse error) resolves to null and the
 * caller keeps the snippet.
 */
export class ContentFetcher {
  readonly maxChars: number;
  private timeoutMs: number;
  private dispatcher: Dispatcher;
  private cache: Cache | null;
  private cacheTtlSeconds: number;

  constructor(opts: ContentFetcherOptions = {}) {
    this.maxChars = opts.maxChars ?? 3_000;
    this.timeoutMs = opts.timeoutMs ?? 8_000;
    this.dispatcher = opts.dispatcher ?? retryingAgent;
    this.cache = opts.cache ?? null;
    this.cacheTtlSeconds = opts.cacheTtlSeconds ?? 6 * 60 * 60;
  }

  async fetchText(url: string): Promise<string | null> {
    if (!isFetchable(url)) return null;

    const key = cacheKey(url, this.maxChars);
    const cached = await this.cache?.get(key).catch(() => null);
    if (cached) return cached;

    const abort = new AbortController();
    const hardTimeout = setTimeout(() => abort.abort(), this.timeoutMs);

    try {
      log.debug(`fetching ${url.slice(0, 80)}`);
      const res = await request(url, {
        method: "GET",
        headers: {
          "User-Agent":
            "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) SourceRouter/1.0",
          Accept: "text/html,application/xhtml+xml,text/plain;q=0.9"
        },
        dispatcher: this.dispatcher,
        signal: abort.signal,
        headersTimeout: 5_000,
        bodyTimeout: 7_000
      });

      const status = res.statusCode;
      const contentType = String(res.headers["content-type"] ?? "").toLowerCase();
      const textual = contentType.includes("text/html") || contentType.includes("text/plain");

      if (status < 200 || status >= 300 || !textual) {
        await res.body.dump();
        log.debug(`skipping ${url.slice(0, 80)} (status=${status}, type=${contentType || "none"})`);
        return null;
      }

      const body = await res.body.text();
      const text = contentType.includes("text/html")
        ? htmlToText(body, url, this.maxChars)
        : collapseWhitespace(body).slice(0, this.maxChars);

      if (!text) return null;

      log.debug(`extracted ${text.length} characters from ${url.slice(0, 80)}`);
      await this.cache?.set(key, text, this.cacheTtlSeconds).catch((err: unknown) => {
        log.warn(`cache write failed: ${errorMessage(err)}`);
      });
      return text;
    } catch (err) {
      log.debug(`content fetch failed for ${url.slice(0, 80)}: ${errorMessage(err)}`);
      return null;
    } finally {
      clearTimeout(hardTimeout);
    }
  }
}

/**
 * Sequential enrichment with a pause between network fetches. Results
 * without a fetchable URL, synthetic placeholders and failed fetches keep
 * their snippet; one failure never affects the rest of the batch.
 */
export async function enrichResults<T extends SearchResult>(
  results: T[],
  fetcher: Pick<ContentFetcher, "fetchText">,
  pauseMs = 200
): Promise<T[]> {
  let fetched = 0;

  for (const result of results) {
    const { url } = result;
    if (!url || !isFetchable(url) || result.providerName === SYNTHETIC_PROVIDER) {
      result.fullContent = result.snippet;
      continue;
    }

    if (fetched > 0 && pauseMs > 0) await sleep(pauseMs);
    fetched += 1;

    try {
      result.fullContent = (await fetcher.fetchText(url)) ?? result.snippet;
    } catch (err) {
      log.debug(`enrichment failed for ${url.slice(0, 80)}: ${errorMessage(err)}`);
      result.fullContent = result.snippet;
    }
  }

  return results;
}
