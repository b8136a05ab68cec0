import { z } from "zod";
import type { NonEmptyArray, ProviderOutcome, SearchResult } from "../types/routing";
import { cacheGetJson, cacheSetJson, type Cache } from "./cache";
import { createLogger, errorMessage } from "./log";
import type { SearchProvider } from "./providers/provider";
import { SyntheticProvider } from "./providers/synthetic";

const log = createLogger("search");

const CachedResultsSchema = z
  .array(
    z.object({
      title: z.string(),
      url: z.string().optional(),
      snippet: z.string(),
      fullContent: z.string().optional(),
      providerName: z.string(),
      resultKind: z.enum(["answer", "web"])
    })
  )
  .nonempty();

export type SearchChainOptions = {
  /** Real providers, highest priority first. */
  providers: SearchProvider[];
  fallback?: SyntheticProvider;
  defaultLimit?: number;
  timeoutMs?: number;
  pauseMs?: number;
  cache?: Cache | null;
  cacheTtlSeconds?: number;
};

export type ChainAttempt = { provider: string; status: ProviderOutcome["status"]; reason?: string; results: number };

export type ChainResult = {
  results: NonEmptyArray<SearchResult>;
  provider: string;
  attempts: ChainAttempt[];
};

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function cacheKey(query: string, limit: number) {
  return `search:v1:${query.trim().toLowerCase()}:${limit}`;
}

/**
 * Strict-precedence fallback chain: providers are tried in order and the
 * first non-empty result set wins. Results are never merged across
 * providers. When every real provider declines the synthetic generator
 * answers, so the result is never empty.
 */
export class SearchChain {
  private providers: SearchProvider[];
  private fallback: SyntheticProvider;
  private defaultLimit: number;
  private timeoutMs: number;
  private pauseMs: number;
  private cache: Cache | null;
  private cacheTtlSeconds: number;

  constructor(opts: SearchChainOptions) {
    this.providers = [...opts.providers];
    this.fallback = opts.fallback ?? new SyntheticProvider();
    this.defaultLimit = opts.defaultLimit ?? 5;
    this.timeoutMs = opts.timeoutMs ?? 15_000;
    this.pauseMs = opts.pauseMs ?? 200;
    this.cache = opts.cache ?? null;
    this.cacheTtlSeconds = opts.cacheTtlSeconds ?? 30 * 60;
  }

  get providerNames(): string[] {
    return [...this.providers.map((p) => p.name), this.fallback.name];
  }

  async search(query: string, limit = this.defaultLimit): Promise<NonEmptyArray<SearchResult>> {
    const { results } = await this.searchDetailed(query, limit);
    return results;
  }

  async searchDetailed(query: string, limit = this.defaultLimit): Promise<ChainResult> {
    log.info(`chain start: "${query.slice(0, 80)}" via ${this.providerNames.join(" -> ")}`);

    const cached = await this.readCache(query, limit);
    if (cached) {
      log.debug(`cache hit (${cached[0].providerName})`);
      return { results: cached, provider: cached[0].providerName, attempts: [] };
    }

    const attempts: ChainAttempt[] = [];

    for (const [i, provider] of this.providers.entries()) {
      if (i > 0 && this.pauseMs > 0) await sleep(this.pauseMs);

      const outcome = await this.attempt(provider, query, limit);
      if (outcome.status === "ok") {
        attempts.push({ provider: provider.name, status: "ok", results: outcome.results.length });
        log.info(`${provider.name} answered with ${outcome.results.length} results`);
        await this.writeCache(query, limit, outcome.results);
        return { results: outcome.results, provider: provider.name, attempts };
      }

      attempts.push({ provider: provider.name, status: "declined", reason: outcome.reason, results: 0 });
      log.warn(`${provider.name} declined: ${outcome.reason}`);
    }

    const results = this.fallback.generate(query);
    attempts.push({ provider: this.fallback.name, status: "ok", results: results.length });
    log.warn(`all providers declined, using ${this.fallback.name} results`);
    return { results, provider: this.fallback.name, attempts };
  }

  /**
   * One bounded provider call. Rejections and timeouts become declines.
   */
  private async attempt(provider: SearchProvider, query: string, limit: number): Promise<ProviderOutcome> {
    const abort = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<ProviderOutcome>((resolve) => {
      timer = setTimeout(() => {
        abort.abort();
        resolve({ status: "declined", reason: `timed out after ${this.timeoutMs}ms` });
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([
        Promise.resolve()
          .then(() => provider.search(query, limit, abort.signal))
          .catch((err: unknown): ProviderOutcome => ({ status: "declined", reason: errorMessage(err) })),
        timeout
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async readCache(query: string, limit: number): Promise<NonEmptyArray<SearchResult> | null> {
    if (!this.cache) return null;
    try {
      return await cacheGetJson(this.cache, cacheKey(query, limit), (raw) => CachedResultsSchema.parse(raw));
    } catch (err) {
      log.warn(`cache read failed: ${errorMessage(err)}`);
      return null;
    }
  }

  private async writeCache(query: string, limit: number, results: SearchResult[]) {
    if (!this.cache) return;
    try {
      await cacheSetJson(this.cache, cacheKey(query, limit), results, this.cacheTtlSeconds);
    } catch (err) {
      log.warn(`cache write failed: ${errorMessage(err)}`);
    }
  }
}
