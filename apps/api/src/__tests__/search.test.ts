import { afterEach, describe, expect, it, vi } from "vitest";
import { MemoryCache } from "../services/cache";
import { BingProvider } from "../services/providers/bing";
import { GoogleProvider } from "../services/providers/google";
import type { FetchLike, SearchProvider } from "../services/providers/provider";
import { SyntheticProvider } from "../services/providers/synthetic";
import { TavilyProvider } from "../services/providers/tavily";
import { SearchChain } from "../services/search";
import type { ProviderOutcome, SearchResult } from "../types/routing";

const NOW = new Date("2026-10-18T12:00:00Z");

function result(providerName: string, title: string): SearchResult {
  return { title, url: `https://${providerName.toLowerCase()}.example/${title}`, snippet: `${title} snippet`, providerName, resultKind: "web" };
}

function fakeProvider(name: string, impl: (signal: AbortSignal) => Promise<ProviderOutcome>) {
  const search = vi.fn<SearchProvider["search"]>((_q, _limit, signal) => impl(signal));
  return { name, search };
}

const ok = (name: string) => fakeProvider(name, async () => ({ status: "ok", results: [result(name, "a"), result(name, "b")] }));
const decline = (name: string) => fakeProvider(name, async () => ({ status: "declined", reason: "0 results" }));

function chain(providers: SearchProvider[], extra: { cache?: MemoryCache; timeoutMs?: number; pauseMs?: number } = {}) {
  return new SearchChain({
    providers,
    fallback: new SyntheticProvider(() => NOW),
    pauseMs: 0,
    ...extra
  });
}

describe("SearchChain", () => {
  it("returns the first provider's results and skips the rest", async () => {
    const first = ok("First");
    const second = ok("Second");

    const { results, provider, attempts } = await chain([first, second]).searchDetailed("routing");

    expect(provider).toBe("First");
    expect(results.map((r) => r.providerName)).toEqual(["First", "First"]);
    expect(second.search).not.toHaveBeenCalled();
    expect(attempts).toEqual([{ provider: "First", status: "ok", results: 2 }]);
  });

  it("passes the limit to providers", async () => {
    const first = ok("First");
    await chain([first]).search("routing", 3);
    expect(first.search.mock.calls[0]?.[1]).toBe(3);
  });

  it("advances past declines and rejections", async () => {
    const broken = fakeProvider("Broken", () => Promise.reject(new Error("HTTP 503: unavailable")));
    const { provider, attempts } = await chain([decline("Empty"), broken, ok("Third")]).searchDetailed("routing");

    expect(provider).toBe("Third");
    expect(attempts).toEqual([
      { provider: "Empty", status: "declined", reason: "0 results", results: 0 },
      { provider: "Broken", status: "declined", reason: "HTTP 503: unavailable", results: 0 },
      { provider: "Third", status: "ok", results: 2 }
    ]);
  });

  it("declines a provider that throws before returning a promise", async () => {
    const sync: SearchProvider = {
      name: "Sync",
      search: () => {
        throw new Error("bad request shape");
      }
    };

    const { provider, attempts } = await chain([sync, ok("Next")]).searchDetailed("routing");

    expect(provider).toBe("Next");
    expect(attempts[0]).toEqual({ provider: "Sync", status: "declined", reason: "bad request shape", results: 0 });
  });

  it("treats a slow provider as declined and aborts it", async () => {
    let seen: AbortSignal | undefined;
    const slow = fakeProvider("Slow", (signal) => {
      seen = signal;
      return new Promise<ProviderOutcome>(() => undefined);
    });

    const { provider, attempts } = await chain([slow, ok("Next")], { timeoutMs: 10 }).searchDetailed("routing");

    expect(provider).toBe("Next");
    expect(attempts[0]).toEqual({ provider: "Slow", status: "declined", reason: "timed out after 10ms", results: 0 });
    expect(seen?.aborted).toBe(true);
  });

  it("falls back to synthetic results when every provider declines", async () => {
    const { results, provider, attempts } = await chain([decline("A"), decline("B")]).searchDetailed("rust async");

    expect(provider).toBe("Synthetic");
    expect(results).toHaveLength(2);
    expect(results.every((r) => r.providerName === "Synthetic")).toBe(true);
    expect(results[0].title).toBe("Information about rust async");
    expect(results[1]?.title).toBe("Related: Rust Async Overview");
    expect(attempts.at(-1)).toEqual({ provider: "Synthetic", status: "ok", results: 2 });
  });

  it("never calls the network for providers without credentials", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response("{}"));
    const providers = [
      new TavilyProvider({ fetchImpl }),
      new GoogleProvider({ apiKey: "test-key", fetchImpl }),
      new BingProvider({ fetchImpl })
    ];

    const { provider, attempts } = await chain(providers).searchDetailed("anything");

    expect(fetchImpl).not.toHaveBeenCalled();
    expect(provider).toBe("Synthetic");
    expect(attempts.map((a) => a.reason)).toEqual([
      "TAVILY_API_KEY is not set",
      "GOOGLE_API_KEY / GOOGLE_SEARCH_ENGINE_ID not set",
      "BING_SEARCH_KEY is not set",
      undefined
    ]);
  });

  it("serves repeated queries from the cache", async () => {
    const first = ok("First");
    const c = chain([first], { cache: new MemoryCache(() => 0) });

    await c.search("Routing ");
    const again = await c.searchDetailed("routing");

    expect(first.search).toHaveBeenCalledTimes(1);
    expect(again.provider).toBe("First");
    expect(again.attempts).toEqual([]);
    expect(again.results.map((r) => r.title)).toEqual(["a", "b"]);
  });

  it("does not cache synthetic results", async () => {
    const empty = decline("Empty");
    const c = chain([empty], { cache: new MemoryCache(() => 0) });

    await c.search("routing");
    await c.search("routing");

    expect(empty.search).toHaveBeenCalledTimes(2);
  });

  describe("pacing", () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it("waits pauseMs before each provider after the first", async () => {
      vi.useFakeTimers();
      const first = decline("First");
      const second = ok("Second");

      const pending = chain([first, second], { pauseMs: 200 }).search("routing");

      await vi.advanceTimersByTimeAsync(0);
      expect(first.search).toHaveBeenCalledTimes(1);
      expect(second.search).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(199);
      expect(second.search).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(1);
      expect(second.search).toHaveBeenCalledTimes(1);

      const results = await pending;
      expect(results.map((r) => r.providerName)).toEqual(["Second", "Second"]);
    });

    it("does not pause before the first provider", async () => {
      vi.useFakeTimers();
      const first = ok("First");

      const pending = chain([first], { pauseMs: 200 }).search("routing");
      await vi.advanceTimersByTimeAsync(0);

      expect(first.search).toHaveBeenCalledTimes(1);
      await expect(pending).resolves.toHaveLength(2);
    });
  });

  it("lists providers in precedence order, synthetic last", () => {
    expect(chain([ok("A"), ok("B")]).providerNames).toEqual(["A", "B", "Synthetic"]);
  });
});

describe("SyntheticProvider", () => {
  it("generates two dated placeholder results", () => {
    const [first, second] = new SyntheticProvider(() => NOW).generate("  rust async ");

    expect(first).toEqual({
      title: "Information about rust async",
      url: "https://local.search/results?q=rust+async",
      snippet: "Based on available knowledge about rust async as of October 18, 2026. This is a locally generated placeholder result.",
      providerName: "Synthetic",
      resultKind: "web"
    });
    expect(second?.url).toBe("https://local.search/related?q=rust+async");
    expect(second?.snippet).toBe(
      "General information and context related to rust async. Generated: 2026-10-18T12:00:00.000Z."
    );
  });
});
