import { z } from "zod";
import { httpFetch } from "../http";
import type { SearchResult } from "../../types/routing";
import { declined, fetchJson, outcomeOf, type FetchLike, type SearchProvider } from "./provider";

const TavilyResponseSchema = z.object({
  answer: z.string().nullish(),
  results: z
    .array(
      z.object({
        title: z.string().nullish(),
        url: z.string().nullish(),
        content: z.string().nullish(),
        snippet: z.string().nullish()
      })
    )
    .default([])
});

/**
 * Tavily answer engine. Optimised for LLM context: it can return a direct
 * answer ahead of the ranked results.
 */
export class TavilyProvider implements SearchProvider {
  readonly name = "Tavily";

  constructor(
    private opts: {
      apiKey?: string;
      includeAnswer?: boolean;
      fetchImpl?: FetchLike;
      endpoint?: string;
    }
  ) {}

  async search(query: string, limit: number, signal: AbortSignal) {
    const { apiKey } = this.opts;
    if (!apiKey) return declined("TAVILY_API_KEY is not set");

    const includeAnswer = this.opts.includeAnswer ?? true;
    const data = await fetchJson(
      this.opts.fetchImpl ?? httpFetch,
      this.opts.endpoint ?? "https://api.tavily.com/search",
      {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          api_key: apiKey,
          query,
          max_results: limit,
          include_answer: includeAnswer,
          topic: "general"
        }),
        signal
      },
      TavilyResponseSchema
    );

    const results: SearchResult[] = [];

    if (includeAnswer && data.answer) {
      results.push({
        title: "Direct Answer",
        snippet: data.answer,
        providerName: this.name,
        resultKind: "answer"
      });
    }

    for (const r of data.results.slice(0, limit)) {
      results.push({
        title: r.title || "No title",
        url: r.url || undefined,
        snippet: r.content ?? r.snippet ?? "",
        providerName: this.name,
        resultKind: "web"
      });
    }

    return outcomeOf(results);
  }
}
