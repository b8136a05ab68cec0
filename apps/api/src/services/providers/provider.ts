import type { z, ZodTypeAny } from "zod";
import type { ProviderOutcome, SearchResult } from "../../types/routing";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface SearchProvider {
  readonly name: string;
  /**
   * Must resolve to `declined` rather than reject when the provider has
   * nothing to offer. The chain still guards against rejections.
   */
  search(query: string, limit: number, signal: AbortSignal): Promise<ProviderOutcome>;
}

export const BROWSER_HEADERS: Record<string, string> = {
  "User-Agent":
    "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.5"
};

export function declined(reason: string): ProviderOutcome {
  return { status: "declined", reason };
}

export function outcomeOf(results: SearchResult[]): ProviderOutcome {
  const [first, ...rest] = results;
  return first ? { status: "ok", results: [first, ...rest] } : declined("0 results");
}

export async function readBody(res: Response): Promise<string> {
  if (!res.ok) throw new Error(`HTTP ${res.status}: ${(await res.text().catch(() => "")).slice(0, 200)}`);
  return res.text();
}

/**
 * Fetch + status check + schema validation. Anything off-contract throws;
 * the chain turns throws into a decline.
 */
export async function fetchJson<S extends ZodTypeAny>(
  fetchImpl: FetchLike,
  url: string,
  init: RequestInit,
  schema: S
): Promise<z.output<S>> {
  const res = await fetchImpl(url, init);
  const body = await readBody(res);
  return schema.parse(JSON.parse(body));
}

export function withQuery(base: string, params: Record<string, string | number>): string {
  const url = new URL(base);
  for (const [k, v] of Object.entries(params)) url.searchParams.set(k, String(v));
  return url.toString();
}
