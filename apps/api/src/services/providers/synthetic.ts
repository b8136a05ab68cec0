import type { NonEmptyArray, SearchResult } from "../../types/routing";

export const SYNTHETIC_PROVIDER = "Synthetic";

function titleCase(s: string): string {
  return s.replace(/\b\w/g, (c) => c.toUpperCase());
}

function longDate(d: Date): string {
  return d.toLocaleDateString("en-US", { month: "long", day: "numeric", year: "numeric", timeZone: "UTC" });
}

/**
 * Last-resort generator. Never performs I/O, always returns two results,
 * so the chain can promise a non-empty answer.
 */
export class SyntheticProvider {
  readonly name = SYNTHETIC_PROVIDER;

  constructor(private now: () => Date = () => new Date()) {}

  generate(query: string): NonEmptyArray<SearchResult> {
    const q = query.trim();
    const encoded = encodeURIComponent(q).replace(/%20/g, "+");
    const at = this.now();

    return [
      {
        title: `Information about ${q}`,
        url: `https://local.search/results?q=${encoded}`,
        snippet: `Based on available knowledge about ${q} as of ${longDate(at)}. This is a locally generated placeholder result.`,
        providerName: this.name,
        resultKind: "web"
      },
      {
        title: `Related: ${titleCase(q)} Overview`,
        url: `https://local.search/related?q=${encoded}`,
        snippet: `General information and context related to ${q}. Generated: ${at.toISOString()}.`,
        providerName: this.name,
        resultKind: "web"
      }
    ];
  }
}
