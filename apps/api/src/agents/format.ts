import type { LocalDocument, SearchResult, SourceRef } from "../types/routing";

const RULE = "-".repeat(70);
const HEAVY_RULE = "=".repeat(70);

export function asOfDate(d: Date): string {
  return d.toLocaleDateString("en-US", { month: "long", day: "numeric", year: "numeric", timeZone: "UTC" });
}

export function contentOf(result: SearchResult): string {
  return result.fullContent || result.snippet;
}

function locatorLine(doc: LocalDocument): string | null {
  const parts: string[] = [];
  if (doc.page) parts.push(`Page: ${doc.page}`);
  if (doc.chunk) parts.push(`Chunk: ${doc.chunk}`);
  return parts.length ? parts.join(" | ") : null;
}

function localBlock(label: string, doc: LocalDocument): string {
  const locator = locatorLine(doc);
  return [`[${label}] ${doc.sourceId}`, ...(locator ? [locator] : []), `Content: ${doc.content}`].join("\n");
}

export function formatLocalContext(docs: LocalDocument[]): string {
  const blocks = docs.map((doc, i) => localBlock(`Document ${i + 1}`, doc));
  return ["=== LOCAL DOCUMENT RESULTS ===", ...blocks].join("\n\n") + "\n";
}

export function formatWebContext(query: string, results: SearchResult[], asOf: Date): string {
  const header = [`=== WEB SEARCH RESULTS (As of ${asOfDate(asOf)}) ===`, "", `Search Query: ${query}`, HEAVY_RULE].join(
    "\n"
  );

  const blocks = results.map((r, i) =>
    [
      `[Result ${i + 1}] (${r.providerName} - ${r.resultKind})`,
      `Title: ${r.title}`,
      ...(r.url ? [`URL: ${r.url}`] : []),
      "Content:",
      contentOf(r),
      RULE
    ].join("\n")
  );

  return [header, ...blocks].join("\n\n") + "\n";
}

export function formatHybridContext(docs: LocalDocument[], results: SearchResult[], asOf: Date): string {
  const local = docs.length
    ? docs.map((doc, i) => localBlock(`Local ${i + 1}`, doc)).join("\n\n")
    : "No local documents found.";

  const web = results.length
    ? results
        .map((r, i) =>
          [`[Web ${i + 1}] ${r.title} (${r.providerName})`, ...(r.url ? [`URL: ${r.url}`] : []), `Content: ${contentOf(r)}`].join(
            "\n"
          )
        )
        .join("\n\n")
    : "No web results found.";

  return [
    `=== HYBRID RETRIEVAL RESULTS (As of ${asOfDate(asOf)}) ===`,
    ["LOCAL DOCUMENTS:", RULE, local].join("\n"),
    ["WEB SEARCH RESULTS:", RULE, web].join("\n")
  ].join("\n\n") + "\n";
}

export function localSourceRef(doc: LocalDocument): SourceRef {
  return {
    origin: "local",
    sourceId: doc.sourceId,
    ...(doc.page ? { page: doc.page } : {}),
    ...(doc.chunk ? { chunk: doc.chunk } : {}),
    content: doc.content
  };
}

export function webSourceRef(result: SearchResult): SourceRef {
  return {
    origin: "web",
    title: result.title,
    ...(result.url ? { url: result.url } : {}),
    snippet: result.snippet,
    content: contentOf(result),
    providerName: result.providerName,
    resultKind: result.resultKind
  };
}
