import { describe, expect, it, vi } from "vitest";
import { ArxivProvider, parseArxivFeed } from "../services/providers/arxiv";
import { BingProvider } from "../services/providers/bing";
import { GoogleProvider } from "../services/providers/google";
import type { FetchLike } from "../services/providers/provider";
import { TavilyProvider } from "../services/providers/tavily";
import { stripMarkup, WikipediaProvider, wikiUrl } from "../services/providers/wikipedia";

const signal = new AbortController().signal;

function respond(body: unknown, status = 200) {
  const text = typeof body === "string" ? body : JSON.stringify(body);
  return vi.fn<FetchLike>(async () => new Response(text, { status }));
}

function requestedUrl(fetchImpl: ReturnType<typeof respond>): URL {
  return new URL(fetchImpl.mock.calls[0]?.[0] ?? "about:blank");
}

describe("TavilyProvider", () => {
  it("declines without an API key", async () => {
    const fetchImpl = respond({});
    expect(await new TavilyProvider({ fetchImpl }).search("q", 5, signal)).toEqual({
      status: "declined",
      reason: "TAVILY_API_KEY is not set"
    });
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("puts the direct answer first", async () => {
    const fetchImpl = respond({
      answer: "Tokyo is mild today.",
      results: [
        { title: "Forecast", url: "https://weather.example/tokyo", content: "Sunny, 21C" },
        { url: "https://weather.example/other", snippet: "Cloudy" }
      ]
    });

    const outcome = await new TavilyProvider({ apiKey: "test-secret", fetchImpl }).search("tokyo weather", 5, signal);

    expect(outcome).toEqual({
      status: "ok",
      results: [
        { title: "Direct Answer", snippet: "Tokyo is mild today.", providerName: "Tavily", resultKind: "answer" },
        { title: "Forecast", url: "https://weather.example/tokyo", snippet: "Sunny, 21C", providerName: "Tavily", resultKind: "web" },
        { title: "No title", url: "https://weather.example/other", snippet: "Cloudy", providerName: "Tavily", resultKind: "web" }
      ]
    });

    const init = fetchImpl.mock.calls[0]?.[1];
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toMatchObject({ api_key: "test-secret", query: "tokyo weather", max_results: 5 });
  });

  it("declines an empty answer set", async () => {
    const outcome = await new TavilyProvider({ apiKey: "test-secret", fetchImpl: respond({ results: [] }) }).search("q", 5, signal);
    expect(outcome).toEqual({ status: "declined", reason: "0 results" });
  });

  it("rejects on HTTP errors", async () => {
    const provider = new TavilyProvider({ apiKey: "test-secret", fetchImpl: respond("quota exceeded", 432) });
    await expect(provider.search("q", 5, signal)).rejects.toThrow("HTTP 432: quota exceeded");
  });
});

describe("WikipediaProvider", () => {
  it("strips search markup and builds article URLs", async () => {
    const fetchImpl = respond({
      query: {
        search: [
          { title: "Greater Tokyo Area", snippet: 'Capital region of <span class="searchmatch">Japan</span> &amp; more' },
          { title: "Tokyo", snippet: "It&#039;s &quot;big&quot;" }
        ]
      }
    });

    const outcome = await new WikipediaProvider({ fetchImpl }).search("tokyo", 5, signal);

    expect(outcome.status).toBe("ok");
    if (outcome.status !== "ok") return;
    expect(outcome.results.map((r) => [r.url, r.snippet])).toEqual([
      ["https://en.wikipedia.org/wiki/Greater_Tokyo_Area", "Capital region of Japan & more"],
      ["https://en.wikipedia.org/wiki/Tokyo", `It's "big"`]
    ]);
    expect(requestedUrl(fetchImpl).searchParams.get("srsearch")).toBe("tokyo");
    expect(requestedUrl(fetchImpl).searchParams.get("srlimit")).toBe("5");
  });

  it("declines when nothing matches", async () => {
    const outcome = await new WikipediaProvider({ fetchImpl: respond({ query: { search: [] } }) }).search("zzz", 5, signal);
    expect(outcome).toEqual({ status: "declined", reason: "0 results" });
  });

  it("rejects malformed payloads", async () => {
    const provider = new WikipediaProvider({ fetchImpl: respond({ query: { search: "nope" } }) });
    await expect(provider.search("q", 5, signal)).rejects.toThrow();
  });

  it("exposes its helpers", () => {
    expect(stripMarkup("  <b>a</b>\n  b  ")).toBe("a b");
    expect(wikiUrl("Query routing")).toBe("https://en.wikipedia.org/wiki/Query_routing");
  });

  it("decodes named and numeric entities", () => {
    expect(stripMarkup("&lt;b&gt; tag&nbsp;test &#x41;&#66; caf&eacute;")).toBe("<b> tag test AB café");
  });
});

const FEED = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <entry>
    <id>http://arxiv.org/abs/2401.00001v1</id>
    <title>Routing   Queries
      Across Sources</title>
    <summary>  We study routing. </summary>
  </entry>
  <entry>
    <id>http://arxiv.org/abs/2401.00002v1</id>
    <title></title>
    <summary>Untitled entry</summary>
  </entry>
</feed>`;

describe("ArxivProvider", () => {
  it("parses titled entries from the Atom feed", () => {
    expect(parseArxivFeed(FEED, "arXiv")).toEqual([
      {
        title: "Routing Queries Across Sources",
        url: "https://arxiv.org/abs/2401.00001v1",
        snippet: "We study routing.",
        providerName: "arXiv",
        resultKind: "web"
      }
    ]);
  });

  it("cuts summaries to 300 characters", () => {
    const long = FEED.replace("We study routing.", "x".repeat(400));
    expect(parseArxivFeed(long, "arXiv")[0]?.snippet).toHaveLength(300);
  });

  it("queries the export API", async () => {
    const fetchImpl = respond(FEED);
    const outcome = await new ArxivProvider({ fetchImpl }).search("query routing", 3, signal);

    expect(outcome.status).toBe("ok");
    const url = requestedUrl(fetchImpl);
    expect(url.searchParams.get("search_query")).toBe("all:query routing");
    expect(url.searchParams.get("max_results")).toBe("3");
  });
});

describe("GoogleProvider", () => {
  it("declines without an engine id", async () => {
    const fetchImpl = respond({});
    const outcome = await new GoogleProvider({ apiKey: "test-key", fetchImpl }).search("q", 5, signal);
    expect(outcome).toEqual({ status: "declined", reason: "GOOGLE_API_KEY / GOOGLE_SEARCH_ENGINE_ID not set" });
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("caps the page size at 10 and maps items", async () => {
    const fetchImpl = respond({ items: [{ title: "Result", link: "https://example.com/r", snippet: "text" }] });
    const outcome = await new GoogleProvider({ apiKey: "test-key", engineId: "test-cx", fetchImpl }).search("q", 25, signal);

    expect(requestedUrl(fetchImpl).searchParams.get("num")).toBe("10");
    expect(outcome).toEqual({
      status: "ok",
      results: [{ title: "Result", url: "https://example.com/r", snippet: "text", providerName: "Google", resultKind: "web" }]
    });
  });

  it("declines when the response has no items", async () => {
    const outcome = await new GoogleProvider({ apiKey: "test-key", engineId: "test-cx", fetchImpl: respond({}) }).search("q", 5, signal);
    expect(outcome).toEqual({ status: "declined", reason: "0 results" });
  });
});

describe("BingProvider", () => {
  it("sends the subscription key and strips highlights", async () => {
    const fetchImpl = respond({
      webPages: { value: [{ name: "Routing", url: "https://example.com/routing", snippet: "Query <b>routing</b> guide" }] }
    });

    const outcome = await new BingProvider({ apiKey: "test-secret", fetchImpl }).search("routing", 5, signal);

    expect(outcome).toEqual({
      status: "ok",
      results: [
        { title: "Routing", url: "https://example.com/routing", snippet: "Query routing guide", providerName: "Bing", resultKind: "web" }
      ]
    });
    const headers = new Headers(fetchImpl.mock.calls[0]?.[1]?.headers);
    expect(headers.get("Ocp-Apim-Subscription-Key")).toBe("test-secret");
    expect(requestedUrl(fetchImpl).searchParams.get("count")).toBe("5");
  });
});
