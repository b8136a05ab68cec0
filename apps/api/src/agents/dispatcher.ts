import { enrichResults, type ContentFetcher } from "../services/fetch";
import { createLogger, errorMessage } from "../services/log";
import type { SearchChain } from "../services/search";
import type {
  LocalDocument,
  LocalRetriever,
  RetrievalOutcome,
  RetrievalType,
  RoutingDecision,
  SearchResult
} from "../types/routing";
import {
  formatHybridContext,
  formatLocalContext,
  formatWebContext,
  localSourceRef,
  webSourceRef
} from "./format";

const log = createLogger("dispatch");

export type DispatcherOptions = {
  /** null disables the web path entirely (configuration, not a failure). */
  search: SearchChain | null;
  fetcher?: Pick<ContentFetcher, "fetchText"> | null;
  fetchFullContent?: boolean;
  enrichPauseMs?: number;
  now?: () => Date;
};

type SideResult<T> = { items: T[]; error?: string };

function emptyOutcome(retrievalType: RetrievalType, contextText: string, error?: string): RetrievalOutcome {
  return {
    contextText,
    sources: [],
    retrievalType,
    resultCounts: { local: 0, web: 0, total: 0 },
    ...(error ? { error } : {})
  };
}

/**
 * Executes a routing decision. `retrieve` never rejects: delegate faults
 * come back as an outcome with `error` set and a readable `contextText`.
 */
export class RetrievalDispatcher {
  private search: SearchChain | null;
  private fetcher: Pick<ContentFetcher, "fetchText"> | null;
  private fetchFullContent: boolean;
  private enrichPauseMs: number;
  private now: () => Date;

  constructor(opts: DispatcherOptions) {
    this.search = opts.search;
    this.fetcher = opts.fetcher ?? null;
    this.fetchFullContent = opts.fetchFullContent ?? false;
    this.enrichPauseMs = opts.enrichPauseMs ?? 200;
    this.now = opts.now ?? (() => new Date());
  }

  async retrieve(query: string, decision: RoutingDecision, localRetriever: LocalRetriever | null): Promise<RetrievalOutcome> {
    try {
      switch (decision.datasource) {
        case "local":
          return await this.retrieveLocal(query, localRetriever);
        case "web":
          return await this.retrieveWeb(query);
        case "hybrid":
          return await this.retrieveHybrid(query, localRetriever);
        default:
          return await this.unknownDatasource(decision.datasource, query);
      }
    } catch (err) {
      const message = errorMessage(err);
      log.error(`retrieval failed: ${message}`);
      return emptyOutcome(decision.datasource, `Error during retrieval: ${message}`, message);
    }
  }

  // Unreachable for well-typed callers; data from outside the type system may still land here.
  private unknownDatasource(value: never, query: string): Promise<RetrievalOutcome> {
    log.warn(`unknown datasource ${String(value)}, defaulting to web`);
    return this.retrieveWeb(query);
  }

  async retrieveLocal(query: string, retriever: LocalRetriever | null): Promise<RetrievalOutcome> {
    if (!retriever) {
      log.warn("no local retriever configured");
      return emptyOutcome("local", "No local documents available.", "No local retriever configured");
    }

    const side = await this.localSide(query, retriever);
    if (side.error) {
      return emptyOutcome("local", `Error retrieving local documents: ${side.error}`, side.error);
    }
    if (side.items.length === 0) {
      log.info("no relevant local documents found");
      return emptyOutcome("local", "No relevant documents found in uploaded files.");
    }

    log.info(`retrieved ${side.items.length} local documents`);
    return {
      contextText: formatLocalContext(side.items),
      sources: side.items.map(localSourceRef),
      retrievalType: "local",
      resultCounts: { local: side.items.length, web: 0, total: side.items.length }
    };
  }

  async retrieveWeb(query: string): Promise<RetrievalOutcome> {
    if (!this.search) {
      log.warn("web search not enabled");
      return emptyOutcome("web", "Web search is not enabled.", "Web search not enabled");
    }

    const side = await this.webSide(query);
    if (side.error) {
      return emptyOutcome("web", `Error performing web search: ${side.error}`, side.error);
    }

    log.info(`retrieved ${side.items.length} web results`);
    return {
      contextText: formatWebContext(query, side.items, this.now()),
      sources: side.items.map(webSourceRef),
      retrievalType: "web",
      resultCounts: { local: 0, web: side.items.length, total: side.items.length }
    };
  }

  /**
   * Both sides run concurrently and fail independently. `error` is only set
   * when nothing came back and at least one side faulted.
   */
  async retrieveHybrid(query: string, retriever: LocalRetriever | null): Promise<RetrievalOutcome> {
    const [local, web] = await Promise.all([
      retriever ? this.localSide(query, retriever) : Promise.resolve<SideResult<LocalDocument>>({ items: [] }),
      this.search ? this.webSide(query) : Promise.resolve<SideResult<SearchResult>>({ items: [] })
    ]);

    if (local.error) log.warn(`hybrid: local side failed: ${local.error}`);
    if (web.error) log.warn(`hybrid: web side failed: ${web.error}`);

    const total = local.items.length + web.items.length;
    const faults = [local.error && `local: ${local.error}`, web.error && `web: ${web.error}`].filter(
      (e): e is string => Boolean(e)
    );

    log.info(`hybrid retrieval: ${local.items.length} local + ${web.items.length} web`);

    return {
      contextText: formatHybridContext(local.items, web.items, this.now()),
      sources: [...local.items.map(localSourceRef), ...web.items.map(webSourceRef)],
      retrievalType: "hybrid",
      resultCounts: { local: local.items.length, web: web.items.length, total },
      ...(total === 0 && faults.length ? { error: faults.join("; ") } : {})
    };
  }

  private async localSide(query: string, retriever: LocalRetriever): Promise<SideResult<LocalDocument>> {
    try {
      return { items: await retriever.getRelevantDocuments(query) };
    } catch (err) {
      return { items: [], error: errorMessage(err) };
    }
  }

  private async webSide(query: string): Promise<SideResult<SearchResult>> {
    const search = this.search;
    if (!search) return { items: [] };

    try {
      const results: SearchResult[] = await search.search(query);
      if (this.fetchFullContent && this.fetcher) {
        log.info(`fetching full content for ${results.length} results`);
        await enrichResults(results, this.fetcher, this.enrichPauseMs);
      }
      return { items: results };
    } catch (err) {
      return { items: [], error: errorMessage(err) };
    }
  }
}
