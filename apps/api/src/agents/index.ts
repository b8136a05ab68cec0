import { getLLM } from "../llm";
import type { LLMProvider } from "../llm/provider";
import type { Cache } from "../services/cache";
import { env as defaultEnv, type Env } from "../services/env";
import { ContentFetcher } from "../services/fetch";
import { ArxivProvider } from "../services/providers/arxiv";
import { BingProvider } from "../services/providers/bing";
import { GoogleProvider } from "../services/providers/google";
import type { SearchProvider } from "../services/providers/provider";
import { TavilyProvider } from "../services/providers/tavily";
import { WikipediaProvider } from "../services/providers/wikipedia";
import { SearchChain } from "../services/search";
import { LLMClassifier, QueryClassifier } from "./classifier";
import { RetrievalDispatcher } from "./dispatcher";
import { RoutingHistory } from "./history";
import { Router } from "./router";

export { Router } from "./router";
export { QueryClassifier, LLMClassifier } from "./classifier";
export { RetrievalDispatcher } from "./dispatcher";
export { RoutingHistory, computeStats } from "./history";

/** Answer engine -> encyclopedia -> preprints -> Google -> Bing. */
export function defaultProviders(config: Env): SearchProvider[] {
  return [
    new TavilyProvider({ apiKey: config.TAVILY_API_KEY }),
    new WikipediaProvider(),
    new ArxivProvider(),
    new GoogleProvider({ apiKey: config.GOOGLE_API_KEY, engineId: config.GOOGLE_SEARCH_ENGINE_ID }),
    new BingProvider({ apiKey: config.BING_SEARCH_KEY })
  ];
}

export function createRouter(
  opts: { config?: Env; cache?: Cache | null; llm?: LLMProvider | null } = {}
): Router {
  const config = opts.config ?? defaultEnv;
  const cache = opts.cache ?? null;
  const llm = opts.llm !== undefined ? opts.llm : getLLM();

  const search = config.WEB_SEARCH_ENABLED
    ? new SearchChain({
        providers: defaultProviders(config),
        defaultLimit: config.WEB_MAX_RESULTS,
        timeoutMs: config.PROVIDER_TIMEOUT_MS,
        pauseMs: config.PROVIDER_PAUSE_MS,
        cache
      })
    : null;

  return new Router({
    classifier: new QueryClassifier({
      capability: llm ? new LLMClassifier(llm) : null,
      timeoutMs: config.CLASSIFIER_TIMEOUT_MS
    }),
    dispatcher: new RetrievalDispatcher({
      search,
      fetcher: new ContentFetcher({ cache }),
      fetchFullContent: config.FETCH_FULL_CONTENT,
      enrichPauseMs: config.PROVIDER_PAUSE_MS
    }),
    history: new RoutingHistory(config.ROUTING_HISTORY_LIMIT)
  });
}
