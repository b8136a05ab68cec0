import { createId } from "@paralleldrive/cuid2";
import { createLogger, errorMessage } from "../services/log";
import type {
  LocalRetriever,
  RetrievalOutcome,
  RoutedOutcome,
  RouterStats,
  RoutingDecision,
  RoutingHistoryEntry
} from "../types/routing";
import type { QueryClassifier } from "./classifier";
import type { RetrievalDispatcher } from "./dispatcher";
import { decision } from "./heuristics";
import { computeStats, RoutingHistory } from "./history";

const log = createLogger("router");

export const CLASSIFIER_ERROR_DECISION: RoutingDecision = decision("web", "Default routing (classifier error)", 0.5);

export type RouteRequest = {
  query: string;
  localRetriever?: LocalRetriever | null;
  hasLocalDocuments: boolean;
};

export type RouterOptions = {
  classifier: Pick<QueryClassifier, "classify">;
  dispatcher: Pick<RetrievalDispatcher, "retrieve">;
  history?: RoutingHistory;
  now?: () => Date;
};

/**
 * classify -> dispatch -> record. `route` never rejects; every call leaves
 * exactly one history entry, including calls that end in error.
 */
export class Router {
  private classifier: Pick<QueryClassifier, "classify">;
  private dispatcher: Pick<RetrievalDispatcher, "retrieve">;
  private history: RoutingHistory;
  private now: () => Date;

  constructor(opts: RouterOptions) {
    this.classifier = opts.classifier;
    this.dispatcher = opts.dispatcher;
    this.history = opts.history ?? new RoutingHistory();
    this.now = opts.now ?? (() => new Date());
  }

  async route(req: RouteRequest): Promise<RoutedOutcome> {
    const { query, hasLocalDocuments } = req;
    const localRetriever = req.localRetriever ?? null;
    log.info(`routing: "${query.slice(0, 50)}"`);

    let routing: RoutingDecision;
    let classifyError: string | undefined;
    try {
      routing = await this.classifier.classify(query, hasLocalDocuments);
    } catch (err) {
      classifyError = errorMessage(err);
      log.error(`classification failed: ${classifyError}`);
      routing = CLASSIFIER_ERROR_DECISION;
    }

    let outcome: RetrievalOutcome;
    try {
      outcome = await this.dispatcher.retrieve(query, routing, localRetriever);
    } catch (err) {
      const message = errorMessage(err);
      log.error(`routing error: ${message}`);
      outcome = {
        contextText: `Error during routing: ${message}`,
        sources: [],
        retrievalType: routing.datasource,
        resultCounts: { local: 0, web: 0, total: 0 },
        error: message
      };
    }

    const error = [classifyError && `classification: ${classifyError}`, outcome.error].filter(Boolean).join("; ");
    const entry: RoutingHistoryEntry = {
      id: createId(),
      query,
      datasource: routing.datasource,
      reasoning: routing.reasoning,
      confidence: routing.confidence,
      retrievalType: outcome.retrievalType,
      sourceCount: outcome.sources.length,
      ...(error ? { error } : {}),
      timestamp: this.now().toISOString()
    };
    this.history.append(entry);

    log.info(`routed to ${routing.datasource} with ${outcome.sources.length} sources`);

    return {
      ...outcome,
      ...(error ? { error } : {}),
      query,
      routing,
      historyId: entry.id
    };
  }

  getStats(): RouterStats {
    return computeStats(this.history.snapshot());
  }

  getHistory(): RoutingHistoryEntry[] {
    return this.history.snapshot();
  }
}
