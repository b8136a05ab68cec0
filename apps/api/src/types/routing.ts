import { z } from "zod";

export const DatasourceSchema = z.enum(["local", "web", "hybrid"]);
export type Datasource = z.infer<typeof DatasourceSchema>;

export type RoutingDecision = Readonly<{
  datasource: Datasource;
  reasoning: string;
  confidence: number;
}>;

export type ResultKind = "answer" | "web";

export type SearchResult = {
  title: string;
  url?: string;
  snippet: string;
  /** Filled by page enrichment; readers fall back to `snippet`. */
  fullContent?: string;
  providerName: string;
  resultKind: ResultKind;
};

export type NonEmptyArray<T> = [T, ...T[]];

export type ProviderOutcome =
  | { status: "ok"; results: NonEmptyArray<SearchResult> }
  | { status: "declined"; reason: string };

export type LocalDocument = {
  content: string;
  sourceId: string;
  page?: string;
  chunk?: string;
};

export interface LocalRetriever {
  getRelevantDocuments(query: string): Promise<LocalDocument[]>;
}

export type SourceRef =
  | {
      origin: "local";
      sourceId: string;
      page?: string;
      chunk?: string;
      content: string;
    }
  | {
      origin: "web";
      title: string;
      url?: string;
      snippet: string;
      content: string;
      providerName: string;
      resultKind: ResultKind;
    };

export type RetrievalType = Datasource;

export type ResultCounts = { local: number; web: number; total: number };

export type RetrievalOutcome = {
  contextText: string;
  sources: SourceRef[];
  retrievalType: RetrievalType;
  resultCounts: ResultCounts;
  error?: string;
};

export type RoutedOutcome = RetrievalOutcome & {
  query: string;
  routing: RoutingDecision;
  historyId: string;
};

export type RoutingHistoryEntry = Readonly<{
  id: string;
  query: string;
  datasource: Datasource;
  reasoning: string;
  confidence: number;
  retrievalType: RetrievalType;
  sourceCount: number;
  error?: string;
  timestamp: string;
}>;

export type RouterStats = {
  totalQueries: number;
  bySource: Partial<Record<Datasource, number>>;
  byRetrievalType: Partial<Record<RetrievalType, number>>;
  avgConfidence: number;
  errorCount: number;
  successRate: number;
};
