import { z } from "zod";
import type { LLMProvider } from "../llm/provider";
import { jsonOnlySystemPrompt, safeJsonParse } from "../llm/jsonSchema";
import { createLogger, errorMessage } from "../services/log";
import type { Datasource, RoutingDecision } from "../types/routing";
import { applyOverrides, contextHint, decision, heuristicDecision } from "./heuristics";

const log = createLogger("classifier");

const DEFAULT_CONFIDENCE = 0.7;
const DEFAULT_REASONING = "Classification based on query content";

/**
 * External classification capability: returns raw model text that should
 * contain a JSON decision. Parsing is the classifier's job.
 */
export interface ClassifierCapability {
  classify(query: string, contextHint: string, signal: AbortSignal): Promise<string>;
}

const RawDecisionSchema = z
  .object({
    datasource: z.unknown(),
    reasoning: z.unknown(),
    confidence: z.unknown()
  })
  .partial();

export function normalizeDatasource(value: unknown): Datasource {
  const v = typeof value === "string" ? value.trim().toLowerCase() : "";
  if (v === "local_rag" || v === "local") return "local";
  if (v === "hybrid") return "hybrid";
  return "web";
}

function normalizeConfidence(value: unknown): number {
  const n = typeof value === "number" ? value : typeof value === "string" ? Number.parseFloat(value) : Number.NaN;
  if (!Number.isFinite(n)) return DEFAULT_CONFIDENCE;
  return Math.min(1, Math.max(0, n));
}

/**
 * Keyword sniffing for replies that carry no parsable JSON at all.
 */
function sniffDecision(text: string): RoutingDecision {
  const lower = text.toLowerCase();
  const datasource: Datasource = lower.includes("local_rag") ? "local" : lower.includes("hybrid") ? "hybrid" : "web";

  const reasoning = /"reasoning"\s*:\s*"([^"]+)"/.exec(text)?.[1] ?? DEFAULT_REASONING;
  const confidence = /"confidence"\s*:\s*([0-9.]+)/.exec(text)?.[1];

  return decision(datasource, reasoning, normalizeConfidence(confidence));
}

/**
 * Parse a model reply into a decision. Accepts a bare JSON object, an object
 * embedded in prose, or free text mentioning one of the datasource tokens.
 */
export function parseDecision(text: string): RoutingDecision {
  const parsed = RawDecisionSchema.safeParse(safeJsonParse(text));
  if (!parsed.success) return sniffDecision(text);

  const raw = parsed.data;
  const reasoning = typeof raw.reasoning === "string" && raw.reasoning.trim() ? raw.reasoning : DEFAULT_REASONING;

  return decision(normalizeDatasource(raw.datasource), reasoning, normalizeConfidence(raw.confidence));
}

const ROUTER_PROMPT = `You are an expert query router for a retrieval system.
Analyze the user's query and decide which data source(s) should answer it.

Available sources:
- local_rag: ONLY for questions EXPLICITLY about UPLOADED DOCUMENTS
- web_search: general knowledge, facts, definitions, current events, external information
- hybrid: ONLY when the query needs BOTH uploaded documents AND external web information

Rules:
- General knowledge ("What is X?", "Explain Y", "How does Z work?") -> web_search, even if documents are uploaded.
- Weather, news, "latest", "recent", real-time data -> web_search.
- Use local_rag only when the query references uploaded content ("my document", "according to my file").
- Use hybrid for requests like "Compare my document with current industry standards".`;

/**
 * LLM-backed capability over any configured chat provider.
 */
export class LLMClassifier implements ClassifierCapability {
  constructor(private llm: LLMProvider) {}

  async classify(query: string, hint: string, signal: AbortSignal): Promise<string> {
    const { text } = await this.llm.chat({
      temperature: 0,
      signal,
      messages: [
        { role: "system", content: ROUTER_PROMPT },
        {
          role: "system",
          content: jsonOnlySystemPrompt(
            '{"datasource":"local_rag|web_search|hybrid","reasoning":"brief explanation","confidence":0.85}'
          )
        },
        { role: "user", content: `User Query: ${query}\n\nContext: ${hint}\n\nRoute this query:` }
      ]
    });
    return text;
  }
}

export type QueryClassifierOptions = {
  capability: ClassifierCapability | null;
  timeoutMs?: number;
  now?: () => Date;
};

/**
 * Routing decision per query. `classify` never rejects: an unavailable,
 * failing or slow capability degrades to keyword heuristics.
 */
export class QueryClassifier {
  private capability: ClassifierCapability | null;
  private timeoutMs: number;
  private now: () => Date;

  constructor(opts: QueryClassifierOptions) {
    this.capability = opts.capability;
    this.timeoutMs = opts.timeoutMs ?? 20_000;
    this.now = opts.now ?? (() => new Date());
  }

  async classify(query: string, hasLocalDocuments: boolean): Promise<RoutingDecision> {
    const hint = contextHint(hasLocalDocuments);

    let reply: string;
    try {
      reply = await this.invoke(query, hint);
    } catch (err) {
      log.warn(`classification unavailable (${errorMessage(err)}), using keyword heuristics`);
      return heuristicDecision(query, hasLocalDocuments, this.now());
    }

    const parsed = parseDecision(reply);
    const final = applyOverrides(parsed, query, hasLocalDocuments);
    if (final !== parsed) log.info(`override ${parsed.datasource} -> ${final.datasource}: ${final.reasoning}`);

    log.info(`classified "${query.slice(0, 50)}" -> ${final.datasource}`);
    return final;
  }

  private async invoke(query: string, hint: string): Promise<string> {
    const capability = this.capability;
    if (!capability) throw new Error("no classifier configured");

    const abort = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        abort.abort();
        reject(new Error(`classifier timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([capability.classify(query, hint, abort.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
