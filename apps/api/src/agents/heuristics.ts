import type { Datasource, RoutingDecision } from "../types/routing";

// Phrases that point at the user's own uploads. Any hit means the query is
// not a general-knowledge question.
const DOCUMENT_INDICATORS = [
  "my document",
  "my file",
  "my pdf",
  "my paper",
  "the document",
  "the file",
  "the pdf",
  "the paper",
  "uploaded",
  "attachment",
  "according to my",
  "based on my",
  "in my file",
  "in the document"
];

const GENERAL_KNOWLEDGE_PATTERNS = [
  "what is",
  "what are",
  "who is",
  "who are",
  "explain",
  "how does",
  "how do",
  "how to",
  "define",
  "definition of",
  "tell me about",
  "describe",
  "why",
  "when",
  "where",
  "weather",
  "temperature",
  "forecast",
  "news",
  "latest",
  "current",
  "recent",
  "history of",
  "background on"
];

// Narrower than DOCUMENT_INDICATORS: only phrases that unambiguously ask
// about an uploaded document.
const EXPLICIT_DOCUMENT_PHRASES = [
  "my document",
  "my file",
  "my pdf",
  "my paper",
  "the document",
  "the file",
  "the pdf",
  "uploaded file",
  "in my document",
  "according to my document",
  "what does my",
  "summarize my",
  "analyze my"
];

const WEB_INTENT_KEYWORDS = [
  "latest",
  "current",
  "recent",
  "news",
  "today",
  "now",
  "what is",
  "what are",
  "explain",
  "define",
  "how does",
  "weather",
  "temperature",
  "forecast",
  "this year"
];

export function decision(datasource: Datasource, reasoning: string, confidence: number): RoutingDecision {
  return Object.freeze({ datasource, reasoning, confidence });
}

function containsAny(lower: string, phrases: readonly string[]): boolean {
  return phrases.some((p) => lower.includes(p));
}

export function isGeneralKnowledge(query: string): boolean {
  const lower = query.toLowerCase();
  if (containsAny(lower, DOCUMENT_INDICATORS)) return false;
  if (containsAny(lower, GENERAL_KNOWLEDGE_PATTERNS)) return true;
  // Anything that does not mention documents is treated as general knowledge.
  return true;
}

export function isExplicitDocumentReference(query: string): boolean {
  return containsAny(query.toLowerCase(), EXPLICIT_DOCUMENT_PHRASES);
}

export function hasWebIntent(query: string, now: Date = new Date()): boolean {
  const lower = query.toLowerCase();
  const year = now.getUTCFullYear();
  return containsAny(lower, [...WEB_INTENT_KEYWORDS, String(year), String(year - 1)]);
}

export function contextHint(hasLocalDocuments: boolean): string {
  return `User has ${hasLocalDocuments ? "uploaded documents available" : "NO uploaded documents"}`;
}

export const NO_DOCUMENTS_DECISION: RoutingDecision = decision("web", "No local documents available - using web search", 0.9);

export const GENERAL_KNOWLEDGE_DECISION: RoutingDecision = decision("web", "General knowledge question - using web search", 0.85);

/**
 * Post-classification rules. They can only move a decision towards `web`.
 */
export function applyOverrides(
  current: RoutingDecision,
  query: string,
  hasLocalDocuments: boolean
): RoutingDecision {
  if (!hasLocalDocuments && current.datasource !== "web") return NO_DOCUMENTS_DECISION;

  if (
    hasLocalDocuments &&
    current.datasource === "local" &&
    isGeneralKnowledge(query) &&
    !isExplicitDocumentReference(query)
  ) {
    return GENERAL_KNOWLEDGE_DECISION;
  }

  return current;
}

/**
 * Keyword-only routing used when the classifier capability is missing or
 * failed. Defaults to `web` when nothing fires.
 */
export function heuristicDecision(query: string, hasLocalDocuments: boolean, now?: Date): RoutingDecision {
  if (!hasLocalDocuments) return NO_DOCUMENTS_DECISION;

  const docRef = isExplicitDocumentReference(query);
  const webIntent = hasWebIntent(query, now);

  if (docRef && webIntent) {
    return decision("hybrid", "Query mentions both uploaded documents and external information", 0.75);
  }

  if (docRef) {
    return decision("local", "Query explicitly references uploaded documents", 0.85);
  }

  if (webIntent || isGeneralKnowledge(query)) {
    return decision("web", "General knowledge or external information query", 0.8);
  }

  return decision("web", "General query - using web search by default", 0.7);
}
