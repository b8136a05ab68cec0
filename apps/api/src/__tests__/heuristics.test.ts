import { describe, expect, it } from "vitest";
import {
  applyOverrides,
  contextHint,
  decision,
  hasWebIntent,
  heuristicDecision,
  isExplicitDocumentReference,
  isGeneralKnowledge
} from "../agents/heuristics";

const NOW = new Date("2026-10-18T12:00:00Z");

describe("predicates", () => {
  it("treats question patterns as general knowledge", () => {
    expect(isGeneralKnowledge("What is the weather in Tokyo?")).toBe(true);
    expect(isGeneralKnowledge("Explain neural networks")).toBe(true);
  });

  it("treats anything without a document mention as general knowledge", () => {
    expect(isGeneralKnowledge("pasta carbonara")).toBe(true);
    expect(isGeneralKnowledge("")).toBe(true);
  });

  it("never treats document mentions as general knowledge", () => {
    expect(isGeneralKnowledge("Summarize my uploaded PDF")).toBe(false);
    expect(isGeneralKnowledge("What is in the attachment?")).toBe(false);
  });

  it("matches explicit document references on the fixed phrase set only", () => {
    expect(isExplicitDocumentReference("Summarize my uploaded PDF")).toBe(true);
    expect(isExplicitDocumentReference("According to my document, who signed?")).toBe(true);
    expect(isExplicitDocumentReference("Tell me about the paper")).toBe(false);
    expect(isExplicitDocumentReference("")).toBe(false);
  });

  it("counts the current and previous year as web intent", () => {
    expect(hasWebIntent("Top frameworks of 2025", NOW)).toBe(true);
    expect(hasWebIntent("Top frameworks of 2026", NOW)).toBe(true);
    expect(hasWebIntent("Top frameworks of 2019", NOW)).toBe(false);
  });

  it("describes document availability for the classifier", () => {
    expect(contextHint(true)).toBe("User has uploaded documents available");
    expect(contextHint(false)).toBe("User has NO uploaded documents");
  });
});

describe("heuristicDecision", () => {
  it("always picks web when no documents are available", () => {
    expect(heuristicDecision("Summarize my uploaded PDF", false, NOW)).toEqual({
      datasource: "web",
      reasoning: "No local documents available - using web search",
      confidence: 0.9
    });
  });

  it("routes explicit document questions to local", () => {
    expect(heuristicDecision("Summarize my uploaded PDF", true, NOW)).toEqual({
      datasource: "local",
      reasoning: "Query explicitly references uploaded documents",
      confidence: 0.85
    });
  });

  it("routes document + web intent to hybrid", () => {
    const d = heuristicDecision("Compare my document with the latest industry trends", true, NOW);
    expect(d.datasource).toBe("hybrid");
    expect(d.confidence).toBe(0.75);
  });

  it("routes general questions to web even with documents", () => {
    const d = heuristicDecision("What is the weather in Tokyo?", true, NOW);
    expect(d.datasource).toBe("web");
    expect(d.confidence).toBe(0.8);
  });

  it("classifies the empty query as web", () => {
    expect(heuristicDecision("", true, NOW).datasource).toBe("web");
  });

  it("falls back to the default web decision when no predicate fires", () => {
    expect(heuristicDecision("Tell me about the paper", true, NOW)).toEqual({
      datasource: "web",
      reasoning: "General query - using web search by default",
      confidence: 0.7
    });
  });

  it("returns frozen decisions", () => {
    expect(Object.isFrozen(heuristicDecision("Summarize my uploaded PDF", true, NOW))).toBe(true);
  });
});

describe("applyOverrides", () => {
  it("forces web when there are no documents", () => {
    for (const datasource of ["local", "hybrid"] as const) {
      const d = applyOverrides(decision(datasource, "model said so", 0.95), "anything", false);
      expect(d).toEqual({ datasource: "web", reasoning: "No local documents available - using web search", confidence: 0.9 });
    }
  });

  it("forces web for general knowledge routed to local", () => {
    const d = applyOverrides(decision("local", "model said so", 0.95), "What is the weather in Tokyo?", true);
    expect(d).toEqual({ datasource: "web", reasoning: "General knowledge question - using web search", confidence: 0.85 });
  });

  it("keeps local for explicit document questions", () => {
    const original = decision("local", "about the upload", 0.9);
    expect(applyOverrides(original, "Summarize my uploaded PDF", true)).toBe(original);
  });

  it("leaves hybrid and web alone when documents exist", () => {
    const hybrid = decision("hybrid", "both", 0.6);
    const web = decision("web", "web", 0.6);
    expect(applyOverrides(hybrid, "What is X?", true)).toBe(hybrid);
    expect(applyOverrides(web, "Summarize my uploaded PDF", true)).toBe(web);
  });
});
