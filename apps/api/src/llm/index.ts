import { env } from "../services/env";
import type { LLMProvider } from "./provider";
import { OllamaProvider } from "./ollama";
import { OpenRouterProvider } from "./openrouter";

/**
 * Model used for routing decisions. `LLM_PROVIDER=none` disables it and the
 * classifier runs on keyword heuristics alone.
 */
export function getLLM(): LLMProvider | null {
  switch (env.LLM_PROVIDER) {
    case "openrouter":
      return new OpenRouterProvider();
    case "ollama":
      return new OllamaProvider();
    case "none":
      return null;
  }
}
