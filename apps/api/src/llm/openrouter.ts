import { z } from "zod";
import { env } from "../services/env";
import type { ChatOptions, LLMProvider } from "./provider";

const CompletionSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullish() }).optional() })).optional()
});

/**
 * OpenRouter Chat Completions wrapper.
 */
export class OpenRouterProvider implements LLMProvider {
  readonly name = "openrouter";
  private apiKey: string | undefined;
  private model: string;

  constructor(opts: { apiKey?: string; model?: string } = {}) {
    this.apiKey = opts.apiKey ?? env.OPENROUTER_API_KEY;
    this.model = opts.model ?? env.OPENROUTER_MODEL;
  }

  async chat(opts: ChatOptions): Promise<{ text: string }> {
    if (!this.apiKey) throw new Error("OPENROUTER_API_KEY is not set.");

    const res = await fetch("https://openrouter.ai/api/v1/chat/completions", {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        "Content-Type": "application/json",
        "HTTP-Referer": "http://localhost",
        "X-Title": "Source Router"
      },
      body: JSON.stringify({
        model: this.model,
        messages: opts.messages,
        temperature: opts.temperature ?? 0,
        stream: false
      }),
      signal: opts.signal
    });

    if (!res.ok) throw new Error(`OpenRouter chat failed (${res.status}): ${await res.text()}`);

    const data = CompletionSchema.parse(await res.json());
    return { text: data.choices?.[0]?.message?.content ?? "" };
  }
}
