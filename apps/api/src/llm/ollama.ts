import { z } from "zod";
import { env } from "../services/env";
import type { ChatOptions, LLMProvider } from "./provider";

// Ollama can return different shapes depending on version/endpoint.
// Prefer chat shape, then fall back to legacy generate / OpenAI-compatible shapes.
const OllamaResponseSchema = z.object({
  message: z.object({ content: z.string() }).partial().optional(),
  response: z.string().optional(),
  choices: z.array(z.object({ message: z.object({ content: z.string() }).partial().optional() })).optional()
});

/**
 * Ollama Chat API wrapper (non-streaming).
 */
export class OllamaProvider implements LLMProvider {
  readonly name = "ollama";
  private baseUrl: string;
  private model: string;

  constructor(opts: { model?: string; baseUrl?: string } = {}) {
    this.model = opts.model ?? env.OLLAMA_MODEL;
    this.baseUrl = opts.baseUrl ?? env.OLLAMA_BASE_URL;
  }

  private options(temperature?: number) {
    return {
      ...(temperature != null ? { temperature } : {}),
      ...(process.env.OLLAMA_NUM_PREDICT ? { num_predict: Number(process.env.OLLAMA_NUM_PREDICT) } : {})
    };
  }

  async chat(opts: ChatOptions): Promise<{ text: string }> {
    const res = await fetch(`${this.baseUrl}/api/chat`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        model: this.model,
        messages: opts.messages,
        stream: false,
        options: this.options(opts.temperature)
      }),
      signal: opts.signal
    });

    if (!res.ok) throw new Error(`Ollama chat failed (${res.status}): ${await res.text()}`);

    const data = OllamaResponseSchema.parse(await res.json());
    const text = data.message?.content ?? data.response ?? data.choices?.[0]?.message?.content ?? "";

    return { text };
  }
}
