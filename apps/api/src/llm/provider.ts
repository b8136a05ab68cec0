export type ChatRole = "system" | "user" | "assistant";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export type ChatOptions = {
  messages: ChatMessage[];
  temperature?: number;

  /**
   * Aborts the underlying HTTP request. Callers use it to bound how long a
   * routing decision may wait on the model.
   */
  signal?: AbortSignal;
};

export interface LLMProvider {
  readonly name: string;
  chat(opts: ChatOptions): Promise<{ text: string }>;
}
