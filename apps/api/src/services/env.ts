import { z } from "zod";

const TRUTHY = new Set(["true", "1", "yes", "on"]);

const flag = z
  .string()
  .default("true")
  .transform((v) => v.trim().toLowerCase())
  .pipe(z.enum(["true", "false", "1", "0", "yes", "no", "on", "off"]))
  .transform((v) => TRUTHY.has(v));

const EnvSchema = z.object({
  PORT: z.string().default("8787"),
  CORS_ORIGIN: z.string().default("http://localhost:5173"),

  LLM_PROVIDER: z.enum(["ollama", "openrouter", "none"]).default("ollama"),

  OLLAMA_BASE_URL: z.string().default("http://localhost:11434"),
  OLLAMA_MODEL: z.string().default("llama3.1"),

  OPENROUTER_API_KEY: z.string().optional(),
  OPENROUTER_MODEL: z.string().default("anthropic/claude-3.5-sonnet"),

  // Provider credentials. Absent keys mean the provider is skipped.
  TAVILY_API_KEY: z.string().optional(),
  GOOGLE_API_KEY: z.string().optional(),
  GOOGLE_SEARCH_ENGINE_ID: z.string().optional(),
  BING_SEARCH_KEY: z.string().optional(),

  WEB_SEARCH_ENABLED: flag,
  WEB_MAX_RESULTS: z.coerce.number().int().min(1).max(20).default(5),
  FETCH_FULL_CONTENT: flag,
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  PROVIDER_PAUSE_MS: z.coerce.number().int().min(0).default(200),
  CLASSIFIER_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  ROUTING_HISTORY_LIMIT: z.coerce.number().int().positive().default(1000),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(30),

  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),

  UPSTASH_REDIS_REST_URL: z.string().optional(),
  UPSTASH_REDIS_REST_TOKEN: z.string().optional()
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Empty strings (common in copied .env files) count as unset so optional
 * credentials stay optional.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value.trim() !== "") cleaned[key] = value;
  }
  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment: ${problems}`);
  }
  return parsed.data;
}

export const env = parseEnv(process.env);
