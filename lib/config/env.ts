import { z } from "zod";

export class ConfigError extends Error {
  name = "ConfigError";

  constructor(message: string, readonly keys: string[] = []) {
    super(message);
  }
}

const positiveInt = (fallback: number, max?: number) => {
  const base = z.coerce.number().int().positive();
  return (max ? base.max(max) : base).default(fallback);
};

// Empty strings from the environment count as "unset".
const unsetToUndefined = (val: unknown) => (typeof val === "string" && val.trim() === "" ? undefined : val);

const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().default(""),

  // Text models: chat drafts answers, classifier handles routing + extraction.
  OPENAI_MODEL_CHAT: z.preprocess(unsetToUndefined, z.string().default("gpt-4o-mini")),
  OPENAI_MODEL_CLASSIFIER: z.preprocess(unsetToUndefined, z.string().default("gpt-4o-mini")),
  OPENAI_MODEL_EMBEDDING: z.preprocess(unsetToUndefined, z.string().default("text-embedding-3-small")),
  OPENAI_TEMPERATURE: z.preprocess(unsetToUndefined, z.coerce.number().min(0).max(2).default(0.2)),

  GENERATION_TIMEOUT_MS: z.preprocess(unsetToUndefined, positiveInt(15000)),

  HISTORY_TURNS: z.preprocess(unsetToUndefined, positiveInt(3, 20)),
  CATALOG_TOP_K: z.preprocess(unsetToUndefined, positiveInt(3, 20)),
  KNOWLEDGE_TOP_K: z.preprocess(unsetToUndefined, positiveInt(3, 10)),

  FINANCE_ANNUAL_RATE: z.preprocess(unsetToUndefined, z.coerce.number().min(0).max(1).default(0.1)),
  FINANCE_DEFAULT_TERM_YEARS: z.preprocess(unsetToUndefined, z.coerce.number().int().min(3).max(6).default(5)),
  CURRENCY: z.preprocess(unsetToUndefined, z.string().default("MXN")),

  CATALOG_PATH: z.preprocess(unsetToUndefined, z.string().default("data/catalog.json")),
  KNOWLEDGE_BASE_PATH: z.preprocess(unsetToUndefined, z.string().default("data/knowledge-base.md")),
  RESPONSES_PATH: z.preprocess(unsetToUndefined, z.string().default("prompts/responses.md")),
});

export type AppConfig = z.infer<typeof EnvSchema>;

/**
 * Reads configuration from an env-like record (defaults to process.env).
 * Fails fast with every offending key listed.
 */
export function loadConfig(source: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map((i) => String(i.path[0] ?? "?")))];
    throw new ConfigError(`Invalid configuration: ${keys.join(", ")}`, keys);
  }
  return parsed.data;
}
