import OpenAI from "openai";
import type { Response } from "openai/resources/responses/responses";
import { ConfigError } from "../config/env";
import type { AppConfig } from "../config/env";
import { GenerationUnavailableError } from "./schema";
import type { ChatMessage, Embeddings, TextGeneration } from "./schema";

/** Rejects with "<label> timed out after <ms>ms" unless `work` settles first; the timer never outlives the call. */
export async function withTimeout<T>(work: Promise<T>, ms: number, label = "model call"): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
  });
  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export function createOpenAIClient(config: AppConfig): OpenAI {
  if (!config.OPENAI_API_KEY) {
    throw new ConfigError("OPENAI_API_KEY is not set", ["OPENAI_API_KEY"]);
  }
  return new OpenAI({ apiKey: config.OPENAI_API_KEY });
}

export function getOutputText(response: Response): string {
  if (typeof response.output_text === "string" && response.output_text.trim()) {
    return response.output_text.trim();
  }
  const chunks: string[] = [];
  for (const item of response.output) {
    if (item.type !== "message") continue;
    for (const c of item.content) {
      if (c.type === "output_text") chunks.push(c.text);
    }
  }
  const joined = chunks.join("").trim();
  if (joined) return joined;
  throw new Error("No output text found in response");
}

/** Responses API text generation. Any failure or timeout surfaces as GenerationUnavailableError. */
export class OpenAITextGeneration implements TextGeneration {
  constructor(
    private readonly client: OpenAI,
    private readonly opts: { model: string; temperature: number; timeoutMs: number }
  ) {}

  async complete(messages: ChatMessage[]): Promise<string> {
    try {
      const response = await withTimeout(
        this.client.responses.create({
          model: this.opts.model,
          temperature: this.opts.temperature,
          input: messages.map((m) => ({ role: m.role, content: m.content })),
        }),
        this.opts.timeoutMs,
        "responses.create"
      );
      return getOutputText(response);
    } catch (e) {
      throw new GenerationUnavailableError(`Text generation failed (${this.opts.model})`, { cause: e });
    }
  }
}

export class OpenAIEmbeddings implements Embeddings {
  constructor(
    private readonly client: OpenAI,
    private readonly opts: { model: string; timeoutMs: number }
  ) {}

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    try {
      const response = await withTimeout(
        this.client.embeddings.create({ model: this.opts.model, input: texts }),
        this.opts.timeoutMs,
        "embeddings.create"
      );
      return [...response.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
    } catch (e) {
      throw new GenerationUnavailableError(`Embedding request failed (${this.opts.model})`, { cause: e });
    }
  }
}
