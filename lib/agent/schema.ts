import type { RecommendationResult } from "../catalog/recommend";
import type { VehicleRecord } from "../catalog/schema";
import type { FinancingPlan } from "../finance/engine";

export const INTENTS = ["GENERAL", "CATALOG_SEARCH", "FINANCE_CALCULATION"] as const;

export type Intent = (typeof INTENTS)[number];

export function isIntent(value: string): value is Intent {
  return INTENTS.some((i) => i === value);
}

/** One request walks these in order, never backwards. */
export type PipelineState = "START" | "CLASSIFIED" | "DISPATCHED" | "FORMATTED" | "DONE";

export type ChatRole = "system" | "user" | "assistant";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

// ------------------------- capabilities -------------------------

export class GenerationUnavailableError extends Error {
  name = "GenerationUnavailableError";
}

/** Text completion over role-tagged messages. Rejects with GenerationUnavailableError. */
export interface TextGeneration {
  complete(messages: ChatMessage[]): Promise<string>;
}

export type RetrievedItem<T> = {
  item: T;
  score: number;
};

/** Deterministic for a fixed index and query. */
export interface Retrieval<T> {
  topK(query: string, k: number): Promise<RetrievedItem<T>[]>;
}

export interface Embeddings {
  embed(texts: string[]): Promise<number[][]>;
}

// ------------------------- handler contract -------------------------

export type HandlerInput = {
  query: string;
  /** Rendered recent turns, "" for a new conversation. */
  history: string;
};

export type HandlerResult = {
  text: string;
  cars?: VehicleRecord[];
  financing_plan?: FinancingPlan;
  recommendation?: RecommendationResult;
};

export type Handler = {
  intent: Intent;
  handle(input: HandlerInput): Promise<HandlerResult>;
};

/** Total over Intent: adding an intent without a handler fails to compile. */
export type HandlerTable = { readonly [K in Intent]: Handler };

export type PipelineResult = HandlerResult & {
  intent: Intent;
  trace: PipelineState[];
};
