import type OpenAI from "openai";
import { loadCatalogFile } from "../catalog/store";
import type { CatalogStore } from "../catalog/store";
import { vehicleEmbeddingText } from "../catalog/schema";
import type { VehicleRecord } from "../catalog/schema";
import type { AppConfig } from "../config/env";
import { Conversation } from "../conversation/conversation";
import { InMemoryConversationStore } from "../conversation/store";
import type { ConversationStore } from "../conversation/store";
import { loadKnowledgeBase, sectionText } from "../knowledge/sections";
import type { KnowledgeSection } from "../knowledge/sections";
import { EmbeddingIndex, LexicalIndex } from "../retrieval/index";
import { createHandlerTable } from "./handlers/index";
import { createOpenAIClient, OpenAIEmbeddings, OpenAITextGeneration } from "./model";
import { ResponseTemplates } from "./responses";
import { dispatch, LlmIntentClassifier } from "./router";
import type { IntentClassifier } from "./router";
import type { Embeddings, HandlerResult, HandlerTable, Intent, PipelineResult, Retrieval, TextGeneration } from "./schema";
import { PipelineTrace } from "./stateMachine";

export type PipelineDeps = {
  classifier: IntentClassifier;
  handlers: HandlerTable;
  store: ConversationStore;
  responses: ResponseTemplates;
  historyTurns: number;
};

function format(result: HandlerResult): HandlerResult {
  const out: HandlerResult = { text: result.text.trim() };
  if (result.cars?.length) out.cars = result.cars;
  if (result.financing_plan) out.financing_plan = result.financing_plan;
  if (result.recommendation) out.recommendation = result.recommendation;
  return out;
}

/** START -> CLASSIFIED -> DISPATCHED -> FORMATTED -> DONE, once per message. */
export class Pipeline {
  constructor(private readonly deps: PipelineDeps) {}

  async process(userId: string, message: string, conversation: Conversation = new Conversation()): Promise<PipelineResult> {
    const trace = new PipelineTrace();
    const history = conversation.historyText(this.deps.historyTurns);

    let intent: Intent;
    try {
      intent = await this.deps.classifier.classify(message, history);
    } catch (e) {
      console.warn("[pipeline] classifier threw, using GENERAL:", e instanceof Error ? e.message : e);
      intent = "GENERAL";
    }
    trace.advance("CLASSIFIED");
    console.info(`[pipeline] user=${userId} intent=${intent}`);

    const handler = dispatch(this.deps.handlers, intent);
    trace.advance("DISPATCHED");

    let result: HandlerResult;
    try {
      result = await handler.handle({ query: message, history });
    } catch (e) {
      console.error(`[pipeline] ${handler.intent} handler failed:`, e);
      result = { text: this.deps.responses.render("pipeline_failure") };
    }

    const formatted = format(result);
    trace.advance("FORMATTED");
    trace.advance("DONE");

    return { ...formatted, intent, trace: trace.states };
  }

  /** Runs under the user's lock; the turn is appended only after a reply exists. */
  respond(userId: string, message: string): Promise<PipelineResult> {
    return this.deps.store.withConversation(userId, async (conversation) => {
      const result = await this.process(userId, message, conversation);
      conversation.addTurn(message, result.text);
      return result;
    });
  }
}

export type PipelineOverrides = Partial<{
  generation: TextGeneration;
  classifier: IntentClassifier;
  embeddings: Embeddings;
  catalog: CatalogStore;
  knowledge: KnowledgeSection[];
  responses: ResponseTemplates;
  store: ConversationStore;
  now: () => Date;
}>;

/**
 * Loads data files and wires OpenAI-backed capabilities for whatever is not injected.
 * Without OPENAI_API_KEY every model capability must be injected, except embeddings:
 * those fall back to lexical retrieval.
 * The catalog index is embedded once from the startup inventory; after `catalog.replace`
 * the catalog handler only offers hits that are still in stock, using their current data.
 */
export async function createPipeline(config: AppConfig, overrides: PipelineOverrides = {}): Promise<Pipeline> {
  let client: OpenAI | undefined;
  const openai = () => (client ??= createOpenAIClient(config));

  const timeoutMs = config.GENERATION_TIMEOUT_MS;
  const generation =
    overrides.generation ??
    new OpenAITextGeneration(openai(), {
      model: config.OPENAI_MODEL_CHAT,
      temperature: config.OPENAI_TEMPERATURE,
      timeoutMs,
    });
  const classifier =
    overrides.classifier ??
    new LlmIntentClassifier(
      overrides.generation ??
        new OpenAITextGeneration(openai(), { model: config.OPENAI_MODEL_CLASSIFIER, temperature: 0, timeoutMs })
    );
  const embeddings =
    overrides.embeddings ??
    (config.OPENAI_API_KEY ? new OpenAIEmbeddings(openai(), { model: config.OPENAI_MODEL_EMBEDDING, timeoutMs }) : undefined);

  const [catalog, knowledge, responses] = await Promise.all([
    overrides.catalog ?? loadCatalogFile(config.CATALOG_PATH),
    overrides.knowledge ?? loadKnowledgeBase(config.KNOWLEDGE_BASE_PATH),
    overrides.responses ?? ResponseTemplates.load(config.RESPONSES_PATH),
  ]);

  let knowledgeIndex: Retrieval<KnowledgeSection> = new LexicalIndex(knowledge, sectionText);
  let catalogIndex: Retrieval<VehicleRecord> | undefined;
  if (embeddings) {
    try {
      [knowledgeIndex, catalogIndex] = await Promise.all([
        EmbeddingIndex.build(knowledge, sectionText, embeddings),
        EmbeddingIndex.build(catalog.all(), vehicleEmbeddingText, embeddings),
      ]);
    } catch (e) {
      console.warn("[pipeline] embedding index build failed, using lexical retrieval:", e instanceof Error ? e.message : e);
    }
  } else {
    console.info("[pipeline] no embeddings configured, using lexical retrieval");
  }

  const handlers = createHandlerTable({
    general: { generation, knowledge: knowledgeIndex, responses, topK: config.KNOWLEDGE_TOP_K },
    catalog: {
      generation,
      catalog,
      retrieval: catalogIndex,
      responses,
      topK: config.CATALOG_TOP_K,
      currency: config.CURRENCY,
      now: overrides.now,
    },
    finance: {
      generation,
      catalog,
      responses,
      annualRate: config.FINANCE_ANNUAL_RATE,
      defaultTermYears: config.FINANCE_DEFAULT_TERM_YEARS,
      currency: config.CURRENCY,
    },
  });

  return new Pipeline({
    classifier,
    handlers,
    store: overrides.store ?? new InMemoryConversationStore(),
    responses,
    historyTurns: config.HISTORY_TURNS,
  });
}
