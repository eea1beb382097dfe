export { loadConfig, ConfigError } from "./config/env";
export type { AppConfig } from "./config/env";

export { Pipeline, createPipeline } from "./agent/pipeline";
export type { PipelineDeps, PipelineOverrides } from "./agent/pipeline";
export { LlmIntentClassifier, KeywordIntentClassifier, dispatch } from "./agent/router";
export type { IntentClassifier } from "./agent/router";
export { createHandlerTable, createCatalogHandler, createFinanceHandler, createGeneralHandler } from "./agent/handlers/index";
export { PipelineTrace, InvalidTransitionError, nextPipelineState } from "./agent/stateMachine";
export { ResponseTemplates } from "./agent/responses";
export { OpenAITextGeneration, OpenAIEmbeddings, createOpenAIClient } from "./agent/model";
export { INTENTS, isIntent, GenerationUnavailableError } from "./agent/schema";
export type {
  ChatMessage,
  Embeddings,
  Handler,
  HandlerResult,
  Intent,
  PipelineResult,
  PipelineState,
  Retrieval,
  TextGeneration,
} from "./agent/schema";

export { InMemoryCatalogStore, CatalogLoadError, loadCatalogFile } from "./catalog/store";
export type { CatalogStore, CatalogStats } from "./catalog/store";
export { parseVehicleRows, describeVehicle, formatPrice } from "./catalog/schema";
export type { VehicleRecord, Feature } from "./catalog/schema";
export { keywordSearch, fuzzySearch, searchCatalog } from "./catalog/search";
export { recommend, similar, parsePreferences, InvalidPreferencesError } from "./catalog/recommend";
export type { CustomerPreferences, RecommendationResult } from "./catalog/recommend";

export {
  calculateFinancing,
  financingOptions,
  describePlan,
  InvalidTermError,
  InvalidDownPaymentError,
} from "./finance/engine";
export type { FinancingPlan } from "./finance/engine";

export { Conversation } from "./conversation/conversation";
export { InMemoryConversationStore } from "./conversation/store";
export type { ConversationStore } from "./conversation/store";

export { EmbeddingIndex, LexicalIndex } from "./retrieval/index";
export { parseKnowledgeSections, loadKnowledgeBase } from "./knowledge/sections";
