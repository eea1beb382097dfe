import { parsePreferences, recommend, similar } from "../../catalog/recommend";
import type { RecommendationResult } from "../../catalog/recommend";
import { describeVehicle } from "../../catalog/schema";
import type { VehicleRecord } from "../../catalog/schema";
import { searchCatalog } from "../../catalog/search";
import type { CatalogStore } from "../../catalog/store";
import { parseModelObject } from "../modelSchema";
import { catalogSystemPrompt, preferencesExtractionPrompt, withSystem } from "../prompts";
import type { ResponseTemplates } from "../responses";
import type { Handler, Retrieval, TextGeneration } from "../schema";

export type CatalogHandlerDeps = {
  generation: TextGeneration;
  catalog: CatalogStore;
  /** Semantic search over the catalog; keyword then fuzzy matching when absent. */
  retrieval?: Retrieval<VehicleRecord>;
  responses: ResponseTemplates;
  topK: number;
  currency: string;
  now?: () => Date;
};

const MAX_ALTERNATIVES = 2;

// Keyword hits count only when every query word is found; anything less goes on to fuzzy and preferences.
const FULL_KEYWORD_MATCH = 1;

type Found = {
  cars: VehicleRecord[];
  recommendation?: RecommendationResult;
  /** The text model could not be reached while searching. */
  unavailable?: boolean;
};

export function createCatalogHandler(deps: CatalogHandlerDeps): Handler {
  async function semantic(query: string): Promise<VehicleRecord[]> {
    if (!deps.retrieval) return [];
    try {
      const hits = await deps.retrieval.topK(query, deps.topK);
      // The index is built once; records replaced since then are not offered.
      const current = new Map(deps.catalog.all().map((r) => [r.stock_id, r]));
      return hits.flatMap((h) => current.get(h.item.stock_id) ?? []);
    } catch (e) {
      console.warn("[catalog] semantic search failed, using keyword search:", e instanceof Error ? e.message : e);
      return [];
    }
  }

  async function fromPreferences(query: string, history: string): Promise<Found> {
    let raw: string;
    try {
      raw = await deps.generation.complete(withSystem(preferencesExtractionPrompt(), query, history));
    } catch (e) {
      console.error("[catalog] preference extraction unavailable:", e instanceof Error ? e.message : e);
      return { cars: [], unavailable: true };
    }

    try {
      const prefs = parsePreferences(parseModelObject(raw));
      const recommendation = recommend(deps.catalog.all(), prefs, deps.topK, {
        now: deps.now?.(),
        currency: deps.currency,
      });
      console.info(`[catalog] preferences matched ${recommendation.total_matches} vehicles`);
      return { cars: recommendation.matches.map((m) => m.record), recommendation };
    } catch (e) {
      console.warn("[catalog] unusable preferences:", e instanceof Error ? e.message : e);
      return { cars: [] };
    }
  }

  async function find(query: string, history: string): Promise<Found> {
    const viaRetrieval = await semantic(query);
    if (viaRetrieval.length) return { cars: viaRetrieval };

    const { strategy, matches } = searchCatalog(deps.catalog.all(), query, { minKeywordScore: FULL_KEYWORD_MATCH });
    if (matches.length) {
      console.info(`[catalog] ${strategy} search matched ${matches.length} vehicles`);
      return { cars: matches.slice(0, deps.topK).map((m) => m.record) };
    }

    return fromPreferences(query, history);
  }

  return {
    intent: "CATALOG_SEARCH",
    async handle({ query, history }) {
      const { cars, recommendation, unavailable } = await find(query, history);
      if (unavailable) {
        return { text: deps.responses.render("catalog_unavailable"), cars: [] };
      }
      if (!cars.length) {
        return { text: deps.responses.render("catalog_no_matches", { query }), cars: [] };
      }

      const shown = new Set(cars.map((c) => c.stock_id));
      const alternatives = similar(deps.catalog.all(), cars[0], MAX_ALTERNATIVES + shown.size)
        .map((s) => s.record)
        .filter((r) => !shown.has(r.stock_id))
        .slice(0, MAX_ALTERNATIVES);

      const lines = cars.map((c) => `- ${describeVehicle(c, deps.currency)}`);
      if (recommendation) lines.unshift(recommendation.rationale);
      if (alternatives.length) {
        lines.push("", "Similar alternatives:", ...alternatives.map((c) => `- ${describeVehicle(c, deps.currency)}`));
      }

      try {
        const text = await deps.generation.complete(withSystem(catalogSystemPrompt(lines.join("\n")), query, history));
        return { text, cars, ...(recommendation && { recommendation }) };
      } catch (e) {
        console.error("[catalog] generation failed:", e instanceof Error ? e.message : e);
        return { text: deps.responses.render("catalog_unavailable"), cars: [] };
      }
    },
  };
}
