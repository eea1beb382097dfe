import { IntentLabelSchema } from "./modelSchema";
import { classifierSystemPrompt, withSystem } from "./prompts";
import type { Handler, HandlerTable, Intent, TextGeneration } from "./schema";

export interface IntentClassifier {
  classify(query: string, history: string): Promise<Intent>;
}

/**
 * One generation call; the reply must be exactly one label after trim/uppercase.
 * Anything else, including a failed call, routes to GENERAL.
 */
export class LlmIntentClassifier implements IntentClassifier {
  constructor(private readonly generation: TextGeneration) {}

  async classify(query: string, history: string): Promise<Intent> {
    let raw: string;
    try {
      raw = await this.generation.complete(withSystem(classifierSystemPrompt(), query, history));
    } catch (e) {
      console.warn("[router] classification failed, using GENERAL:", e instanceof Error ? e.message : e);
      return "GENERAL";
    }

    const label = IntentLabelSchema.safeParse(raw);
    if (!label.success) {
      console.warn("[router] unrecognized label, using GENERAL:", JSON.stringify(raw));
      return "GENERAL";
    }
    return label.data;
  }
}

const FINANCE_PATTERN = /\b(financ\w*|monthly|payments?|down ?payment|enganche|mensualidad\w*|credit|cr[eé]dito|loan|interest|term|plazo)\b/i;
const CATALOG_PATTERN = /\b(cars?|autos?|coches?|vehicles?|suv|sedan|pickup|truck|hatchback|looking for|busco|available|disponibles?|stock|inventory|budget|presupuesto|km|mileage)\b/i;

/** Offline classifier for running without a text model. Finance wins over catalog. */
export class KeywordIntentClassifier implements IntentClassifier {
  async classify(query: string): Promise<Intent> {
    if (FINANCE_PATTERN.test(query)) return "FINANCE_CALCULATION";
    if (CATALOG_PATTERN.test(query)) return "CATALOG_SEARCH";
    return "GENERAL";
  }
}

export function dispatch(table: HandlerTable, intent: Intent): Handler {
  return table[intent] ?? table.GENERAL;
}
