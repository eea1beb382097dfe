import type { ChatMessage } from "./schema";
import { MISSING } from "./modelSchema";

export function classifierSystemPrompt() {
  return `
You route messages for a used-car dealership assistant.
Classify the customer's latest message into exactly one label:
- GENERAL: questions about the dealership, warranties, processes, greetings, anything else.
- CATALOG_SEARCH: looking for cars, asking about availability, brands, models, budgets or features.
- FINANCE_CALCULATION: monthly payments, down payments, terms, credit or financing plans.
Answer with the label only. No punctuation, no explanation.
`.trim();
}

export function generalSystemPrompt(context: string) {
  return `
You are a friendly sales assistant for a used-car dealership.
Answer using only the information below. If it does not cover the question, say so briefly and offer to help with cars or financing.
Keep answers short and conversational.

Information:
${context || "(no matching information)"}
`.trim();
}

export function catalogSystemPrompt(cars: string) {
  return `
You are a sales assistant helping a customer find a used car.
Present the cars below in a short, friendly reply: mention make, model, year, price and mileage.
Do not invent cars, prices or features that are not listed.

Cars:
${cars}
`.trim();
}

export function preferencesExtractionPrompt() {
  return `
Extract the customer's car preferences from the conversation.
Return a single JSON object, nothing else, with these fields:
{"min_price": number, "max_price": number, "preferred_makes": [string], "max_km": number, "min_year": number, "max_year": number, "required_features": ["bluetooth" | "carplay"]}
Use "${MISSING}" for any field the customer did not mention.
`.trim();
}

export function financeExtractionPrompt() {
  return `
Extract the financing request from the conversation.
Return a single JSON object, nothing else:
{"price": number, "car_name": string, "down_payment": number, "term_years": number}
- price: the car's price if the customer states it.
- car_name: the make and model if the customer names a car.
- down_payment: the amount the customer will pay up front.
- term_years: the financing term in years.
Use "${MISSING}" for any value that is not in the conversation. Do not guess.
`.trim();
}

export function financePhrasingPrompt(planSummary: string) {
  return `
You are a sales assistant explaining a car financing plan.
Explain the plan below in a short, friendly reply. Use the figures exactly as given; do not recompute them.

Plan:
${planSummary}
`.trim();
}

/** Recent turns (if any) followed by the current message, as one user message. */
export function userMessage(query: string, history: string): ChatMessage {
  const content = history ? `Conversation so far:\n${history}\n\nCustomer: ${query}` : query;
  return { role: "user", content };
}

export function withSystem(system: string, query: string, history: string): ChatMessage[] {
  return [{ role: "system", content: system }, userMessage(query, history)];
}
