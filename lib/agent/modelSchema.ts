import { z } from "zod";
import { INTENTS } from "./schema";

/**
 * Model contract:
 * - Extraction calls return a single JSON object, nothing else.
 * - Fields the model could not find are the literal "MISSING".
 * - Values are coerced here; anything unusable becomes undefined, never an error.
 */

export const MISSING = "MISSING";

const isMissing = (val: unknown) =>
  val == null || (typeof val === "string" && (val.trim() === "" || val.trim().toUpperCase() === MISSING));

/** 250000, "250,000", "$250k", "1.2m" -> number; anything else -> undefined. */
export const toAmount = (val: unknown): number | undefined => {
  if (isMissing(val)) return undefined;
  if (typeof val === "number") return Number.isFinite(val) ? val : undefined;
  if (typeof val !== "string") return undefined;

  const m = val
    .toLowerCase()
    .replace(/[$,\s]|mxn|pesos?/g, "")
    .match(/^(\d+(?:\.\d+)?)([km])?$/);
  if (!m) return undefined;

  const base = parseFloat(m[1]);
  const mult = m[2] === "k" ? 1_000 : m[2] === "m" ? 1_000_000 : 1;
  return base * mult;
};

const toName = (val: unknown): string | undefined => {
  if (isMissing(val) || typeof val !== "string") return undefined;
  return val.trim();
};

export const FinanceExtractionSchema = z.object({
  price: z.preprocess(toAmount, z.number().nonnegative().optional()),
  car_name: z.preprocess(toName, z.string().optional()),
  down_payment: z.preprocess(toAmount, z.number().nonnegative().optional()),
  term_years: z.preprocess(toAmount, z.number().optional()),
});

export type FinanceExtraction = z.infer<typeof FinanceExtractionSchema>;

export const IntentLabelSchema = z.preprocess(
  (val) => (typeof val === "string" ? val.trim().toUpperCase() : val),
  z.enum(INTENTS)
);

// ------------------------- raw output helpers -------------------------

// Leading ```json and trailing ``` lines the model sometimes wraps around its answer.
const FENCE = /^```[a-z]*[ \t]*\n?|\n?[ \t]*```[ \t]*$/gim;

// A complete string literal, or a single brace. Strings are consumed whole so braces inside them do not count.
const JSON_TOKEN = /"(?:[^"\\]|\\[\s\S])*"|[{}]/g;

/** Text of the first balanced `{...}` in a model reply; fences and surrounding prose are ignored. */
export function extractJsonObject(raw: string): string {
  const text = raw.replace(FENCE, "");
  const start = text.indexOf("{");
  if (start < 0) throw new Error("No JSON object found in model output");

  const token = new RegExp(JSON_TOKEN.source, "g");
  token.lastIndex = start;
  let depth = 0;
  for (let m = token.exec(text); m; m = token.exec(text)) {
    if (m[0] === "{") depth += 1;
    else if (m[0] === "}") depth -= 1;
    else continue;
    if (depth === 0) return text.slice(start, token.lastIndex);
  }
  throw new Error("Unterminated JSON object in model output");
}

/** First JSON object of a model reply, parsed but not validated. */
export function parseModelObject(raw: string): unknown {
  return JSON.parse(extractJsonObject(raw));
}

/** Fence-tolerant JSON parse + schema validation of one model reply. */
export function parseModelJson<S extends z.ZodTypeAny>(raw: string, schema: S): z.infer<S> {
  const parsed = schema.safeParse(parseModelObject(raw));
  if (!parsed.success) {
    console.error("[model] raw output:", raw);
    console.error("[model] zod issues:", parsed.error.issues);
    throw new Error("Model JSON did not match schema");
  }
  return parsed.data;
}
