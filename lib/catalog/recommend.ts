import { z } from "zod";
import { ageInYears, formatPrice, hasFeature, isRecentModel } from "./schema";
import type { Feature, ScoredVehicle, VehicleRecord } from "./schema";
import { byScoreThenStockId, normalizeMakeModel } from "./search";

export type CustomerPreferences = {
  min_price?: number;
  max_price?: number;
  preferred_makes?: string[];
  max_km?: number;
  min_year?: number;
  max_year?: number;
  required_features?: Feature[];
};

export type SearchCriteria = {
  price_range?: { min?: number; max?: number };
  makes?: string[];
  max_km?: number;
  year_range?: { min?: number; max?: number };
};

export type RecommendationResult = {
  matches: ScoredVehicle[];
  rationale: string;
  /** Survivors of the hard filters, before the limit is applied. */
  total_matches: number;
  search_criteria: SearchCriteria;
};

export class InvalidPreferencesError extends Error {
  name = "InvalidPreferencesError";
}

// ------------------------- preferences -------------------------

// Model output uses null / "" / "MISSING" for fields it could not fill.
const absent = (val: unknown) => (val == null || val === "" || val === "MISSING" ? undefined : val);

/** Free-text feature words -> known features; anything else is dropped. */
const toFeatures = (val: unknown): Feature[] | undefined => {
  if (absent(val) === undefined) return undefined;
  const items = Array.isArray(val) ? val : [val];
  const out = new Set<Feature>();
  for (const item of items) {
    const t = String(item).toLowerCase();
    if (t.includes("bluetooth")) out.add("bluetooth");
    if (t.includes("carplay") || t.includes("car play")) out.add("carplay");
  }
  return [...out];
};

const toMakes = (val: unknown) => {
  if (absent(val) === undefined) return undefined;
  const items = Array.isArray(val) ? val : String(val).split(",");
  return items.map((m) => String(m).trim()).filter(Boolean);
};

const optionalAmount = z.preprocess(absent, z.coerce.number().nonnegative().optional());
const optionalYear = z.preprocess(absent, z.coerce.number().int().min(2000).max(2030).optional());

export const PreferencesSchema = z
  .object({
    min_price: optionalAmount,
    max_price: optionalAmount,
    preferred_makes: z.preprocess(toMakes, z.array(z.string()).optional()),
    max_km: z.preprocess(absent, z.coerce.number().int().nonnegative().optional()),
    min_year: optionalYear,
    max_year: optionalYear,
    required_features: z.preprocess(toFeatures, z.array(z.enum(["bluetooth", "carplay"])).optional()),
  })
  .refine((p) => p.min_price == null || p.max_price == null || p.max_price > p.min_price, {
    message: "max_price must be greater than min_price",
    path: ["max_price"],
  })
  .refine((p) => p.min_year == null || p.max_year == null || p.max_year >= p.min_year, {
    message: "max_year must not be earlier than min_year",
    path: ["max_year"],
  });

/** Validates loose input (model JSON, request bodies) into preferences. */
export function parsePreferences(input: unknown): CustomerPreferences {
  const parsed = PreferencesSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new InvalidPreferencesError(parsed.error.issues.map((i) => i.message).join("; "));
  }
  return parsed.data;
}

// ------------------------- hard filters -------------------------

/** True when the record passes every active filter. */
export function passesHardFilters(record: VehicleRecord, prefs: CustomerPreferences): boolean {
  if (prefs.min_price != null && record.price < prefs.min_price) return false;
  if (prefs.max_price != null && record.price > prefs.max_price) return false;

  if (prefs.preferred_makes?.length) {
    // Same brand synonyms as fuzzy search: "VW" matches "Volkswagen".
    const makes = prefs.preferred_makes.map(normalizeMakeModel);
    if (!makes.includes(normalizeMakeModel(record.make))) return false;
  }

  if (prefs.max_km != null && record.mileage_km > prefs.max_km) return false;
  if (prefs.min_year != null && record.year < prefs.min_year) return false;
  if (prefs.max_year != null && record.year > prefs.max_year) return false;

  for (const feature of prefs.required_features ?? []) {
    if (!hasFeature(record, feature)) return false;
  }

  return true;
}

// ------------------------- soft score -------------------------

/** Where in the budget the price-fit peaks: 60% of the way from min to max. */
export const PRICE_FIT_PEAK = 0.6;

/**
 * Weighted soft score for a record that already passed the hard filters.
 * Price fit only applies when both price bounds are set.
 */
export function recommendationScore(record: VehicleRecord, prefs: CustomerPreferences, now: Date = new Date()): number {
  let score = 0;

  if (prefs.min_price != null && prefs.max_price != null) {
    const range = prefs.max_price - prefs.min_price;
    if (range > 0) {
      const ideal = prefs.min_price + range * PRICE_FIT_PEAK;
      const priceFit = Math.max(0, 1 - Math.abs(record.price - ideal) / range);
      score += priceFit * 0.3;
    }
  }

  const age = ageInYears(record, now);
  score += Math.max(0, 1 - age / 15) * 0.2;
  score += Math.max(0, 1 - record.mileage_km / 200_000) * 0.2;

  if (record.has_bluetooth) score += 0.1;
  if (record.has_carplay) score += 0.1;
  if (isRecentModel(record, now)) score += 0.1;

  return score;
}

export function searchCriteria(prefs: CustomerPreferences): SearchCriteria {
  const criteria: SearchCriteria = {};
  if (prefs.min_price != null || prefs.max_price != null) {
    criteria.price_range = { min: prefs.min_price, max: prefs.max_price };
  }
  if (prefs.preferred_makes?.length) criteria.makes = [...prefs.preferred_makes];
  if (prefs.max_km != null) criteria.max_km = prefs.max_km;
  if (prefs.min_year != null || prefs.max_year != null) {
    criteria.year_range = { min: prefs.min_year, max: prefs.max_year };
  }
  return criteria;
}

/** e.g. "Found 4 cars within your budget of $400,000 MXN and with less than 80,000 km". */
export function buildRationale(prefs: CustomerPreferences, totalMatches: number, currency = "MXN"): string {
  const reasons: string[] = [];

  if (prefs.max_price != null) reasons.push(`within your budget of ${formatPrice(prefs.max_price, currency)}`);
  if (prefs.preferred_makes?.length) reasons.push(`from preferred brands: ${prefs.preferred_makes.join(", ")}`);
  if (prefs.max_km != null) reasons.push(`with less than ${prefs.max_km.toLocaleString("en-US")} km`);
  if (prefs.min_year != null) reasons.push(`manufactured from ${prefs.min_year} on`);

  const base = `Found ${totalMatches} ${totalMatches === 1 ? "car" : "cars"}`;
  return reasons.length ? `${base} ${reasons.join(" and ")}` : base;
}

export function recommend(
  records: readonly VehicleRecord[],
  prefs: CustomerPreferences,
  limit = 5,
  opts: { now?: Date; currency?: string } = {}
): RecommendationResult {
  const now = opts.now ?? new Date();
  const survivors = records.filter((r) => passesHardFilters(r, prefs));

  const ranked = survivors
    .map((record) => ({ record, score: recommendationScore(record, prefs, now) }))
    .sort(byScoreThenStockId);

  return {
    matches: ranked.slice(0, Math.max(0, limit)),
    rationale: buildRationale(prefs, survivors.length, opts.currency),
    total_matches: survivors.length,
    search_criteria: searchCriteria(prefs),
  };
}

// ------------------------- similarity -------------------------

/** Bounded to [0, 1]: make 0.4, price 0.3, year 0.2, each feature flag 0.05. */
export function similarityScore(a: VehicleRecord, b: VehicleRecord): number {
  let score = 0;

  if (a.make.toLowerCase() === b.make.toLowerCase()) score += 0.4;

  const maxPrice = Math.max(a.price, b.price);
  const priceDiff = maxPrice === 0 ? 0 : Math.abs(a.price - b.price) / maxPrice;
  if (priceDiff <= 0.2) score += 0.3;

  if (Math.abs(a.year - b.year) <= 2) score += 0.2;

  if ((a.has_bluetooth ?? false) === (b.has_bluetooth ?? false)) score += 0.05;
  if ((a.has_carplay ?? false) === (b.has_carplay ?? false)) score += 0.05;

  return Math.min(1, score);
}

export function similar(records: readonly VehicleRecord[], target: VehicleRecord, limit = 3): ScoredVehicle[] {
  return records
    .filter((r) => r.stock_id !== target.stock_id)
    .map((record) => ({ record, score: similarityScore(target, record) }))
    .sort(byScoreThenStockId)
    .slice(0, Math.max(0, limit));
}
