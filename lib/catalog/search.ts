import type { ScoredVehicle, VehicleRecord } from "./schema";

export type SearchStrategy = "keyword" | "fuzzy" | "none";

export type SearchResult = {
  strategy: SearchStrategy;
  matches: ScoredVehicle[];
};

/** Minimum Jaccard similarity for a fuzzy make/model match. */
export const FUZZY_THRESHOLD = 0.5;

// Long brand names -> the short form customers actually type.
const MAKE_SYNONYMS: ReadonlyArray<[string, string]> = [
  ["volkswagen", "vw"],
  ["chevrolet", "chevy"],
  ["mercedes-benz", "mercedes"],
  ["mercedes benz", "mercedes"],
  ["land rover", "landrover"],
];

/**
 * Score descending, stock_id ascending. Every ranked list in the catalog
 * goes through this so equal scores always come back in the same order.
 */
export function byScoreThenStockId(a: ScoredVehicle, b: ScoredVehicle): number {
  if (b.score !== a.score) return b.score - a.score;
  return a.record.stock_id < b.record.stock_id ? -1 : a.record.stock_id > b.record.stock_id ? 1 : 0;
}

function tokenize(text: string): string[] {
  return text.toLowerCase().split(/\s+/).filter(Boolean);
}

export function searchableText(record: VehicleRecord): string {
  return `${record.make} ${record.model} ${record.version} ${record.year}`.toLowerCase();
}

/**
 * Fraction of query words found (as substrings) in make/model/version/year.
 * An empty query scores 0.
 */
export function keywordScore(record: VehicleRecord, query: string): number {
  const words = tokenize(query);
  if (words.length === 0) return 0;

  const haystack = searchableText(record);
  const hits = words.filter((w) => haystack.includes(w)).length;
  return hits / words.length;
}

export function keywordSearch(records: readonly VehicleRecord[], query: string): ScoredVehicle[] {
  return records
    .map((record) => ({ record, score: keywordScore(record, query) }))
    .filter((m) => m.score > 0)
    .sort(byScoreThenStockId);
}

/** Lowercase, apply brand synonyms, drop punctuation, collapse spaces. */
export function normalizeMakeModel(text: string): string {
  let normalized = text.toLowerCase();
  for (const [long, short] of MAKE_SYNONYMS) {
    normalized = normalized.split(long).join(short);
  }
  return normalized
    .replace(/[^\p{L}\p{N}\s]/gu, "")
    .split(/\s+/)
    .filter(Boolean)
    .join(" ");
}

export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 || b.size === 0) return 0;
  let shared = 0;
  for (const x of a) if (b.has(x)) shared++;
  return shared / (a.size + b.size - shared);
}

export function fuzzyScore(record: VehicleRecord, query: string): number {
  const q = new Set(tokenize(normalizeMakeModel(query)));
  const target = new Set(tokenize(normalizeMakeModel(`${record.make} ${record.model}`)));
  return jaccard(q, target);
}

export function fuzzySearch(records: readonly VehicleRecord[], query: string): ScoredVehicle[] {
  return records
    .map((record) => ({ record, score: fuzzyScore(record, query) }))
    .filter((m) => m.score > FUZZY_THRESHOLD)
    .sort(byScoreThenStockId);
}

/**
 * Keyword match first; fuzzy make/model only when keywords find nothing.
 * `minKeywordScore` drops partial keyword hits (1 = every query word must be found).
 */
export function searchCatalog(
  records: readonly VehicleRecord[],
  query: string,
  opts: { minKeywordScore?: number } = {}
): SearchResult {
  const minKeywordScore = opts.minKeywordScore ?? 0;
  const keyword = keywordSearch(records, query).filter((m) => m.score >= minKeywordScore);
  if (keyword.length) return { strategy: "keyword", matches: keyword };

  const fuzzy = fuzzySearch(records, query);
  if (fuzzy.length) return { strategy: "fuzzy", matches: fuzzy };

  return { strategy: "none", matches: [] };
}
