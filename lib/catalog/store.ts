import { readFile } from "node:fs/promises";
import path from "node:path";
import { parseVehicleRows } from "./schema";
import type { VehicleRecord } from "./schema";
import { fuzzySearch, keywordSearch } from "./search";

/** Read side of the catalog, as handlers see it. */
export interface CatalogStore {
  all(): readonly VehicleRecord[];
  byName(text: string): VehicleRecord | undefined;
}

export type CatalogStats = {
  total: number;
  unique_makes: number;
  makes: string[];
  price_range: { min: number; max: number };
  year_range: { min: number; max: number };
};

export class CatalogLoadError extends Error {
  name = "CatalogLoadError";
}

/**
 * Loaded once, read-only afterwards. `replace` swaps the whole snapshot;
 * readers holding the previous array keep a consistent view.
 */
export class InMemoryCatalogStore implements CatalogStore {
  private records: readonly VehicleRecord[];

  constructor(records: readonly VehicleRecord[] = []) {
    this.records = Object.freeze([...records]);
  }

  static fromRows(rows: unknown[]): InMemoryCatalogStore {
    const { records, skipped } = parseVehicleRows(rows);
    console.info(`[catalog] loaded ${records.length} vehicles (${skipped.length} skipped)`);
    return new InMemoryCatalogStore(records);
  }

  all(): readonly VehicleRecord[] {
    return this.records;
  }

  replace(records: readonly VehicleRecord[]): void {
    this.records = Object.freeze([...records]);
  }

  byStockId(stockId: string): VehicleRecord | undefined {
    return this.records.find((r) => r.stock_id === stockId);
  }

  byMake(make: string): VehicleRecord[] {
    const m = make.trim().toLowerCase();
    return this.records.filter((r) => r.make.toLowerCase() === m);
  }

  inPriceRange(min: number, max: number): VehicleRecord[] {
    return this.records.filter((r) => r.price >= min && r.price <= max);
  }

  /**
   * Best-effort lookup of a car the customer named ("jetta 2019", "VW Jetta").
   * Exact make+model, then fuzzy make/model, then a full keyword hit.
   */
  byName(text: string): VehicleRecord | undefined {
    const name = text.trim().toLowerCase();
    if (!name) return undefined;

    const exact = this.records.find((r) => `${r.make} ${r.model}`.toLowerCase() === name);
    if (exact) return exact;

    const fuzzy = fuzzySearch(this.records, name);
    if (fuzzy.length) return fuzzy[0].record;

    const keyword = keywordSearch(this.records, name);
    if (keyword.length && keyword[0].score === 1) return keyword[0].record;

    return undefined;
  }

  uniqueMakes(): string[] {
    return [...new Set(this.records.map((r) => r.make))].sort();
  }

  stats(): CatalogStats {
    const makes = this.uniqueMakes();
    if (this.records.length === 0) {
      return {
        total: 0,
        unique_makes: 0,
        makes,
        price_range: { min: 0, max: 0 },
        year_range: { min: 0, max: 0 },
      };
    }

    const prices = this.records.map((r) => r.price);
    const years = this.records.map((r) => r.year);
    return {
      total: this.records.length,
      unique_makes: makes.length,
      makes,
      price_range: { min: Math.min(...prices), max: Math.max(...prices) },
      year_range: { min: Math.min(...years), max: Math.max(...years) },
    };
  }
}

/** Reads a JSON array of raw rows; relative paths resolve from the working directory. */
export async function loadCatalogFile(filePath: string): Promise<InMemoryCatalogStore> {
  const resolved = path.resolve(process.cwd(), filePath);

  let rows: unknown;
  try {
    rows = JSON.parse(await readFile(resolved, "utf8"));
  } catch (e) {
    throw new CatalogLoadError(`Cannot read catalog at ${resolved}`, { cause: e });
  }

  if (!Array.isArray(rows)) {
    throw new CatalogLoadError(`Catalog at ${resolved} is not a JSON array`);
  }
  return InMemoryCatalogStore.fromRows(rows);
}
