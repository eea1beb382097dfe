import { z } from "zod";

export type VehicleRecord = Readonly<{
  stock_id: string;
  make: string;
  model: string;
  version: string;
  year: number;
  price: number;
  mileage_km: number;
  has_bluetooth?: boolean;
  has_carplay?: boolean;
  length_mm?: number;
  width_mm?: number;
  height_mm?: number;
}>;

export type Feature = "bluetooth" | "carplay";

/** A record paired with the score a strategy gave it. */
export type ScoredVehicle = {
  record: VehicleRecord;
  score: number;
};

// ------------------------- row parsing -------------------------

const YES = new Set(["yes", "si", "sí", "true", "1", "y"]);

const isBlank = (val: unknown) => val == null || (typeof val === "string" && val.trim() === "");

/** "Sí" / "yes" / 1 -> true; other non-empty -> false; blank -> absent. */
const toFlag = (val: unknown): boolean | undefined => {
  if (isBlank(val)) return undefined;
  if (typeof val === "boolean") return val;
  if (typeof val === "number") return val !== 0;
  return YES.has(String(val).trim().toLowerCase());
};

const toOptionalNumber = (val: unknown) => (isBlank(val) ? undefined : val);

const toText = (val: unknown) => (typeof val === "number" ? String(val) : val);

// Blank cells must fail instead of coercing to 0.
const requiredNumber = z.preprocess(toOptionalNumber, z.coerce.number());

const titleCase = (s: string) =>
  s
    .trim()
    .split(/\s+/)
    .map((w) => {
      const shouting = /^[A-Z]{4,}$/.test(w);
      // Mixed case, short acronyms (BMW) and codes (CR-V) are kept as written.
      if (w !== w.toLowerCase() && !shouting) return w;
      return w[0].toUpperCase() + w.slice(1).toLowerCase();
    })
    .join(" ");

/**
 * Column aliases used by the legacy spreadsheet export (km, car_play, largo...).
 * Canonical keys win when both are present.
 */
const normalizeRow = (val: unknown) => {
  if (!val || typeof val !== "object") return val;
  const r: Record<string, unknown> = Object.fromEntries(Object.entries(val));

  if (r.mileage_km == null && r.km != null) r.mileage_km = r.km;
  if (r.has_bluetooth == null && r.bluetooth != null) r.has_bluetooth = r.bluetooth;
  if (r.has_carplay == null && r.car_play != null) r.has_carplay = r.car_play;
  if (r.length_mm == null && r.largo != null) r.length_mm = r.largo;
  if (r.width_mm == null && r.ancho != null) r.width_mm = r.ancho;
  if (r.height_mm == null && r.altura != null) r.height_mm = r.altura;

  return r;
};

const dimension = z.preprocess(toOptionalNumber, z.coerce.number().nonnegative().optional());

export const VehicleRowSchema = z.preprocess(
  normalizeRow,
  z.object({
    stock_id: z.preprocess(toText, z.string().trim().min(1)),
    make: z.string().trim().min(1).transform(titleCase),
    model: z.string().trim().min(1).transform(titleCase),
    version: z.preprocess((v) => (v == null ? "" : toText(v)), z.string().trim()),
    year: requiredNumber.pipe(z.number().int().min(2000).max(2030)),
    price: requiredNumber.pipe(z.number().nonnegative()),
    mileage_km: requiredNumber.pipe(z.number().int().nonnegative()),
    has_bluetooth: z.preprocess(toFlag, z.boolean().optional()),
    has_carplay: z.preprocess(toFlag, z.boolean().optional()),
    length_mm: dimension,
    width_mm: dimension,
    height_mm: dimension,
  })
);

export type VehicleRow = z.infer<typeof VehicleRowSchema>;

export type ParsedRows = {
  records: VehicleRecord[];
  skipped: { index: number; reason: string }[];
};

/**
 * Validates raw rows into records. Bad rows are skipped (never abort the load);
 * a repeated stock_id keeps the first occurrence.
 */
export function parseVehicleRows(rows: unknown[]): ParsedRows {
  const records: VehicleRecord[] = [];
  const skipped: ParsedRows["skipped"] = [];
  const seen = new Set<string>();

  rows.forEach((row, index) => {
    const parsed = VehicleRowSchema.safeParse(row);
    if (!parsed.success) {
      const reason = parsed.error.issues.map((i) => `${i.path.join(".") || "row"}: ${i.message}`).join("; ");
      console.warn(`[catalog] skipping row ${index}: ${reason}`);
      skipped.push({ index, reason });
      return;
    }

    const record = stripUndefined(parsed.data);
    if (seen.has(record.stock_id)) {
      console.warn(`[catalog] skipping row ${index}: duplicate stock_id ${record.stock_id}`);
      skipped.push({ index, reason: `duplicate stock_id ${record.stock_id}` });
      return;
    }

    seen.add(record.stock_id);
    records.push(Object.freeze(record));
  });

  return { records, skipped };
}

function stripUndefined(row: VehicleRow): VehicleRecord {
  const out: { -readonly [K in keyof VehicleRecord]: VehicleRecord[K] } = {
    stock_id: row.stock_id,
    make: row.make,
    model: row.model,
    version: row.version,
    year: row.year,
    price: row.price,
    mileage_km: row.mileage_km,
  };
  if (row.has_bluetooth !== undefined) out.has_bluetooth = row.has_bluetooth;
  if (row.has_carplay !== undefined) out.has_carplay = row.has_carplay;
  if (row.length_mm !== undefined) out.length_mm = row.length_mm;
  if (row.width_mm !== undefined) out.width_mm = row.width_mm;
  if (row.height_mm !== undefined) out.height_mm = row.height_mm;
  return out;
}

// ------------------------- record helpers -------------------------

export function ageInYears(record: VehicleRecord, now: Date = new Date()): number {
  return now.getFullYear() - record.year;
}

export function isRecentModel(record: VehicleRecord, now: Date = new Date()): boolean {
  return ageInYears(record, now) <= 3;
}

export function hasFeature(record: VehicleRecord, feature: Feature): boolean {
  return feature === "bluetooth" ? record.has_bluetooth === true : record.has_carplay === true;
}

export function formatPrice(amount: number, currency = "MXN"): string {
  return `$${Math.round(amount).toLocaleString("en-US")} ${currency}`;
}

export function describeVehicle(record: VehicleRecord, currency = "MXN"): string {
  const title = [record.year, record.make, record.model, record.version].filter(Boolean).join(" ");
  return `${title} — ${formatPrice(record.price, currency)}, ${record.mileage_km.toLocaleString("en-US")} km`;
}

/** Text embedded for semantic catalog search. */
export function vehicleEmbeddingText(record: VehicleRecord): string {
  const flag = (v?: boolean) => (v === undefined ? "unknown" : v ? "yes" : "no");
  return [
    `${record.make} ${record.model} year ${record.year} version ${record.version}`,
    `price ${record.price} mileage ${record.mileage_km} km`,
    `bluetooth ${flag(record.has_bluetooth)} carplay ${flag(record.has_carplay)}`,
    `length ${record.length_mm ?? ""} width ${record.width_mm ?? ""} height ${record.height_mm ?? ""}`,
  ].join(" ");
}
