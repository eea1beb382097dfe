import {
  buildRationale,
  InvalidPreferencesError,
  parsePreferences,
  passesHardFilters,
  recommend,
  recommendationScore,
  similar,
  similarityScore,
} from "../../lib/catalog/recommend";
import { TEST_NOW, vehicle } from "../helpers/fakes";

const catalog = [
  vehicle({ stock_id: "R1", make: "Honda", model: "Civic", year: 2020, price: 300000, mileage_km: 50000, has_bluetooth: true, has_carplay: true }),
  vehicle({ stock_id: "R2", make: "Mazda", model: "3", year: 2022, price: 340000, mileage_km: 15000, has_bluetooth: true, has_carplay: true }),
  vehicle({ stock_id: "R3", make: "Honda", model: "Fit", year: 2016, price: 160000, mileage_km: 120000, has_bluetooth: false }),
  vehicle({ stock_id: "R4", make: "Kia", model: "Rio", year: 2021, price: 250000, mileage_km: 30000, has_bluetooth: true }),
  vehicle({ stock_id: "R5", make: "Toyota", model: "Corolla", year: 2019, price: 420000, mileage_km: 70000 }),
];

describe("parsePreferences", () => {
  it("drops MISSING fields and maps makes and feature words", () => {
    const prefs = parsePreferences({
      max_price: "MISSING",
      preferred_makes: "Honda, Mazda",
      required_features: ["Apple CarPlay", "heated seats"],
      min_year: "2018",
    });

    expect(prefs).toEqual({ preferred_makes: ["Honda", "Mazda"], required_features: ["carplay"], min_year: 2018 });
  });

  it("treats missing input as no preferences", () => {
    expect(parsePreferences(undefined)).toEqual({});
  });

  it.each([
    [{ min_price: 300000, max_price: 200000 }],
    [{ min_price: 300000, max_price: 300000 }],
    [{ min_year: 2022, max_year: 2020 }],
    [{ max_km: -5 }],
  ])("rejects %j", (input) => {
    expect(() => parsePreferences(input)).toThrow(InvalidPreferencesError);
  });
});

describe("hard filters", () => {
  it("matches makes case-insensitively", () => {
    expect(passesHardFilters(catalog[0], { preferred_makes: ["honda"] })).toBe(true);
    expect(passesHardFilters(catalog[1], { preferred_makes: ["honda"] })).toBe(false);
  });

  it("matches a make given by its short brand name", () => {
    const jetta = vehicle({ stock_id: "VW1", make: "Volkswagen", model: "Jetta" });
    const tracker = vehicle({ stock_id: "CH1", make: "Chevrolet", model: "Tracker" });

    expect(passesHardFilters(jetta, { preferred_makes: ["VW"] })).toBe(true);
    expect(passesHardFilters(tracker, { preferred_makes: ["chevy"] })).toBe(true);
    expect(passesHardFilters(jetta, { preferred_makes: ["chevy"] })).toBe(false);
  });

  it("treats an unknown feature flag as absent", () => {
    expect(passesHardFilters(catalog[4], { required_features: ["bluetooth"] })).toBe(false);
    expect(passesHardFilters(catalog[2], { required_features: ["bluetooth"] })).toBe(false);
    expect(passesHardFilters(catalog[3], { required_features: ["bluetooth"] })).toBe(true);
  });
});

describe("recommendationScore", () => {
  it("adds price fit, recency, mileage and feature bonuses", () => {
    const car = vehicle({ stock_id: "P1", year: 2020, price: 320000, mileage_km: 50000, has_bluetooth: true, has_carplay: false });
    // 0.3 (price at peak) + 0.2 * 11/15 + 0.2 * 0.75 + 0.1 (bluetooth)
    expect(recommendationScore(car, { min_price: 200000, max_price: 400000 }, TEST_NOW)).toBeCloseTo(0.696667, 5);
  });

  it("peaks above the middle of the budget", () => {
    const prefs = { min_price: 200000, max_price: 400000 };
    const atMiddle = vehicle({ stock_id: "M", price: 300000 });
    const atPeak = vehicle({ stock_id: "P", price: 320000 });

    expect(recommendationScore(atPeak, prefs, TEST_NOW)).toBeGreaterThan(recommendationScore(atMiddle, prefs, TEST_NOW));
  });

  it("never scores lower mileage below higher mileage", () => {
    for (const km of [0, 20000, 80000, 150000, 199000]) {
      const low = vehicle({ stock_id: "L", mileage_km: km });
      const high = vehicle({ stock_id: "H", mileage_km: km + 10000 });

      expect(recommendationScore(low, {}, TEST_NOW)).toBeGreaterThanOrEqual(recommendationScore(high, {}, TEST_NOW));
    }
  });
});

describe("recommend", () => {
  it("counts every survivor before applying the limit", () => {
    const result = recommend(catalog, { max_price: 400000 }, 2, { now: TEST_NOW });

    expect(result.total_matches).toBe(4);
    expect(result.matches).toHaveLength(2);
    expect(result.rationale).toBe("Found 4 cars within your budget of $400,000 MXN");
    expect(result.search_criteria).toEqual({ price_range: { max: 400000 } });
  });

  it("ranks newer, low-mileage, well-equipped cars first", () => {
    const result = recommend(catalog, {}, 5, { now: TEST_NOW });

    expect(result.matches.map((m) => m.record.stock_id)).toEqual(["R2", "R4", "R1", "R5", "R3"]);
  });

  it("returns the same ordered result on repeated calls", () => {
    const prefs = { preferred_makes: ["Honda", "Kia"], max_km: 100000 };

    expect(recommend(catalog, prefs, 5, { now: TEST_NOW })).toEqual(recommend(catalog, prefs, 5, { now: TEST_NOW }));
  });

  it("returns no matches when nothing survives the filters", () => {
    const result = recommend(catalog, { preferred_makes: ["Ferrari"] }, 5, { now: TEST_NOW });

    expect(result.matches).toEqual([]);
    expect(result.rationale).toBe("Found 0 cars from preferred brands: Ferrari");
  });
});

describe("buildRationale", () => {
  it("joins every active criterion", () => {
    expect(buildRationale({ max_price: 400000, preferred_makes: ["Honda", "Mazda"], max_km: 80000, min_year: 2018 }, 1)).toBe(
      "Found 1 car within your budget of $400,000 MXN and from preferred brands: Honda, Mazda and with less than 80,000 km and manufactured from 2018 on"
    );
  });
});

describe("similarity", () => {
  it("scores a same-make, close-price, close-year twin at 1", () => {
    const twin = vehicle({ stock_id: "T", make: "Honda", year: 2021, price: 290000, has_bluetooth: true, has_carplay: true });

    expect(similarityScore(catalog[0], twin)).toBeCloseTo(1);
  });

  it("ranks alternatives and leaves out the target", () => {
    const result = similar(catalog, catalog[0], 2);

    expect(result.map((s) => s.record.stock_id)).toEqual(["R2", "R4"]);
    expect(result.every((s) => s.record.stock_id !== "R1")).toBe(true);
  });
});
