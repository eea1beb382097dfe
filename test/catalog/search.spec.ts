import {
  fuzzyScore,
  fuzzySearch,
  jaccard,
  keywordScore,
  keywordSearch,
  normalizeMakeModel,
  searchCatalog,
} from "../../lib/catalog/search";
import { vehicle } from "../helpers/fakes";

const civic = vehicle({ stock_id: "S1", make: "Honda", model: "Civic", version: "LX", year: 2020 });
const corolla = vehicle({ stock_id: "S2", make: "Toyota", model: "Corolla", version: "", year: 2019 });
const jetta = vehicle({ stock_id: "S3", make: "Volkswagen", model: "Jetta", version: "Comfortline", year: 2021 });
const civic2018 = vehicle({ stock_id: "S0", make: "Honda", model: "Civic", version: "EX", year: 2018 });

describe("keyword search", () => {
  it("scores the share of query words found", () => {
    expect(keywordScore(civic, "civic 2020")).toBe(1);
    expect(keywordScore(corolla, "civic 2020")).toBe(0);
    expect(keywordScore(civic2018, "civic 2020")).toBe(0.5);
    expect(keywordScore(civic, "   ")).toBe(0);
  });

  it("drops zero scores and orders by score, then stock id", () => {
    const matches = keywordSearch([corolla, civic, civic2018], "honda civic");

    expect(matches.map((m) => [m.record.stock_id, m.score])).toEqual([
      ["S0", 1],
      ["S1", 1],
    ]);
  });
});

describe("fuzzy search", () => {
  it("normalizes brand synonyms and punctuation", () => {
    expect(normalizeMakeModel("Volkswagen  Jetta!")).toBe("vw jetta");
    expect(normalizeMakeModel("Mercedes-Benz C-Class")).toBe("mercedes cclass");
  });

  it("computes Jaccard similarity", () => {
    expect(jaccard(new Set(["a", "b"]), new Set(["b", "c"]))).toBeCloseTo(1 / 3);
    expect(jaccard(new Set(), new Set(["a"]))).toBe(0);
  });

  it("matches a short brand name against the full one", () => {
    expect(fuzzyScore(jetta, "vw jetta")).toBe(1);
    expect(fuzzySearch([civic, jetta], "VW Jetta").map((m) => m.record.stock_id)).toEqual(["S3"]);
  });

  it("requires more than half overlap", () => {
    // {toyota, corolla} vs {corolla, cross}: 1/3
    expect(fuzzySearch([corolla], "corolla cross")).toEqual([]);
  });
});

describe("searchCatalog", () => {
  it("uses keywords first", () => {
    const result = searchCatalog([civic, corolla], "corolla");

    expect(result.strategy).toBe("keyword");
    expect(result.matches.map((m) => m.record.stock_id)).toEqual(["S2"]);
  });

  it("falls back to fuzzy make/model matching", () => {
    // Neither "jetta," nor "vw" is a substring of "volkswagen jetta comfortline 2021".
    const result = searchCatalog([civic, jetta], "Jetta, VW");

    expect(result.strategy).toBe("fuzzy");
    expect(result.matches.map((m) => [m.record.stock_id, m.score])).toEqual([["S3", 1]]);
  });

  it("drops partial keyword hits below the minimum score", () => {
    expect(searchCatalog([civic, corolla], "a honda please").matches.map((m) => m.record.stock_id)).toEqual(["S1", "S2"]);
    expect(searchCatalog([civic, corolla], "a honda please", { minKeywordScore: 1 })).toEqual({ strategy: "none", matches: [] });
  });

  it("reports no matches", () => {
    expect(searchCatalog([civic], "tesla")).toEqual({ strategy: "none", matches: [] });
  });
});
