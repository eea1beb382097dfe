import { loadKnowledgeBase, parseKnowledgeSections, sectionText } from "../../lib/knowledge/sections";

describe("parseKnowledgeSections", () => {
  it("splits on level-2 headings and drops the preamble", () => {
    const sections = parseKnowledgeSections("# Title\nintro\n\n## Warranty\n3 months.\n\n## Trial\r\n7 days.\n### Detail\nno refunds after.\n");

    expect(sections).toEqual([
      { title: "Warranty", body: "3 months." },
      { title: "Trial", body: "7 days.\n### Detail\nno refunds after." },
    ]);
    expect(sectionText(sections[0])).toBe("Warranty\n3 months.");
  });

  it("returns nothing for a document without sections", () => {
    expect(parseKnowledgeSections("just text")).toEqual([]);
  });
});

describe("loadKnowledgeBase", () => {
  it("reads the bundled knowledge base", async () => {
    jest.spyOn(console, "info").mockImplementation(() => undefined);

    const sections = await loadKnowledgeBase("data/knowledge-base.md");

    expect(sections.map((s) => s.title)).toEqual([
      "About us",
      "Warranty",
      "Seven-day trial",
      "Financing",
      "Trade-in",
      "Delivery and test drives",
      "Required documents",
    ]);
    jest.restoreAllMocks();
  });
});
