import { readFile } from "node:fs/promises";
import path from "node:path";

export type KnowledgeSection = {
  title: string;
  body: string;
};

/** Splits on level-2 headings; text before the first "## " is the document preamble and is dropped. */
export function parseKnowledgeSections(markdown: string): KnowledgeSection[] {
  return markdown
    .replace(/\r\n/g, "\n")
    .split(/^## /m)
    .slice(1)
    .map((chunk) => {
      const [title, ...rest] = chunk.split("\n");
      return { title: title.trim(), body: rest.join("\n").trim() };
    })
    .filter((s) => s.title || s.body);
}

export function sectionText(section: KnowledgeSection): string {
  return `${section.title}\n${section.body}`;
}

export async function loadKnowledgeBase(filePath: string): Promise<KnowledgeSection[]> {
  const resolved = path.resolve(process.cwd(), filePath);
  const sections = parseKnowledgeSections(await readFile(resolved, "utf8"));
  console.info(`[knowledge] loaded ${sections.length} sections from ${resolved}`);
  return sections;
}
