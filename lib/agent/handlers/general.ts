import type { KnowledgeSection } from "../../knowledge/sections";
import { sectionText } from "../../knowledge/sections";
import { generalSystemPrompt, withSystem } from "../prompts";
import type { ResponseTemplates } from "../responses";
import type { Handler, Retrieval, TextGeneration } from "../schema";

export type GeneralHandlerDeps = {
  generation: TextGeneration;
  knowledge: Retrieval<KnowledgeSection>;
  responses: ResponseTemplates;
  topK: number;
};

/** Answers from the knowledge base only; an unreachable index still gets an answer with empty context. */
export function createGeneralHandler(deps: GeneralHandlerDeps): Handler {
  return {
    intent: "GENERAL",
    async handle({ query, history }) {
      let context = "";
      try {
        const hits = await deps.knowledge.topK(query, deps.topK);
        context = hits.map((h) => sectionText(h.item)).join("\n\n");
      } catch (e) {
        console.warn("[general] knowledge retrieval failed:", e instanceof Error ? e.message : e);
      }

      try {
        const text = await deps.generation.complete(withSystem(generalSystemPrompt(context), query, history));
        return { text };
      } catch (e) {
        console.error("[general] generation failed:", e instanceof Error ? e.message : e);
        return { text: deps.responses.render("general_unavailable") };
      }
    },
  };
}
