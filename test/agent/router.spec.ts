import { dispatch, KeywordIntentClassifier, LlmIntentClassifier } from "../../lib/agent/router";
import { GenerationUnavailableError } from "../../lib/agent/schema";
import type { Handler, HandlerTable } from "../../lib/agent/schema";
import { ScriptedGeneration } from "../helpers/fakes";

describe("LlmIntentClassifier", () => {
  beforeEach(() => {
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("accepts a label with stray whitespace and casing", async () => {
    const generation = new ScriptedGeneration([" finance_calculation\n"]);

    await expect(new LlmIntentClassifier(generation).classify("how much per month?", "")).resolves.toBe("FINANCE_CALCULATION");
  });

  it("sends the history along with the message", async () => {
    const generation = new ScriptedGeneration(["CATALOG_SEARCH"]);

    await new LlmIntentClassifier(generation).classify("and in red?", "User: any jetta?\nAssistant: Yes, a 2021 one.");

    const [system, user] = generation.calls[0];
    expect(system.role).toBe("system");
    expect(user).toEqual({
      role: "user",
      content: "Conversation so far:\nUser: any jetta?\nAssistant: Yes, a 2021 one.\n\nCustomer: and in red?",
    });
  });

  it("routes an unknown label to GENERAL", async () => {
    const generation = new ScriptedGeneration(["MAYBE"]);

    await expect(new LlmIntentClassifier(generation).classify("hmm", "")).resolves.toBe("GENERAL");
  });

  it("routes a failed call to GENERAL", async () => {
    const generation = new ScriptedGeneration([new GenerationUnavailableError("timeout")]);

    await expect(new LlmIntentClassifier(generation).classify("hmm", "")).resolves.toBe("GENERAL");
    expect(console.warn).toHaveBeenCalledWith("[router] classification failed, using GENERAL:", "timeout");
  });
});

describe("KeywordIntentClassifier", () => {
  const classifier = new KeywordIntentClassifier();

  it.each([
    ["What would my monthly payment be?", "FINANCE_CALCULATION"],
    ["Can I finance a car with 50k down?", "FINANCE_CALCULATION"],
    ["I'm looking for an SUV under 400k", "CATALOG_SEARCH"],
    ["Do you have any cars from Honda?", "CATALOG_SEARCH"],
    ["What are your opening hours?", "GENERAL"],
  ])("%s -> %s", async (query, intent) => {
    await expect(classifier.classify(query)).resolves.toBe(intent);
  });
});

describe("dispatch", () => {
  const handler = (intent: Handler["intent"]): Handler => ({
    intent,
    handle: async () => ({ text: intent }),
  });
  const table: HandlerTable = {
    GENERAL: handler("GENERAL"),
    CATALOG_SEARCH: handler("CATALOG_SEARCH"),
    FINANCE_CALCULATION: handler("FINANCE_CALCULATION"),
  };

  it("selects the handler for the intent", () => {
    expect(dispatch(table, "CATALOG_SEARCH").intent).toBe("CATALOG_SEARCH");
    expect(dispatch(table, "FINANCE_CALCULATION").intent).toBe("FINANCE_CALCULATION");
  });
});
