import { Conversation } from "../../lib/conversation/conversation";
import { InMemoryConversationStore } from "../../lib/conversation/store";

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("Conversation", () => {
  it("renders the most recent turns", () => {
    const conversation = new Conversation();
    conversation.addTurn("hi", "Hello! How can I help?");
    conversation.addTurn("any civic?", "We have a 2020 Civic.");
    conversation.addTurn("price?");

    expect(conversation.recent(2).map((t) => t.user_text)).toEqual(["any civic?", "price?"]);
    expect(conversation.historyText(2)).toBe("User: any civic?\nAssistant: We have a 2020 Civic.\nUser: price?\nAssistant: ");
    expect(conversation.recent(0)).toEqual([]);
    expect(conversation.historyText(5).split("\n")).toHaveLength(6);
  });

  it("hands out a copy of its turns", () => {
    const conversation = new Conversation();
    conversation.addTurn("hi", "Hello!");
    const seen = conversation.turns;

    conversation.addTurn("any civic?", "We have a 2020 Civic.");

    expect(seen).toHaveLength(1);
    expect(conversation.turns).toHaveLength(2);
  });

  it("is empty for a new user", () => {
    expect(new Conversation().historyText(3)).toBe("");
  });
});

describe("InMemoryConversationStore", () => {
  it("creates a conversation on first use", async () => {
    const store = new InMemoryConversationStore();
    expect(store.get("u1")).toBeUndefined();

    await store.withConversation("u1", async (c) => c.addTurn("hello", "hi"));

    expect(store.get("u1")?.length).toBe(1);
    expect(store.size()).toBe(1);
  });

  it("runs calls for the same user one at a time, in arrival order", async () => {
    const store = new InMemoryConversationStore();
    const events: string[] = [];

    const slow = store.withConversation("u1", async (c) => {
      events.push("first:start");
      await tick();
      await tick();
      c.addTurn("first", "a");
      events.push("first:end");
    });
    const fast = store.withConversation("u1", async (c) => {
      events.push(`second:start after ${c.length}`);
      c.addTurn("second", "b");
    });

    await Promise.all([slow, fast]);

    expect(events).toEqual(["first:start", "first:end", "second:start after 1"]);
    expect(store.get("u1")?.turns.map((t) => t.user_text)).toEqual(["first", "second"]);
  });

  it("does not block other users", async () => {
    const store = new InMemoryConversationStore();
    const events: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const blocked = store.withConversation("u1", async () => {
      await gate;
      events.push("u1");
    });
    await store.withConversation("u2", async () => {
      events.push("u2");
    });
    release();
    await blocked;

    expect(events).toEqual(["u2", "u1"]);
  });

  it("keeps the chain going after a failed call", async () => {
    const store = new InMemoryConversationStore();

    await expect(
      store.withConversation("u1", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    const length = await store.withConversation("u1", async (c) => {
      c.addTurn("again", "ok");
      return c.length;
    });

    expect(length).toBe(1);
  });

  it("forgets a user on clear", async () => {
    const store = new InMemoryConversationStore();
    await store.withConversation("u1", async (c) => c.addTurn("x"));

    store.clear("u1");

    expect(store.get("u1")).toBeUndefined();
    expect(store.size()).toBe(0);
  });
});
