import { Conversation } from "./conversation";

export interface ConversationStore {
  get(userId: string): Conversation | undefined;
  /**
   * Runs `fn` with the user's conversation (created on first use). Calls for
   * the same user id run one at a time in arrival order; other users are not blocked.
   */
  withConversation<T>(userId: string, fn: (conversation: Conversation) => Promise<T>): Promise<T>;
}

/** Process-lifetime store. Nothing is persisted. */
export class InMemoryConversationStore implements ConversationStore {
  private readonly conversations = new Map<string, Conversation>();
  private readonly tails = new Map<string, Promise<void>>();

  get(userId: string): Conversation | undefined {
    return this.conversations.get(userId);
  }

  size(): number {
    return this.conversations.size;
  }

  clear(userId: string): void {
    this.conversations.delete(userId);
  }

  async withConversation<T>(userId: string, fn: (conversation: Conversation) => Promise<T>): Promise<T> {
    const previous = this.tails.get(userId) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(userId, tail);

    await previous;
    try {
      let conversation = this.conversations.get(userId);
      if (!conversation) {
        conversation = new Conversation();
        this.conversations.set(userId, conversation);
      }
      return await fn(conversation);
    } finally {
      release();
      // Last one out drops the chain so idle users hold no promises.
      if (this.tails.get(userId) === tail) this.tails.delete(userId);
    }
  }
}
