export type ConversationTurn = Readonly<{
  user_text: string;
  assistant_text?: string;
}>;

/** Append-only turn history for one user. */
export class Conversation {
  private readonly log: ConversationTurn[] = [];

  constructor(turns: readonly ConversationTurn[] = []) {
    for (const t of turns) this.addTurn(t.user_text, t.assistant_text);
  }

  get turns(): readonly ConversationTurn[] {
    return [...this.log];
  }

  get length(): number {
    return this.log.length;
  }

  addTurn(userText: string, assistantText?: string): void {
    const turn: ConversationTurn =
      assistantText === undefined ? { user_text: userText } : { user_text: userText, assistant_text: assistantText };
    this.log.push(Object.freeze(turn));
  }

  /** Copy of the last `n` turns; earlier turns are never touched. */
  recent(n: number): ConversationTurn[] {
    if (n <= 0) return [];
    return this.log.slice(-n);
  }

  historyText(n: number): string {
    return this.recent(n)
      .map((t) => `User: ${t.user_text}\nAssistant: ${t.assistant_text ?? ""}`)
      .join("\n");
  }
}
