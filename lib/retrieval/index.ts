import type { Embeddings, Retrieval, RetrievedItem } from "../agent/schema";
import { cosineSimilarity } from "./cosine";

type Entry<T> = {
  item: T;
  text: string;
};

type VectorEntry<T> = Entry<T> & { vector: number[] };
type TokenEntry<T> = Entry<T> & { tokens: Set<string> };

function rank<E extends Entry<unknown>>(entries: E[], score: (e: E) => number, k: number): RetrievedItem<E["item"]>[] {
  // Stable sort keeps insertion order for equal scores.
  return entries
    .map((e) => ({ item: e.item, score: score(e) }))
    .sort((a, b) => b.score - a.score)
    .slice(0, Math.max(0, k));
}

/**
 * Small in-memory vector index: every item is embedded once at build time,
 * queries scan all vectors. Read-only after `build`.
 */
export class EmbeddingIndex<T> implements Retrieval<T> {
  private constructor(
    private readonly entries: VectorEntry<T>[],
    private readonly embeddings: Embeddings
  ) {}

  static async build<T>(items: readonly T[], textOf: (item: T) => string, embeddings: Embeddings): Promise<EmbeddingIndex<T>> {
    const texts = items.map(textOf);
    const vectors = await embeddings.embed(texts);
    if (vectors.length !== items.length) {
      throw new Error(`Embedding count mismatch: ${vectors.length} vectors for ${items.length} items`);
    }
    const entries = items.map((item, i) => ({ item, text: texts[i], vector: vectors[i] }));
    return new EmbeddingIndex(entries, embeddings);
  }

  get size(): number {
    return this.entries.length;
  }

  async topK(query: string, k: number): Promise<RetrievedItem<T>[]> {
    if (!query.trim() || this.entries.length === 0) return [];
    const [queryVector] = await this.embeddings.embed([query]);
    if (!queryVector) return [];
    return rank(this.entries, (e) => cosineSimilarity(queryVector, e.vector), k);
  }
}

const tokens = (text: string) =>
  new Set(
    text
      .toLowerCase()
      .replace(/[^\p{L}\p{N}\s]/gu, " ")
      .split(/\s+/)
      .filter((t) => t.length > 1)
  );

/**
 * Embedding-free stand-in: share of query tokens present in the item text.
 * Items scoring 0 are left out.
 */
export class LexicalIndex<T> implements Retrieval<T> {
  private readonly entries: TokenEntry<T>[];

  constructor(items: readonly T[], textOf: (item: T) => string) {
    this.entries = items.map((item) => {
      const text = textOf(item);
      return { item, text, tokens: tokens(text) };
    });
  }

  async topK(query: string, k: number): Promise<RetrievedItem<T>[]> {
    const q = tokens(query);
    if (q.size === 0) return [];

    const overlap = (e: TokenEntry<T>) => {
      let hits = 0;
      for (const t of q) if (e.tokens.has(t)) hits++;
      return hits / q.size;
    };

    return rank(
      this.entries.filter((e) => overlap(e) > 0),
      overlap,
      k
    );
  }
}
