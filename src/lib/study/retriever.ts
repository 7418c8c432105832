import type { KnowledgeStore } from "@/lib/knowledge/knowledge-store";
import { rankBySimilarity } from "@/lib/knowledge/similarity";
import type { KnowledgeEntry, ScoredEntry } from "@/lib/knowledge/types";

export type RetrieverOptions = {
  /** Candidates scoring below this cosine similarity are dropped. Unset keeps every candidate. */
  minSimilarity?: number;
};

export class Retriever {
  private readonly store: KnowledgeStore;
  private readonly minSimilarity?: number;

  constructor(store: KnowledgeStore, options: RetrieverOptions = {}) {
    this.store = store;
    this.minSimilarity = options.minSimilarity;
  }

  async retrieve(query: string, grade: number, subject: string, topK: number): Promise<KnowledgeEntry[]> {
    const scored = await this.retrieveScored(query, grade, subject, topK);
    return scored.map((item) => item.entry);
  }

  /**
   * Ranked retrieval with scores. Without a usable query vector the
   * candidates come back in catalog order with a score of 0.
   */
  async retrieveScored(
    query: string,
    grade: number,
    subject: string,
    topK: number,
  ): Promise<Array<ScoredEntry<KnowledgeEntry>>> {
    const limit = Math.max(0, Math.floor(topK));
    const candidates = this.store.indexedEntriesFor(grade, subject);

    if (!candidates.length || !limit) {
      if (!candidates.length) {
        console.info("[retriever] no catalog entries", { grade, subject });
      }
      return [];
    }

    const inCatalogOrder = () => candidates.slice(0, limit).map(({ entry }) => ({ entry, score: 0 }));

    if (!query.trim()) {
      return inCatalogOrder();
    }

    const embedded = await this.store.embeddingProvider.embed([query]);
    if (!embedded.ok) {
      console.warn("[retriever] query embedding failed, falling back to catalog order", {
        grade,
        subject,
        message: embedded.error.message,
      });
      return inCatalogOrder();
    }

    const vectors = this.store.embeddingsFor(candidates.map((item) => item.index));
    return rankBySimilarity(
      embedded.value[0],
      candidates.map((item) => item.entry),
      vectors,
      this.minSimilarity,
    ).slice(0, limit);
  }
}
