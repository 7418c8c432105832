import type { EmbeddingProvider } from "@/lib/ai/embedding";
import { EmbeddingUnavailableError } from "@/lib/errors";
import {
  parseCuratedCatalog,
  readAuxiliaryCatalogs,
  readCuratedCatalog,
  toAuxiliaryText,
  toCanonicalText,
} from "@/lib/knowledge/catalog";
import { rankBySimilarity } from "@/lib/knowledge/similarity";
import type { AuxiliaryEntry, IndexedEntry, KnowledgeEntry } from "@/lib/knowledge/types";

export type KnowledgeStoreOptions = {
  embedder: EmbeddingProvider;
  /** Path to the curated catalog JSON file, or the catalog itself. */
  catalog: string | unknown[];
  knowledgeBaseDir?: string;
};

type AuxiliaryIndex = {
  entries: AuxiliaryEntry[];
  vectors: number[][];
};

type LoadState = "idle" | "loading" | "ready";

export function matchesSubject(entrySubject: string, subject: string): boolean {
  return entrySubject.toLowerCase().includes(subject.toLowerCase());
}

/**
 * Owns the curated catalog, the auxiliary catalogs and their embedding
 * indexes. Everything is computed once in `load()` and read-only afterwards,
 * so one instance can serve concurrent requests without locking.
 */
export class KnowledgeStore {
  private readonly embedder: EmbeddingProvider;
  private readonly catalogSource: string | unknown[];
  private readonly knowledgeBaseDir?: string;

  private state: LoadState = "idle";
  private catalog: KnowledgeEntry[] = [];
  private vectors: number[][] = [];
  private readonly auxiliary = new Map<string, AuxiliaryIndex>();

  constructor(options: KnowledgeStoreOptions) {
    this.embedder = options.embedder;
    this.catalogSource = options.catalog;
    this.knowledgeBaseDir = options.knowledgeBaseDir;
  }

  get size(): number {
    return this.catalog.length;
  }

  get embeddingProvider(): EmbeddingProvider {
    return this.embedder;
  }

  async load(): Promise<void> {
    if (this.state !== "idle") {
      throw new Error("KnowledgeStore.load() must run exactly once");
    }
    this.state = "loading";

    const catalog =
      typeof this.catalogSource === "string"
        ? await readCuratedCatalog(this.catalogSource)
        : parseCuratedCatalog(this.catalogSource);

    const embedded = await this.embedder.embed(catalog.map(toCanonicalText));
    if (!embedded.ok) {
      throw new EmbeddingUnavailableError(
        `Unable to embed curated catalog with ${this.embedder.model}: ${embedded.error.message}`,
      );
    }
    if (embedded.value.length !== catalog.length) {
      throw new EmbeddingUnavailableError(
        `Expected ${catalog.length} catalog embeddings, received ${embedded.value.length}`,
      );
    }

    this.catalog = catalog;
    this.vectors = embedded.value;
    console.info("[knowledge-store] curated catalog indexed", {
      entries: catalog.length,
      model: this.embedder.model,
    });

    if (this.knowledgeBaseDir) {
      await this.loadAuxiliaryCatalogs(this.knowledgeBaseDir);
    }

    this.state = "ready";
  }

  private async loadAuxiliaryCatalogs(directory: string): Promise<void> {
    const { catalogs } = await readAuxiliaryCatalogs(directory);

    for (const [name, entries] of catalogs) {
      const embedded = await this.embedder.embed(entries.map(toAuxiliaryText));
      if (!embedded.ok || embedded.value.length !== entries.length) {
        console.warn("[knowledge-store] skipping auxiliary catalog, embeddings unavailable", {
          name,
          message: embedded.ok ? "embedding count mismatch" : embedded.error.message,
        });
        continue;
      }

      this.auxiliary.set(name, { entries, vectors: embedded.value });
      console.info("[knowledge-store] auxiliary catalog loaded", { name, entries: entries.length });
    }
  }

  private assertReady(): void {
    if (this.state !== "ready") {
      throw new Error("KnowledgeStore used before load() completed");
    }
  }

  indexedEntriesFor(grade?: number, subject?: string): IndexedEntry[] {
    this.assertReady();

    const matches: IndexedEntry[] = [];
    this.catalog.forEach((entry, index) => {
      if (grade !== undefined && entry.grade !== grade) {
        return;
      }
      if (subject && !matchesSubject(entry.subject, subject)) {
        return;
      }
      matches.push({ index, entry });
    });
    return matches;
  }

  entriesFor(grade?: number, subject?: string): KnowledgeEntry[] {
    return this.indexedEntriesFor(grade, subject).map((item) => item.entry);
  }

  embeddingsFor(indices: number[]): number[][] {
    this.assertReady();

    return indices.map((index) => {
      const vector = this.vectors[index];
      if (!vector) {
        throw new RangeError(`No catalog entry at index ${index}`);
      }
      return [...vector];
    });
  }

  auxiliaryCatalogNames(): string[] {
    this.assertReady();
    return [...this.auxiliary.keys()];
  }

  async searchKnowledgeBase(query: string, name: string, topK = 1): Promise<AuxiliaryEntry[]> {
    this.assertReady();

    const index = this.auxiliary.get(name);
    if (!index) {
      console.warn("[knowledge-store] knowledge base not found", { name });
      return [];
    }
    if (!index.entries.length || !query.trim()) {
      return index.entries.slice(0, topK);
    }

    const embedded = await this.embedder.embed([query]);
    if (!embedded.ok) {
      console.warn("[knowledge-store] query embedding failed, returning catalog order", {
        name,
        message: embedded.error.message,
      });
      return index.entries.slice(0, topK);
    }

    return rankBySimilarity(embedded.value[0], index.entries, index.vectors)
      .slice(0, topK)
      .map((item) => item.entry);
  }
}
