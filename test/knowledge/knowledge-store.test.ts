import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";

import type { EmbeddingFailure } from "@/lib/ai/embedding";
import { EmbeddingUnavailableError, KnowledgeCatalogError } from "@/lib/errors";
import { KnowledgeStore, matchesSubject } from "@/lib/knowledge/knowledge-store";
import { type Result, err } from "@/lib/result";
import { VocabularyEmbedder } from "../helpers/vocabulary-embedder";
import { TEST_CATALOG, VOCABULARY } from "./fixtures";

/** Fails any batch that contains the marker text, embeds everything else. */
class SelectiveFailureEmbedder extends VocabularyEmbedder {
  constructor(private readonly marker: string) {
    super(VOCABULARY);
  }

  override async embed(texts: string[]): Promise<Result<number[][], EmbeddingFailure>> {
    if (texts.some((text) => text.includes(this.marker))) {
      this.calls.push(texts);
      return err({ code: "request_failed", message: "quota exceeded" });
    }
    return super.embed(texts);
  }
}

async function loadedStore(knowledgeBaseDir?: string, embedder = new VocabularyEmbedder(VOCABULARY)) {
  const store = new KnowledgeStore({ embedder, catalog: TEST_CATALOG, knowledgeBaseDir });
  await store.load();
  return { store, embedder };
}

describe("matchesSubject", () => {
  it("is case-insensitive substring containment", () => {
    expect(matchesSubject("Science", "science")).toBe(true);
    expect(matchesSubject("Social Studies", "social")).toBe(true);
    expect(matchesSubject("Science", "sci")).toBe(true);
    expect(matchesSubject("Sci", "Science")).toBe(false);
  });
});

describe("KnowledgeStore", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("embeds every catalog entry once at load", async () => {
    const { store, embedder } = await loadedStore();
    expect(store.size).toBe(TEST_CATALOG.length);
    expect(embedder.calls).toHaveLength(1);
    expect(embedder.calls[0][1]).toBe("Grade 5 Science: Water Cycle - evaporation and rain in the water cycle");
  });

  it("filters by exact grade and loose subject", async () => {
    const { store } = await loadedStore();
    expect(store.entriesFor(5, "science").map((entry) => entry.chapterName)).toEqual([
      "Food Webs",
      "Water Cycle",
      "Sunlight",
    ]);
    expect(store.entriesFor(undefined, "Science").map((entry) => entry.chapterName)).toEqual([
      "Food Webs",
      "Water Cycle",
      "Sunlight",
      "Rainfall",
    ]);
    expect(store.entriesFor(1).map((entry) => entry.chapterName)).toEqual(["Counting", "Shapes", "Adding"]);
    expect(store.entriesFor()).toHaveLength(TEST_CATALOG.length);
    expect(store.entriesFor(9, "Math")).toEqual([]);
  });

  it("returns identical results for repeated lookups", async () => {
    const { store } = await loadedStore();
    expect(store.entriesFor(5, "Science")).toEqual(store.entriesFor(5, "Science"));
  });

  it("hands out copies of the cached vectors", async () => {
    const { store } = await loadedStore();
    const [first] = store.embeddingsFor([1]);
    first.fill(9);

    expect(store.embeddingsFor([1])).toEqual([[0, 0, 2, 1, 0, 0, 0]]);
  });

  it("returns cached vectors aligned with the requested indices", async () => {
    const { store, embedder } = await loadedStore();
    expect(store.embeddingsFor([1, 2])).toEqual([
      [0, 0, 2, 1, 0, 0, 0],
      [0, 0, 0, 0, 1, 1, 0],
    ]);
    expect(embedder.calls).toHaveLength(1);
    expect(() => store.embeddingsFor([42])).toThrow(RangeError);
  });

  it("refuses to load twice or to serve before loading", async () => {
    const store = new KnowledgeStore({ embedder: new VocabularyEmbedder(VOCABULARY), catalog: TEST_CATALOG });
    expect(() => store.entriesFor(5)).toThrow("KnowledgeStore used before load() completed");
    await store.load();
    await expect(store.load()).rejects.toThrow("KnowledgeStore.load() must run exactly once");
  });

  it("fails startup when catalog embeddings are unavailable", async () => {
    const embedder = new VocabularyEmbedder(VOCABULARY);
    embedder.failure = { code: "missing_api_key", message: "Missing GEMINI_API_KEY" };
    const store = new KnowledgeStore({ embedder, catalog: TEST_CATALOG });
    await expect(store.load()).rejects.toBeInstanceOf(EmbeddingUnavailableError);
  });

  it("fails startup on a malformed curated catalog", async () => {
    const store = new KnowledgeStore({
      embedder: new VocabularyEmbedder(VOCABULARY),
      catalog: [{ grade: 0, subject: "Math", chapterNumber: 1, chapterName: "X", content: "Y" }],
    });
    await expect(store.load()).rejects.toBeInstanceOf(KnowledgeCatalogError);
  });

  describe("auxiliary knowledge bases", () => {
    let directory = "";

    afterEach(async () => {
      if (directory) {
        await rm(directory, { recursive: true, force: true });
      }
    });

    async function withAuxiliaryFiles(files: Record<string, string>, embedder?: VocabularyEmbedder) {
      directory = await mkdtemp(path.join(os.tmpdir(), "kb-store-"));
      for (const [name, content] of Object.entries(files)) {
        await writeFile(path.join(directory, name), content);
      }
      return loadedStore(directory, embedder);
    }

    it("loads valid catalogs and skips malformed ones", async () => {
      vi.spyOn(console, "warn").mockImplementation(() => undefined);
      const { store } = await withAuxiliaryFiles({
        "science-facts.json": JSON.stringify([
          { topic: "Rain", content: "water falls as rain" },
          { topic: "Sun", content: "the sun gives energy" },
        ]),
        "broken.json": "[{",
      });

      expect(store.auxiliaryCatalogNames()).toEqual(["science-facts"]);
    });

    it("skips a catalog whose embeddings fail and keeps the others", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
      vi.spyOn(console, "info").mockImplementation(() => undefined);
      const { store } = await withAuxiliaryFiles(
        {
          "archive.json": JSON.stringify([{ topic: "Unembeddable", content: "scanned pages" }]),
          "science-facts.json": JSON.stringify([{ topic: "Rain", content: "water falls as rain" }]),
        },
        new SelectiveFailureEmbedder("Unembeddable"),
      );

      expect(store.auxiliaryCatalogNames()).toEqual(["science-facts"]);
      expect(warn).toHaveBeenCalledWith("[knowledge-store] skipping auxiliary catalog, embeddings unavailable", {
        name: "archive",
        message: "quota exceeded",
      });
      expect(await store.searchKnowledgeBase("rain", "science-facts")).toEqual([
        { topic: "Rain", content: "water falls as rain" },
      ]);
    });

    it("ranks a named catalog by similarity", async () => {
      vi.spyOn(console, "warn").mockImplementation(() => undefined);
      const { store } = await withAuxiliaryFiles({
        "science-facts.json": JSON.stringify([
          { topic: "Rain", content: "water falls as rain" },
          { topic: "Sun", content: "the sun gives energy" },
        ]),
      });

      expect(await store.searchKnowledgeBase("sun energy", "science-facts")).toEqual([
        { topic: "Sun", content: "the sun gives energy" },
      ]);
      expect((await store.searchKnowledgeBase("sun energy", "science-facts", 2)).map((entry) => entry.topic)).toEqual([
        "Sun",
        "Rain",
      ]);
    });

    it("returns nothing for an unknown catalog name", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
      const { store } = await withAuxiliaryFiles({});
      expect(await store.searchKnowledgeBase("sun", "missing")).toEqual([]);
      expect(warn).toHaveBeenCalledWith("[knowledge-store] knowledge base not found", { name: "missing" });
    });
  });
});
