import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { loadRagConfig } from "@/lib/config";
import { EmbeddingUnavailableError } from "@/lib/errors";
import { createRagService } from "@/lib/rag-service";
import { RecordingGeneration } from "./helpers/recording-generation";
import { VocabularyEmbedder } from "./helpers/vocabulary-embedder";

const KNOWLEDGE_BASE = fileURLToPath(new URL("../knowledge_base", import.meta.url));

function testConfig() {
  return loadRagConfig({ RAG_APP_ID: "test-app", RAG_KNOWLEDGE_BASE_DIR: KNOWLEDGE_BASE });
}

describe("createRagService", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("loads the curated catalog and the bundled knowledge base", async () => {
    const embedder = new VocabularyEmbedder(["exam", "revision", "notes", "reading", "ecosystems"]);
    const service = await createRagService(testConfig(), {
      embedder,
      generation: new RecordingGeneration(),
      documentStore: null,
    });

    expect(service.knowledgeStore.size).toBe(27);
    expect(service.knowledgeStore.auxiliaryCatalogNames()).toEqual(["study-skills"]);
    expect((await service.knowledgeStore.searchKnowledgeBase("exam revision", "study-skills"))[0].topic).toBe(
      "Exam preparation",
    );
  });

  it("answers statelessly when no document store is available", async () => {
    const generation = new RecordingGeneration();
    const service = await createRagService(testConfig(), {
      embedder: new VocabularyEmbedder(["ecosystems"]),
      generation,
      documentStore: null,
    });

    expect(service.memory.persistent).toBe(false);
    expect(await service.orchestrator.answer("What are ecosystems?", "u1", 5)).toMatchObject({
      kind: "answered",
      subject: "Science",
      persisted: false,
    });
    expect(generation.requests).toHaveLength(1);
  });

  it("refuses to start when the catalog cannot be embedded", async () => {
    const embedder = new VocabularyEmbedder(["ecosystems"]);
    embedder.failure = { code: "request_failed", message: "offline" };

    await expect(createRagService(testConfig(), { embedder, documentStore: null })).rejects.toBeInstanceOf(
      EmbeddingUnavailableError,
    );
  });
});
