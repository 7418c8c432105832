import { type EmbeddingProvider, createGeminiEmbedder } from "@/lib/ai/embedding";
import { type GenerationCapability, createGeminiGeneration } from "@/lib/ai/generation";
import type { RagConfig } from "@/lib/config";
import { getAdminFirestore } from "@/lib/firebase-admin";
import { ConversationMemory } from "@/lib/firestore/conversation-memory";
import { type DocumentStore, createFirestoreDocumentStore } from "@/lib/firestore/document-store";
import { KnowledgeStore } from "@/lib/knowledge/knowledge-store";
import { QueryOrchestrator } from "@/lib/study/orchestrator";
import { Retriever } from "@/lib/study/retriever";

export type RagServiceOverrides = {
  embedder?: EmbeddingProvider;
  generation?: GenerationCapability;
  /** `null` forces stateless conversation memory. */
  documentStore?: DocumentStore | null;
  catalog?: unknown[];
};

export type RagService = {
  knowledgeStore: KnowledgeStore;
  retriever: Retriever;
  memory: ConversationMemory;
  orchestrator: QueryOrchestrator;
};

function resolveDocumentStore(config: RagConfig, overrides: RagServiceOverrides): DocumentStore | null {
  if (overrides.documentStore !== undefined) {
    return overrides.documentStore;
  }

  const db = getAdminFirestore(config.firebase);
  if (!db) {
    console.info("[rag-service] Firebase not configured, conversation memory is stateless");
    return null;
  }
  return createFirestoreDocumentStore(db);
}

/**
 * Builds and loads every engine component once. Rejects when the curated
 * catalog or its embeddings cannot be loaded; nothing should serve traffic
 * in that state.
 */
export async function createRagService(config: RagConfig, overrides: RagServiceOverrides = {}): Promise<RagService> {
  const embedder =
    overrides.embedder ??
    createGeminiEmbedder({
      apiKey: config.gemini.apiKey,
      model: config.gemini.embeddingModel,
      timeoutMs: config.gemini.timeoutMs,
    });

  const knowledgeStore = new KnowledgeStore({
    embedder,
    catalog: overrides.catalog ?? config.knowledge.catalogPath,
    knowledgeBaseDir: config.knowledge.knowledgeBaseDir,
  });
  await knowledgeStore.load();

  const retriever = new Retriever(knowledgeStore, { minSimilarity: config.retrieval.minSimilarity });
  const memory = new ConversationMemory({
    store: resolveDocumentStore(config, overrides),
    appId: config.memory.appId,
  });

  const generation =
    overrides.generation ??
    createGeminiGeneration({
      apiKey: config.gemini.apiKey,
      model: config.gemini.model,
      timeoutMs: config.gemini.timeoutMs,
    });

  const orchestrator = new QueryOrchestrator({
    retriever,
    memory,
    generation,
    topK: config.retrieval.topK,
    historyLimit: config.memory.historyLimit,
    promptHistoryTurns: config.memory.promptHistoryTurns,
  });

  return { knowledgeStore, retriever, memory, orchestrator };
}
