import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import { ConfigurationError } from "@/lib/errors";

const DEFAULT_CATALOG_PATH = fileURLToPath(new URL("../../data/curriculum.json", import.meta.url));
const DEFAULT_KNOWLEDGE_BASE_DIR = fileURLToPath(new URL("../../knowledge_base", import.meta.url));

export type FirebaseSettings = {
  serviceAccountKey?: string;
  projectId?: string;
  privateKey?: string;
  clientEmail?: string;
  production: boolean;
};

export type RagConfig = {
  gemini: {
    apiKey?: string;
    model: string;
    embeddingModel: string;
    timeoutMs: number;
  };
  retrieval: {
    topK: number;
    minSimilarity?: number;
  };
  memory: {
    appId: string;
    historyLimit: number;
    promptHistoryTurns: number;
  };
  knowledge: {
    catalogPath: string;
    knowledgeBaseDir: string;
  };
  firebase: FirebaseSettings;
};

function blankToUndefined(value: unknown): unknown {
  return typeof value === "string" && value.trim() === "" ? undefined : value;
}

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());
const textWithDefault = (fallback: string) => z.preprocess(blankToUndefined, z.string().trim().default(fallback));
const countWithDefault = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const envSchema = z.object({
  NODE_ENV: optionalText,
  GEMINI_API_KEY: optionalText,
  GEMINI_MODEL: textWithDefault("gemini-2.0-flash"),
  GEMINI_EMBEDDING_MODEL: textWithDefault("text-embedding-004"),
  GEMINI_TIMEOUT_MS: countWithDefault(30_000),
  RAG_TOP_K: countWithDefault(3),
  RAG_HISTORY_LIMIT: countWithDefault(10),
  RAG_PROMPT_HISTORY_TURNS: countWithDefault(5),
  RAG_MIN_SIMILARITY: z.preprocess(blankToUndefined, z.coerce.number().min(-1).max(1).optional()),
  RAG_APP_ID: textWithDefault("rag-chatbot-app"),
  RAG_CATALOG_PATH: optionalText,
  RAG_KNOWLEDGE_BASE_DIR: optionalText,
  FIREBASE_SERVICE_ACCOUNT_KEY: optionalText,
  FIREBASE_PROJECT_ID: optionalText,
  FIREBASE_PRIVATE_KEY: optionalText,
  FIREBASE_CLIENT_EMAIL: optionalText,
});

/**
 * Reads engine settings from the environment. Any malformed value is fatal:
 * the service must not start half-configured.
 */
export function loadRagConfig(env: NodeJS.ProcessEnv = process.env): RagConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment configuration: ${details}`);
  }

  const values = parsed.data;
  if (values.RAG_PROMPT_HISTORY_TURNS > values.RAG_HISTORY_LIMIT) {
    throw new ConfigurationError("RAG_PROMPT_HISTORY_TURNS cannot exceed RAG_HISTORY_LIMIT");
  }

  return {
    gemini: {
      apiKey: values.GEMINI_API_KEY,
      model: values.GEMINI_MODEL,
      embeddingModel: values.GEMINI_EMBEDDING_MODEL,
      timeoutMs: values.GEMINI_TIMEOUT_MS,
    },
    retrieval: {
      topK: values.RAG_TOP_K,
      minSimilarity: values.RAG_MIN_SIMILARITY,
    },
    memory: {
      appId: values.RAG_APP_ID,
      historyLimit: values.RAG_HISTORY_LIMIT,
      promptHistoryTurns: values.RAG_PROMPT_HISTORY_TURNS,
    },
    knowledge: {
      catalogPath: values.RAG_CATALOG_PATH ? path.resolve(values.RAG_CATALOG_PATH) : DEFAULT_CATALOG_PATH,
      knowledgeBaseDir: values.RAG_KNOWLEDGE_BASE_DIR
        ? path.resolve(values.RAG_KNOWLEDGE_BASE_DIR)
        : DEFAULT_KNOWLEDGE_BASE_DIR,
    },
    firebase: {
      serviceAccountKey: values.FIREBASE_SERVICE_ACCOUNT_KEY,
      projectId: values.FIREBASE_PROJECT_ID,
      privateKey: values.FIREBASE_PRIVATE_KEY,
      clientEmail: values.FIREBASE_CLIENT_EMAIL,
      production: values.NODE_ENV === "production",
    },
  };
}
