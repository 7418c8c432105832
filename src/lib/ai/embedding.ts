import { embedWithGeminiModel, isGeminiError } from "@/lib/ai/providers/gemini";
import { type Result, err, errorMessage, ok } from "@/lib/result";

export type EmbeddingFailure = {
  code: "missing_api_key" | "request_failed" | "invalid_vectors";
  message: string;
};

export interface EmbeddingProvider {
  readonly model: string;
  embed(texts: string[]): Promise<Result<number[][], EmbeddingFailure>>;
}

export type GeminiEmbedderOptions = {
  apiKey?: string;
  model: string;
  timeoutMs?: number;
};

function hasUniformDimensions(vectors: number[][]): boolean {
  const dimensions = vectors[0]?.length ?? 0;
  return vectors.every((vector) => vector.length === dimensions);
}

export function createGeminiEmbedder(options: GeminiEmbedderOptions): EmbeddingProvider {
  return {
    model: options.model,
    async embed(texts) {
      if (!texts.length) {
        return ok([]);
      }

      try {
        const vectors = await embedWithGeminiModel(texts, {
          apiKey: options.apiKey,
          modelName: options.model,
          timeoutMs: options.timeoutMs,
        });

        if (!hasUniformDimensions(vectors)) {
          return err({ code: "invalid_vectors", message: "Embedding dimensions differ within one response" });
        }

        return ok(vectors);
      } catch (error) {
        if (isGeminiError(error) && error.code === "missing_api_key") {
          return err({ code: "missing_api_key", message: error.message });
        }
        return err({ code: "request_failed", message: errorMessage(error, "Unknown embedding error") });
      }
    },
  };
}
