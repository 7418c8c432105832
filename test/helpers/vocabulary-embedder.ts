import type { EmbeddingFailure, EmbeddingProvider } from "@/lib/ai/embedding";
import { type Result, err, ok } from "@/lib/result";

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(Boolean);
}

/**
 * Deterministic embedder for tests: one dimension per vocabulary word,
 * holding that word's token count in the text.
 */
export class VocabularyEmbedder implements EmbeddingProvider {
  readonly model = "vocabulary-test";
  readonly calls: string[][] = [];
  failure: EmbeddingFailure | null = null;

  private readonly vocabulary: string[];

  constructor(vocabulary: string[]) {
    this.vocabulary = vocabulary;
  }

  vectorFor(text: string): number[] {
    const tokens = tokenize(text);
    return this.vocabulary.map((word) => tokens.filter((token) => token === word).length);
  }

  async embed(texts: string[]): Promise<Result<number[][], EmbeddingFailure>> {
    this.calls.push(texts);
    if (this.failure) {
      return err(this.failure);
    }
    return ok(texts.map((text) => this.vectorFor(text)));
  }
}
