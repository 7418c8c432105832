const GEMINI_API_BASE = "https://generativelanguage.googleapis.com/v1beta/models";
const EMBED_BATCH_SIZE = 100;

export type GeminiErrorCode = "missing_api_key" | "timeout" | "request_failed" | "empty_response";

export type GeminiError = Error & { code: GeminiErrorCode };

export type GeminiGenerationConfig = {
  temperature: number;
  topK: number;
  topP: number;
  maxOutputTokens: number;
};

export const DEFAULT_GENERATION_CONFIG: GeminiGenerationConfig = {
  temperature: 0.7,
  topK: 40,
  topP: 0.95,
  maxOutputTokens: 1024,
};

export type GeminiRequestOptions = {
  apiKey?: string;
  modelName: string;
  timeoutMs?: number;
};

function createGeminiError(code: GeminiErrorCode, message: string): GeminiError {
  const error = new Error(message) as GeminiError;
  error.name = "GeminiProviderError";
  error.code = code;
  return error;
}

export function isGeminiError(error: unknown): error is GeminiError {
  return error instanceof Error && error.name === "GeminiProviderError" && "code" in error;
}

function requireApiKey(apiKey: string | undefined): string {
  if (!apiKey) {
    throw createGeminiError("missing_api_key", "Missing GEMINI_API_KEY");
  }
  return apiKey;
}

async function postJson(url: string, body: unknown, timeoutMs?: number): Promise<unknown> {
  const controller = new AbortController();
  const timer = timeoutMs ? setTimeout(() => controller.abort(), timeoutMs) : undefined;

  try {
    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
      signal: controller.signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw createGeminiError("request_failed", `Gemini request failed: ${response.status} ${errorText}`);
    }

    return (await response.json()) as unknown;
  } catch (error) {
    if (controller.signal.aborted) {
      throw createGeminiError("timeout", `Gemini request timed out after ${timeoutMs}ms`);
    }
    if (isGeminiError(error)) {
      throw error;
    }
    throw createGeminiError(
      "request_failed",
      `Gemini request failed: ${error instanceof Error ? error.message : "network error"}`,
    );
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}

function extractGeminiText(payload: unknown): string {
  if (!payload || typeof payload !== "object") {
    return "";
  }

  const data = payload as {
    candidates?: Array<{
      content?: {
        parts?: Array<{ text?: string }>;
      };
    }>;
  };

  return data.candidates?.[0]?.content?.parts?.map((part) => part.text ?? "").join("\n") ?? "";
}

export async function generateWithGeminiModel(
  prompt: string,
  options: GeminiRequestOptions,
  generationConfig: GeminiGenerationConfig = DEFAULT_GENERATION_CONFIG,
): Promise<string> {
  const apiKey = requireApiKey(options.apiKey);

  const payload = await postJson(
    `${GEMINI_API_BASE}/${options.modelName}:generateContent?key=${apiKey}`,
    {
      contents: [{ role: "user", parts: [{ text: prompt }] }],
      generationConfig,
    },
    options.timeoutMs,
  );

  const text = extractGeminiText(payload);
  if (!text.trim()) {
    throw createGeminiError("empty_response", "Gemini returned empty response");
  }

  return text;
}

function extractEmbeddings(payload: unknown, expected: number): number[][] {
  const data = (payload ?? {}) as {
    embeddings?: Array<{ values?: unknown }>;
  };

  const vectors = (data.embeddings ?? []).map((item) =>
    Array.isArray(item.values) ? item.values.filter((value): value is number => typeof value === "number") : [],
  );

  if (vectors.length !== expected || vectors.some((vector) => !vector.length)) {
    throw createGeminiError(
      "empty_response",
      `Gemini returned ${vectors.length} embeddings for ${expected} inputs`,
    );
  }

  return vectors;
}

/**
 * Embeds texts with `batchEmbedContents`, preserving input order across
 * batches.
 */
export async function embedWithGeminiModel(texts: string[], options: GeminiRequestOptions): Promise<number[][]> {
  const apiKey = requireApiKey(options.apiKey);
  const vectors: number[][] = [];

  for (let index = 0; index < texts.length; index += EMBED_BATCH_SIZE) {
    const batch = texts.slice(index, index + EMBED_BATCH_SIZE);
    const payload = await postJson(
      `${GEMINI_API_BASE}/${options.modelName}:batchEmbedContents?key=${apiKey}`,
      {
        requests: batch.map((text) => ({
          model: `models/${options.modelName}`,
          content: { parts: [{ text }] },
        })),
      },
      options.timeoutMs,
    );
    vectors.push(...extractEmbeddings(payload, batch.length));
  }

  return vectors;
}
