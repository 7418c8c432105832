import {
  DEFAULT_GENERATION_CONFIG,
  type GeminiGenerationConfig,
  generateWithGeminiModel,
} from "@/lib/ai/providers/gemini";
import { type Result, err, ok } from "@/lib/result";

export type GenerationErrorCode =
  | "missing_api_key"
  | "timeout"
  | "request_failed"
  | "empty_response"
  | "unknown_provider_error";

export type GenerationFailure = {
  code: GenerationErrorCode;
  message: string;
};

export type GenerationRequest = {
  prompt: string;
  historyContext: string;
  groundingContext: string;
};

/** Single-shot text generation. Implementations never retry. */
export interface GenerationCapability {
  readonly model: string;
  generate(request: GenerationRequest): Promise<Result<string, GenerationFailure>>;
}

export type GeminiGenerationOptions = {
  apiKey?: string;
  model: string;
  timeoutMs: number;
  generationConfig?: GeminiGenerationConfig;
};

export function classifyProviderError(error: unknown): GenerationErrorCode {
  if (typeof error === "object" && error !== null && "code" in error) {
    const code = String(error.code ?? "");
    if (
      code === "missing_api_key" ||
      code === "timeout" ||
      code === "request_failed" ||
      code === "empty_response"
    ) {
      return code;
    }
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    if (error.name === "AbortError" || error.name === "TimeoutError" || message.includes("timed out")) {
      return "timeout";
    }
    if (message.includes("missing") && message.includes("api")) {
      return "missing_api_key";
    }
    if (message.includes("empty response")) {
      return "empty_response";
    }
    if (message.includes("request failed") || message.includes("status") || message.includes("fetch failed")) {
      return "request_failed";
    }
  }

  return "unknown_provider_error";
}

export function createGeminiGeneration(options: GeminiGenerationOptions): GenerationCapability {
  const generationConfig = options.generationConfig ?? DEFAULT_GENERATION_CONFIG;

  return {
    model: options.model,
    async generate(request) {
      try {
        const text = await generateWithGeminiModel(
          request.prompt,
          { apiKey: options.apiKey, modelName: options.model, timeoutMs: options.timeoutMs },
          generationConfig,
        );
        return ok(text);
      } catch (error) {
        return err({
          code: classifyProviderError(error),
          message: error instanceof Error ? error.message : "Unknown provider error",
        });
      }
    },
  };
}
