export type EngineErrorCode =
  | "invalid_configuration"
  | "invalid_catalog"
  | "embedding_unavailable"
  | "invalid_query";

class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string) {
    super(message);
    this.code = code;
  }
}

export class ConfigurationError extends EngineError {
  constructor(message: string) {
    super("invalid_configuration", message);
    this.name = "ConfigurationError";
  }
}

export class KnowledgeCatalogError extends EngineError {
  constructor(message: string) {
    super("invalid_catalog", message);
    this.name = "KnowledgeCatalogError";
  }
}

/**
 * Raised while loading the knowledge store when catalog embeddings cannot be
 * produced. Startup must stop: retrieval without vectors is meaningless.
 */
export class EmbeddingUnavailableError extends EngineError {
  constructor(message: string) {
    super("embedding_unavailable", message);
    this.name = "EmbeddingUnavailableError";
  }
}

export class InvalidQueryError extends EngineError {
  readonly field: "question" | "userId" | "grade";

  constructor(field: InvalidQueryError["field"], message: string) {
    super("invalid_query", message);
    this.name = "InvalidQueryError";
    this.field = field;
  }
}
