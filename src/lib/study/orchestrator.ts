import type { GenerationCapability, GenerationErrorCode } from "@/lib/ai/generation";
import { InvalidQueryError } from "@/lib/errors";
import type { ConversationMemory } from "@/lib/firestore/conversation-memory";
import type { KnowledgeEntry, SubjectLabel } from "@/lib/knowledge/types";
import { errorMessage } from "@/lib/result";
import { GENERATION_APOLOGY, INTERNAL_ERROR_MESSAGE, TIMEOUT_APOLOGY } from "@/lib/study/constants";
import { buildEducationalPrompt } from "@/lib/study/prompt";
import type { Retriever } from "@/lib/study/retriever";
import { inferSubject } from "@/lib/study/subject-inference";

export const MIN_GRADE = 1;
export const MAX_GRADE = 12;

export type AnswerOutcome =
  | {
      kind: "answered";
      text: string;
      subject: SubjectLabel;
      grounding: KnowledgeEntry[];
      persisted: boolean;
    }
  | { kind: "generation_failed"; text: string; code: GenerationErrorCode }
  | { kind: "invalid_input"; field: InvalidQueryError["field"]; message: string }
  | { kind: "internal_error"; message: string };

export type QueryOrchestratorOptions = {
  retriever: Retriever;
  memory: ConversationMemory;
  generation: GenerationCapability;
  topK?: number;
  historyLimit?: number;
  promptHistoryTurns?: number;
};

export function validateQuery(question: string, userId: string, grade: number): InvalidQueryError | null {
  if (typeof question !== "string" || !question.trim()) {
    return new InvalidQueryError("question", "Please enter a question.");
  }
  if (typeof userId !== "string" || !userId.trim()) {
    return new InvalidQueryError("userId", "A user id is required.");
  }
  if (!Number.isInteger(grade) || grade < MIN_GRADE || grade > MAX_GRADE) {
    return new InvalidQueryError("grade", `Grade must be a whole number between ${MIN_GRADE} and ${MAX_GRADE}.`);
  }
  return null;
}

function apologyFor(code: GenerationErrorCode): string {
  return code === "timeout" ? TIMEOUT_APOLOGY : GENERATION_APOLOGY;
}

/**
 * Answers one educational question: subject inference, grounding retrieval,
 * recent history, a single generation call, then the user and model turns
 * are saved. The generation call is made at most once per question.
 */
export class QueryOrchestrator {
  private readonly retriever: Retriever;
  private readonly memory: ConversationMemory;
  private readonly generation: GenerationCapability;
  private readonly topK: number;
  private readonly historyLimit: number;
  private readonly promptHistoryTurns: number;

  constructor(options: QueryOrchestratorOptions) {
    this.retriever = options.retriever;
    this.memory = options.memory;
    this.generation = options.generation;
    this.topK = options.topK ?? 3;
    this.historyLimit = options.historyLimit ?? 10;
    this.promptHistoryTurns = options.promptHistoryTurns ?? 5;
  }

  async answer(question: string, userId: string, grade: number): Promise<AnswerOutcome> {
    const invalid = validateQuery(question, userId, grade);
    if (invalid) {
      return { kind: "invalid_input", field: invalid.field, message: invalid.message };
    }

    try {
      const subject = inferSubject(question);
      const grounding = await this.retriever.retrieve(question, grade, subject, this.topK);
      const history = await this.memory.loadRecent(userId, this.historyLimit);

      const request = buildEducationalPrompt({
        question,
        grade,
        history: this.promptHistoryTurns > 0 ? history.slice(-this.promptHistoryTurns) : [],
        grounding,
      });

      const generated = await this.generation.generate(request);
      if (!generated.ok) {
        const log = generated.error.code === "timeout" ? console.warn : console.error;
        log("[orchestrator] generation failed", {
          userId,
          model: this.generation.model,
          code: generated.error.code,
          message: generated.error.message,
        });
        return { kind: "generation_failed", text: apologyFor(generated.error.code), code: generated.error.code };
      }

      const savedQuestion = await this.memory.append(userId, { role: "user", text: question, grade });
      const savedAnswer = await this.memory.append(userId, { role: "model", text: generated.value, grade });

      console.info("[orchestrator] answered", {
        userId,
        grade,
        subject,
        groundingEntries: grounding.length,
        historyTurns: history.length,
      });

      return {
        kind: "answered",
        text: generated.value,
        subject,
        grounding,
        persisted: savedQuestion.ok && savedAnswer.ok,
      };
    } catch (error) {
      console.error("[orchestrator] unexpected failure", {
        userId,
        grade,
        message: errorMessage(error),
      });
      return { kind: "internal_error", message: INTERNAL_ERROR_MESSAGE };
    }
  }

  /** Always resolves to text for the user; never rejects. */
  async processEducationalQuery(question: string, userId: string, grade: number): Promise<string> {
    const outcome = await this.answer(question, userId, grade);
    switch (outcome.kind) {
      case "answered":
      case "generation_failed":
        return outcome.text;
      case "invalid_input":
      case "internal_error":
        return outcome.message;
    }
  }
}
