import type { GenerationRequest } from "@/lib/ai/generation";
import type { ConversationTurn } from "@/lib/firestore/conversation-memory";
import type { KnowledgeEntry } from "@/lib/knowledge/types";
import { NO_GROUNDING_MARKER, NO_HISTORY_MARKER } from "@/lib/study/constants";

export type EducationalPromptInput = {
  question: string;
  grade: number;
  history: ConversationTurn[];
  grounding: KnowledgeEntry[];
};

export function gradeOrdinal(grade: number): string {
  const lastTwo = grade % 100;
  if (lastTwo >= 11 && lastTwo <= 13) {
    return `${grade}th`;
  }
  switch (grade % 10) {
    case 1:
      return `${grade}st`;
    case 2:
      return `${grade}nd`;
    case 3:
      return `${grade}rd`;
    default:
      return `${grade}th`;
  }
}

export function formatHistory(turns: ConversationTurn[]): string {
  return turns.map((turn) => `${turn.role}: ${turn.text}`).join("\n");
}

export function formatGrounding(entries: KnowledgeEntry[]): string {
  return entries.map((entry) => `Chapter: ${entry.chapterName} - ${entry.content}`).join("\n\n");
}

export function buildEducationalPrompt(input: EducationalPromptInput): GenerationRequest {
  const level = `${gradeOrdinal(input.grade)} grade`;
  const historyContext = formatHistory(input.history);
  const groundingContext = input.grounding.length ? formatGrounding(input.grounding) : NO_GROUNDING_MARKER;

  const prompt = [
    `You are a helpful educational assistant for a ${level} student.`,
    "",
    "Here is the current conversation history:",
    historyContext || NO_HISTORY_MARKER,
    "",
    `Here is some relevant knowledge base information for ${level}:`,
    groundingContext,
    "",
    `Based on the conversation history and the provided knowledge, please answer the user's question: "${input.question}"`,
    "",
    `Please provide a comprehensive and age-appropriate answer for a ${level} student. If the knowledge base doesn't contain specific information, use your general knowledge to provide a helpful educational response.`,
  ].join("\n");

  return { prompt, historyContext, groundingContext };
}
