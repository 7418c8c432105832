import { z } from "zod";

import type { DocumentStore } from "@/lib/firestore/document-store";
import { type Result, err, errorMessage, ok } from "@/lib/result";

export type ConversationRole = "user" | "model";

export type ConversationTurn = {
  readonly role: ConversationRole;
  readonly text: string;
  readonly timestamp: number;
  readonly grade: number;
};

export type NewConversationTurn = Omit<ConversationTurn, "timestamp">;

export type PersistenceFailure = {
  code: "not_configured" | "write_failed";
  message: string;
};

export type ConversationMemoryOptions = {
  /** `null` runs the memory stateless: nothing is loaded or saved. */
  store: DocumentStore | null;
  appId: string;
  now?: () => number;
};

const storedTurnSchema = z.object({
  role: z.enum(["user", "model"]),
  text: z.string(),
  timestamp: z.number(),
  grade: z.number().int().catch(0),
});

export function conversationCollectionPath(appId: string, userId: string): string {
  return `artifacts/${appId}/users/${userId}/conversation_memory`;
}

/**
 * Per-user conversation history. Reads and writes degrade instead of
 * failing: history is optional context for an answer, never a reason to
 * withhold one.
 *
 * Turns from two concurrent requests for the same user may interleave; there
 * is no cross-request lock.
 */
export class ConversationMemory {
  private readonly store: DocumentStore | null;
  private readonly appId: string;
  private readonly now: () => number;
  private lastTimestamp = 0;

  constructor(options: ConversationMemoryOptions) {
    this.store = options.store;
    this.appId = options.appId;
    this.now = options.now ?? Date.now;
  }

  get persistent(): boolean {
    return this.store !== null;
  }

  private nextTimestamp(): number {
    this.lastTimestamp = Math.max(this.now(), this.lastTimestamp + 1);
    return this.lastTimestamp;
  }

  /** Up to `limit` most recent turns, oldest first. */
  async loadRecent(userId: string, limit: number): Promise<ConversationTurn[]> {
    if (!this.store || limit <= 0) {
      return [];
    }

    try {
      const documents = await this.store.query(conversationCollectionPath(this.appId, userId), {
        orderBy: { field: "timestamp", direction: "desc" },
        limit,
      });

      const turns: ConversationTurn[] = [];
      for (const document of documents) {
        const parsed = storedTurnSchema.safeParse(document.data);
        if (parsed.success) {
          turns.push(parsed.data);
        }
      }

      return turns.reverse();
    } catch (error) {
      console.warn("[conversation-memory] unable to load history, continuing without it", {
        userId,
        message: errorMessage(error),
      });
      return [];
    }
  }

  async append(userId: string, turn: NewConversationTurn): Promise<Result<string, PersistenceFailure>> {
    if (!this.store) {
      return err({ code: "not_configured", message: "Conversation store not configured" });
    }

    const record: ConversationTurn = { ...turn, timestamp: this.nextTimestamp() };

    try {
      const id = await this.store.add(conversationCollectionPath(this.appId, userId), { ...record });
      return ok(id);
    } catch (error) {
      const message = errorMessage(error);
      console.warn("[conversation-memory] unable to save turn", { userId, role: turn.role, message });
      return err({ code: "write_failed", message });
    }
  }
}
