import type { Message, MessageLike } from "./messages.js";
import { normalizeMessage } from "./messages.js";
import { mergeMessageRuns } from "./merge.js";

/**
 * Keyed, append-only message log kept by some external service (a database
 * table, a cache). Only the boundary is defined here.
 */
export interface ChatHistoryStore {
  append(sessionId: string, message: Message): Promise<void>;
  list(sessionId: string): Promise<Message[]>;
  clear(sessionId: string): Promise<void>;
}

/** In-memory buffer for one conversation, with helpers to sync it against a {@link ChatHistoryStore}. */
export class MessageSession {
  private buffer: Message[] = [];

  add(...messages: MessageLike[]): void {
    this.buffer.push(...messages.map((m, i) => normalizeMessage(m, i)));
  }
  messages(): Message[] { return [...this.buffer]; }
  merged(): Message[] { return mergeMessageRuns(this.buffer); }
  clear(): void { this.buffer = []; }
  get length(): number { return this.buffer.length; }

  async load(store: ChatHistoryStore, sessionId: string): Promise<void> {
    const stored = await store.list(sessionId);
    this.buffer = stored.map((m, i) => normalizeMessage(m, i));
  }

  /**
   * Appends the buffered messages to the store in order. Each message leaves
   * the buffer once its append resolves, so a retry after a failure resumes
   * with the first unwritten message.
   */
  async flush(store: ChatHistoryStore, sessionId: string): Promise<number> {
    let written = 0;
    for (let next = this.buffer[0]; next !== undefined; next = this.buffer[0]) {
      await store.append(sessionId, next);
      if (this.buffer[0] === next) this.buffer.shift();
      written++;
    }
    return written;
  }
}
