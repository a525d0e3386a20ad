import { describe, it, expect } from "vitest";
import { MessageSession, type ChatHistoryStore } from "../src/history.js";
import { ai, human, type Message, type MessageLike } from "../src/messages.js";

class FakeStore implements ChatHistoryStore {
  readonly sessions = new Map<string, Message[]>();
  failAfter = Infinity;
  failures = 0;
  async append(sessionId: string, message: Message): Promise<void> {
    const log = this.sessions.get(sessionId) ?? [];
    if (log.length >= this.failAfter && this.failures > 0) {
      this.failures--;
      throw new Error("store unavailable");
    }
    this.sessions.set(sessionId, [...log, message]);
  }
  async list(sessionId: string): Promise<Message[]> { return [...(this.sessions.get(sessionId) ?? [])]; }
  async clear(sessionId: string): Promise<void> { this.sessions.delete(sessionId); }
}

describe("MessageSession", () => {
  it("buffers, merges and clears", () => {
    const s = new MessageSession();
    s.add(human("a"), human("b"));
    s.add(ai("c"));
    expect(s.length).toBe(3);
    expect(s.merged()).toEqual([human("a\nb"), ai("c")]);
    expect(s.messages()).toHaveLength(3);
    s.clear();
    expect(s.length).toBe(0);
  });

  it("rejects a bad message without adding any of the batch", () => {
    const s = new MessageSession();
    const bad: MessageLike = JSON.parse('{"type":"robot","content":"x"}');
    expect(() => s.add(human("ok"), bad)).toThrow(/^Invalid message at index 1: type: /);
    expect(s.length).toBe(0);
  });

  it("flushes to a store and loads back", async () => {
    const store = new FakeStore();
    const s = new MessageSession();
    s.add(human("a"), human("b"), ai("c"));
    expect(await s.flush(store, "s1")).toBe(3);
    expect(s.length).toBe(0);

    const t = new MessageSession();
    await t.load(store, "s1");
    expect(t.merged()).toEqual([human("a\nb"), ai("c")]);
    await store.clear("s1");
    expect(await store.list("s1")).toEqual([]);
  });

  it("keeps only unwritten messages when the store fails, so a retry does not duplicate", async () => {
    const store = new FakeStore();
    store.failAfter = 1;
    store.failures = 1;
    const s = new MessageSession();
    s.add(human("a"), human("b"));
    await expect(s.flush(store, "s1")).rejects.toThrow("store unavailable");
    expect(s.messages()).toEqual([human("b")]);
    expect(await store.list("s1")).toEqual([human("a")]);

    expect(await s.flush(store, "s1")).toBe(1);
    expect(s.length).toBe(0);
    expect((await store.list("s1")).map(m => m.content)).toEqual(["a", "b"]);
  });
});
