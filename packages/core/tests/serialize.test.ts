import { describe, it, expect } from "vitest";
import { messageToDict, messagesFromDict, messagesToDict } from "../src/serialize.js";
import { ai, human, system, tool } from "../src/messages.js";
import { InvalidInputError } from "../src/errors.js";

describe("dict serialization", () => {
  it("splits the type from the data", () => {
    expect(messageToDict(human("human", { metadata: { key: "value" }, name: "human erick" }))).toEqual({
      type: "human",
      data: { content: "human", metadata: { key: "value" }, name: "human erick" },
    });
  });

  it("reads back what it wrote", () => {
    const msgs = [
      human("human", { metadata: { key: "value" } }),
      ai("ai", { name: "ai erick" }),
      system("sys"),
      ai("", { toolCalls: [{ name: "a", args: { b: 1 } }] }),
      tool("done", "call_1"),
    ];
    expect(messagesFromDict(messagesToDict(msgs))).toEqual(msgs);
  });

  it("survives JSON", () => {
    const msgs = [human(["a", { type: "text", text: "b" }]), ai("c")];
    expect(messagesFromDict(JSON.parse(JSON.stringify(messagesToDict(msgs))))).toEqual(msgs);
  });

  it("rejects unknown types and missing data", () => {
    expect(() => messagesFromDict([{ type: "human", data: { content: "x" } }, { type: "robot", data: {} }])).toThrow(/^Invalid message at index 1: type: /);
    expect(() => messagesFromDict([{ type: "human" }])).toThrow(InvalidInputError);
  });
});
