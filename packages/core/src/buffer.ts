import type { Message, MessageContent } from "./messages.js";

export interface BufferOptions {
  humanPrefix?: string;
  aiPrefix?: string;
}

function textOf(content: MessageContent): string {
  if (typeof content === "string") return content;
  const parts: string[] = [];
  for (const b of content) {
    if (typeof b === "string") parts.push(b);
    else if (b.type === "text" && typeof b.text === "string") parts.push(b.text);
  }
  return parts.join("\n");
}

/** Renders messages as a plain transcript, one `Prefix: text` line per message. */
export function getBufferString(messages: readonly Message[], { humanPrefix = "Human", aiPrefix = "AI" }: BufferOptions = {}): string {
  const prefixes = { system: "System", human: humanPrefix, ai: aiPrefix, tool: "Tool" };
  return messages.map(m => `${prefixes[m.type]}: ${textOf(m.content)}`).join("\n");
}
