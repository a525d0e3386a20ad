import type { ContentBlock, Message, ToolCall } from "../messages.js";
import { ai, human, system, tool } from "../messages.js";
import { createLogger } from "../logger.js";

const log = createLogger("openai");

export interface OpenAIToolCall { id: string; type: "function"; function: { name: string; arguments: string }; }
export type OpenAIContentPart = { type: string; [key: string]: unknown };
export interface OpenAIMessage {
  role: "system" | "user" | "assistant" | "tool" | "function";
  content?: string | OpenAIContentPart[] | null;
  name?: string;
  function_call?: { name: string; arguments: string };
  tool_calls?: OpenAIToolCall[];
  tool_call_id?: string;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function safeArgs(s: string): Record<string, unknown> {
  try {
    const v: unknown = JSON.parse(s);
    if (isRecord(v)) return v;
  } catch (err) {
    log.warn(`tool arguments are not JSON (${String(err)}), keeping them raw`);
    return { _raw: s };
  }
  log.warn("tool arguments are not a JSON object, keeping them raw");
  return { _raw: s };
}

const named = (m: OpenAIMessage) => (m.name !== undefined ? { name: m.name } : {});

const functionCallId = () => `fc_${Date.now()}_${Math.random().toString(36).slice(2, 8)}`;

export function ingest(messages: OpenAIMessage[]): Message[] {
  const out: Message[] = [];
  // legacy function_call has no id; the next `function` reply with the same name answers it
  const pendingFunctions = new Map<string, string>();
  for (const m of messages) {
    const content = m.content ?? "";
    if (m.role === "system") { out.push(system(content, named(m))); continue; }
    if (m.role === "user") { out.push(human(content, named(m))); continue; }
    if (m.role === "assistant") {
      const toolCalls: ToolCall[] = [];
      if (m.tool_calls) for (const tc of m.tool_calls) toolCalls.push({ id: tc.id, name: tc.function.name, args: safeArgs(tc.function.arguments) });
      if (m.function_call) {
        const id = functionCallId();
        pendingFunctions.set(m.function_call.name, id);
        toolCalls.push({ id, name: m.function_call.name, args: safeArgs(m.function_call.arguments) });
      }
      out.push(ai(content, { ...named(m), toolCalls }));
      continue;
    }
    if (m.role === "tool") { out.push(tool(content, m.tool_call_id)); continue; }
    if (m.role === "function") {
      const name = m.name ?? "unknown";
      out.push(tool(content, pendingFunctions.get(name) ?? name, named(m)));
      pendingFunctions.delete(name);
    }
  }
  return out;
}

function emitContent(content: string | ContentBlock[]): string | OpenAIContentPart[] {
  if (typeof content === "string") return content;
  return content.map(b => (typeof b === "string" ? { type: "text", text: b } : b));
}

/**
 * Calls without an id get `call_<n>`, numbered across the whole output. A tool
 * message without a `toolCallId` answers the oldest call still unanswered.
 */
export function emit(messages: Message[]): OpenAIMessage[] {
  let generated = 0;
  const unanswered: string[] = [];
  return messages.map((m): OpenAIMessage => {
    const o: OpenAIMessage = { role: "user", content: emitContent(m.content), ...(m.name !== undefined && { name: m.name }) };
    switch (m.type) {
      case "system": return { ...o, role: "system" };
      case "human": return o;
      case "tool": {
        const id = m.toolCallId ?? unanswered.at(0);
        const at = id === undefined ? -1 : unanswered.indexOf(id);
        if (at >= 0) unanswered.splice(at, 1);
        return { ...o, role: "tool", ...(id !== undefined && { tool_call_id: id }) };
      }
      case "ai": {
        const a: OpenAIMessage = { ...o, role: "assistant", content: m.content === "" && m.toolCalls.length ? null : o.content };
        if (m.toolCalls.length) {
          a.tool_calls = m.toolCalls.map(tc => ({ id: tc.id ?? `call_${generated++}`, type: "function" as const, function: { name: tc.name, arguments: JSON.stringify(tc.args) } }));
          unanswered.push(...a.tool_calls.map(tc => tc.id));
        }
        return a;
      }
    }
  });
}
