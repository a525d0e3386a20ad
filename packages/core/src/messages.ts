import { z } from "zod";
import { InvalidInputError } from "./errors.js";

export const MESSAGE_TYPES = ["system", "human", "ai", "tool"] as const;

export const MessageTypeSchema = z.enum(MESSAGE_TYPES);

export const StructuredBlockSchema = z.object({ type: z.string() }).passthrough();

export const ContentBlockSchema = z.union([z.string(), StructuredBlockSchema]);

export const MessageContentSchema = z.union([z.string(), z.array(ContentBlockSchema)]);

export const MetadataSchema = z.record(z.unknown());

export const ToolCallSchema = z.object({
  id: z.string().optional(),
  name: z.string(),
  args: z.record(z.unknown()),
});

const base = {
  content: MessageContentSchema,
  metadata: MetadataSchema.default({}),
  name: z.string().optional(),
  id: z.string().optional(),
};

export const SystemMessageSchema = z.object({ type: z.literal("system"), ...base });
export const HumanMessageSchema = z.object({ type: z.literal("human"), ...base });
export const AIMessageSchema = z.object({ type: z.literal("ai"), ...base, toolCalls: z.array(ToolCallSchema).default([]) });
export const ToolMessageSchema = z.object({ type: z.literal("tool"), ...base, toolCallId: z.string().optional() });

export const MessageSchema = z.discriminatedUnion("type", [SystemMessageSchema, HumanMessageSchema, AIMessageSchema, ToolMessageSchema]);

export type MessageType = z.infer<typeof MessageTypeSchema>;
export type StructuredBlock = z.infer<typeof StructuredBlockSchema>;
export type ContentBlock = z.infer<typeof ContentBlockSchema>;
export type MessageContent = z.infer<typeof MessageContentSchema>;
export type Metadata = z.infer<typeof MetadataSchema>;
export type ToolCall = z.infer<typeof ToolCallSchema>;

export type SystemMessage = z.infer<typeof SystemMessageSchema>;
export type HumanMessage = z.infer<typeof HumanMessageSchema>;
export type AIMessage = z.infer<typeof AIMessageSchema>;
export type ToolMessage = z.infer<typeof ToolMessageSchema>;
export type Message = z.infer<typeof MessageSchema>;

/** Anything {@link normalizeMessage} accepts: a message whose defaulted fields may be left out. */
export type MessageLike = z.input<typeof MessageSchema>;

type Fields = { metadata?: Metadata; name?: string; id?: string };

/**
 * Validates one message-like value and returns a fresh, normalized copy.
 * `index` is only used to locate the element in the error.
 */
export function normalizeMessage(value: unknown, index?: number): Message {
  const parsed = MessageSchema.safeParse(value);
  if (!parsed.success) throw InvalidInputError.fromZod(parsed.error, index);
  return parsed.data;
}

export function isMessageType(value: unknown): value is MessageType {
  return MessageTypeSchema.safeParse(value).success;
}

function fieldsOf({ metadata, name, id }: Fields) {
  return { metadata: metadata ?? {}, ...(name !== undefined && { name }), ...(id !== undefined && { id }) };
}

export function system(content: MessageContent, fields: Fields = {}): SystemMessage {
  return { type: "system", content, ...fieldsOf(fields) };
}

export function human(content: MessageContent, fields: Fields = {}): HumanMessage {
  return { type: "human", content, ...fieldsOf(fields) };
}

export function ai(content: MessageContent, fields: Fields & { toolCalls?: ToolCall[] } = {}): AIMessage {
  return { type: "ai", content, ...fieldsOf(fields), toolCalls: fields.toolCalls ?? [] };
}

export function tool(content: MessageContent, toolCallId?: string, fields: Fields = {}): ToolMessage {
  return { type: "tool", content, ...fieldsOf(fields), ...(toolCallId !== undefined && { toolCallId }) };
}

/** Builds one list out of single messages and message lists, in argument order. */
export function concatMessages(...parts: Array<Message | readonly Message[]>): Message[] {
  const out: Message[] = [];
  for (const p of parts) {
    if (isList(p)) out.push(...p);
    else out.push(p);
  }
  return out;
}

function isList<T>(value: T | readonly T[]): value is readonly T[] {
  return Array.isArray(value);
}
