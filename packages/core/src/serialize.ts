import { z } from "zod";
import { InvalidInputError } from "./errors.js";
import { MessageTypeSchema, normalizeMessage } from "./messages.js";
import type { Message, MessageType } from "./messages.js";

export interface MessageDict {
  type: MessageType;
  data: Omit<Message, "type">;
}

const MessageDictSchema = z.object({ type: MessageTypeSchema, data: z.record(z.unknown()) });

export function messageToDict(message: Message): MessageDict {
  const { type, ...data } = message;
  return { type, data };
}

export function messagesToDict(messages: readonly Message[]): MessageDict[] {
  return messages.map(messageToDict);
}

export function messageFromDict(value: unknown, index?: number): Message {
  const parsed = MessageDictSchema.safeParse(value);
  if (!parsed.success) throw InvalidInputError.fromZod(parsed.error, index);
  return normalizeMessage({ ...parsed.data.data, type: parsed.data.type }, index);
}

export function messagesFromDict(values: readonly unknown[]): Message[] {
  return values.map((v, i) => messageFromDict(v, i));
}
