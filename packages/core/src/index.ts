import * as openaiAdapter from "./adapters/openai.js";

export type {
  AIMessage, ContentBlock, HumanMessage, Message, MessageContent, MessageLike, MessageType, Metadata,
  StructuredBlock, SystemMessage, ToolCall, ToolMessage,
} from "./messages.js";
export { MESSAGE_TYPES, MessageSchema, ai, concatMessages, human, isMessageType, normalizeMessage, system, tool } from "./messages.js";
export { isMergeable, mergeContent, mergeMessageRuns, mergeMetadata } from "./merge.js";
export { stage } from "./pipeline.js";
export type { PipelineStage } from "./pipeline.js";
export { coerceMessage, coerceMessages } from "./convert.js";
export { messageFromDict, messageToDict, messagesFromDict, messagesToDict } from "./serialize.js";
export type { MessageDict } from "./serialize.js";
export { getBufferString } from "./buffer.js";
export type { BufferOptions } from "./buffer.js";
export { MessageSession } from "./history.js";
export type { ChatHistoryStore } from "./history.js";
export { InvalidInputError } from "./errors.js";
export { loadConfig, LOG_LEVELS } from "./config.js";
export type { Config, LogLevel } from "./config.js";
export { createLogger } from "./logger.js";
export type { OpenAIMessage, OpenAIToolCall, OpenAIContentPart } from "./adapters/openai.js";

export const adapters = { openai: openaiAdapter } as const;
