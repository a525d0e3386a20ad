import type { ContentBlock, Message, MessageContent, MessageLike, Metadata } from "./messages.js";
import { normalizeMessage } from "./messages.js";
import { stage, type PipelineStage } from "./pipeline.js";
import { createLogger } from "./logger.js";

const log = createLogger("merge");

/** Two messages belong to the same run when type and name match. */
export function isMergeable(a: Message, b: Message): boolean {
  return a.type === b.type && a.name === b.name;
}

function toBlocks(content: MessageContent): ContentBlock[] {
  return typeof content === "string" ? [content] : content;
}

export function mergeContent(a: MessageContent, b: MessageContent): MessageContent {
  if (typeof a === "string" && typeof b === "string") return a + "\n" + b;
  return [...toBlocks(a), ...toBlocks(b)];
}

/** Shallow merge: numbers add up, arrays concatenate, anything else is taken from `b`. */
export function mergeMetadata(a: Metadata, b: Metadata): Metadata {
  const out: Metadata = { ...a };
  for (const [k, bv] of Object.entries(b)) {
    const av = out[k];
    if (!Object.prototype.hasOwnProperty.call(out, k)) out[k] = bv;
    else if (typeof av === "number" && typeof bv === "number") out[k] = av + bv;
    else if (Array.isArray(av) && Array.isArray(bv)) out[k] = [...av, ...bv];
    else out[k] = bv;
  }
  return out;
}

function combine(a: Message, b: Message): Message {
  const content = mergeContent(a.content, b.content);
  const metadata = mergeMetadata(a.metadata, b.metadata);
  if (a.type === "ai" && b.type === "ai") return { ...a, content, metadata, toolCalls: [...a.toolCalls, ...b.toolCalls] };
  return { ...a, content, metadata };
}

function run(messages: readonly MessageLike[]): Message[] {
  const out: Message[] = [];
  let acc: Message | undefined;
  for (let i = 0; i < messages.length; i++) {
    const m = normalizeMessage(messages[i], i);
    if (!acc) acc = m;
    else if (isMergeable(acc, m)) acc = combine(acc, m);
    else { out.push(acc); acc = m; }
  }
  if (acc) out.push(acc);
  log.debug(`merged ${messages.length} messages into ${out.length}`);
  return out;
}

/**
 * Collapses each run of adjacent messages with the same type and name into
 * one message. String contents are joined with a newline; as soon as either
 * side holds content blocks, the blocks are concatenated as they are.
 *
 * Called without arguments it returns the same operation as a pipeline stage.
 *
 * @throws InvalidInputError at the first element that is not a valid message.
 */
export function mergeMessageRuns(): PipelineStage<readonly MessageLike[], Message[]>;
export function mergeMessageRuns(messages: readonly MessageLike[]): Message[];
export function mergeMessageRuns(messages?: readonly MessageLike[]): Message[] | PipelineStage<readonly MessageLike[], Message[]> {
  if (messages === undefined) return stage(run, "mergeMessageRuns");
  return run(messages);
}
