import { z } from "zod";
import { InvalidInputError } from "./errors.js";
import { ai, human, MessageContentSchema, normalizeMessage, system, tool, ToolCallSchema } from "./messages.js";
import type { Message, MessageContent, MessageType } from "./messages.js";

const ROLES = { system: "system", user: "human", human: "human", assistant: "ai", ai: "ai", tool: "tool" } as const satisfies Record<string, MessageType>;

const RoleSchema = z.enum(["system", "user", "human", "assistant", "ai", "tool"]).transform(r => ROLES[r]);

const RoleDictSchema = z.object({
  role: RoleSchema,
  content: MessageContentSchema,
  name: z.string().optional(),
  id: z.string().optional(),
  tool_calls: z.array(ToolCallSchema).optional(),
  tool_call_id: z.string().optional(),
});

const TupleSchema = z.tuple([RoleSchema, MessageContentSchema]);

type Extras = Omit<z.infer<typeof RoleDictSchema>, "role" | "content">;

function build(type: MessageType, content: MessageContent, extras: Extras): Message {
  const fields = { name: extras.name, id: extras.id };
  switch (type) {
    case "system": return system(content, fields);
    case "human": return human(content, fields);
    case "ai": return ai(content, { ...fields, toolCalls: extras.tool_calls });
    case "tool": return tool(content, extras.tool_call_id, fields);
  }
}

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, index?: number): T {
  const r = schema.safeParse(value);
  if (!r.success) throw InvalidInputError.fromZod(r.error, index);
  return r.data;
}

/**
 * Turns a loose message-like value into a message. Accepted forms: a message
 * object (`type`), a role dict (`role`), a `[role, content]` tuple, or a bare
 * string (a human message).
 */
export function coerceMessage(value: unknown, index?: number): Message {
  if (typeof value === "string") return human(value);
  if (Array.isArray(value)) {
    const [type, content] = parse(TupleSchema, value, index);
    return build(type, content, {});
  }
  if (typeof value === "object" && value !== null) {
    if ("type" in value) return normalizeMessage(value, index);
    if ("role" in value) {
      const { role, content, ...extras } = parse(RoleDictSchema, value, index);
      return build(role, content, extras);
    }
  }
  throw new InvalidInputError("expected a message, a role dict, a [role, content] tuple or a string", { index });
}

export function coerceMessages(values: readonly unknown[]): Message[] {
  return values.map((v, i) => coerceMessage(v, i));
}
