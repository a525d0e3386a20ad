import { z } from "zod";
import { InvalidInputError } from "./errors.js";

export const LOG_LEVELS = ["error", "warn", "info", "verbose", "debug", "silly"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

const LogLevelSchema = z.preprocess(
  v => (typeof v === "string" ? v.trim().toLowerCase() : v),
  z.union([z.enum(LOG_LEVELS), z.enum(["false", "off"]).transform(() => false as const)]),
);

const ConfigSchema = z.object({
  MESSAGE_RUNS_LOG_LEVEL: LogLevelSchema.default(DEFAULT_LOG_LEVEL),
});

export interface Config {
  /** Console log level; `false` silences the console transport. */
  logLevel: LogLevel | false;
}

/** Level names are case-insensitive. */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) throw InvalidInputError.fromZod(parsed.error);
  return { logLevel: parsed.data.MESSAGE_RUNS_LOG_LEVEL };
}
