import log from "electron-log/node";
import { DEFAULT_LOG_LEVEL, loadConfig, type LogLevel } from "./config.js";
import { InvalidInputError } from "./errors.js";

// Console only, no log file.
log.transports.file.level = false;
log.transports.console.format = "[{h}:{i}:{s}] [{level}]{scope} {text}";

/** A bad level in the environment falls back to the default instead of failing the import. */
export function resolveLogLevel(env: Record<string, string | undefined> = process.env): LogLevel | false {
  try {
    return loadConfig(env).logLevel;
  } catch (err) {
    if (!(err instanceof InvalidInputError)) throw err;
    log.warn(`${err.message}; falling back to "${DEFAULT_LOG_LEVEL}"`);
    return DEFAULT_LOG_LEVEL;
  }
}

export const logLevel = resolveLogLevel();
log.transports.console.level = logLevel;

/** Logger tagged with the module it belongs to. */
export function createLogger(tag: string): ReturnType<typeof log.scope> {
  return log.scope(tag);
}
