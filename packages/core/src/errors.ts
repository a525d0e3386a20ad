import type { ZodError, ZodIssue } from "zod";

/** Raised when a message, or one of its fields, does not have a shape the library understands. */
export class InvalidInputError extends Error {
  readonly index?: number;
  readonly issues: ZodIssue[];

  constructor(message: string, options: { index?: number; issues?: ZodIssue[] } = {}) {
    super(options.index === undefined ? message : `Invalid message at index ${options.index}: ${message}`);
    this.name = "InvalidInputError";
    this.index = options.index;
    this.issues = options.issues ?? [];
  }

  static fromZod(error: ZodError, index?: number): InvalidInputError {
    const first = error.issues[0];
    const where = first && first.path.length ? `${first.path.join(".")}: ` : "";
    return new InvalidInputError(`${where}${first ? first.message : "invalid value"}`, { index, issues: error.issues });
  }
}
