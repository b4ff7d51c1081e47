export class ConfigError extends Error {
  name = "ConfigError";
}

export type ParsingContext = Record<string, string>;

/**
 * Raised when no layer of the parse cascade produced a valid record.
 * `context.final_error` carries the last underlying failure.
 */
export class ParsingError extends Error {
  name = "ParsingError";
  readonly context: ParsingContext;

  constructor(message: string, context: ParsingContext = {}) {
    super(message);
    this.context = context;
  }
}

export class EmptyInputError extends ParsingError {
  name = "EmptyInputError";

  constructor() {
    super("Input text is empty.");
  }
}

export class SchemaDefinitionError extends Error {
  name = "SchemaDefinitionError";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
