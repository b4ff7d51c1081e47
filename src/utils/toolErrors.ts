import {
  ConfigError,
  EmptyInputError,
  ParsingError,
  SchemaDefinitionError,
} from "../errors.js";
import { clipForLog } from "./logSafe.js";

export type ToolErrorInfo = { message: string };

const MAX_MESSAGE_CHARS = 500;

export function formatToolError(error: unknown): ToolErrorInfo {
  if (error instanceof ConfigError) {
    return { message: error.message || "Configuration error." };
  }

  if (error instanceof EmptyInputError) {
    return { message: "Input text is empty. Pass the raw model output in `text`." };
  }

  if (error instanceof SchemaDefinitionError) {
    return {
      message: `Invalid schema definition: ${error.message} Expected an object such as {"name": "str", "age": "int"}; type names are str, int, float, bool, list, dict, any.`,
    };
  }

  if (error instanceof ParsingError) {
    const context =
      Object.keys(error.context).length > 0
        ? `\n\nError context:\n${JSON.stringify(error.context, null, 2)}`
        : "";
    return { message: `${error.message}${context}` };
  }

  if (error instanceof Error) {
    const message = (error.message || "").trim();
    if (message) return { message: clipForLog(message, MAX_MESSAGE_CHARS) };
  }

  return { message: "Unexpected error. Check server logs for details." };
}
