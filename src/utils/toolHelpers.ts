import type { SalvageConfig } from "../config.js";
import type { Logger } from "../logger.js";
import type { RecordParser } from "../parser/parser.js";
import { formatToolError } from "./toolErrors.js";
import { textBlock, type TextBlock } from "./textBlock.js";

export type ToolDependencies = {
  config: SalvageConfig;
  logger: Logger;
  parser: RecordParser;
};

export type ToolResult = {
  isError?: boolean;
  content: TextBlock[];
};

export function errorResult(message: string): ToolResult {
  return { isError: true, content: [textBlock(message)] };
}

/**
 * Validates that input doesn't exceed the configured character limit.
 * Returns an error ToolResult if validation fails, null otherwise.
 */
export function validateInputSize(
  input: string,
  maxChars: number,
  fieldName = "input",
): ToolResult | null {
  if (input.length > maxChars) {
    return errorResult(
      `Request too large. Max ${fieldName} is ${maxChars} characters (set RECORD_SALVAGE_MAX_INPUT_CHARS to override).`,
    );
  }
  return null;
}

export function validateFieldCount(count: number, maxFields: number): ToolResult | null {
  if (count > maxFields) {
    return errorResult(
      `Schema has ${count} fields; the limit is ${maxFields} (set RECORD_SALVAGE_MAX_SCHEMA_FIELDS to override).`,
    );
  }
  return null;
}

/**
 * Wraps tool execution with standard error handling.
 * Logs errors and returns a formatted error result.
 */
export async function withToolErrorHandling<T>(
  toolName: string,
  deps: Pick<ToolDependencies, "logger">,
  fn: () => Promise<T>,
): Promise<T | ToolResult> {
  try {
    return await fn();
  } catch (error) {
    deps.logger.error(`Error in ${toolName}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    const { message } = formatToolError(error);
    return errorResult(message);
  }
}
