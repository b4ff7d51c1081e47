import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { GetPromptResult } from "@modelcontextprotocol/sdk/types.js";
import { describeSchema, schemaFromDefinition } from "../parser/schema.js";
import type { FieldKind } from "../parser/types.js";
import { textBlock } from "../utils/textBlock.js";

export const PROMPT_NAMES = ["structured_record"] as const;

const KIND_HINTS: Record<FieldKind, string> = {
  string: "string",
  integer: "integer",
  float: "number",
  boolean: "true or false",
  list: "array",
  dict: "object",
  any: "any JSON value",
};

export function buildStructuredRecordPrompt(schemaDefinition: string, task?: string): string {
  const fields = describeSchema(schemaFromDefinition(schemaDefinition));
  const lines = Object.entries(fields).map(
    ([name, kind]) => `- "${name}": ${KIND_HINTS[kind]}`,
  );
  const intro = task?.trim() ? `${task.trim()}\n\n` : "";
  return (
    `${intro}Answer with exactly one JSON object and nothing else. ` +
    `It must contain every one of these fields:\n${lines.join("\n")}`
  );
}

function singleMessagePrompt(text: string): GetPromptResult {
  return {
    messages: [
      {
        role: "user",
        content: textBlock(text),
      },
    ],
  };
}

export function registerPrompts(server: McpServer): void {
  server.registerPrompt(
    "structured_record",
    {
      title: "Structured Record",
      description: "Ask a model to answer with one JSON object matching a field map.",
      argsSchema: {
        schema: z.string().min(1).describe('Field map, e.g. {"name": "str", "age": "int"}'),
        task: z.string().optional(),
      },
    },
    ({ schema, task }) => singleMessagePrompt(buildStructuredRecordPrompt(schema, task)),
  );
}
