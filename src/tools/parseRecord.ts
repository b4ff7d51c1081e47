import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { describeSchema, parseSchemaDefinition, createSchema } from "../parser/schema.js";
import { jsonBlock, textBlock } from "../utils/textBlock.js";
import {
  type ToolDependencies,
  validateFieldCount,
  validateInputSize,
  withToolErrorHandling,
} from "../utils/toolHelpers.js";

export const PARSE_RECORD_TOOL = "salvage_parse_record";

export function registerParseRecordTool(server: McpServer, deps: ToolDependencies): void {
  const maxInputChars = deps.config.limits.maxInputChars;
  server.registerTool(
    PARSE_RECORD_TOOL,
    {
      title: "Parse Record",
      description: `Extract a record matching a schema from messy model output (fenced, commented, truncated JSON or plain prose). Returns the record as structuredContent. Limits: text <= ${maxInputChars} chars.`,
      inputSchema: {
        text: z
          .string()
          .describe("Raw text expected to contain the record, e.g. an LLM response."),
        schema: z
          .union([z.string(), z.record(z.unknown())])
          .describe(
            'Field map such as {"name": "str", "age": "int"} (object or JSON string). Types: str, int, float, bool, list, dict, any.',
          ),
      },
    },
    createParseRecordHandler(deps),
  );
}

export function createParseRecordHandler(deps: ToolDependencies, toolName = PARSE_RECORD_TOOL) {
  return async ({ text, schema }: { text: string; schema: string | Record<string, unknown> }) => {
    return withToolErrorHandling(toolName, deps, async () => {
      const inputError = validateInputSize(text, deps.config.limits.maxInputChars, "text");
      if (inputError) return inputError;

      const declarations = parseSchemaDefinition(schema);
      const fieldError = validateFieldCount(declarations.length, deps.config.limits.maxSchemaFields);
      if (fieldError) return fieldError;

      const compiled = createSchema(declarations);
      const outcome = deps.parser.parseDetailed(text, compiled);
      deps.logger.debug("Parsed record", {
        layer: outcome.layer,
        repaired: outcome.repaired,
        fields: describeSchema(compiled),
      });

      const via =
        outcome.layer === "semantic"
          ? "semantic extraction from prose"
          : outcome.repaired
            ? "structural decoding after bracket repair"
            : "structural decoding";
      return {
        structuredContent: outcome.record,
        content: [jsonBlock(outcome.record), textBlock(`Recovered via ${via}.`)],
      };
    });
  };
}
