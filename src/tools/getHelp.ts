import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  HELP_CASCADE,
  HELP_EXAMPLES,
  HELP_SCHEMA,
  HELP_USAGE,
} from "../resources/helpContent.js";
import { textBlock } from "../utils/textBlock.js";

export const GET_HELP_TOOL = "salvage_get_help";

const topicSchema = z.enum(["overview", "schema", "cascade", "examples"]);

type Topic = z.infer<typeof topicSchema>;

export function registerGetHelpTool(server: McpServer): void {
  server.registerTool(
    GET_HELP_TOOL,
    {
      title: "Record Salvage Help",
      description: "Get help on schemas, the parse cascade and examples.",
      inputSchema: {
        topic: topicSchema.optional(),
      },
    },
    createGetHelpHandler(),
  );
}

export function createGetHelpHandler() {
  return async ({ topic }: { topic?: Topic }) => {
    switch (topic) {
      case "schema":
        return { content: [textBlock(HELP_SCHEMA)] };
      case "cascade":
        return { content: [textBlock(HELP_CASCADE)] };
      case "examples":
        return { content: [textBlock(HELP_EXAMPLES)] };
      case "overview":
      default:
        return { content: [textBlock(HELP_USAGE)] };
    }
  };
}
