import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { jsonBlock } from "../utils/textBlock.js";
import {
  type ToolDependencies,
  validateInputSize,
  withToolErrorHandling,
} from "../utils/toolHelpers.js";

export const REPAIR_JSON_TOOL = "salvage_repair_json";

export function registerRepairJsonTool(server: McpServer, deps: ToolDependencies): void {
  server.registerTool(
    REPAIR_JSON_TOOL,
    {
      title: "Repair JSON",
      description:
        "Isolate, clean and bracket-repair JSON text without a schema. Reports the candidate text and whether it now decodes.",
      inputSchema: {
        text: z.string().describe("Raw text containing (possibly broken) JSON."),
      },
    },
    createRepairJsonHandler(deps),
  );
}

export function createRepairJsonHandler(deps: ToolDependencies) {
  return async ({ text }: { text: string }) => {
    return withToolErrorHandling(REPAIR_JSON_TOOL, deps, async () => {
      const inputError = validateInputSize(text, deps.config.limits.maxInputChars, "text");
      if (inputError) return inputError;

      const report = deps.parser.repairCandidate(text);
      return {
        isError: !report.decodes,
        content: [jsonBlock(report)],
      };
    });
  };
}
