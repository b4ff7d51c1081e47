import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ToolDependencies } from "../utils/toolHelpers.js";
import { registerParseRecordTool, PARSE_RECORD_TOOL } from "./parseRecord.js";
import { registerRepairJsonTool, REPAIR_JSON_TOOL } from "./repairJson.js";
import { registerGetHelpTool, GET_HELP_TOOL } from "./getHelp.js";

export const TOOL_NAMES = [PARSE_RECORD_TOOL, REPAIR_JSON_TOOL, GET_HELP_TOOL] as const;

export function registerTools(server: McpServer, deps: ToolDependencies): void {
  registerParseRecordTool(server, deps);
  registerRepairJsonTool(server, deps);
  registerGetHelpTool(server);
}
