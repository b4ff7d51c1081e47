import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { SalvageConfig } from "../config.js";
import type { Logger } from "../logger.js";
import { FLATTEN_KEYS } from "../parser/heal.js";
import { TYPE_NAMES } from "../parser/schema.js";
import { FIELD_KINDS } from "../parser/types.js";
import { PROMPT_NAMES } from "../prompts/index.js";
import { TOOL_NAMES } from "../tools/index.js";
import { redactString } from "../utils/logSafe.js";

type ServerInfo = { name: string; version: string };

export const CAPABILITIES_URI = "salvage://capabilities";

export function buildCapabilities(config: SalvageConfig, info: ServerInfo) {
  return {
    server: info,
    tools: [...TOOL_NAMES],
    prompts: [...PROMPT_NAMES],
    fieldKinds: [...FIELD_KINDS],
    typeNames: { ...TYPE_NAMES },
    flattenKeys: [...FLATTEN_KEYS],
    keyMatch: config.parser.keyMatch,
    limits: {
      maxInputChars: config.limits.maxInputChars,
      maxSchemaFields: config.limits.maxSchemaFields,
    },
  };
}

export function registerCapabilitiesResource(
  server: McpServer,
  config: SalvageConfig,
  info: ServerInfo,
  logger: Logger,
): void {
  server.registerResource(
    "capabilities",
    CAPABILITIES_URI,
    {
      title: "Record Salvage Capabilities",
      description: "Tools, prompts, schema type names and active limits.",
      mimeType: "application/json",
    },
    async () => {
      let text: string;
      try {
        text = JSON.stringify(buildCapabilities(config, info), null, 2);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error("Failed to build capabilities resource", {
          uri: CAPABILITIES_URI,
          error: redactString(message),
        });
        text = JSON.stringify({ error: "Resource unavailable" }, null, 2);
      }
      return {
        contents: [{ uri: CAPABILITIES_URI, mimeType: "application/json", text }],
      };
    },
  );
}
