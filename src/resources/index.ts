import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { SalvageConfig } from "../config.js";
import type { Logger } from "../logger.js";
import { registerCapabilitiesResource } from "./capabilities.js";

export function registerResources(
  server: McpServer,
  deps: {
    config: SalvageConfig;
    info: { name: string; version: string };
    logger: Logger;
  },
): void {
  registerCapabilitiesResource(server, deps.config, deps.info, deps.logger);
}
