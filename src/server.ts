import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { SalvageConfig } from "./config.js";
import type { Logger } from "./logger.js";
import { RecordParser } from "./parser/parser.js";
import { registerTools } from "./tools/index.js";
import { registerResources } from "./resources/index.js";
import { registerPrompts } from "./prompts/index.js";

export type ServerDependencies = {
  config: SalvageConfig;
  logger: Logger;
};

export function createParser(config: SalvageConfig, logger: Logger): RecordParser {
  return new RecordParser({
    keyMatch: config.parser.keyMatch,
    maxInputChars: config.limits.maxInputChars,
    logger,
  });
}

export function createMcpServer(
  deps: ServerDependencies,
  info: { name: string; version: string },
): McpServer {
  const server = new McpServer({ name: info.name, version: info.version });
  const parser = createParser(deps.config, deps.logger);
  registerTools(server, { ...deps, parser });
  registerPrompts(server);
  registerResources(server, { config: deps.config, info, logger: deps.logger });
  return server;
}
