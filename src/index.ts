#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { createStderrLogger } from "./logger.js";
import { createMcpServer } from "./server.js";
import { formatHelp, parseArgs, processIo, runParse } from "./cli.js";
import { redactString } from "./utils/logSafe.js";
import { isRecord } from "./utils/typeGuards.js";

const PROJECT_NAME = "record-salvage";
const VERSION_FALLBACK = "0.1.0";

function readPackageInfo(): { name: string; version: string } {
  try {
    const distDir = path.dirname(fileURLToPath(import.meta.url));
    const packageJsonPath = path.resolve(distDir, "..", "package.json");
    if (!fs.existsSync(packageJsonPath)) {
      return { name: PROJECT_NAME, version: VERSION_FALLBACK };
    }
    const raw = fs.readFileSync(packageJsonPath, "utf-8");
    const parsed: unknown = JSON.parse(raw);
    const version = isRecord(parsed) && typeof parsed.version === "string" ? parsed.version : undefined;
    return { name: PROJECT_NAME, version: version ?? VERSION_FALLBACK };
  } catch {
    return { name: PROJECT_NAME, version: VERSION_FALLBACK };
  }
}

async function serve(configPath: string | undefined, pkg: { name: string; version: string }): Promise<void> {
  const config = loadConfig({ configPath });
  const logger = createStderrLogger({ debugEnabled: config.logging.debug });
  const server = createMcpServer({ config, logger }, pkg);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("Server running on stdio", { name: pkg.name, version: pkg.version });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down", { signal });
    try {
      await server.close();
    } catch (error) {
      logger.error("Error during shutdown", {
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      process.exit(0);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.stdin.on("end", () => void shutdown("stdin_end"));
  process.stdin.on("close", () => void shutdown("stdin_close"));
}

async function main(): Promise<void> {
  const cmd = parseArgs(process.argv.slice(2));
  const pkg = readPackageInfo();

  switch (cmd.kind) {
    case "invalid":
      process.stderr.write(`${cmd.message}\n`);
      process.exit(1);
    case "help":
      process.stdout.write(formatHelp(pkg));
      process.exit(0);
    case "version":
      process.stdout.write(`${pkg.name} ${pkg.version}\n`);
      process.exit(0);
    case "print-config": {
      const config = loadConfig({ configPath: cmd.configPath });
      process.stdout.write(`${JSON.stringify(config, null, 2)}\n`);
      process.exit(0);
    }
    case "parse": {
      const config = loadConfig({ configPath: cmd.configPath });
      process.exit(await runParse(cmd, config, processIo));
    }
    case "serve":
      await serve(cmd.configPath, pkg);
      break;
  }
}

main().catch((err) => {
  const message = redactString(err instanceof Error ? err.message : String(err));
  process.stderr.write(`[fatal] ${message}\n`);
  process.exit(1);
});
