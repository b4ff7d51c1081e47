import fs from "node:fs";
import type { SalvageConfig } from "./config.js";
import { createStderrLogger } from "./logger.js";
import { createParser } from "./server.js";
import { createSchema, parseSchemaDefinition } from "./parser/schema.js";
import { formatToolError } from "./utils/toolErrors.js";
import { validateFieldCount } from "./utils/toolHelpers.js";
import { expandHome } from "./utils/paths.js";

export type CliCommand =
  | { kind: "serve"; configPath?: string }
  | { kind: "parse"; configPath?: string; inputPath?: string; schema: string }
  | { kind: "print-config"; configPath?: string }
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "invalid"; message: string };

export type CliIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readStdin: () => Promise<string>;
  readFile: (filePath: string) => string;
};

export function parseArgs(argv: string[]): CliCommand {
  const args = [...argv];
  let configPath: string | undefined;
  let inputPath: string | undefined;
  let schema: string | undefined;
  let kind: "serve" | "parse" | "print-config" = "serve";

  while (args.length > 0) {
    const a = args.shift();
    if (!a) break;
    if (a === "--config" || a === "--input" || a === "--schema") {
      const value = args.shift();
      if (!value) return { kind: "invalid", message: `Missing value for ${a}` };
      if (a === "--config") configPath = value;
      else if (a === "--input") inputPath = value;
      else schema = value;
      continue;
    }
    if (a === "--stdio") continue;
    if (a === "--parse") {
      kind = "parse";
      continue;
    }
    if (a === "--print-config") {
      kind = "print-config";
      continue;
    }
    if (a === "--help" || a === "-h") return { kind: "help" };
    if (a === "--version" || a === "-v") return { kind: "version" };
    return { kind: "invalid", message: `Unknown argument: ${a}` };
  }

  if (kind === "parse") {
    if (!schema) return { kind: "invalid", message: "--parse requires --schema" };
    return { kind, configPath, inputPath, schema };
  }
  if (inputPath || schema) {
    return { kind: "invalid", message: "--input and --schema are only valid with --parse" };
  }
  if (kind === "print-config") return { kind, configPath };
  return { kind: "serve", configPath };
}

export function formatHelp(info: { name: string; version: string }): string {
  return [
    `${info.name} ${info.version}`,
    "",
    "Usage:",
    "  record-salvage [--stdio] [--config path]",
    "  record-salvage --parse --schema <json|@file> [--input file] [--config path]",
    "  record-salvage --print-config [--config path]",
    "  record-salvage --version",
    "  record-salvage --help",
    "",
    "With --parse and no --input, the text is read from stdin.",
    "",
  ].join("\n");
}

/** `@path` reads the schema from a file; anything else is inline JSON. */
export function resolveSchemaArg(value: string, readFile: CliIo["readFile"]): string {
  return value.startsWith("@") ? readFile(expandHome(value.slice(1))) : value;
}

export async function runParse(
  cmd: { inputPath?: string; schema: string },
  config: SalvageConfig,
  io: CliIo,
): Promise<number> {
  const logger = createStderrLogger({ debugEnabled: config.logging.debug, write: io.stderr });
  try {
    const declarations = parseSchemaDefinition(resolveSchemaArg(cmd.schema, io.readFile));
    const fieldError = validateFieldCount(declarations.length, config.limits.maxSchemaFields);
    if (fieldError) {
      io.stderr(`${fieldError.content.map((block) => block.text).join("\n")}\n`);
      return 1;
    }
    const schema = createSchema(declarations);
    const text = cmd.inputPath ? io.readFile(expandHome(cmd.inputPath)) : await io.readStdin();
    const parser = createParser(config, logger);
    const outcome = parser.parseDetailed(text, schema);
    logger.debug("Parsed record", { layer: outcome.layer, repaired: outcome.repaired });
    io.stdout(`${JSON.stringify(outcome.record, null, 2)}\n`);
    return 0;
  } catch (error) {
    io.stderr(`${formatToolError(error).message}\n`);
    return 1;
  }
}

export function readStdin(): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    process.stdin.on("data", (chunk: Buffer) => chunks.push(chunk));
    process.stdin.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    process.stdin.on("error", reject);
  });
}

export const processIo: CliIo = {
  stdout: (text) => void process.stdout.write(text),
  stderr: (text) => void process.stderr.write(text),
  readStdin,
  readFile: (filePath) => fs.readFileSync(filePath, "utf-8"),
};
