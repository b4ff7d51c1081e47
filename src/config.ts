import fs from "node:fs";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { expandHome } from "./utils/paths.js";
import { isRecord } from "./utils/typeGuards.js";

const keyMatchSchema = z.enum(["first", "last"]);

const configSchema = z
  .object({
    parser: z
      .object({
        keyMatch: keyMatchSchema.default("first"),
      })
      .default({}),
    limits: z
      .object({
        maxInputChars: z.number().int().positive().default(50_000),
        maxSchemaFields: z.number().int().positive().default(100),
      })
      .default({}),
    logging: z
      .object({
        debug: z.boolean().default(false),
      })
      .default({}),
  })
  .strict();

export type SalvageConfig = z.infer<typeof configSchema>;

const DEFAULT_CONFIG_PATH = "~/.record-salvage/config.json";

function readJsonFileIfExists(filePath: string): unknown | undefined {
  if (!fs.existsSync(filePath)) return undefined;
  const raw = fs.readFileSync(filePath, "utf-8");
  try {
    return JSON.parse(raw) as unknown;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid JSON in config file ${filePath}: ${message}`);
  }
}

function mergeDeep(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = out[key];
    out[key] = isRecord(existing) && isRecord(value) ? mergeDeep(existing, value) : value;
  }
  return out;
}

function parseBooleanEnv(value: string): boolean {
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

function parseIntEnv(value: string, name: string): number {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) throw new ConfigError(`Invalid integer for ${name}`);
  return Number(trimmed);
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const parser: Record<string, unknown> = {};
  const limits: Record<string, unknown> = {};
  const logging: Record<string, unknown> = {};

  if (env.RECORD_SALVAGE_KEY_MATCH) parser.keyMatch = env.RECORD_SALVAGE_KEY_MATCH.trim();
  if (env.RECORD_SALVAGE_MAX_INPUT_CHARS)
    limits.maxInputChars = parseIntEnv(
      env.RECORD_SALVAGE_MAX_INPUT_CHARS,
      "RECORD_SALVAGE_MAX_INPUT_CHARS",
    );
  if (env.RECORD_SALVAGE_MAX_SCHEMA_FIELDS)
    limits.maxSchemaFields = parseIntEnv(
      env.RECORD_SALVAGE_MAX_SCHEMA_FIELDS,
      "RECORD_SALVAGE_MAX_SCHEMA_FIELDS",
    );
  if (env.RECORD_SALVAGE_DEBUG) logging.debug = parseBooleanEnv(env.RECORD_SALVAGE_DEBUG);

  return { parser, limits, logging };
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Defaults, then the JSON config file, then RECORD_SALVAGE_* env vars.
 */
export function loadConfig(
  opts: { configPath?: string; env?: NodeJS.ProcessEnv } = {},
): SalvageConfig {
  const env = opts.env ?? process.env;

  const resolvedDefaultPath = expandHome(DEFAULT_CONFIG_PATH);
  const resolvedProvidedPath = opts.configPath ? expandHome(opts.configPath) : undefined;
  if (resolvedProvidedPath && !fs.existsSync(resolvedProvidedPath)) {
    throw new ConfigError(`Config file not found: ${resolvedProvidedPath}`);
  }
  const configPathToUse =
    resolvedProvidedPath ?? (fs.existsSync(resolvedDefaultPath) ? resolvedDefaultPath : undefined);

  const fileConfigRaw = configPathToUse ? readJsonFileIfExists(configPathToUse) : undefined;
  if (fileConfigRaw !== undefined && !isRecord(fileConfigRaw)) {
    throw new ConfigError(`Config file ${configPathToUse} must contain a JSON object.`);
  }

  const merged = mergeDeep(
    mergeDeep(configSchema.parse({}), fileConfigRaw ?? {}),
    envOverrides(env),
  );

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}
