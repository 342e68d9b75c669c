import { readFile } from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import { ConfigNotFoundError, ConfigValidationError, errorMessage } from "./errors.js";
import { resolveCompletionOptions, toValidationError } from "./options.js";
import { type CompletionOptions } from "./types.js";

export const CONFIG_FILE_NAME = "rlm.config.json";

const subCallSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  maxPerTurn: z.number().int().nonnegative().default(5),
  budgetInheritance: z.number().min(0).max(1).default(0.5),
  maxCostPerSession: z.number().nonnegative().default(1.0),
});

const runtimeConfigSchema = z.object({
  model: z.string().min(1).default("gpt-4o-mini"),
  temperature: z.number().min(0).max(2).default(0),
  maxDepth: z.number().int().nonnegative().default(4),
  maxSubcalls: z.number().int().nonnegative().default(12),
  tokenBudget: z.number().int().nonnegative().default(8000),
  toolBudget: z.number().int().nonnegative().default(20),
  timeoutSeconds: z.number().positive().default(120),
  verbose: z.boolean().default(false),
  logDir: z.string().min(1).default("./logs"),
  sandboxTimeoutSeconds: z.number().positive().default(30),
  subCalls: subCallSettingsSchema.default({}),
});

export type SubCallSettings = z.infer<typeof subCallSettingsSchema>;
export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>;
export type RuntimeConfigInput = z.input<typeof runtimeConfigSchema>;

export interface LoadConfigOptions {
  /** Explicit config file; a missing file is an error. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Directory searched for `rlm.config.json` when no path is given. */
  cwd?: string;
}

type EnvParser = (raw: string) => unknown;

const ENV_FIELDS: ReadonlyArray<[name: string, field: keyof RuntimeConfig, parse: EnvParser]> = [
  ["RLM_MODEL", "model", (raw) => raw],
  ["RLM_TEMPERATURE", "temperature", Number],
  ["RLM_MAX_DEPTH", "maxDepth", Number],
  ["RLM_MAX_SUBCALLS", "maxSubcalls", Number],
  ["RLM_TOKEN_BUDGET", "tokenBudget", Number],
  ["RLM_TOOL_BUDGET", "toolBudget", Number],
  ["RLM_TIMEOUT_SECONDS", "timeoutSeconds", Number],
  ["RLM_VERBOSE", "verbose", parseBoolean],
  ["RLM_LOG_DIR", "logDir", (raw) => raw],
];

export function parseConfig(input: unknown): RuntimeConfig {
  const parsed = runtimeConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw toValidationError(parsed.error);
  }
  return parsed.data;
}

export const DEFAULT_CONFIG: RuntimeConfig = parseConfig({});

/**
 * Resolves configuration from defaults, then the JSON config file, then
 * `RLM_*` environment variables. Later sources win.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<RuntimeConfig> {
  const env = options.env ?? process.env;
  const fileValues = await readConfigFile(options);
  const envValues = readEnv(env);

  const fileSubCalls = isRecord(fileValues.subCalls) ? fileValues.subCalls : {};
  return parseConfig({
    ...fileValues,
    ...envValues,
    subCalls: fileSubCalls,
  });
}

export function defaultCompletionOptions(
  config: RuntimeConfig,
  overrides: Partial<CompletionOptions> = {},
): CompletionOptions {
  return resolveCompletionOptions({
    maxDepth: config.maxDepth,
    maxSubcalls: config.maxSubcalls,
    tokenBudget: config.tokenBudget,
    toolBudget: config.toolBudget,
    timeoutSeconds: config.timeoutSeconds,
    ...overrides,
  });
}

async function readConfigFile(options: LoadConfigOptions): Promise<Record<string, unknown>> {
  const explicit = options.configPath !== undefined;
  const filePath = explicit
    ? path.resolve(options.cwd ?? process.cwd(), options.configPath ?? CONFIG_FILE_NAME)
    : path.join(options.cwd ?? process.cwd(), CONFIG_FILE_NAME);

  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      if (explicit) {
        throw new ConfigNotFoundError(filePath);
      }
      return {};
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigValidationError(filePath, `invalid JSON: ${errorMessage(error)}`);
  }

  if (!isRecord(parsed)) {
    throw new ConfigValidationError(filePath, "expected a JSON object");
  }
  return parsed;
}

function readEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  for (const [name, field, parse] of ENV_FIELDS) {
    const raw = env[name];
    if (raw === undefined || raw.trim() === "") {
      continue;
    }
    values[field] = parse(raw.trim());
  }
  return values;
}

function parseBoolean(raw: string): unknown {
  const normalized = raw.toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(normalized)) {
    return false;
  }
  return raw;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}
