import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { chmod } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import JSON5 from "json5";
import { ConfigError } from "../infra/errors.js";
import { createLogger, isLogLevel } from "../infra/logger.js";
import { defaultConfig, defaultConfigFile } from "./defaults.js";
import { migrateConfig } from "./migrations.js";
import { ParleyConfigSchema } from "./schema.js";
import type { ParleyConfig, ParleyConfigInput } from "./types.js";
import { validateConfig } from "./validation.js";

const log = createLogger("config");

const CONFIG_FILE_MODE = 0o600;

/** Integer settings that can be overridden from the environment. */
const INTEGER_ENV_OVERRIDES = [
  { env: "PARLEY_TOKEN_BUDGET", key: "tokenBudget" },
  { env: "PARLEY_KEEP_RECENT", key: "keepRecent" },
  { env: "PARLEY_MEMORY_TOP_K", key: "recallTopK" },
  { env: "PARLEY_RECALL_TOKEN_BUDGET", key: "recallTokenBudget" },
  { env: "PARLEY_CONTEXT_TOKEN_BUDGET", key: "contextTokenBudget" },
] as const;

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}

/**
 * Layer environment overrides over a raw (pre-validation) config object.
 * Values that do not parse are reported and ignored.
 */
export function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: Env,
): Record<string, unknown> {
  const memory: Record<string, unknown> = isRecord(raw.memory) ? { ...raw.memory } : {};
  const result: Record<string, unknown> = { ...raw };

  for (const { env: name, key } of INTEGER_ENV_OVERRIDES) {
    const value = env[name]?.trim();
    if (value === undefined || value === "") continue;
    if (!/^\d+$/.test(value)) {
      log.warn(`Ignoring ${name}="${value}": expected a non-negative integer`);
      continue;
    }
    memory[key] = Number.parseInt(value, 10);
  }

  const sessionDir = env.PARLEY_MEMORY_DIR?.trim();
  if (sessionDir) memory.sessionDir = sessionDir;

  if (Object.keys(memory).length > 0) result.memory = memory;

  const model = env.PARLEY_MODEL?.trim();
  if (model) result.model = model;

  const level = env.PARLEY_LOG_LEVEL?.trim().toLowerCase();
  if (level) {
    if (isLogLevel(level)) {
      const logging = isRecord(raw.logging) ? raw.logging : {};
      result.logging = { ...logging, level };
    } else {
      log.warn(`Ignoring PARLEY_LOG_LEVEL="${level}": unknown log level`);
    }
  }

  return result;
}

function readConfigFile(filePath: string): Record<string, unknown> {
  const raw = readFileSync(filePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON5.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file is not valid JSON or JSON5: ${filePath}`, err);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file must contain an object: ${filePath}`);
  }
  return parsed;
}

/**
 * Load config from a JSON or JSON5 file (defaults when it does not exist),
 * apply environment overrides and validate. Older files are migrated and
 * rewritten in place.
 */
export async function loadConfig(
  filePath?: string,
  env: Env = process.env,
): Promise<ParleyConfig> {
  let fileConfig: Record<string, unknown> = {};

  if (filePath && existsSync(filePath)) {
    const migration = migrateConfig(readConfigFile(filePath));
    if (migration.applied.length > 0) {
      writeFileSync(filePath, JSON.stringify(migration.config, null, 2) + "\n", {
        mode: CONFIG_FILE_MODE,
      });
      log.info(
        `Migrated ${filePath} from config version ${migration.fromVersion} to ${migration.toVersion}`,
      );
    }
    fileConfig = migration.config;
  } else if (filePath) {
    log.debug(`No config file at ${filePath}; using defaults`);
  }

  const result = ParleyConfigSchema.safeParse(applyEnvOverrides(fileConfig, env));
  if (!result.success) {
    const messages = result.error.issues.map(
      (i) => `${i.path.join(".")}: ${i.message}`,
    );
    throw new ConfigError(
      `Config validation failed:\n${messages.map((m) => `  - ${m}`).join("\n")}`,
    );
  }

  validateConfig(result.data);

  return {
    ...result.data,
    memory: { ...result.data.memory, sessionDir: expandHome(result.data.memory.sessionDir) },
  };
}

/**
 * Save config to a JSON file with 0o600 permissions.
 */
export async function saveConfig(
  filePath: string,
  config: ParleyConfigInput,
): Promise<void> {
  const dir = dirname(filePath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
  }

  writeFileSync(filePath, JSON.stringify(config, null, 2) + "\n", {
    mode: CONFIG_FILE_MODE,
  });
  await chmod(filePath, CONFIG_FILE_MODE);
}

/**
 * Write a default config file. Refuses to overwrite an existing one.
 */
export async function initializeConfig(filePath: string): Promise<ParleyConfig> {
  if (existsSync(filePath)) {
    throw new ConfigError(`Config file already exists: ${filePath}`);
  }

  await saveConfig(filePath, defaultConfigFile());
  return defaultConfig();
}
