import { ConfigError } from "../infra/errors.js";

export interface ConfigMigration {
  version: number;
  description: string;
  migrate: (config: Record<string, unknown>) => Record<string, unknown>;
}

export interface MigrationResult {
  config: Record<string, unknown>;
  applied: ConfigMigration[];
  fromVersion: number;
  toVersion: number;
}

/** Flat top-level keys from early config files and where they live now. */
const LEGACY_MEMORY_KEYS: Record<string, string> = {
  token_budget: "tokenBudget",
  keep_recent: "keepRecent",
  memory_top_k: "recallTopK",
  memory_dir: "sessionDir",
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Ordered list of config migrations. Each migration upgrades from
 * version (N-1) to version N.
 */
export const migrations: ConfigMigration[] = [
  {
    version: 1,
    description: "Move flat memory settings into the memory section",
    migrate(config) {
      const memory: Record<string, unknown> = isRecord(config.memory) ? { ...config.memory } : {};
      const rest: Record<string, unknown> = {};

      for (const [key, value] of Object.entries(config)) {
        const target = LEGACY_MEMORY_KEYS[key];
        if (target === undefined) {
          rest[key] = value;
        } else if (!(target in memory)) {
          // An explicit memory.* value wins over its legacy spelling
          memory[target] = value;
        }
      }

      const hasMemory = Object.keys(memory).length > 0;
      return { ...rest, ...(hasMemory && { memory }), configVersion: 1 };
    },
  },
];

export const CURRENT_CONFIG_VERSION: number =
  migrations[migrations.length - 1]?.version ?? 0;

/**
 * Run all applicable migrations on a raw config object.
 *
 * - If `configVersion` is missing, it is treated as version 0.
 * - If `configVersion` is higher than the latest known migration,
 *   a ConfigError is thrown (config is from a newer release).
 */
export function migrateConfig(
  rawConfig: Record<string, unknown>,
): MigrationResult {
  const fromVersion =
    typeof rawConfig.configVersion === "number" ? rawConfig.configVersion : 0;

  if (fromVersion > CURRENT_CONFIG_VERSION) {
    throw new ConfigError(
      `Config version ${fromVersion} is newer than the latest supported version ` +
        `(${CURRENT_CONFIG_VERSION}). Please upgrade parley.`,
    );
  }

  const applied: ConfigMigration[] = [];
  let config = { ...rawConfig };

  for (const migration of migrations) {
    if (migration.version > fromVersion) {
      config = migration.migrate(config);
      applied.push(migration);
    }
  }

  config.configVersion = CURRENT_CONFIG_VERSION;

  return {
    config,
    applied,
    fromVersion,
    toVersion: CURRENT_CONFIG_VERSION,
  };
}
