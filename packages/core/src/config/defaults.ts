import { CURRENT_CONFIG_VERSION } from "./migrations.js";
import { ParleyConfigSchema } from "./schema.js";
import type { ParleyConfig, ParleyConfigInput } from "./types.js";

export const DEFAULT_CONFIG_FILE = "parley.json";

/**
 * A fresh copy of the fully defaulted config.
 */
export function defaultConfig(): ParleyConfig {
  return ParleyConfigSchema.parse({ configVersion: CURRENT_CONFIG_VERSION });
}

/**
 * What `init` writes: the defaults, minus settings derived from others.
 */
export function defaultConfigFile(): ParleyConfigInput {
  const config = defaultConfig();
  const memory: NonNullable<ParleyConfigInput["memory"]> = { ...config.memory };
  delete memory.recallTokenBudget;
  return { ...config, memory };
}
