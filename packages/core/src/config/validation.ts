import { ConfigError } from "../infra/errors.js";
import type { ParleyConfig } from "./types.js";

export class ConfigValidationError extends ConfigError {
  constructor(
    public readonly errors: string[],
  ) {
    super(`Config validation failed:\n${errors.map((e) => `  - ${e}`).join("\n")}`);
    this.name = "ConfigValidationError";
  }
}

/**
 * Cross-field rules the schema alone cannot express.
 */
export function validateConfig(config: ParleyConfig): void {
  const errors: string[] = [];
  const { memory } = config;

  // Recalled context is sent alongside the active view
  if (memory.recallTokenBudget > memory.tokenBudget) {
    errors.push(
      `memory.recallTokenBudget (${memory.recallTokenBudget}) must not exceed ` +
        `memory.tokenBudget (${memory.tokenBudget}).`,
    );
  }

  if (errors.length > 0) {
    throw new ConfigValidationError(errors);
  }
}
