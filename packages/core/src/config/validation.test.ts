import { describe, expect, it } from "vitest";
import { ConfigError } from "../infra/errors.js";
import { defaultConfig } from "./defaults.js";
import type { ParleyConfig } from "./types.js";
import { ConfigValidationError, validateConfig } from "./validation.js";

function makeConfig(memory: Partial<ParleyConfig["memory"]> = {}): ParleyConfig {
  const base = defaultConfig();
  return { ...base, memory: { ...base.memory, ...memory } };
}

describe("validateConfig", () => {
  it("passes for the default config", () => {
    expect(() => validateConfig(makeConfig())).not.toThrow();
  });

  it("passes when the recall budget equals the token budget", () => {
    expect(() =>
      validateConfig(makeConfig({ tokenBudget: 1000, recallTokenBudget: 1000 })),
    ).not.toThrow();
  });

  it("rejects a recall budget larger than the token budget", () => {
    const config = makeConfig({ tokenBudget: 1000, recallTokenBudget: 1001 });
    expect(() => validateConfig(config)).toThrow(ConfigValidationError);
    expect(() => validateConfig(config)).toThrow(
      /memory\.recallTokenBudget \(1001\) must not exceed memory\.tokenBudget \(1000\)/,
    );
  });

  it("reports errors as a ConfigError with the list attached", () => {
    try {
      validateConfig(makeConfig({ tokenBudget: 10, recallTokenBudget: 20 }));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      expect(err).toBeInstanceOf(ConfigValidationError);
      if (err instanceof ConfigValidationError) {
        expect(err.errors).toHaveLength(1);
      }
    }
  });
});
