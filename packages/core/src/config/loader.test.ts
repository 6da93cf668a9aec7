import { existsSync, mkdirSync, readFileSync, rmSync, statSync, writeFileSync } from "node:fs";
import { randomBytes } from "node:crypto";
import { homedir, tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError } from "../infra/errors.js";
import { defaultConfig } from "./defaults.js";
import {
  applyEnvOverrides,
  expandHome,
  initializeConfig,
  loadConfig,
  saveConfig,
} from "./loader.js";
import { ConfigValidationError } from "./validation.js";

function makeTempDir(): string {
  const dir = join(tmpdir(), `parley-test-${randomBytes(8).toString("hex")}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

describe("expandHome", () => {
  it("expands a leading ~", () => {
    expect(expandHome("~")).toBe(homedir());
    expect(expandHome("~/sessions")).toBe(join(homedir(), "sessions"));
  });

  it("leaves other paths alone", () => {
    expect(expandHome("/var/sessions")).toBe("/var/sessions");
    expect(expandHome("a/~/b")).toBe("a/~/b");
  });
});

describe("applyEnvOverrides", () => {
  it("sets integer memory settings", () => {
    const result = applyEnvOverrides(
      { memory: { keepRecent: 4 } },
      { PARLEY_TOKEN_BUDGET: "8000", PARLEY_MEMORY_TOP_K: " 5 " },
    );
    expect(result.memory).toEqual({ keepRecent: 4, tokenBudget: 8000, recallTopK: 5 });
  });

  it("ignores values that are not non-negative integers", () => {
    const result = applyEnvOverrides(
      { memory: { keepRecent: 4 } },
      { PARLEY_KEEP_RECENT: "ten", PARLEY_TOKEN_BUDGET: "-1", PARLEY_RECALL_TOKEN_BUDGET: "1.5" },
    );
    expect(result.memory).toEqual({ keepRecent: 4 });
  });

  it("sets the session directory and model", () => {
    const result = applyEnvOverrides({}, { PARLEY_MEMORY_DIR: "/tmp/s", PARLEY_MODEL: "test-model" });
    expect(result).toEqual({ memory: { sessionDir: "/tmp/s" }, model: "test-model" });
  });

  it("normalizes the log level and ignores unknown ones", () => {
    expect(applyEnvOverrides({}, { PARLEY_LOG_LEVEL: "DEBUG" }).logging).toEqual({ level: "debug" });
    expect(applyEnvOverrides({}, { PARLEY_LOG_LEVEL: "loud" })).toEqual({});
  });

  it("does not mutate the input", () => {
    const raw = { memory: { tokenBudget: 100 } };
    applyEnvOverrides(raw, { PARLEY_TOKEN_BUDGET: "200" });
    expect(raw).toEqual({ memory: { tokenBudget: 100 } });
  });
});

describe("loadConfig", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = makeTempDir();
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("returns defaults when the file does not exist", async () => {
    const config = await loadConfig(join(tempDir, "missing.json"), {});
    expect(config.memory.tokenBudget).toBe(6000);
    expect(config.memory.keepRecent).toBe(10);
    expect(config.memory.recallTopK).toBe(3);
    expect(config.memory.sessionDir).toBe(join(homedir(), ".parley/sessions"));
    expect(config.summarizer.timeoutMs).toBe(15_000);
  });

  it("returns defaults without a path", async () => {
    const config = await loadConfig(undefined, {});
    expect(config.memory.recallTokenBudget).toBe(1500);
  });

  it("reads JSON5 and lets the environment win", async () => {
    const filePath = join(tempDir, "parley.json");
    writeFileSync(
      filePath,
      `{
        // tuned for a small model
        configVersion: 1,
        memory: { tokenBudget: 3000, recallTokenBudget: 500, sessionDir: '/srv/sessions' },
      }`,
    );

    const config = await loadConfig(filePath, { PARLEY_TOKEN_BUDGET: "4000" });
    expect(config.memory.tokenBudget).toBe(4000);
    expect(config.memory.recallTokenBudget).toBe(500);
    expect(config.memory.sessionDir).toBe("/srv/sessions");
  });

  it("keeps the file value when the env value is invalid", async () => {
    const filePath = join(tempDir, "parley.json");
    writeFileSync(filePath, JSON.stringify({ configVersion: 1, memory: { keepRecent: 4 } }));

    const config = await loadConfig(filePath, { PARLEY_KEEP_RECENT: "lots" });
    expect(config.memory.keepRecent).toBe(4);
  });

  it("migrates legacy files and rewrites them", async () => {
    const filePath = join(tempDir, "legacy.json");
    writeFileSync(filePath, JSON.stringify({ token_budget: 5000, memory_dir: "/srv/old" }));

    const config = await loadConfig(filePath, {});
    expect(config.memory.tokenBudget).toBe(5000);
    expect(config.memory.sessionDir).toBe("/srv/old");

    const rewritten: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
    expect(rewritten).toEqual({
      memory: { tokenBudget: 5000, sessionDir: "/srv/old" },
      configVersion: 1,
    });
  });

  it("throws a ConfigError on invalid JSON or JSON5", async () => {
    const filePath = join(tempDir, "bad.json");
    writeFileSync(filePath, "not json{");
    await expect(loadConfig(filePath, {})).rejects.toThrow(ConfigError);
    await expect(loadConfig(filePath, {})).rejects.toThrow(/not valid JSON or JSON5/);
  });

  it("throws when the file is not an object", async () => {
    const filePath = join(tempDir, "array.json");
    writeFileSync(filePath, "[1, 2]");
    await expect(loadConfig(filePath, {})).rejects.toThrow(/must contain an object/);
  });

  it("throws on schema-invalid config", async () => {
    const filePath = join(tempDir, "invalid.json");
    writeFileSync(filePath, JSON.stringify({ configVersion: 1, memory: { tokenBudget: 0 } }));
    await expect(loadConfig(filePath, {})).rejects.toThrow(/memory\.tokenBudget/);
  });

  it("derives the recall budget from a small token budget", async () => {
    const config = await loadConfig(undefined, { PARLEY_TOKEN_BUDGET: "1000" });
    expect(config.memory.tokenBudget).toBe(1000);
    expect(config.memory.recallTokenBudget).toBe(1000);
  });

  it("accepts a file token budget below the default recall budget", async () => {
    const filePath = join(tempDir, "small.json");
    writeFileSync(filePath, JSON.stringify({ configVersion: 1, memory: { tokenBudget: 100 } }));

    const config = await loadConfig(filePath, {});
    expect(config.memory.recallTokenBudget).toBe(100);
  });

  it("reads the context budget from the environment", async () => {
    const config = await loadConfig(undefined, { PARLEY_CONTEXT_TOKEN_BUDGET: "4000" });
    expect(config.memory.contextTokenBudget).toBe(4000);
  });

  it("runs cross-field validation", async () => {
    await expect(
      loadConfig(undefined, { PARLEY_TOKEN_BUDGET: "1000", PARLEY_RECALL_TOKEN_BUDGET: "2000" }),
    ).rejects.toThrow(ConfigValidationError);
  });
});

describe("saveConfig / initializeConfig", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = makeTempDir();
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("saves with 0o600 permissions and loads back", async () => {
    const filePath = join(tempDir, "nested", "parley.json");
    const config = defaultConfig();
    await saveConfig(filePath, { ...config, memory: { ...config.memory, keepRecent: 3 } });

    expect(statSync(filePath).mode & 0o777).toBe(0o600);
    const loaded = await loadConfig(filePath, {});
    expect(loaded.memory.keepRecent).toBe(3);
  });

  it("writes a default config that loads without migration", async () => {
    const filePath = join(tempDir, "parley.json");
    const config = await initializeConfig(filePath);

    expect(existsSync(filePath)).toBe(true);
    expect(config.configVersion).toBe(1);
    const before = readFileSync(filePath, "utf-8");
    await loadConfig(filePath, {});
    expect(readFileSync(filePath, "utf-8")).toBe(before);
  });

  it("leaves the recall budget out of a fresh file", async () => {
    const filePath = join(tempDir, "parley.json");
    await initializeConfig(filePath);

    const written: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
    expect(written).toMatchObject({ configVersion: 1, memory: { tokenBudget: 6000 } });
    expect(written).not.toHaveProperty("memory.recallTokenBudget");

    const config = await loadConfig(filePath, { PARLEY_TOKEN_BUDGET: "1000" });
    expect(config.memory.recallTokenBudget).toBe(1000);
  });

  it("refuses to overwrite an existing config", async () => {
    const filePath = join(tempDir, "parley.json");
    writeFileSync(filePath, "{}");
    await expect(initializeConfig(filePath)).rejects.toThrow(/already exists/);
  });
});
