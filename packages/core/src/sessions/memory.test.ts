import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { randomBytes } from "node:crypto";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { SummarizerConfig } from "../agent/summarizer.js";
import { defaultConfig } from "../config/defaults.js";
import { SessionPersistenceError, ValidationError } from "../infra/errors.js";
import {
  ConversationMemory,
  createConversationMemory,
  defaultSessionName,
} from "./memory.js";
import { SessionStore } from "./store.js";

const PLAIN = "x".repeat(160);

function makeTempDir(): string {
  const dir = join(tmpdir(), `parley-memory-test-${randomBytes(8).toString("hex")}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

describe("defaultSessionName", () => {
  it("uses a file-safe timestamp", () => {
    expect(defaultSessionName(0)).toBe("session-1970-01-01T00-00-00-000Z");
  });
});

describe("ConversationMemory", () => {
  let tempDir: string;
  let store: SessionStore;

  beforeEach(() => {
    tempDir = makeTempDir();
    store = new SessionStore(tempDir);
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  function makeMemory(extra: Partial<ConstructorParameters<typeof ConversationMemory>[0]> = {}) {
    return new ConversationMemory({
      store,
      sessionName: "chat",
      now: () => 0,
      memory: { tokenBudget: 100, keepRecent: 2 },
      ...extra,
    });
  }

  it("rejects invalid options at construction", () => {
    expect(() => makeMemory({ memory: { tokenBudget: 0 } })).toThrow(ValidationError);
    expect(() => makeMemory({ memory: { recallTopK: -1 } })).toThrow(ValidationError);
    expect(() => makeMemory({ memory: { recallTokenBudget: -1 } })).toThrow(ValidationError);
    expect(() => makeMemory({ memory: { contextTokenBudget: 0 } })).toThrow(ValidationError);
  });

  it("names the session from the clock when no name is given", () => {
    const memory = new ConversationMemory({ store, now: () => 0 });
    expect(memory.name).toBe("session-1970-01-01T00-00-00-000Z");
  });

  it("compresses as part of add", async () => {
    const memory = makeMemory();

    await memory.add("user", PLAIN);
    await memory.add("assistant", PLAIN);
    const { message, compression } = await memory.add("user", PLAIN);

    expect(message.id).toBe(3);
    expect(compression.tokensBefore).toBe(120);
    expect(compression.tokensAfter).toBe(100);
    expect(await memory.stats()).toEqual({
      name: "chat",
      model: undefined,
      activeEntities: 3,
      activeMessages: 2,
      totalMessages: 3,
      summaries: 1,
      indexedMessages: 3,
      activeTokens: 100,
    });
  });

  it("serializes overlapping calls", async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const complete = vi.fn<SummarizerConfig["complete"]>(async () => {
      await gate;
      return "summary";
    });
    const memory = makeMemory({ summarizer: { complete } });

    await memory.add("user", PLAIN);
    await memory.add("user", PLAIN);
    const third = memory.add("user", PLAIN);
    const fourth = memory.add("user", PLAIN);
    const stats = memory.stats();

    await vi.waitFor(() => expect(complete).toHaveBeenCalledTimes(1));
    release();

    expect((await third).message.id).toBe(3);
    expect((await fourth).message.id).toBe(4);
    // Both compressions ran before stats were taken
    expect((await stats).totalMessages).toBe(4);
    expect((await stats).summaries).toBe(2);
  });

  it("recalls compressed messages when building context", async () => {
    const memory = makeMemory();
    await memory.add("user", `kafka consumers stall during rebalance ${"y".repeat(121)}`);
    await memory.add("assistant", PLAIN);
    await memory.add("user", PLAIN);

    const payload = await memory.buildContext("why does kafka stall?");

    expect(payload.recalled.map((c) => c.messageId)).toEqual([1]);
    expect(payload.entities.map((e) => e.type)).toEqual(["summary", "message", "message"]);
  });

  it("saves, renames and loads sessions", async () => {
    const memory = makeMemory();
    await memory.add("user", "hello there, remember the blue config");

    expect(await memory.save()).toBe(join(tempDir, "chat.jsonl"));
    expect(await memory.save("renamed")).toBe(join(tempDir, "renamed.jsonl"));
    expect(memory.name).toBe("renamed");
    expect(await memory.listSessions()).toEqual(["chat", "renamed"]);

    const other = makeMemory();
    const result = await other.load("chat");

    expect(result).toEqual({ name: "chat", skipped: 0 });
    expect(other.name).toBe("chat");
    expect((await other.stats()).totalMessages).toBe(1);
    expect(other.current.index.has(1)).toBe(true);
  });

  it("keeps the old name when saving under a new one fails", async () => {
    const memory = makeMemory();
    await memory.add("user", "hello there");
    // A plain file where the sessions directory should be
    rmSync(tempDir, { recursive: true, force: true });
    writeFileSync(tempDir, "");

    await expect(memory.save("renamed")).rejects.toThrow(SessionPersistenceError);
    expect(memory.name).toBe("chat");
  });

  it("fits the context under its ceiling when exempt messages fill the view", async () => {
    const code = "```ts\nconst x = 1;\n```";
    const memory = makeMemory({
      memory: { tokenBudget: 10, keepRecent: 0, contextTokenBudget: 20 },
    });

    await memory.add("user", "the staging database password rotates weekly");
    await memory.add("assistant", code);
    await memory.add("assistant", code);
    const { compression } = await memory.add("assistant", code);
    expect(compression.budgetSatisfied).toBe(false);

    const payload = await memory.buildContext("when does the staging database rotate?");

    // 18 message tokens leave 2; the 5-token summary is cut to 1
    expect(payload.entities.map((e) => e.type)).toEqual([
      "summary",
      "message",
      "message",
      "message",
    ]);
    expect(payload.entities[0]?.tokens).toBe(1);
    expect(payload.activeTokens).toBe(19);
    // One token left cannot hold the 11-token original
    expect(payload.recalled).toEqual([]);
    expect((await memory.stats()).activeTokens).toBe(23);
  });

  it("rejects loading a session that does not exist", async () => {
    await expect(makeMemory().load("nope")).rejects.toThrow(/Session file not found/);
  });

  it("keeps working after a failed call", async () => {
    const memory = makeMemory();
    await expect(memory.load("nope")).rejects.toThrow();
    await memory.add("user", "still here");
    expect((await memory.stats()).totalMessages).toBe(1);
  });

  it("clears the session but keeps its name and model", async () => {
    const memory = makeMemory({ model: "test-model" });
    await memory.add("user", "something");

    await memory.clear();
    const stats = await memory.stats();

    expect(stats.name).toBe("chat");
    expect(stats.model).toBe("test-model");
    expect(stats.totalMessages).toBe(0);
    expect(stats.indexedMessages).toBe(0);
  });
});

describe("createConversationMemory", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = makeTempDir();
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("wires the store, limits, model and summarizer timeout from config", async () => {
    const base = defaultConfig();
    const config = {
      ...base,
      model: "test-model",
      memory: { ...base.memory, tokenBudget: 100, keepRecent: 2, sessionDir: join(tempDir, "s") },
      summarizer: { timeoutMs: 10 },
    };
    const complete = vi.fn<SummarizerConfig["complete"]>(() => new Promise<string>(() => {}));
    const memory = createConversationMemory(config, { complete, sessionName: "wired" });

    await memory.add("user", PLAIN);
    await memory.add("user", PLAIN);
    const { compression } = await memory.add("user", PLAIN);

    // The hanging summarizer hit the 10ms timeout and the fallback was used
    expect(complete).toHaveBeenCalledTimes(1);
    expect(compression.summaries).toHaveLength(1);
    expect((await memory.stats()).model).toBe("test-model");
    expect(await memory.save()).toBe(join(tempDir, "s", "wired.jsonl"));
  });
});
