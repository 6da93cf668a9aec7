import { existsSync, mkdirSync, readFileSync, rmSync } from "node:fs";
import { randomBytes } from "node:crypto";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { SessionPersistenceError } from "../infra/errors.js";
import { Session } from "./session.js";
import { backupPath, loadSession, saveSession } from "./store.js";

const disk = vi.hoisted(() => ({ full: false }));

vi.mock("node:fs", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs")>();
  return {
    ...actual,
    writeFileSync: vi.fn((...args: Parameters<typeof actual.writeFileSync>) => {
      if (disk.full) throw new Error("ENOSPC: no space left on device");
      actual.writeFileSync(...args);
    }),
  };
});

describe("saveSession when the write fails", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = join(tmpdir(), `parley-store-write-test-${randomBytes(8).toString("hex")}`);
    mkdirSync(tempDir, { recursive: true });
  });

  afterEach(() => {
    disk.full = false;
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("leaves the previous save in the backup", () => {
    const filePath = join(tempDir, "demo.jsonl");
    const session = new Session({ name: "demo", now: () => 1_000 });
    session.append("user", "first turn");
    saveSession(session, filePath);
    const firstSave = readFileSync(filePath, "utf-8");

    session.append("assistant", "second turn");
    disk.full = true;

    expect(() => saveSession(session, filePath)).toThrow(SessionPersistenceError);
    expect(existsSync(filePath)).toBe(false);
    expect(readFileSync(backupPath(filePath), "utf-8")).toBe(firstSave);
    expect(loadSession(backupPath(filePath)).session.messageCount).toBe(1);
  });

  it("reports the target file and the cause", () => {
    const filePath = join(tempDir, "demo.jsonl");
    const session = new Session({ name: "demo", now: () => 1_000 });
    disk.full = true;

    let caught: unknown;
    try {
      saveSession(session, filePath);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(SessionPersistenceError);
    expect(caught).toMatchObject({ filePath });
    expect(caught).toHaveProperty("message", expect.stringContaining("ENOSPC"));
  });
});
