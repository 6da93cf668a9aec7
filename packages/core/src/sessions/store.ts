import { createHash } from "node:crypto";
import {
  existsSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  renameSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { basename, dirname, join } from "node:path";
import { SessionNotFoundError, SessionPersistenceError } from "../infra/errors.js";
import { createLogger } from "../infra/logger.js";
import { parseRecordLine, serializeSession } from "./records.js";
import { Session } from "./session.js";
import type { Message, SessionMeta, Summary } from "./types.js";

const log = createLogger("sessions");

const SESSION_EXTENSION = ".jsonl";
const BACKUP_SUFFIX = ".bak";

export interface LoadedSession {
  session: Session;
  /** Lines that were present but could not be used. */
  skipped: number;
}

export function backupPath(filePath: string): string {
  return `${filePath}${BACKUP_SUFFIX}`;
}

/**
 * Write a session as JSONL. An existing file is first renamed to its
 * `.bak` sibling, so a failed write leaves the previous state there.
 */
export function saveSession(session: Session, filePath: string): void {
  const content = serializeSession(session).join("\n") + "\n";

  try {
    mkdirSync(dirname(filePath), { recursive: true, mode: 0o700 });
    if (existsSync(filePath)) {
      renameSync(filePath, backupPath(filePath));
    }
    writeFileSync(filePath, content, { mode: 0o600 });
  } catch (err) {
    throw new SessionPersistenceError(
      `Failed to save session "${session.name}" to ${filePath}: ${
        err instanceof Error ? err.message : String(err)
      }`,
      filePath,
      err,
    );
  }

  log.info(
    `Session saved: ${filePath} (${session.messageCount} messages, ${session.summaries.length} summaries)`,
  );
}

/**
 * Read a session written by saveSession. Unusable lines are skipped with a
 * warning instead of failing the load; the term index is rebuilt from the
 * loaded messages.
 */
export function loadSession(
  filePath: string,
  options?: { now?: () => number },
): LoadedSession {
  if (!existsSync(filePath)) {
    throw new SessionNotFoundError(filePath);
  }

  const lines = readFileSync(filePath, "utf-8").split("\n");
  let meta: SessionMeta | undefined;
  const messages = new Map<number, Message>();
  const candidates: Summary[] = [];
  let skipped = 0;

  const skip = (lineNumber: number, reason: string): void => {
    skipped++;
    log.warn(`Skipping line ${lineNumber} in ${filePath}: ${reason}`);
  };

  for (const [i, line] of lines.entries()) {
    const lineNumber = i + 1;
    if (line.trim().length === 0) continue;

    const parsed = parseRecordLine(line);
    if (!parsed.ok) {
      skip(lineNumber, parsed.reason);
      continue;
    }

    const { record } = parsed;
    switch (record.type) {
      case "meta":
        if (meta) {
          skip(lineNumber, "duplicate meta record");
          continue;
        }
        meta = { name: record.name, createdAt: record.createdAt, model: record.model };
        continue;
      case "message":
        if (messages.has(record.id)) {
          skip(lineNumber, `duplicate message id ${record.id}`);
          continue;
        }
        messages.set(record.id, { ...record });
        continue;
      case "summary":
        if (record.fromId > record.toId) {
          skip(lineNumber, `summary span ${record.fromId}..${record.toId} is reversed`);
          continue;
        }
        candidates.push({ ...record });
        continue;
    }
  }

  // Spans must cover existing, compressed messages and never overlap
  const covered = new Set<number>();
  const summaries: Summary[] = [];
  for (const summary of [...candidates].sort((a, b) => a.fromId - b.fromId)) {
    let valid = true;
    for (let id = summary.fromId; id <= summary.toId; id++) {
      if (!messages.get(id)?.compressed || covered.has(id)) {
        valid = false;
        break;
      }
    }
    if (!valid) {
      skipped++;
      log.warn(
        `Skipping summary ${summary.fromId}..${summary.toId} in ${filePath}: span does not match compressed messages`,
      );
      continue;
    }
    for (let id = summary.fromId; id <= summary.toId; id++) covered.add(id);
    summaries.push(summary);
  }

  // A compressed message without its summary goes back into the active view
  for (const message of messages.values()) {
    if (message.compressed && !covered.has(message.id)) {
      message.compressed = false;
      log.warn(`Message ${message.id} in ${filePath} lost its summary; restoring it to the active view`);
    }
  }

  if (!meta) {
    log.warn(`No meta record in ${filePath}; deriving session metadata`);
    const first = [...messages.values()].sort((a, b) => a.id - b.id)[0];
    meta = {
      name: basename(filePath, SESSION_EXTENSION),
      createdAt: first?.createdAt ?? (options?.now ?? Date.now)(),
    };
  }

  const session = Session.restore(meta, [...messages.values()], summaries, options?.now);
  log.info(
    `Session loaded: ${meta.name} (${session.messageCount} messages, ${summaries.length} summaries, ${skipped} skipped)`,
  );

  return { session, skipped };
}

/**
 * Turn a free-form session name into a safe file name. Names that
 * sanitize to nothing get a short hash so distinct inputs stay distinct.
 */
export function sanitizeSessionName(name: string): string {
  // eslint-disable-next-line no-control-regex
  const cleaned = name.replace(/[<>:"/\\|?*\x00-\x1f]/g, "").trim().replace(/\s+/g, "_");
  if (cleaned.length === 0) {
    const hash = createHash("sha256").update(name).digest("hex").slice(0, 8);
    return `session_${hash}`;
  }
  return cleaned;
}

/**
 * Named sessions stored as `<name>.jsonl` files under one directory.
 */
export class SessionStore {
  private readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = baseDir;
    if (!existsSync(baseDir)) {
      mkdirSync(baseDir, { recursive: true, mode: 0o700 });
    }
  }

  get directory(): string {
    return this.baseDir;
  }

  pathFor(name: string): string {
    return join(this.baseDir, `${sanitizeSessionName(name)}${SESSION_EXTENSION}`);
  }

  /**
   * Save under `name` (default: the session's own name). Returns the path.
   */
  save(session: Session, name: string = session.name): string {
    const filePath = this.pathFor(name);
    saveSession(session, filePath);
    return filePath;
  }

  load(name: string, options?: { now?: () => number }): LoadedSession {
    return loadSession(this.pathFor(name), options);
  }

  exists(name: string): boolean {
    return existsSync(this.pathFor(name));
  }

  /**
   * Delete a saved session and its backup.
   */
  delete(name: string): boolean {
    const filePath = this.pathFor(name);
    if (!existsSync(filePath)) return false;
    rmSync(filePath);
    rmSync(backupPath(filePath), { force: true });
    return true;
  }

  /**
   * Sorted names of saved sessions.
   */
  list(): string[] {
    if (!existsSync(this.baseDir)) return [];
    return readdirSync(this.baseDir)
      .filter((f) => f.endsWith(SESSION_EXTENSION))
      .map((f) => f.slice(0, -SESSION_EXTENSION.length))
      .sort();
  }
}
