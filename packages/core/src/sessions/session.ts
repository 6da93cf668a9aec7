import { scoreImportance } from "../agent/importance.js";
import { estimateTokens } from "../agent/token-counter.js";
import type { MessageRole } from "../agent/types.js";
import { TermIndex } from "../memory/term-index.js";
import type { Message, SessionEntity, SessionMeta, Summary } from "./types.js";

export interface SessionInit {
  name: string;
  model?: string;
  createdAt?: number;
  /** Clock for message and summary timestamps. */
  now?: () => number;
}

/**
 * One conversation: the ordered active entities (messages and summaries),
 * every message ever appended, and the term index over those messages.
 *
 * Compression replaces runs of active messages with a summary, but the
 * messages themselves stay in the store and in the index.
 */
export class Session {
  name: string;
  readonly createdAt: number;
  model?: string;
  readonly index = new TermIndex();

  private readonly entities: SessionEntity[] = [];
  private readonly messages = new Map<number, Message>();
  private nextId = 1;
  private readonly clock: () => number;

  constructor(init: SessionInit) {
    this.clock = init.now ?? Date.now;
    this.name = init.name;
    this.model = init.model;
    this.createdAt = init.createdAt ?? this.clock();
  }

  get meta(): SessionMeta {
    return { name: this.name, createdAt: this.createdAt, model: this.model };
  }

  /** Active view, in order. This is what gets sent to the model. */
  get activeEntities(): readonly SessionEntity[] {
    return this.entities;
  }

  /** Every message ever appended, in id order, compressed or not. */
  get allMessages(): Message[] {
    return [...this.messages.values()];
  }

  get summaries(): Summary[] {
    return this.entities.filter((e): e is Summary => e.type === "summary");
  }

  get messageCount(): number {
    return this.messages.size;
  }

  get lastMessageId(): number {
    return this.nextId - 1;
  }

  now(): number {
    return this.clock();
  }

  getMessage(id: number): Message | undefined {
    return this.messages.get(id);
  }

  /** Ids of messages currently in the active view. */
  activeMessageIds(): Set<number> {
    const ids = new Set<number>();
    for (const entity of this.entities) {
      if (entity.type === "message") ids.add(entity.id);
    }
    return ids;
  }

  /**
   * Position in the active view where the always-uncompressed tail begins.
   */
  recentWindowStart(keepRecent: number): number {
    return Math.max(0, this.entities.length - Math.max(0, keepRecent));
  }

  append(role: MessageRole, content: string): Message {
    const message: Message = {
      type: "message",
      id: this.nextId++,
      role,
      content,
      createdAt: this.clock(),
      tokens: estimateTokens(content),
      importance: scoreImportance({ role, content }),
      compressed: false,
    };

    this.messages.set(message.id, message);
    this.entities.push(message);
    this.index.add(message.id, content);
    return message;
  }

  /**
   * Replace `count` active entities starting at `start` with `summary`
   * and mark the replaced messages compressed. Callers validate the span.
   */
  replaceSpan(start: number, count: number, summary: Summary): Message[] {
    const replaced = this.entities.splice(start, count, summary);
    const messages: Message[] = [];
    for (const entity of replaced) {
      if (entity.type !== "message") continue;
      entity.compressed = true;
      messages.push(entity);
    }
    return messages;
  }

  /**
   * Recompute importance for every message with its current age.
   */
  rescore(): void {
    const last = this.lastMessageId;
    for (const message of this.messages.values()) {
      message.importance = scoreImportance(message, last - message.id);
    }
  }

  /**
   * Rebuild a session from persisted parts. Active messages (by id) and
   * summaries (by the first id they cover) are merged into one ordered
   * view, and every message is replayed into a fresh index.
   */
  static restore(
    meta: SessionMeta,
    messages: readonly Message[],
    summaries: readonly Summary[],
    now?: () => number,
  ): Session {
    const session = new Session({ ...meta, now });
    const ordered = [...messages].sort((a, b) => a.id - b.id);

    for (const message of ordered) {
      session.messages.set(message.id, message);
      session.index.add(message.id, message.content);
    }
    session.nextId = (ordered[ordered.length - 1]?.id ?? 0) + 1;

    const active: SessionEntity[] = [
      ...ordered.filter((m) => !m.compressed),
      ...summaries,
    ];
    active.sort((a, b) => entityPosition(a) - entityPosition(b));
    session.entities.push(...active);

    return session;
  }
}

export function entityPosition(entity: SessionEntity): number {
  return entity.type === "message" ? entity.id : entity.fromId;
}
