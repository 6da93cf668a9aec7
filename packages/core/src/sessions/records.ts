import { z } from "zod";
import { MESSAGE_ROLES } from "../agent/types.js";
import type { Session } from "./session.js";
import type { Message, SessionMeta, Summary } from "./types.js";

/**
 * On-disk format: JSON Lines, one self-describing record per line.
 * A `meta` record comes first, then every message in id order with each
 * summary directly after the last message of its span.
 */

export const SESSION_FORMAT_VERSION = 1;

export const MetaRecordSchema = z.object({
  type: z.literal("meta"),
  version: z.literal(SESSION_FORMAT_VERSION),
  name: z.string().min(1),
  createdAt: z.number(),
  model: z.string().optional(),
});

export const MessageRecordSchema = z.object({
  type: z.literal("message"),
  id: z.number().int().positive(),
  role: z.enum(MESSAGE_ROLES),
  content: z.string(),
  createdAt: z.number(),
  tokens: z.number().int().min(0),
  importance: z.number().min(0).max(1),
  compressed: z.boolean(),
});

export const SummaryRecordSchema = z.object({
  type: z.literal("summary"),
  fromId: z.number().int().positive(),
  toId: z.number().int().positive(),
  text: z.string(),
  tokens: z.number().int().min(0),
  createdAt: z.number(),
});

export const SessionRecordSchema = z.discriminatedUnion("type", [
  MetaRecordSchema,
  MessageRecordSchema,
  SummaryRecordSchema,
]);

export type MetaRecord = z.infer<typeof MetaRecordSchema>;
export type SessionRecord = z.infer<typeof SessionRecordSchema>;

export type ParsedLine =
  | { ok: true; record: SessionRecord }
  | { ok: false; reason: string };

export function parseRecordLine(line: string): ParsedLine {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (err) {
    return { ok: false, reason: `invalid JSON (${err instanceof Error ? err.message : String(err)})` };
  }

  const result = SessionRecordSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (i) => `${i.path.join(".") || "<root>"}: ${i.message}`,
    );
    return { ok: false, reason: issues.join("; ") };
  }
  return { ok: true, record: result.data };
}

export function metaRecord(meta: SessionMeta): MetaRecord {
  return {
    type: "meta",
    version: SESSION_FORMAT_VERSION,
    name: meta.name,
    createdAt: meta.createdAt,
    ...(meta.model !== undefined && { model: meta.model }),
  };
}

export function messageRecord(message: Message): Message {
  return {
    type: "message",
    id: message.id,
    role: message.role,
    content: message.content,
    createdAt: message.createdAt,
    tokens: message.tokens,
    importance: message.importance,
    compressed: message.compressed,
  };
}

export function summaryRecord(summary: Summary): Summary {
  return {
    type: "summary",
    fromId: summary.fromId,
    toId: summary.toId,
    text: summary.text,
    tokens: summary.tokens,
    createdAt: summary.createdAt,
  };
}

/**
 * Serialize a session to JSONL lines (without trailing newlines).
 */
export function serializeSession(session: Session): string[] {
  const summariesByLastId = new Map<number, Summary>();
  for (const summary of session.summaries) {
    summariesByLastId.set(summary.toId, summary);
  }

  const lines = [JSON.stringify(metaRecord(session.meta))];
  for (const message of session.allMessages) {
    lines.push(JSON.stringify(messageRecord(message)));
    const summary = summariesByLastId.get(message.id);
    if (summary) lines.push(JSON.stringify(summaryRecord(summary)));
  }
  return lines;
}
