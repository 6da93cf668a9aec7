import type { MessageRole } from "../agent/types.js";

/**
 * One conversational turn. Only `compressed` (and `importance`, when
 * rescored) changes after creation.
 */
export interface Message {
  type: "message";
  id: number;
  role: MessageRole;
  content: string;
  createdAt: number;
  tokens: number;
  importance: number;
  compressed: boolean;
}

/**
 * Stand-in for the inclusive message id span `fromId..toId`.
 */
export interface Summary {
  type: "summary";
  fromId: number;
  toId: number;
  text: string;
  tokens: number;
  createdAt: number;
}

export type SessionEntity = Message | Summary;

export interface MessageSpan {
  fromId: number;
  toId: number;
}

export interface SessionMeta {
  name: string;
  createdAt: number;
  model?: string;
}

export interface SessionStats {
  name: string;
  model?: string;
  activeEntities: number;
  activeMessages: number;
  totalMessages: number;
  summaries: number;
  indexedMessages: number;
  activeTokens: number;
}

/**
 * Tuning shared by the budget manager, compressor and recall engine.
 */
export interface MemoryOptions {
  tokenBudget: number;
  keepRecent: number;
  importanceThreshold: number;
  recallTopK: number;
  recallTokenBudget: number;
  recallMinScore: number;
  /** Ceiling for one assembled context: active view plus recalled chunks. */
  contextTokenBudget: number;
}

export function isMessage(entity: SessionEntity): entity is Message {
  return entity.type === "message";
}

export function isSummary(entity: SessionEntity): entity is Summary {
  return entity.type === "summary";
}
