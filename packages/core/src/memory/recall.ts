/**
 * Recall of older messages relevant to the current user input.
 *
 * Messages still in the active view are already visible to the model and
 * are never returned. The result is cut to fit a token sub-budget.
 */

import { createSimpleTokenCounter, type TokenCounter } from "../agent/token-counter.js";
import type { MessageRole } from "../agent/types.js";
import type { Session } from "../sessions/session.js";

export const DEFAULT_RECALL_MIN_SCORE = 0.1;

export interface RecallChunk {
  messageId: number;
  role: MessageRole;
  content: string;
  score: number;
  tokens: number;
  createdAt: number;
}

export interface RecallOptions {
  topK: number;
  tokenBudget: number;
  minScore?: number;
  counter?: TokenCounter;
}

export function recall(
  session: Session,
  queryText: string,
  options: RecallOptions,
): RecallChunk[] {
  if (options.topK <= 0 || options.tokenBudget <= 0) return [];

  const counter = options.counter ?? createSimpleTokenCounter();
  const minScore = options.minScore ?? DEFAULT_RECALL_MIN_SCORE;
  const visible = session.activeMessageIds();

  // Ask for enough candidates to survive filtering out the active view
  const hits = session.index.query(queryText, options.topK + visible.size);

  const chunks: RecallChunk[] = [];
  let used = 0;
  for (const hit of hits) {
    if (chunks.length >= options.topK) break;
    if (hit.score < minScore) break;
    if (visible.has(hit.messageId)) continue;

    const message = session.getMessage(hit.messageId);
    if (!message) continue;

    const tokens = counter.count(message.content);
    if (used + tokens > options.tokenBudget) break;
    used += tokens;

    chunks.push({
      messageId: message.id,
      role: message.role,
      content: message.content,
      score: hit.score,
      tokens,
      createdAt: message.createdAt,
    });
  }

  return chunks;
}
