import { createSimpleTokenCounter } from "../agent/token-counter.js";
import type { ParleyConfig } from "../config/types.js";
import { recall, type RecallChunk } from "../memory/recall.js";
import { computeStats } from "../sessions/memory.js";
import type { SessionStore } from "../sessions/store.js";
import type { SessionStats } from "../sessions/types.js";

export interface InspectResult {
  stats: SessionStats;
  skipped: number;
}

export function inspectSession(store: SessionStore, name: string): InspectResult {
  const { session, skipped } = store.load(name);
  return { stats: computeStats(session, createSimpleTokenCounter()), skipped };
}

/**
 * Recall against a saved session with the configured limits.
 */
export function recallFromSession(
  store: SessionStore,
  name: string,
  query: string,
  memory: ParleyConfig["memory"],
): RecallChunk[] {
  const { session } = store.load(name);
  return recall(session, query, {
    topK: memory.recallTopK,
    tokenBudget: memory.recallTokenBudget,
    minScore: memory.recallMinScore,
  });
}

export function formatSessionList(names: readonly string[], directory: string): string {
  if (names.length === 0) return `No saved sessions in ${directory}`;
  return [`Sessions in ${directory}:`, ...names.map((name) => `  ${name}`)].join("\n");
}

export function formatStats({ stats, skipped }: InspectResult): string {
  const lines = [
    `Session: ${stats.name}`,
    ...(stats.model ? [`  Model: ${stats.model}`] : []),
    `  Messages: ${stats.totalMessages} (${stats.activeMessages} active, ${stats.indexedMessages} indexed)`,
    `  Summaries: ${stats.summaries}`,
    `  Active tokens: ${stats.activeTokens}`,
  ];
  if (skipped > 0) lines.push(`  Skipped lines: ${skipped}`);
  return lines.join("\n");
}

export function formatRecall(chunks: readonly RecallChunk[]): string {
  if (chunks.length === 0) return "No matching earlier messages.";
  return chunks
    .map(
      (chunk) =>
        `#${chunk.messageId} [${chunk.role}] score=${chunk.score.toFixed(3)} tokens=${chunk.tokens}\n${chunk.content}`,
    )
    .join("\n\n");
}
