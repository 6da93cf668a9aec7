/**
 * Token counting utilities for context budget management.
 */

import type { SessionEntity } from "../sessions/types.js";

export interface TokenCounter {
  count(content: unknown): number;
  countEntities(entities: readonly SessionEntity[]): number;
}

/**
 * Flat cost charged for content that is not text (images, tool payloads).
 */
export const NON_TEXT_TOKEN_COST = 64;

/**
 * Character/4 heuristic. Approximates GPT-style BPE tokenisation without
 * requiring a tokeniser library. Every string costs at least one token.
 */
export function estimateTokens(content: unknown): number {
  if (typeof content !== "string") return NON_TEXT_TOKEN_COST;
  return Math.max(1, Math.ceil(content.length / 4));
}

export function createSimpleTokenCounter(): TokenCounter {
  return {
    count(content: unknown): number {
      return estimateTokens(content);
    },

    countEntities(entities: readonly SessionEntity[]): number {
      let total = 0;
      for (const entity of entities) {
        total += entity.tokens;
      }
      return total;
    },
  };
}
