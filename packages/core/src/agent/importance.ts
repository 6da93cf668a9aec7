/**
 * Retention-priority scoring for conversation messages.
 *
 * Structural signals (code blocks, decision language, length) dominate.
 * Age only contributes a small tie-breaker that is always smaller than the
 * smallest structural increment, so an older message with a signal still
 * outranks a newer one without it.
 */

import type { MessageRole } from "./types.js";

/** Messages scoring strictly above this are never summarized. */
export const IMPORTANCE_THRESHOLD = 0.7;

const ROLE_WEIGHT: Record<MessageRole, number> = {
  assistant: 0.25,
  user: 0.2,
  system: 0.15,
};

const CODE_BLOCK_BONUS = 0.55;
const DECISION_BONUS = 0.2;
const LENGTH_BONUS = 0.1;
const FILLER_PENALTY = 0.1;
const RECENCY_WEIGHT = 0.04;

const SUBSTANTIVE_LENGTH = 200;
const SHORT_MESSAGE_LENGTH = 20;

const DECISION_PATTERN =
  /\b(decided|agreed|must|requirements?|required|important|errors?|fix|fixed|breaking|critical|should|need to)\b/i;

const FILLER_PATTERN =
  /^(ok|okay|k|sure|thanks|thank you|thx|ty|cool|nice|great|got it|sounds good|yes|yep|yeah|no|nope|hi|hello|hey|lol|np|no problem|alright)[\s!.?]*$/i;

export interface ImportanceInput {
  role: MessageRole;
  content: string;
}

export function hasCodeBlock(content: string): boolean {
  return content.includes("```");
}

export function hasDecisionLanguage(content: string): boolean {
  return DECISION_PATTERN.test(content);
}

export function isFiller(content: string): boolean {
  const trimmed = content.trim();
  if (hasCodeBlock(trimmed) || hasDecisionLanguage(trimmed)) return false;
  return trimmed.length < SHORT_MESSAGE_LENGTH || FILLER_PATTERN.test(trimmed);
}

/**
 * Score a message in [0, 1]. `age` is the number of messages appended
 * after it (0 for the newest).
 */
export function scoreImportance(message: ImportanceInput, age: number = 0): number {
  const { content } = message;
  let score = ROLE_WEIGHT[message.role];

  const structural =
    hasCodeBlock(content) ||
    hasDecisionLanguage(content) ||
    content.length > SUBSTANTIVE_LENGTH;

  if (hasCodeBlock(content)) score += CODE_BLOCK_BONUS;
  if (hasDecisionLanguage(content)) score += DECISION_BONUS;
  if (content.length > SUBSTANTIVE_LENGTH) score += LENGTH_BONUS;
  if (!structural && isFiller(content)) score -= FILLER_PENALTY;

  score += RECENCY_WEIGHT / (1 + Math.max(0, age));

  return Math.min(1, Math.max(0, score));
}

export function isRetentionExempt(
  importance: number,
  threshold: number = IMPORTANCE_THRESHOLD,
): boolean {
  return importance > threshold;
}
