/**
 * Span compression for session history.
 *
 * Replaces a run of older active messages with one summary, keeping the
 * most recent entities and every retention-exempt message verbatim.
 */

import { createLogger } from "../infra/logger.js";
import type { Session } from "../sessions/session.js";
import type { Message, MessageSpan, Summary } from "../sessions/types.js";
import { IMPORTANCE_THRESHOLD, isRetentionExempt } from "./importance.js";
import { headAndTail, summarizeSpan, type SummarizerConfig } from "./summarizer.js";
import { createSimpleTokenCounter, type TokenCounter } from "./token-counter.js";

const log = createLogger("compaction");

/**
 * A summary may cost at most this share of the span it replaces, so a
 * compression never raises the active token total.
 */
const SUMMARY_TOKEN_RATIO = 0.5;

const MIN_HEAD_TAIL_CHARS = 16;

export interface CompactionOptions {
  keepRecent: number;
  importanceThreshold?: number;
  summarizer?: SummarizerConfig;
  counter?: TokenCounter;
}

interface LocatedSpan {
  start: number;
  messages: Message[];
}

function isCompressible(message: Message, threshold: number): boolean {
  return !message.compressed && !isRetentionExempt(message.importance, threshold);
}

/**
 * Eligible spans, oldest first: maximal runs of consecutive active,
 * non-exempt messages before the recent window. Summaries and exempt
 * messages end a run.
 */
export function findEligibleSpans(
  session: Session,
  options: CompactionOptions,
): MessageSpan[] {
  const threshold = options.importanceThreshold ?? IMPORTANCE_THRESHOLD;
  const limit = session.recentWindowStart(options.keepRecent);
  const entities = session.activeEntities;
  const spans: MessageSpan[] = [];
  let run: Message[] = [];

  const flush = (): void => {
    const first = run[0];
    const last = run[run.length - 1];
    if (first && last) spans.push({ fromId: first.id, toId: last.id });
    run = [];
  };

  for (let i = 0; i < limit; i++) {
    const entity = entities[i];
    if (entity?.type === "message" && isCompressible(entity, threshold)) {
      run.push(entity);
    } else {
      flush();
    }
  }
  flush();

  return spans;
}

function locateSpan(
  session: Session,
  span: MessageSpan,
  options: CompactionOptions,
): LocatedSpan | null {
  if (!Number.isInteger(span.fromId) || !Number.isInteger(span.toId)) return null;
  if (span.fromId > span.toId) return null;

  const entities = session.activeEntities;
  const start = entities.findIndex((e) => e.type === "message" && e.id === span.fromId);
  if (start < 0) return null;

  const count = span.toId - span.fromId + 1;
  if (start + count > session.recentWindowStart(options.keepRecent)) return null;

  const threshold = options.importanceThreshold ?? IMPORTANCE_THRESHOLD;
  const messages: Message[] = [];
  for (let offset = 0; offset < count; offset++) {
    const entity = entities[start + offset];
    if (entity?.type !== "message") return null;
    if (entity.id !== span.fromId + offset) return null;
    if (!isCompressible(entity, threshold)) return null;
    messages.push(entity);
  }

  return { start, messages };
}

/**
 * Cut `text` to at most `maxTokens`, keeping its head and tail.
 */
export function clampToTokens(text: string, maxTokens: number, counter: TokenCounter): string {
  if (counter.count(text) <= maxTokens) return text;

  const maxChars = maxTokens * 4;
  let result =
    maxChars >= MIN_HEAD_TAIL_CHARS ? headAndTail(text, maxChars) : text.slice(0, maxChars);
  while (result.length > 1 && counter.count(result) > maxTokens) {
    result = result.slice(0, Math.floor(result.length * 0.9));
  }
  return result;
}

/**
 * Compress one span into a summary placed where the span was.
 *
 * Returns null without changing anything when the span is not eligible:
 * unknown or non-consecutive ids, already summarized, touching the recent
 * window, or containing a retention-exempt message.
 */
export async function compress(
  session: Session,
  span: MessageSpan,
  options: CompactionOptions,
): Promise<Summary | null> {
  const located = locateSpan(session, span, options);
  if (!located) {
    log.debug(`Ignoring ineligible span ${span.fromId}..${span.toId}`);
    return null;
  }

  const counter = options.counter ?? createSimpleTokenCounter();
  const spanTokens = located.messages.reduce((sum, m) => sum + m.tokens, 0);
  const { text, source } = await summarizeSpan(located.messages, options.summarizer, counter);

  // The view may have moved while the summarizer ran
  const current = locateSpan(session, span, options);
  if (!current) {
    log.debug(`Span ${span.fromId}..${span.toId} changed during summarization`);
    return null;
  }

  const maxTokens = Math.max(1, Math.floor(spanTokens * SUMMARY_TOKEN_RATIO));
  const summaryText = clampToTokens(text, maxTokens, counter);
  const summary: Summary = {
    type: "summary",
    fromId: span.fromId,
    toId: span.toId,
    text: summaryText,
    tokens: counter.count(summaryText),
    createdAt: session.now(),
  };

  session.replaceSpan(current.start, current.messages.length, summary);
  log.debug(
    `Compressed messages ${span.fromId}..${span.toId} (${spanTokens} tokens) into a ${summary.tokens}-token summary (${source})`,
  );

  return summary;
}
