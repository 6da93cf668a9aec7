/**
 * Summarization of compressed message spans.
 *
 * The summary text comes from an external completion capability (an LLM
 * call owned by the host). That call may fail, hang or return nothing; in
 * every such case a deterministic extractive summary is used instead, so
 * compression never blocks on or raises from the external call.
 */

import { createLogger } from "../infra/logger.js";
import type { Message } from "../sessions/types.js";
import { hasCodeBlock, hasDecisionLanguage } from "./importance.js";
import { createSimpleTokenCounter, type TokenCounter } from "./token-counter.js";
import type { ChatMessage } from "./types.js";

const log = createLogger("summarizer");

const SUMMARIZE_SYSTEM_PROMPT =
  "You are a conversation summarizer. Summarize the following conversation messages " +
  "concisely, preserving key decisions, action items, important facts, and context. " +
  "Keep the summary under 200 words. Focus on information that would be needed to " +
  "continue the conversation coherently.";

const MERGE_SUMMARIES_PROMPT =
  "Merge these partial summaries into a single cohesive summary. " +
  "Preserve decisions, action items, open questions, and any constraints.";

const EMPTY_SPAN_SUMMARY = "[Earlier conversation history was summarized]";

export const DEFAULT_SUMMARIZER_TIMEOUT_MS = 15_000;
export const FALLBACK_MAX_CHARS = 600;

const TRUNCATION_MARKER = "\n[...]\n";
const MESSAGE_OVERHEAD = 4;
const SHORT_MESSAGE_LENGTH = 20;

export interface SummarizerConfig {
  /** Provider's complete function. */
  complete: (messages: ChatMessage[]) => Promise<string>;
  /** Upper bound for the whole summarization, in milliseconds. No retries. */
  timeoutMs?: number;
  /** Token budget to reserve for the summary response; sizes the input chunks. */
  reserveTokens?: number;
}

export interface SpanSummary {
  text: string;
  source: "summarizer" | "fallback";
}

export class SummarizerTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Summarizer timed out after ${timeoutMs}ms`);
    this.name = "SummarizerTimeoutError";
  }
}

type SpanMessage = Pick<Message, "role" | "content">;

function formatMessagesForSummary(messages: readonly SpanMessage[]): string {
  return messages
    .map((m) => `[${m.role.toUpperCase()}]: ${m.content}`)
    .join("\n\n");
}

/**
 * Chunk messages by maximum token count per chunk.
 */
export function chunkMessagesByMaxTokens<T extends SpanMessage>(
  messages: readonly T[],
  maxTokensPerChunk: number,
  counter: TokenCounter,
): T[][] {
  if (messages.length === 0) return [];

  const chunks: T[][] = [];
  let currentChunk: T[] = [];
  let currentTokens = 0;

  for (const msg of messages) {
    const msgTokens = counter.count(msg.content) + MESSAGE_OVERHEAD;
    if (currentChunk.length > 0 && currentTokens + msgTokens > maxTokensPerChunk) {
      chunks.push(currentChunk);
      currentChunk = [];
      currentTokens = 0;
    }
    currentChunk.push(msg);
    currentTokens += msgTokens;

    // A single oversized message is flushed as its own chunk
    if (msgTokens > maxTokensPerChunk) {
      chunks.push(currentChunk);
      currentChunk = [];
      currentTokens = 0;
    }
  }

  if (currentChunk.length > 0) {
    chunks.push(currentChunk);
  }

  return chunks;
}

/**
 * Keep the first and last part of `text`, `maxChars` characters in total.
 */
export function headAndTail(text: string, maxChars: number = FALLBACK_MAX_CHARS): string {
  if (text.length <= maxChars) return text;
  const room = Math.max(0, maxChars - TRUNCATION_MARKER.length);
  const head = Math.ceil(room / 2);
  const tail = room - head;
  return text.slice(0, head) + TRUNCATION_MARKER + text.slice(text.length - tail);
}

/**
 * Pull questions, decision lines and fenced code out of a span.
 * Short pleasantries are dropped and near-duplicates collapsed.
 */
export function distillFacts(messages: readonly SpanMessage[]): string {
  const facts: string[] = [];

  for (const msg of messages) {
    const { content } = msg;
    if (content.length < SHORT_MESSAGE_LENGTH && !hasCodeBlock(content)) continue;

    const label = `[${msg.role.toUpperCase()}]`;
    let codeLines: string[] | null = null;

    for (const line of content.split("\n")) {
      const stripped = line.trim();

      if (stripped.startsWith("```")) {
        if (codeLines) {
          codeLines.push(line);
          facts.push(codeLines.join("\n"));
          codeLines = null;
        } else {
          codeLines = [line];
        }
        continue;
      }

      if (codeLines) {
        codeLines.push(line);
        continue;
      }

      if (stripped.endsWith("?") || hasDecisionLanguage(stripped)) {
        facts.push(`${label}: ${stripped}`);
      }
    }

    // Unclosed fence: keep the partial code, closed
    if (codeLines) {
      codeLines.push("```");
      facts.push(codeLines.join("\n"));
    }
  }

  const seen = new Set<string>();
  const unique: string[] = [];
  for (const fact of facts) {
    const normalized = fact.trim().toLowerCase().replace(/\s+/g, " ");
    if (seen.has(normalized)) continue;
    seen.add(normalized);
    unique.push(fact);
  }

  return unique.join("\n");
}

/**
 * Deterministic local summary: distilled facts when there are any,
 * otherwise the raw span, cut to the first and last portion.
 */
export function extractiveSummary(
  messages: readonly SpanMessage[],
  maxChars: number = FALLBACK_MAX_CHARS,
): string {
  if (messages.length === 0) return EMPTY_SPAN_SUMMARY;
  const distilled = distillFacts(messages);
  return headAndTail(distilled || formatMessagesForSummary(messages), maxChars);
}

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new SummarizerTimeoutError(timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Summarize a span of messages.
 *
 * Strategy:
 * 1. Without a summarizer, use the extractive summary.
 * 2. If the span fits in one chunk, summarize it directly; otherwise
 *    summarize each chunk and merge the partial summaries.
 * 3. On error, timeout or empty output, use the extractive summary.
 */
export async function summarizeSpan(
  messages: readonly SpanMessage[],
  summarizer?: SummarizerConfig,
  counter: TokenCounter = createSimpleTokenCounter(),
): Promise<SpanSummary> {
  if (messages.length === 0 || !summarizer) {
    return { text: extractiveSummary(messages), source: "fallback" };
  }

  const timeoutMs = summarizer.timeoutMs ?? DEFAULT_SUMMARIZER_TIMEOUT_MS;

  try {
    const text = (
      await withTimeout(summarizeWithModel(messages, summarizer, counter), timeoutMs)
    ).trim();
    if (text.length === 0) {
      log.warn("Summarizer returned empty text, using extractive fallback");
      return { text: extractiveSummary(messages), source: "fallback" };
    }
    return { text, source: "summarizer" };
  } catch (error) {
    log.warn(
      `Summarization failed, using extractive fallback: ${
        error instanceof Error ? error.message : String(error)
      }`,
    );
    return { text: extractiveSummary(messages), source: "fallback" };
  }
}

async function summarizeWithModel(
  messages: readonly SpanMessage[],
  config: SummarizerConfig,
  counter: TokenCounter,
): Promise<string> {
  const reserveTokens = config.reserveTokens ?? 2048;
  const maxChunkTokens = Math.max(1000, reserveTokens * 4);
  const chunks = chunkMessagesByMaxTokens(messages, maxChunkTokens, counter);

  if (chunks.length <= 1) {
    return summarizeSingleChunk(chunks[0] ?? messages, config);
  }

  const partialSummaries: string[] = [];
  for (const chunk of chunks) {
    partialSummaries.push(await summarizeSingleChunk(chunk, config));
  }

  return mergeSummaries(partialSummaries, config);
}

async function summarizeSingleChunk(
  messages: readonly SpanMessage[],
  config: SummarizerConfig,
): Promise<string> {
  return config.complete([
    { role: "system", content: SUMMARIZE_SYSTEM_PROMPT },
    { role: "user", content: formatMessagesForSummary(messages) },
  ]);
}

async function mergeSummaries(
  summaries: string[],
  config: SummarizerConfig,
): Promise<string> {
  const mergeInput = summaries
    .map((s, i) => `--- Part ${i + 1} ---\n${s}`)
    .join("\n\n");

  return config.complete([
    { role: "system", content: MERGE_SUMMARIES_PROMPT },
    { role: "user", content: mergeInput },
  ]);
}
