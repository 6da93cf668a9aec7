import { clampToTokens } from "../agent/compaction.js";
import { createSimpleTokenCounter, type TokenCounter } from "../agent/token-counter.js";
import type { ChatMessage } from "../agent/types.js";
import { createLogger } from "../infra/logger.js";
import { recall, type RecallChunk, type RecallOptions } from "../memory/recall.js";
import type { Session } from "./session.js";
import type { SessionEntity } from "./types.js";

const log = createLogger("context");

/**
 * Material for one outbound model request. The user input itself is not
 * included; the chat loop appends it.
 */
export interface ContextPayload {
  entities: readonly SessionEntity[];
  recalled: RecallChunk[];
  activeTokens: number;
  recalledTokens: number;
}

export interface ContextOptions extends RecallOptions {
  counter?: TokenCounter;
  /**
   * Ceiling for the whole payload. Messages always go in; summaries may
   * take half of what they leave, recalled chunks the rest.
   */
  contextTokenBudget?: number;
}

/**
 * Fit summaries into `limit` tokens, oldest first. Summaries past the
 * limit are left out; the one crossing it is cut. The session keeps its
 * own copies untouched.
 */
function fitSummaries(
  active: readonly SessionEntity[],
  limit: number,
  counter: TokenCounter,
): SessionEntity[] {
  let left = limit;
  const fitted: SessionEntity[] = [];

  for (const entity of active) {
    if (entity.type === "message") {
      fitted.push(entity);
      continue;
    }
    if (left <= 0) continue;
    if (entity.tokens <= left) {
      fitted.push(entity);
      left -= entity.tokens;
      continue;
    }
    const text = clampToTokens(entity.text, left, counter);
    const tokens = counter.count(text);
    fitted.push({ ...entity, text, tokens });
    left -= tokens;
  }

  return fitted;
}

export function buildContextPayload(
  session: Session,
  userInput: string,
  options: ContextOptions,
): ContextPayload {
  const counter = options.counter ?? createSimpleTokenCounter();
  const active = session.activeEntities;
  let entities: SessionEntity[] = [...active];
  let recallBudget = options.tokenBudget;

  if (options.contextTokenBudget !== undefined) {
    const messageTokens = counter.countEntities(active.filter((e) => e.type === "message"));
    const summaryTokens = counter.countEntities(active) - messageTokens;
    const summaryLimit = Math.floor((options.contextTokenBudget - messageTokens) / 2);

    if (summaryTokens > 0 && summaryTokens > summaryLimit) {
      entities = fitSummaries(active, summaryLimit, counter);
      log.debug(
        `Summaries for "${session.name}" cut from ${summaryTokens} to ` +
          `${counter.countEntities(entities) - messageTokens} tokens`,
      );
    }
    const left = options.contextTokenBudget - counter.countEntities(entities);
    recallBudget = Math.max(0, Math.min(recallBudget, left));
  }

  const recalled = recall(session, userInput, { ...options, tokenBudget: recallBudget, counter });

  return {
    entities,
    recalled,
    activeTokens: counter.countEntities(entities),
    recalledTokens: recalled.reduce((sum, chunk) => sum + chunk.tokens, 0),
  };
}

/**
 * Render a payload as chat messages: recalled context first, then the
 * active view with summaries as system messages.
 */
export function toChatMessages(payload: ContextPayload): ChatMessage[] {
  const messages: ChatMessage[] = [];

  if (payload.recalled.length > 0) {
    const body = payload.recalled
      .map((chunk) => `[${chunk.role.toUpperCase()}]: ${chunk.content}`)
      .join("\n\n");
    messages.push({ role: "system", content: `[Relevant earlier context]\n${body}` });
  }

  for (const entity of payload.entities) {
    if (entity.type === "summary") {
      messages.push({ role: "system", content: `[Conversation summary]\n${entity.text}` });
    } else {
      messages.push({ role: entity.role, content: entity.content });
    }
  }

  return messages;
}
