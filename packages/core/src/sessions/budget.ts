import { compress, findEligibleSpans, type CompactionOptions } from "../agent/compaction.js";
import { createSimpleTokenCounter, type TokenCounter } from "../agent/token-counter.js";
import { ValidationError } from "../infra/errors.js";
import { createLogger } from "../infra/logger.js";
import type { Session } from "./session.js";
import type { Summary } from "./types.js";

const log = createLogger("sessions");

export interface BudgetOptions extends CompactionOptions {
  tokenBudget: number;
}

export interface CompressionReport {
  tokensBefore: number;
  tokensAfter: number;
  summaries: Summary[];
  budgetSatisfied: boolean;
}

/**
 * Keeps a session's active view within its token budget by compressing
 * the oldest eligible spans. Runs inline, before each outbound request.
 */
export class BudgetManager {
  private readonly counter: TokenCounter;

  constructor(private readonly options: BudgetOptions) {
    if (!Number.isInteger(options.tokenBudget) || options.tokenBudget < 1) {
      throw new ValidationError(`tokenBudget must be a positive integer, got ${options.tokenBudget}`);
    }
    if (!Number.isInteger(options.keepRecent) || options.keepRecent < 0) {
      throw new ValidationError(`keepRecent must be a non-negative integer, got ${options.keepRecent}`);
    }
    this.counter = options.counter ?? createSimpleTokenCounter();
  }

  get tokenBudget(): number {
    return this.options.tokenBudget;
  }

  /**
   * Estimated tokens of everything in the active view, summaries included.
   */
  activeTokens(session: Session): number {
    return this.counter.countEntities(session.activeEntities);
  }

  /**
   * Compress oldest-first until the active view fits the budget or nothing
   * eligible is left. Never raises the active token total.
   */
  async checkAndCompress(session: Session): Promise<CompressionReport> {
    const tokensBefore = this.activeTokens(session);
    const summaries: Summary[] = [];
    let tokens = tokensBefore;

    while (tokens > this.options.tokenBudget) {
      const [oldest] = findEligibleSpans(session, this.options);
      if (!oldest) break;

      const summary = await compress(session, oldest, {
        ...this.options,
        counter: this.counter,
      });
      if (!summary) break;

      summaries.push(summary);
      tokens = this.activeTokens(session);
    }

    const budgetSatisfied = tokens <= this.options.tokenBudget;
    if (summaries.length > 0) {
      log.debug(
        `Compression pass on "${session.name}": ${tokensBefore} -> ${tokens} tokens, ${summaries.length} span(s)`,
      );
    }
    if (!budgetSatisfied) {
      log.debug(
        `Session "${session.name}" is over budget (${tokens} > ${this.options.tokenBudget}) with nothing left to compress`,
      );
    }

    return { tokensBefore, tokensAfter: tokens, summaries, budgetSatisfied };
  }
}
