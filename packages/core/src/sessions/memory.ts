import type { SummarizerConfig } from "../agent/summarizer.js";
import { createSimpleTokenCounter, type TokenCounter } from "../agent/token-counter.js";
import type { MessageRole } from "../agent/types.js";
import type { ParleyConfig } from "../config/types.js";
import { ValidationError } from "../infra/errors.js";
import { createLogger } from "../infra/logger.js";
import { DEFAULT_RECALL_MIN_SCORE } from "../memory/recall.js";
import { BudgetManager, type CompressionReport } from "./budget.js";
import { buildContextPayload, type ContextPayload } from "./context.js";
import { SessionLock } from "./lock.js";
import { Session } from "./session.js";
import { SessionStore } from "./store.js";
import type { Message, MemoryOptions, SessionStats } from "./types.js";

const log = createLogger("memory");

export const DEFAULT_MEMORY_OPTIONS: MemoryOptions = {
  tokenBudget: 6000,
  keepRecent: 10,
  importanceThreshold: 0.7,
  recallTopK: 3,
  recallTokenBudget: 1500,
  recallMinScore: DEFAULT_RECALL_MIN_SCORE,
  contextTokenBudget: 12_000,
};

export interface ConversationMemoryOptions {
  store: SessionStore;
  summarizer?: SummarizerConfig;
  counter?: TokenCounter;
  memory?: Partial<MemoryOptions>;
  sessionName?: string;
  model?: string;
  now?: () => number;
}

export interface AddResult {
  message: Message;
  compression: CompressionReport;
}

export interface LoadResult {
  name: string;
  skipped: number;
}

/**
 * Name for a session nobody named, e.g. `session-2026-10-18T09-30-00-000Z`.
 */
export function defaultSessionName(timestamp: number): string {
  return `session-${new Date(timestamp).toISOString().replace(/[:.]/g, "-")}`;
}

function resolveOptions(overrides: Partial<MemoryOptions> | undefined): MemoryOptions {
  const defaults = DEFAULT_MEMORY_OPTIONS;
  const options: MemoryOptions = {
    tokenBudget: overrides?.tokenBudget ?? defaults.tokenBudget,
    keepRecent: overrides?.keepRecent ?? defaults.keepRecent,
    importanceThreshold: overrides?.importanceThreshold ?? defaults.importanceThreshold,
    recallTopK: overrides?.recallTopK ?? defaults.recallTopK,
    recallTokenBudget: overrides?.recallTokenBudget ?? defaults.recallTokenBudget,
    recallMinScore: overrides?.recallMinScore ?? defaults.recallMinScore,
    contextTokenBudget: overrides?.contextTokenBudget ?? defaults.contextTokenBudget,
  };

  if (options.recallTopK < 0 || !Number.isInteger(options.recallTopK)) {
    throw new ValidationError(`recallTopK must be a non-negative integer, got ${options.recallTopK}`);
  }
  if (options.recallTokenBudget < 0) {
    throw new ValidationError(
      `recallTokenBudget must not be negative, got ${options.recallTokenBudget}`,
    );
  }
  if (options.contextTokenBudget <= 0) {
    throw new ValidationError(
      `contextTokenBudget must be positive, got ${options.contextTokenBudget}`,
    );
  }
  return options;
}

/**
 * Memory for one conversation. Appends turns, keeps the active view within
 * budget, recalls older messages for new input and persists through a
 * SessionStore. Calls on one instance run one at a time.
 */
export class ConversationMemory {
  private session: Session;
  private readonly lock = new SessionLock();
  private readonly budget: BudgetManager;
  private readonly options: MemoryOptions;
  private readonly counter: TokenCounter;
  private readonly store: SessionStore;
  private readonly clock: () => number;

  constructor(opts: ConversationMemoryOptions) {
    this.store = opts.store;
    this.clock = opts.now ?? Date.now;
    this.counter = opts.counter ?? createSimpleTokenCounter();
    this.options = resolveOptions(opts.memory);
    this.budget = new BudgetManager({
      tokenBudget: this.options.tokenBudget,
      keepRecent: this.options.keepRecent,
      importanceThreshold: this.options.importanceThreshold,
      summarizer: opts.summarizer,
      counter: this.counter,
    });
    this.session = new Session({
      name: opts.sessionName ?? defaultSessionName(this.clock()),
      model: opts.model,
      now: this.clock,
    });
  }

  get name(): string {
    return this.session.name;
  }

  /** The session currently held. Mutate it only through this object. */
  get current(): Session {
    return this.session;
  }

  /**
   * Append a turn, index it and compress until the budget holds (or nothing
   * eligible is left). Resolves once compression has finished.
   */
  add(role: MessageRole, content: string): Promise<AddResult> {
    return this.lock.runExclusive(async () => {
      const message = this.session.append(role, content);
      const compression = await this.budget.checkAndCompress(this.session);
      return { message, compression };
    });
  }

  /**
   * Active view plus recalled older messages for the given user input,
   * within the context token budget. Only the payload is cut to fit.
   */
  buildContext(userInput: string): Promise<ContextPayload> {
    return this.lock.runExclusive(() =>
      buildContextPayload(this.session, userInput, {
        topK: this.options.recallTopK,
        tokenBudget: this.options.recallTokenBudget,
        minScore: this.options.recallMinScore,
        contextTokenBudget: this.options.contextTokenBudget,
        counter: this.counter,
      }),
    );
  }

  /**
   * Persist the session. Saving under a new name renames the session.
   * Returns the file written.
   */
  save(name?: string): Promise<string> {
    return this.lock.runExclusive(() => {
      const previous = this.session.name;
      if (name !== undefined) this.session.name = name;
      try {
        return this.store.save(this.session);
      } catch (err) {
        this.session.name = previous;
        throw err;
      }
    });
  }

  /**
   * Replace the current session with a saved one.
   */
  load(name: string): Promise<LoadResult> {
    return this.lock.runExclusive(() => {
      const { session, skipped } = this.store.load(name, { now: this.clock });
      this.session = session;
      if (skipped > 0) {
        log.warn(`Session "${session.name}" loaded with ${skipped} unusable line(s) skipped`);
      }
      return { name: session.name, skipped };
    });
  }

  listSessions(): Promise<string[]> {
    return this.lock.runExclusive(() => this.store.list());
  }

  /**
   * Start over with an empty session under the same name and model.
   */
  clear(): Promise<void> {
    return this.lock.runExclusive(() => {
      const { name, model } = this.session;
      this.session = new Session({ name, model, now: this.clock });
      log.debug(`Session "${name}" cleared`);
    });
  }

  stats(): Promise<SessionStats> {
    return this.lock.runExclusive(() => computeStats(this.session, this.counter));
  }
}

export function computeStats(session: Session, counter: TokenCounter): SessionStats {
  const active = session.activeEntities;
  const activeMessages = active.filter((e) => e.type === "message").length;

  return {
    name: session.name,
    model: session.model,
    activeEntities: active.length,
    activeMessages,
    totalMessages: session.messageCount,
    summaries: active.length - activeMessages,
    indexedMessages: session.index.documentCount,
    activeTokens: counter.countEntities(active),
  };
}

/**
 * Wire a ConversationMemory from loaded config. Without `complete`, every
 * compression uses the extractive fallback.
 */
export function createConversationMemory(
  config: ParleyConfig,
  options: Omit<ConversationMemoryOptions, "store" | "memory" | "summarizer"> & {
    complete?: SummarizerConfig["complete"];
  } = {},
): ConversationMemory {
  const { complete, ...rest } = options;
  const { sessionDir, ...memory } = config.memory;

  return new ConversationMemory({
    ...rest,
    model: rest.model ?? config.model,
    store: new SessionStore(sessionDir),
    memory,
    summarizer: complete && { complete, timeoutMs: config.summarizer.timeoutMs },
  });
}
