// Config
export {
  DEFAULT_RECALL_TOKEN_BUDGET,
  LoggingSchema,
  MemorySchema,
  ParleyConfigSchema,
  SummarizerSchema,
} from "./config/schema.js";
export type {
  LoggingConfig,
  MemoryConfig,
  ParleyConfig,
  ParleyConfigInput,
  SummarizerSettings,
} from "./config/types.js";
export { DEFAULT_CONFIG_FILE, defaultConfig, defaultConfigFile } from "./config/defaults.js";
export { validateConfig, ConfigValidationError } from "./config/validation.js";
export { CURRENT_CONFIG_VERSION, migrateConfig } from "./config/migrations.js";
export type { ConfigMigration, MigrationResult } from "./config/migrations.js";
export {
  applyEnvOverrides,
  expandHome,
  initializeConfig,
  loadConfig,
  saveConfig,
} from "./config/loader.js";

// Infrastructure
export { createLogger, isLogLevel, setLogLevel } from "./infra/logger.js";
export type { LogLevel } from "./infra/logger.js";
export {
  AppError,
  ConfigError,
  ValidationError,
  NotFoundError,
  SessionNotFoundError,
  SessionPersistenceError,
} from "./infra/errors.js";

// Agent-side building blocks
export { MESSAGE_ROLES } from "./agent/types.js";
export type { ChatMessage, MessageRole } from "./agent/types.js";
export {
  NON_TEXT_TOKEN_COST,
  createSimpleTokenCounter,
  estimateTokens,
} from "./agent/token-counter.js";
export type { TokenCounter } from "./agent/token-counter.js";
export {
  IMPORTANCE_THRESHOLD,
  isRetentionExempt,
  scoreImportance,
} from "./agent/importance.js";
export {
  SummarizerTimeoutError,
  extractiveSummary,
  summarizeSpan,
} from "./agent/summarizer.js";
export type { SpanSummary, SummarizerConfig } from "./agent/summarizer.js";
export { compress, findEligibleSpans } from "./agent/compaction.js";
export type { CompactionOptions } from "./agent/compaction.js";

// Memory
export { TermIndex } from "./memory/term-index.js";
export type { TermIndexHit } from "./memory/term-index.js";
export { tokenize } from "./memory/tokenize.js";
export { DEFAULT_RECALL_MIN_SCORE, recall } from "./memory/recall.js";
export type { RecallChunk, RecallOptions } from "./memory/recall.js";

// Sessions
export { Session } from "./sessions/session.js";
export type { SessionInit } from "./sessions/session.js";
export { isMessage, isSummary } from "./sessions/types.js";
export type {
  MemoryOptions,
  Message,
  MessageSpan,
  SessionEntity,
  SessionMeta,
  SessionStats,
  Summary,
} from "./sessions/types.js";
export { BudgetManager } from "./sessions/budget.js";
export type { BudgetOptions, CompressionReport } from "./sessions/budget.js";
export { buildContextPayload, toChatMessages } from "./sessions/context.js";
export type { ContextOptions, ContextPayload } from "./sessions/context.js";
export { SessionLock } from "./sessions/lock.js";
export {
  SessionStore,
  backupPath,
  loadSession,
  sanitizeSessionName,
  saveSession,
} from "./sessions/store.js";
export type { LoadedSession } from "./sessions/store.js";
export {
  ConversationMemory,
  DEFAULT_MEMORY_OPTIONS,
  computeStats,
  createConversationMemory,
  defaultSessionName,
} from "./sessions/memory.js";
export type {
  AddResult,
  ConversationMemoryOptions,
  LoadResult,
} from "./sessions/memory.js";
