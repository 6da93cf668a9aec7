import { z } from "zod";

export const DEFAULT_RECALL_TOKEN_BUDGET = 1500;

export const MemorySchema = z
  .object({
    tokenBudget: z.number().int().positive().default(6000),
    keepRecent: z.number().int().nonnegative().default(10),
    recallTopK: z.number().int().nonnegative().default(3),
    recallTokenBudget: z.number().int().nonnegative().optional(),
    recallMinScore: z.number().min(0).max(1).default(0.1),
    importanceThreshold: z.number().min(0).max(1).default(0.7),
    contextTokenBudget: z.number().int().positive().default(12_000),
    sessionDir: z.string().min(1).default("~/.parley/sessions"),
  })
  .transform(({ recallTokenBudget, ...memory }) => ({
    ...memory,
    // Unset: the default, lowered to fit a smaller token budget
    recallTokenBudget:
      recallTokenBudget ?? Math.min(DEFAULT_RECALL_TOKEN_BUDGET, memory.tokenBudget),
  }));

export const SummarizerSchema = z.object({
  timeoutMs: z.number().int().positive().default(15_000),
});

export const LoggingSchema = z.object({
  level: z
    .enum(["silly", "trace", "debug", "info", "warn", "error", "fatal"])
    .default("info"),
});

export const ParleyConfigSchema = z.object({
  configVersion: z.number().int().nonnegative().optional(),
  model: z.string().min(1).optional(),
  memory: MemorySchema.default({}),
  summarizer: SummarizerSchema.default({}),
  logging: LoggingSchema.default({}),
});
