import type { z } from "zod";
import type {
  LoggingSchema,
  MemorySchema,
  ParleyConfigSchema,
  SummarizerSchema,
} from "./schema.js";

export type ParleyConfig = z.infer<typeof ParleyConfigSchema>;
/** Config as written in a file, before defaults are filled in. */
export type ParleyConfigInput = z.input<typeof ParleyConfigSchema>;
export type MemoryConfig = z.infer<typeof MemorySchema>;
export type SummarizerSettings = z.infer<typeof SummarizerSchema>;
export type LoggingConfig = z.infer<typeof LoggingSchema>;
