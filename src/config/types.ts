import { z } from "zod";
import { configSchema } from "./schema.js";

/**
 * Loop tuning settings
 */
export type LoopSettings = {
  /** Deliveries between yields to the host inside run() */
  yield_every: number;
  /** Upper bound for a single idle wait in milliseconds */
  max_wait_ms: number;
};

/**
 * Logging settings
 */
export type LoggingSettings = {
  /** Winston level for the default logger */
  level: "error" | "warn" | "info" | "debug";
  /** Install the event spy on the application scope */
  trace_dispatch: boolean;
};

/**
 * TypeScript type for the complete slotloop configuration
 *
 * Inferred from the Zod schema, with defaults applied.
 *
 * @example
 * ```ts
 * const config: SlotloopConfig = {
 *   loop: { yield_every: 64, max_wait_ms: 60000 },
 *   logging: { level: 'info', trace_dispatch: false },
 * };
 * ```
 */
export type SlotloopConfig = z.infer<typeof configSchema>;
