import { z } from "zod";
import { MAX_TIMEOUT_MS } from "../core/wake-source.js";
import { DEFAULT_YIELD_EVERY } from "../core/event-loop.js";

/**
 * Schema for loop tuning
 */
const loopSchema = z.object({
  /** Deliveries between yields to the host inside run() (default: 64) */
  yield_every: z
    .number()
    .int()
    .positive("yield_every must be positive")
    .default(DEFAULT_YIELD_EVERY),
  /** Upper bound for a single idle wait in milliseconds */
  max_wait_ms: z
    .number()
    .int()
    .positive("max_wait_ms must be positive")
    .max(MAX_TIMEOUT_MS, `max_wait_ms must not exceed ${MAX_TIMEOUT_MS}`)
    .default(MAX_TIMEOUT_MS),
});

/**
 * Schema for logging configuration
 */
const loggingSchema = z.object({
  level: z
    .enum(["error", "warn", "info", "debug"], {
      errorMap: () => ({
        message: "Expected 'error', 'warn', 'info', or 'debug'",
      }),
    })
    .default("info"),
  /** Install the event spy on the application scope */
  trace_dispatch: z.boolean().default(false),
  /** Write combined.log and error.log here, in addition to the console */
  directory: z.string().min(1, "directory must not be empty").optional(),
});

/**
 * Main configuration schema for slotloop.json
 *
 * Every section is optional; an empty object yields the defaults.
 *
 * @example
 * ```ts
 * const config = configSchema.parse({
 *   loop: { yield_every: 32 },
 *   logging: { level: 'debug', trace_dispatch: true },
 * });
 * config.loop.max_wait_ms; // 2147483647
 * ```
 */
export const configSchema = z
  .object({
    loop: loopSchema.default({}),
    logging: loggingSchema.default({}),
  })
  .strict();

/**
 * Type alias for the Zod loop schema
 */
export type LoopSchema = typeof loopSchema;

/**
 * Type alias for the Zod logging schema
 */
export type LoggingSchema = typeof loggingSchema;

/**
 * Type alias for the main config schema
 */
export type ConfigSchema = typeof configSchema;
