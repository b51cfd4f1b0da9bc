import { readFile } from "fs/promises";
import { ZodError } from "zod";
import { configSchema } from "./schema.js";
import type { LoopSettings, SlotloopConfig } from "./types.js";
import { EventLoop, type EventLoopOptions } from "../core/event-loop.js";
import { TimeoutWakeSource } from "../core/wake-source.js";
import { createEventSpy } from "../core/event-spy.js";
import { configureLogging } from "../utils/logger.js";

/**
 * Default configuration file name, looked up in the working directory
 */
export const DEFAULT_CONFIG_FILE = "slotloop.json";

/**
 * Error thrown when configuration loading fails
 */
export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = "ConfigLoadError";
  }
}

/**
 * Loads and validates a slotloop configuration file
 *
 * @param filePath - Path to the configuration JSON file
 * @returns Validated configuration object with defaults applied
 * @throws {ConfigLoadError} If file cannot be read or parsed
 * @throws {ZodError} If configuration validation fails
 *
 * @example
 * ```ts
 * try {
 *   const config = await loadConfig('./slotloop.json');
 *   console.log(`Yielding every ${config.loop.yield_every} events`);
 * } catch (error) {
 *   if (error instanceof ZodError) {
 *     console.error(formatValidationErrors(error));
 *   }
 * }
 * ```
 */
export async function loadConfig(filePath: string): Promise<SlotloopConfig> {
  try {
    const fileContent = await readFile(filePath, "utf-8");

    let rawConfig: unknown;
    try {
      rawConfig = JSON.parse(fileContent);
    } catch (error) {
      throw new ConfigLoadError(
        `Failed to parse JSON from ${filePath}`,
        error instanceof Error ? error : undefined,
      );
    }

    return configSchema.parse(rawConfig);
  } catch (error) {
    // Re-throw ZodError as-is for detailed validation messages
    if (error instanceof ZodError) {
      throw error;
    }

    if (error instanceof ConfigLoadError) {
      throw error;
    }

    throw new ConfigLoadError(
      `Failed to load configuration from ${filePath}`,
      error instanceof Error ? error : undefined,
    );
  }
}

/**
 * Validates a configuration object without loading from file
 *
 * @param config - Raw configuration object to validate
 * @returns Validated configuration object
 * @throws {ZodError} If configuration validation fails
 */
export function validateConfig(config: unknown): SlotloopConfig {
  return configSchema.parse(config);
}

/**
 * Configuration with every default applied
 */
export function defaultConfig(): SlotloopConfig {
  return configSchema.parse({});
}

/**
 * Formats Zod validation errors into a human-readable string
 *
 * @param error - ZodError instance from schema validation
 * @returns Formatted error message
 *
 * @example
 * ```ts
 * formatValidationErrors(error);
 * // Configuration validation failed:
 * //   - loop.yield_every: yield_every must be positive
 * ```
 */
export function formatValidationErrors(error: ZodError): string {
  const errors = error.errors.map((err) => {
    const path = err.path.join(".");
    return `  - ${path}: ${err.message}`;
  });

  return `Configuration validation failed:\n${errors.join("\n")}`;
}

/**
 * Translate loop settings into EventLoop constructor options
 *
 * @example
 * ```ts
 * const loop = new EventLoop(loopOptionsFromConfig(config.loop));
 * ```
 */
export function loopOptionsFromConfig(settings: LoopSettings): EventLoopOptions {
  return {
    yieldEvery: settings.yield_every,
    wakeSource: new TimeoutWakeSource(settings.max_wait_ms),
  };
}

/**
 * Build an EventLoop from a validated configuration
 *
 * Applies the logging section (level and optional log directory) and, with
 * `trace_dispatch`, installs the event spy on the application scope at info
 * level.
 *
 * @param config - Validated configuration
 * @param overrides - Options taking precedence over the configuration
 */
export function createEventLoop(
  config: SlotloopConfig,
  overrides: EventLoopOptions = {},
): EventLoop {
  configureLogging(config.logging);

  const loop = new EventLoop({
    ...loopOptionsFromConfig(config.loop),
    ...overrides,
  });

  if (config.logging.trace_dispatch) {
    loop.install(loop.application, createEventSpy({ level: "info" }));
  }

  return loop;
}
