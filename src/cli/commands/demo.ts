/**
 * Demo Command
 *
 * Runs one demonstration on a fresh event loop and exits with the loop's
 * exit code.
 */

import { ZodError } from "zod";
import {
  createEventLoop,
  defaultConfig,
  formatValidationErrors,
  loadConfig,
} from "../../config/loader.js";
import type { SlotloopConfig } from "../../config/types.js";
import { HandlerFaultError } from "../../core/errors.js";
import { demos, findDemo } from "../../demos/index.js";
import {
  formatExitCode,
  printError,
  printHeader,
  printInfo,
} from "../utils/formatter.js";

export interface DemoOptions {
  /** Quit after this many milliseconds */
  duration?: number;
  /** Path to a slotloop.json */
  config?: string;
}

/**
 * Run a demo
 *
 * @param name - Demo name
 * @param options - Command options
 * @returns Exit code (the loop's exit code, or 1 on failure)
 */
export async function demoCommand(
  name: string,
  options: DemoOptions = {},
): Promise<number> {
  const demo = findDemo(name);
  if (!demo) {
    printError(`Unknown demo: ${name}`);
    printInfo(`Available demos: ${demos.map((d) => d.name).join(", ")}`);
    return 1;
  }

  let config: SlotloopConfig;
  try {
    config = options.config ? await loadConfig(options.config) : defaultConfig();
  } catch (error) {
    if (error instanceof ZodError) {
      printError(formatValidationErrors(error));
      return 1;
    }
    printError(
      `Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`,
    );
    return 1;
  }

  const loop = createEventLoop(config);
  printHeader(demo.name);

  const cleanup = demo.setup({
    loop,
    out: (line) => console.log(line),
    durationMs: options.duration,
  });

  try {
    const exitCode = await loop.run();
    console.log();
    printInfo(`Event loop exited with code ${formatExitCode(exitCode)}`);
    return exitCode;
  } catch (error) {
    if (error instanceof HandlerFaultError) {
      printError(`Demo stopped by a handler fault: ${error.message}`);
      return 1;
    }
    throw error;
  } finally {
    if (cleanup) {
      cleanup();
    }
  }
}
