/**
 * Validate Command
 *
 * Validates a slotloop.json configuration file.
 */

import path from "path";
import { ZodError } from "zod";
import {
  DEFAULT_CONFIG_FILE,
  formatValidationErrors,
  loadConfig,
} from "../../config/loader.js";
import { printSuccess, printError } from "../utils/formatter.js";

/**
 * Validate configuration file
 *
 * @param configPath - Path to configuration file (defaults to slotloop.json in cwd)
 * @returns Exit code (0 for success, 1 for failure)
 */
export async function validateCommand(configPath?: string): Promise<number> {
  const configFile =
    configPath || path.join(process.cwd(), DEFAULT_CONFIG_FILE);

  try {
    const config = await loadConfig(configFile);

    printSuccess(`Configuration is valid!`);
    console.log();
    console.log(`  Loop:`);
    console.log(`    - Yield every: ${config.loop.yield_every} events`);
    console.log(`    - Max wait: ${config.loop.max_wait_ms}ms`);
    console.log(`  Logging:`);
    console.log(`    - Level: ${config.logging.level}`);
    console.log(
      `    - Trace dispatch: ${config.logging.trace_dispatch ? "enabled" : "disabled"}`,
    );
    console.log(
      `    - Log directory: ${config.logging.directory ?? "none (console only)"}`,
    );
    console.log();

    return 0;
  } catch (error) {
    if (error instanceof ZodError) {
      printError("Configuration validation failed");
      console.error(formatValidationErrors(error));
      return 1;
    }

    // File not found, JSON parse error, etc.
    printError(
      `Failed to validate configuration: ${error instanceof Error ? error.message : String(error)}`,
    );
    return 1;
  }
}
