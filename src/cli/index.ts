/**
 * slotloop CLI
 *
 * Main CLI entry point using Commander.js
 */

import { Command, InvalidArgumentError } from "commander";
import { demoCommand } from "./commands/demo.js";
import { demosCommand } from "./commands/demos.js";
import { validateCommand } from "./commands/validate.js";

/**
 * Parse a non-negative integer option value
 */
function parseMilliseconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer");
  }
  return parsed;
}

/**
 * Create and configure the CLI program
 *
 * @returns Configured Commander program
 */
export function createCLI(): Command {
  const program = new Command();

  program
    .name("slotloop")
    .description(
      "Single-threaded event loop with timers, event filters and signals",
    )
    .version("0.1.0");

  // Demo command
  program
    .command("demo")
    .description("Run a demonstration on a fresh event loop")
    .argument("<name>", "Demo name (see 'slotloop demos')")
    .option(
      "-d, --duration <ms>",
      "Quit after this many milliseconds",
      parseMilliseconds,
    )
    .option("-c, --config <path>", "Path to slotloop.json")
    .action(
      async (name: string, options: { duration?: number; config?: string }) => {
        const exitCode = await demoCommand(name, options);
        process.exit(exitCode);
      },
    );

  // Demos command
  program
    .command("demos")
    .description("List available demos")
    .action(async () => {
      const exitCode = await demosCommand();
      process.exit(exitCode);
    });

  // Validate command
  program
    .command("validate")
    .description("Validate config file")
    .argument("[config]", "Path to slotloop.json (default: ./slotloop.json)")
    .action(async (configPath?: string) => {
      const exitCode = await validateCommand(configPath);
      process.exit(exitCode);
    });

  return program;
}

/**
 * Run the CLI
 *
 * @param argv - Command line arguments
 */
export async function runCLI(argv: string[] = process.argv): Promise<void> {
  const program = createCLI();
  await program.parseAsync(argv);
}
