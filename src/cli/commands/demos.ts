/**
 * Demos Command
 *
 * Lists the demonstrations the demo command can run.
 */

import chalk from "chalk";
import Table from "cli-table3";
import { demos } from "../../demos/index.js";

/**
 * Print the demo table
 *
 * @returns Exit code (always 0)
 */
export async function demosCommand(): Promise<number> {
  const table = new Table({
    head: [chalk.white("Name"), chalk.white("Description")],
    style: {
      head: [],
      border: [],
    },
  });

  for (const demo of demos) {
    table.push([demo.name, demo.description]);
  }

  console.log(table.toString());
  console.log();
  console.log(chalk.gray("  Run one with: slotloop demo <name>"));
  console.log();
  return 0;
}
