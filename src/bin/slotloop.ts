#!/usr/bin/env node

/**
 * slotloop CLI Binary
 *
 * Executable entry point for the slotloop CLI.
 */

import { runCLI } from "../cli/index.js";

runCLI(process.argv).catch((error) => {
  console.error("Unexpected error:", error);
  process.exit(1);
});
