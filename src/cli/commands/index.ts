/**
 * CLI Command Registry
 *
 * Registers all command categories with the main program.
 *
 * @module cli/commands
 */

import type { Command } from "commander";
import { registerAnalysisCommands } from "./analysis";
import type { Runner } from "./helpers";
import { registerMaintenanceCommands } from "./maintenance";
import { registerQueryCommands } from "./query";

export function registerCommands(program: Command, run: Runner): void {
  registerQueryCommands(program, run);
  registerAnalysisCommands(program, run);
  registerMaintenanceCommands(program, run);
}
