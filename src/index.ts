#!/usr/bin/env node

import { Command } from "commander";
import { createCreateCommand } from "./commands/create";
import { createListCommand } from "./commands/list";
import { createRemoveCommand } from "./commands/remove";
import { createCleanupCommand } from "./commands/cleanup";
import { createSwitchCommand } from "./commands/switch";
import { createStatusCommand } from "./commands/status";
import { createPruneCommand } from "./commands/prune";
import { createConfigCommand } from "./commands/config";
import { errorMessage, log } from "./utils";

const program = new Command();

program
  .name("wtm")
  .description("Manage git worktrees and carry local config files into them")
  .version(require("../package.json").version);

// Add all commands
program.addCommand(createCreateCommand());
program.addCommand(createListCommand());
program.addCommand(createRemoveCommand());
program.addCommand(createCleanupCommand());
program.addCommand(createSwitchCommand());
program.addCommand(createStatusCommand());
program.addCommand(createPruneCommand());
program.addCommand(createConfigCommand());

// Handle unknown commands
program.on("command:*", () => {
  log.error(`Unknown command: ${program.args.join(" ")}`);
  console.log("See --help for a list of available commands.");
  process.exit(1);
});

// Error handling
process.on("uncaughtException", (error) => {
  log.error(`Uncaught exception: ${error.message}`);
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  log.error(`Unhandled rejection: ${errorMessage(reason)}`);
  process.exit(1);
});

// If no command is provided, show help
if (!process.argv.slice(2).length) {
  log.error("No command specified");
  program.outputHelp();
  process.exit(1);
}

// Parse command line arguments
program.parseAsync().catch((error: unknown) => {
  log.error(errorMessage(error));
  process.exit(1);
});
