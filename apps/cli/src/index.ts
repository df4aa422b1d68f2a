#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { registerGetCommand } from "./commands/get.js";
import { registerBookCommand } from "./commands/book.js";
import { registerReleaseCommand } from "./commands/release.js";
import { registerExportCommand } from "./commands/export.js";
import { registerStatusCommand } from "./commands/status.js";
import { registerContextCommand } from "./commands/context.js";
import { registerDiscoverCommand } from "./commands/discover.js";
import { registerPruneCommand } from "./commands/prune.js";
import { registerInitCommand } from "./commands/init.js";
import { registerConfigCommand } from "./commands/config.js";

const program = new Command();

program
  .name("devports")
  .description("Port manager for development environments")
  .version("0.1.0", "-v, --version");

registerGetCommand(program);
registerBookCommand(program);
registerReleaseCommand(program);
registerExportCommand(program);
registerStatusCommand(program);
registerContextCommand(program);
registerDiscoverCommand(program);
registerPruneCommand(program);
registerInitCommand(program);
registerConfigCommand(program);

// Error handling
program.exitOverride((err) => {
  if (err.code === "commander.helpDisplayed" || err.code === "commander.version") {
    process.exit(0);
  }
  process.exit(1);
});

await program.parseAsync();
