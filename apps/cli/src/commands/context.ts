import { Command } from "commander";
import chalk from "chalk";
import { getContext } from "@devports/core";
import { fail } from "../output.js";

export function registerContextCommand(program: Command): void {
  program
    .command("context")
    .description("Show the current context")
    .action(async () => {
      try {
        const context = await getContext();

        console.log(`${chalk.bold("Context:")} ${context.hash}`);
        console.log(`  ${chalk.gray("Path:")}   ${context.path}`);
        console.log(`  ${chalk.gray("Label:")}  ${context.label}`);
        if (context.remote) {
          console.log(`  ${chalk.gray("Remote:")} ${context.remote}`);
        }
        if (context.branch) {
          console.log(`  ${chalk.gray("Branch:")} ${context.branch}`);
        }
      } catch (error) {
        fail(error);
      }
    });
}
