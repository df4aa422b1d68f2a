import { Command } from "commander";
import chalk from "chalk";
import { direnvrcHelper, envrcSnippet } from "@devports/core";

export function registerInitCommand(program: Command): void {
  program
    .command("init")
    .description("Show setup instructions")
    .option("--direnv", "Print the .envrc snippet")
    .option("--shell", "Print the direnvrc helper function")
    .action((options: { direnv?: boolean; shell?: boolean }) => {
      if (options.direnv) {
        console.log(chalk.bold("Add to your .envrc:"));
        console.log(chalk.green(envrcSnippet()));
        return;
      }

      if (options.shell) {
        console.log(chalk.bold("Direnv helper function:"));
        console.log(direnvrcHelper());
        return;
      }

      console.log(chalk.bold("devports setup\n"));
      console.log("1. Install direnv if it is not installed:");
      console.log(chalk.gray("   brew install direnv  # macOS"));
      console.log(chalk.gray("   apt install direnv   # Debian/Ubuntu\n"));
      console.log("2. Add to your project's .envrc:");
      console.log(`   ${chalk.green(envrcSnippet().trim())}\n`);
      console.log("3. Allow direnv:");
      console.log(chalk.gray("   direnv allow\n"));
      console.log("4. Ports are now booked when you enter the project.\n");
      console.log(chalk.gray("Tip: run 'devports status' to see your allocations"));
    });
}
