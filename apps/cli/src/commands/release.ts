import { Command } from "commander";
import chalk from "chalk";
import { getContext } from "@devports/core";
import { getRuntime } from "../runtime.js";
import { fail } from "../output.js";

export function registerReleaseCommand(program: Command): void {
  program
    .command("release [service]")
    .description("Release port allocation(s) for the current context")
    .option("--all", "Release every port of the current context")
    .action(async (service: string | undefined, options: { all?: boolean }) => {
      try {
        const { registry } = getRuntime();
        const context = await getContext();

        if (options.all) {
          const count = registry.deleteByContext(context.hash);
          console.log(chalk.green(`Released ${count} allocation(s)`));
          return;
        }

        if (!service) {
          console.error(chalk.red("Error:"), "Specify a service or use --all");
          process.exit(1);
        }

        if (registry.deleteByService(context.hash, service)) {
          console.log(chalk.green(`Released ${service}`));
        } else {
          console.log(chalk.yellow(`No allocation found for ${service}`));
        }
      } catch (error) {
        fail(error);
      }
    });
}
