import { basename } from "node:path";
import { Command } from "commander";
import chalk from "chalk";
import { discoverServices } from "@devports/core";
import { getRuntime } from "../runtime.js";
import { fail, printTable } from "../output.js";

export function registerDiscoverCommand(program: Command): void {
  program
    .command("discover")
    .description("Show services that `book --auto` would book")
    .option("-f, --compose-file <file>", "Compose file to read instead of the standard names")
    .action((options: { composeFile?: string }) => {
      try {
        const { logger } = getRuntime();
        const services = discoverServices({ composeFile: options.composeFile, logger });

        if (services.length === 0) {
          console.log(chalk.yellow(`No services discovered from ${options.composeFile ?? "docker-compose.yml"}`));
          return;
        }

        printTable(
          "Discovered Services",
          ["Service", "Container Port", "Env Var", "Source"],
          services.map((service) => [
            service.name,
            String(service.containerPort),
            service.envVar ?? "-",
            basename(service.source),
          ])
        );
      } catch (error) {
        fail(error);
      }
    });
}
