import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import type { PortRange } from "@devports/shared";
import { getRuntime } from "../runtime.js";
import { fail, printTable } from "../output.js";

const RANGE_SPEC = /^([^:]+):(\d+)-(\d+)$/;

/**
 * Parse `service:start-end`, e.g. `postgres:5500-5599`
 */
export function parseRangeSpec(value: string): PortRange {
  const match = RANGE_SPEC.exec(value.trim());
  if (!match) {
    throw new InvalidArgumentError("Format should be service:start-end.");
  }
  const [, service = "", start = "", end = ""] = match;
  return { service, start: Number(start), end: Number(end) };
}

export function registerConfigCommand(program: Command): void {
  program
    .command("config")
    .description("Manage port range configuration")
    .option("--show", "Show configured port ranges")
    .option("--set-range <spec>", "Set a port range: service:start-end", parseRangeSpec)
    .addHelpText("after", "\nExamples:\n  devports config --show\n  devports config --set-range postgres:5500-5599")
    .action((options: { show?: boolean; setRange?: PortRange }) => {
      try {
        const { registry } = getRuntime();

        if (options.setRange) {
          const { service, start, end } = options.setRange;
          registry.setRange(service, start, end);
          console.log(chalk.green(`Set range for ${service}: ${start}-${end}`));
          return;
        }

        if (options.show) {
          printTable(
            "Port Ranges",
            ["Service", "Start", "End"],
            registry.listRanges().map((range) => [range.service, String(range.start), String(range.end)])
          );
          return;
        }

        console.log(chalk.yellow("Use --show or --set-range"));
      } catch (error) {
        fail(error);
      }
    });
}
