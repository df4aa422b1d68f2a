import { Command } from "commander";
import chalk from "chalk";
import { getContext } from "@devports/core";
import type { Allocation } from "@devports/shared";
import { getRuntime } from "../runtime.js";
import { fail, printTable } from "../output.js";

interface StatusOptions {
  all?: boolean;
  live?: boolean;
}

async function showAllocations(options: StatusOptions): Promise<void> {
  const { registry, probe } = getRuntime();

  let allocations: Allocation[];
  if (options.all) {
    allocations = registry.listAll();
  } else {
    const context = await getContext();
    allocations = registry.listByContext(context.hash);
  }

  if (allocations.length === 0) {
    console.log(chalk.yellow("No allocations found"));
    return;
  }

  const listening = options.live ? await probe.listeningPorts() : new Set<number>();

  const headers = [...(options.all ? ["Context", "Label"] : []), "Service", "Port"];
  if (options.live) {
    headers.push("Status");
  }

  const rows = allocations.map((allocation) => {
    const row: string[] = options.all
      ? [allocation.contextHash.slice(0, 8), allocation.contextLabel || "-"]
      : [];
    row.push(allocation.service, String(allocation.port));
    if (options.live) {
      row.push(listening.has(allocation.port) ? "● LISTEN" : "○ free");
    }
    return row;
  });

  printTable(options.all ? "Port Allocations" : "Current Context Allocations", headers, rows);
}

export function registerStatusCommand(program: Command): void {
  program
    .command("status")
    .description("Show port allocations")
    .option("-a, --all", "Show all contexts, not just the current one")
    .option("--live", "Check whether allocated ports are listening")
    .action(async (options: StatusOptions) => {
      try {
        await showAllocations(options);
      } catch (error) {
        fail(error);
      }
    });

  program
    .command("list")
    .alias("ls")
    .description("List allocations of every context")
    .option("--live", "Check whether allocated ports are listening")
    .action(async (options: { live?: boolean }) => {
      try {
        await showAllocations({ all: true, live: options.live });
      } catch (error) {
        fail(error);
      }
    });
}
