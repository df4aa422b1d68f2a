import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import type { Allocation, PruneResult } from "@devports/shared";
import { getRuntime } from "../runtime.js";
import { fail } from "../output.js";

interface PruneOptions {
  dryRun?: boolean;
  stale?: number;
  force?: boolean;
}

function parseDays(value: string): number {
  const days = Number(value);
  if (!Number.isInteger(days) || days <= 0) {
    throw new InvalidArgumentError("Days must be a positive integer.");
  }
  return days;
}

function runPrune(options: PruneOptions, dryRun: boolean): PruneResult {
  const { pruner } = getRuntime();
  const result = pruner.prune(dryRun);

  if (options.stale !== undefined) {
    const stale = pruner.pruneStale(options.stale, dryRun);
    const seen = new Set(result.removed.map((allocation) => allocation.id));
    result.removed.push(...stale.removed.filter((allocation) => !seen.has(allocation.id)));
    result.errors.push(...stale.errors);
  }
  return result;
}

function describe(allocation: Allocation): string {
  return `${allocation.contextLabel}: ${allocation.service} (${allocation.port})`;
}

function pruneAllocations(options: PruneOptions): void {
  const preview = runPrune(options, true);

  if (preview.removed.length === 0) {
    console.log(chalk.green("No orphaned allocations found"));
    return;
  }

  console.log(chalk.yellow(`Would remove ${preview.removed.length} allocation(s):`));
  for (const allocation of preview.removed) {
    console.log(`  - ${describe(allocation)}`);
  }

  if (options.dryRun || !options.force) {
    console.log(chalk.gray("\nRun with --force to remove them"));
    return;
  }

  const result = runPrune(options, false);
  console.log(chalk.green(`Removed ${result.removed.length} allocation(s)`));

  if (result.errors.length > 0) {
    for (const message of result.errors) {
      console.error(chalk.red(`  ✖ ${message}`));
    }
    process.exit(1);
  }
}

export function registerPruneCommand(program: Command): void {
  program
    .command("prune")
    .description("Remove allocations whose project directory no longer exists")
    .option("-n, --dry-run", "Show what would be removed")
    .option("--stale <days>", "Also remove allocations not accessed in this many days", parseDays)
    .option("-f, --force", "Remove the allocations instead of only listing them")
    .action((options: PruneOptions) => {
      try {
        pruneAllocations(options);
      } catch (error) {
        fail(error);
      }
    });

  program
    .command("gc")
    .description("Remove orphaned and stale allocations (stale after the configured number of days)")
    .option("-n, --dry-run", "Show what would be removed")
    .action((options: { dryRun?: boolean }) => {
      try {
        const { settings } = getRuntime();
        pruneAllocations({ dryRun: options.dryRun, stale: settings.prune.staleDays, force: true });
      } catch (error) {
        fail(error);
      }
    });
}
