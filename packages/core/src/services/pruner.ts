import { existsSync } from "node:fs";
import type { Allocation, PruneResult } from "@devports/shared";
import type { Registry } from "../db/registry.js";
import { silentLogger, type Logger } from "../utils/logger.js";

export interface PathChecker {
  exists(path: string): boolean;
}

export const fileSystemPaths: PathChecker = {
  exists: (path) => existsSync(path),
};

export interface PrunerOptions {
  paths?: PathChecker;
  logger?: Logger;
}

function describeError(allocation: Allocation, error: unknown): string {
  return `${allocation.contextLabel}: ${error instanceof Error ? error.message : String(error)}`;
}

/**
 * Retires allocations whose project directory is gone or that have not been
 * used for a while. Records are deleted one at a time; a failure on one record
 * is reported and the rest are still processed.
 */
export class Pruner {
  private readonly paths: PathChecker;
  private readonly logger: Logger;

  constructor(
    private readonly registry: Registry,
    options: PrunerOptions = {}
  ) {
    this.paths = options.paths ?? fileSystemPaths;
    this.logger = options.logger ?? silentLogger();
  }

  /**
   * Remove allocations whose context path no longer exists.
   * A context whose branch changed is a different context, not an orphan.
   */
  prune(dryRun = false): PruneResult {
    const result: PruneResult = { removed: [], kept: [], errors: [] };

    for (const allocation of this.registry.listAll()) {
      try {
        if (this.paths.exists(allocation.contextPath)) {
          result.kept.push(allocation);
          continue;
        }
        if (!dryRun) {
          this.registry.deleteById(allocation.id);
        }
        result.removed.push(allocation);
      } catch (error) {
        result.errors.push(describeError(allocation, error));
      }
    }

    this.logger.info(
      { dryRun, removed: result.removed.length, kept: result.kept.length, errors: result.errors.length },
      "Pruned orphaned allocations"
    );
    return result;
  }

  /**
   * Remove allocations not accessed in the last `days` days, whether or not
   * their directory still exists
   */
  pruneStale(days: number, dryRun = false): PruneResult {
    const result: PruneResult = { removed: [], kept: [], errors: [] };

    const stale = this.registry.listStale(days);
    const staleIds = new Set(stale.map((allocation) => allocation.id));

    for (const allocation of stale) {
      try {
        if (!dryRun) {
          this.registry.deleteById(allocation.id);
        }
        result.removed.push(allocation);
      } catch (error) {
        result.errors.push(describeError(allocation, error));
      }
    }

    result.kept = this.registry.listAll().filter((allocation) => !staleIds.has(allocation.id));

    this.logger.info(
      { days, dryRun, removed: result.removed.length, kept: result.kept.length, errors: result.errors.length },
      "Pruned stale allocations"
    );
    return result;
  }
}
