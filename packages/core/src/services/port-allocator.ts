import type { PortRange } from "@devports/shared";
import { AllocationExhaustedError } from "../errors.js";
import { DEFAULT_RANGE_NAME } from "../db/schema.js";
import type { Registry } from "../db/registry.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import type { PortProbe } from "./system-probe.js";

export interface AllocatorOptions {
  logger?: Logger;
}

/**
 * Chooses ports for services. Never writes an allocation: callers persist the
 * decision with `Registry.createAllocation`.
 */
export class Allocator {
  private readonly logger: Logger;

  constructor(
    private readonly registry: Registry,
    private readonly probe: PortProbe,
    options: AllocatorOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger();
  }

  /**
   * Resolve the port for `service` in a context.
   *
   * An existing allocation is touched and returned as-is. Otherwise the preferred
   * port is tried, then the range of `rangeService` in ascending order, then the
   * default range. `rangeService` lets a service named "db" scan the postgres range.
   */
  async allocate(
    service: string,
    contextHash: string,
    preferredPort?: number,
    rangeService: string = service
  ): Promise<number> {
    const existing = this.registry.getAllocation(contextHash, service);
    if (existing) {
      this.registry.touch(existing.id);
      this.logger.debug({ service, context: contextHash, port: existing.port }, "Reusing allocation");
      return existing.port;
    }

    const unavailable = await this.getUnavailablePorts();

    if (preferredPort !== undefined) {
      if (await this.isPortAvailable(preferredPort, unavailable)) {
        return preferredPort;
      }
      this.logger.debug({ service, port: preferredPort }, "Preferred port unavailable");
    }

    const rangesTried: PortRange[] = [];

    const serviceRange = this.registry.getRange(rangeService);
    rangesTried.push(serviceRange);
    const port = await this.scanRange(serviceRange, unavailable);
    if (port !== undefined) {
      return port;
    }

    // An unconfigured service was already scanning the default range
    if (rangeService !== DEFAULT_RANGE_NAME && serviceRange.service !== DEFAULT_RANGE_NAME) {
      const defaultRange = this.registry.getRange(DEFAULT_RANGE_NAME);
      rangesTried.push(defaultRange);
      this.logger.info(
        { service, range: `${serviceRange.start}-${serviceRange.end}` },
        "Service range exhausted, falling back to default range"
      );

      const fallback = await this.scanRange(defaultRange, unavailable);
      if (fallback !== undefined) {
        return fallback;
      }
    }

    throw new AllocationExhaustedError(service, rangesTried);
  }

  /**
   * Ports claimed in the registry plus ports listening on the host
   */
  private async getUnavailablePorts(): Promise<Set<number>> {
    const unavailable = this.registry.allAllocatedPorts();
    for (const port of await this.probe.listeningPorts()) {
      unavailable.add(port);
    }
    return unavailable;
  }

  private async scanRange(range: PortRange, unavailable: Set<number>): Promise<number | undefined> {
    for (let port = range.start; port <= range.end; port++) {
      if (await this.isPortAvailable(port, unavailable)) {
        return port;
      }
    }
    return undefined;
  }

  private async isPortAvailable(port: number, unavailable: Set<number>): Promise<boolean> {
    if (!Number.isInteger(port) || port < 1 || port > 65535 || unavailable.has(port)) {
      return false;
    }
    return this.probe.isBindable(port);
  }
}
