import { ConflictError, inferServiceType, type Allocator, type Registry } from "@devports/core";
import type { Context } from "@devports/shared";

export interface BookRequest {
  service: string;
  preferredPort?: number;
  containerPort?: number;
  envVar?: string;
  image?: string;
  source?: string;
}

export interface BookOutcome {
  service: string;
  port: number;
  /** False when the service already had a port in this context */
  created: boolean;
}

const MAX_ATTEMPTS = 3;

/**
 * Allocate and persist a port for a service in a context.
 *
 * Another process may book between the allocation decision and the insert.
 * If it booked this same service, its port is returned; if it took the chosen
 * port for something else, allocation runs again.
 */
export async function bookService(
  registry: Registry,
  allocator: Allocator,
  context: Context,
  request: BookRequest
): Promise<BookOutcome> {
  const { service } = request;
  const rangeService = inferServiceType(service, request.image);

  for (let attempt = 1; ; attempt++) {
    const existing = registry.getAllocation(context.hash, service);
    if (existing) {
      registry.touch(existing.id);
      return { service, port: existing.port, created: false };
    }

    const port = await allocator.allocate(service, context.hash, request.preferredPort, rangeService);

    try {
      registry.createAllocation({
        contextHash: context.hash,
        contextPath: context.path,
        contextLabel: context.label,
        service,
        port,
        containerPort: request.containerPort,
        envVar: request.envVar,
        source: request.source ?? "manual",
      });
      return { service, port, created: true };
    } catch (error) {
      if (!(error instanceof ConflictError) || attempt >= MAX_ATTEMPTS) {
        throw error;
      }

      const booked = registry.getAllocation(context.hash, service);
      if (booked) {
        return { service, port: booked.port, created: false };
      }
    }
  }
}
