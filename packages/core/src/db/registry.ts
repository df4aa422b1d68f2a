import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type Database from "better-sqlite3";
import { z } from "zod";
import type { Allocation, CreateAllocationInput, PortRange } from "@devports/shared";
import { ConflictError, DevportsError, InvalidRangeError } from "../errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { DEFAULT_RANGE_NAME, FALLBACK_RANGE, initializeSchema, openDatabase } from "./schema.js";
import * as allocationsRepo from "./repositories/allocations.js";
import * as rangesRepo from "./repositories/ranges.js";

const DAY_MS = 24 * 60 * 60 * 1000;

const PortRangeSchema = z
  .object({
    service: z.string().min(1, "service name is required"),
    start: z.number().int().min(1).max(65535),
    end: z.number().int().min(1).max(65535),
  })
  .refine((data) => data.end > data.start, {
    message: "start must be less than end",
  });

export interface RegistryOptions {
  /** SQLite file backing the registry; its directory is created if missing */
  path: string;
  /** How long a write waits for another process's lock (default: 5 seconds) */
  busyTimeoutMs?: number;
  now?: () => Date;
  logger?: Logger;
}

function uniqueViolation(error: unknown): "port" | "service" | undefined {
  if (!(error instanceof Error) || !("code" in error) || error.code !== "SQLITE_CONSTRAINT_UNIQUE") {
    return undefined;
  }
  return error.message.includes("allocations.port") ? "port" : "service";
}

/**
 * Durable store of allocations and port ranges.
 *
 * Every public method opens its own connection, runs a single transaction and
 * closes the connection again, so nothing stays locked between calls. Writers in
 * other processes are serialized by SQLite's write lock.
 */
export class Registry {
  readonly path: string;
  private readonly busyTimeoutMs: number;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private busy = false;

  constructor(options: RegistryOptions) {
    this.path = options.path;
    this.busyTimeoutMs = options.busyTimeoutMs ?? 5000;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? silentLogger();

    mkdirSync(dirname(this.path), { recursive: true, mode: 0o700 });
    this.withConnection((db) => initializeSchema(db));
    this.logger.debug({ path: this.path }, "Registry opened");
  }

  /**
   * Record an allocation. Throws ConflictError when the port is already claimed
   * or the context already has an allocation for the service.
   */
  createAllocation(input: CreateAllocationInput): number {
    const timestamp = this.now().toISOString();
    try {
      const id = this.write((db) => allocationsRepo.insertAllocation(db, input, timestamp));
      this.logger.info(
        { id, context: input.contextHash, service: input.service, port: input.port },
        "Allocation created"
      );
      return id;
    } catch (error) {
      const field = uniqueViolation(error);
      if (field) {
        this.logger.warn(
          { context: input.contextHash, service: input.service, port: input.port, field },
          "Allocation conflict"
        );
        throw new ConflictError(field, input.contextHash, input.service, input.port);
      }
      throw error;
    }
  }

  getAllocation(contextHash: string, service: string): Allocation | undefined {
    return this.read((db) => allocationsRepo.findAllocation(db, contextHash, service));
  }

  listByContext(contextHash: string): Allocation[] {
    return this.read((db) => allocationsRepo.findAllocationsByContext(db, contextHash));
  }

  listAll(): Allocation[] {
    return this.read((db) => allocationsRepo.findAllAllocations(db));
  }

  allAllocatedPorts(): Set<number> {
    return new Set(this.read((db) => allocationsRepo.getAllocatedPorts(db)));
  }

  /**
   * Mark an allocation as used now
   */
  touch(id: number): void {
    const timestamp = this.now().toISOString();
    this.write((db) => allocationsRepo.updateLastAccessed(db, id, timestamp));
  }

  deleteById(id: number): boolean {
    const deleted = this.write((db) => allocationsRepo.deleteAllocation(db, id));
    if (deleted) {
      this.logger.info({ id }, "Allocation deleted");
    }
    return deleted;
  }

  deleteByContext(contextHash: string): number {
    const count = this.write((db) => allocationsRepo.deleteAllocationsByContext(db, contextHash));
    this.logger.info({ context: contextHash, count }, "Context allocations deleted");
    return count;
  }

  deleteByService(contextHash: string, service: string): boolean {
    const deleted = this.write((db) =>
      allocationsRepo.deleteAllocationByService(db, contextHash, service)
    );
    if (deleted) {
      this.logger.info({ context: contextHash, service }, "Allocation deleted");
    }
    return deleted;
  }

  /**
   * Allocations not accessed within the last `days` days, oldest first
   */
  listStale(days: number): Allocation[] {
    if (!Number.isFinite(days) || days < 0) {
      throw new DevportsError(`Stale threshold must be a non-negative number of days, got ${days}`);
    }
    const cutoff = new Date(this.now().getTime() - days * DAY_MS).toISOString();
    return this.read((db) => allocationsRepo.findAllocationsAccessedBefore(db, cutoff));
  }

  /**
   * Range scanned for `service`. Unconfigured services get the "default" range,
   * and a store without a "default" row gets 10000-19999.
   */
  getRange(service: string): PortRange {
    const range = this.read(
      (db) =>
        rangesRepo.findPortRange(db, service) ?? rangesRepo.findPortRange(db, DEFAULT_RANGE_NAME)
    );

    if (!range) {
      this.logger.debug({ service }, "No default range stored, using fallback");
      return { ...FALLBACK_RANGE };
    }
    return range;
  }

  setRange(service: string, start: number, end: number): void {
    const parsed = PortRangeSchema.safeParse({ service, start, end });
    if (!parsed.success) {
      throw new InvalidRangeError(service, start, end, parsed.error.issues[0]?.message);
    }

    this.write((db) => rangesRepo.upsertPortRange(db, parsed.data));
    this.logger.info({ service, start, end }, "Port range set");
  }

  listRanges(): PortRange[] {
    return this.read((db) => rangesRepo.findAllPortRanges(db));
  }

  private read<T>(fn: (db: Database.Database) => T): T {
    return this.withConnection((db) => db.transaction(() => fn(db)).deferred());
  }

  private write<T>(fn: (db: Database.Database) => T): T {
    return this.withConnection((db) => db.transaction(() => fn(db)).immediate());
  }

  private withConnection<T>(fn: (db: Database.Database) => T): T {
    // The driver is synchronous, so only a re-entrant call could interleave
    if (this.busy) {
      throw new DevportsError("Registry operations cannot be nested");
    }

    this.busy = true;
    const db = openDatabase(this.path, this.busyTimeoutMs);
    try {
      return fn(db);
    } finally {
      db.close();
      this.busy = false;
    }
  }
}
