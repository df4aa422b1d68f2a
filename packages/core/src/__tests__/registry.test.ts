import Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConflictError, DevportsError, InvalidRangeError } from "../errors.js";
import { Registry } from "../db/registry.js";
import { allocationInput, createTestRegistry, type TestRegistry } from "./helpers.js";

describe("Registry", () => {
  let t: TestRegistry;

  beforeEach(() => {
    t = createTestRegistry();
  });

  afterEach(() => {
    t.cleanup();
  });

  describe("port ranges", () => {
    it("seeds the default ranges on creation", () => {
      expect(t.registry.listRanges().map((r) => r.service)).toEqual([
        "default",
        "elasticsearch",
        "kafka",
        "mariadb",
        "meilisearch",
        "mongo",
        "mongodb",
        "mysql",
        "postgres",
        "postgresql",
        "rabbitmq",
        "redis",
      ]);
      expect(t.registry.getRange("postgres")).toEqual({ service: "postgres", start: 5432, end: 5499 });
      expect(t.registry.getRange("mongo")).toEqual({ service: "mongo", start: 27017, end: 27099 });
    });

    it("returns the default range for an unconfigured service", () => {
      expect(t.registry.getRange("api")).toEqual({ service: "default", start: 10000, end: 19999 });
    });

    it("falls back to 10000-19999 when the default row is missing", () => {
      const db = new Database(t.registry.path);
      db.prepare("DELETE FROM port_ranges WHERE service = 'default'").run();
      db.close();

      expect(t.registry.getRange("api")).toEqual({ service: "default", start: 10000, end: 19999 });
    });

    it("upserts ranges", () => {
      t.registry.setRange("custom", 7000, 7002);
      t.registry.setRange("postgres", 6000, 6099);

      expect(t.registry.getRange("custom")).toEqual({ service: "custom", start: 7000, end: 7002 });
      expect(t.registry.getRange("postgres")).toEqual({ service: "postgres", start: 6000, end: 6099 });
    });

    it("rejects a range whose start is not below its end", () => {
      expect(() => t.registry.setRange("custom", 7000, 7000)).toThrow(InvalidRangeError);
      expect(() => t.registry.setRange("custom", 7001, 7000)).toThrow(
        "Invalid port range for 'custom': 7001-7000 (start must be less than end)"
      );
      expect(t.registry.getRange("custom").service).toBe("default");
    });

    it("rejects ports outside 1-65535", () => {
      expect(() => t.registry.setRange("custom", 65000, 70000)).toThrow(InvalidRangeError);
      expect(() => t.registry.setRange("custom", 0, 100)).toThrow(InvalidRangeError);
    });

    it("keeps configured ranges when the registry is reopened", () => {
      t.registry.setRange("postgres", 6000, 6099);

      const reopened = new Registry({ path: t.registry.path });

      expect(reopened.getRange("postgres")).toEqual({ service: "postgres", start: 6000, end: 6099 });
    });
  });

  describe("allocations", () => {
    it("creates an allocation with both timestamps set", () => {
      const id = t.registry.createAllocation(
        allocationInput({ containerPort: 5432, envVar: "PG_PORT", source: "docker-compose.yml" })
      );

      expect(id).toBeGreaterThan(0);
      expect(t.registry.getAllocation("ctx-a", "postgres")).toEqual({
        id,
        contextHash: "ctx-a",
        contextPath: "/projects/a",
        contextLabel: "a/main",
        service: "postgres",
        port: 5432,
        containerPort: 5432,
        envVar: "PG_PORT",
        source: "docker-compose.yml",
        createdAt: "2026-01-01T00:00:00.000Z",
        lastAccessedAt: "2026-01-01T00:00:00.000Z",
      });
    });

    it("decodes missing optional fields as undefined", () => {
      t.registry.createAllocation(allocationInput());

      const allocation = t.registry.getAllocation("ctx-a", "postgres");

      expect(allocation?.containerPort).toBeUndefined();
      expect(allocation?.envVar).toBeUndefined();
      expect(allocation?.source).toBeUndefined();
    });

    it("returns undefined for an unknown allocation", () => {
      expect(t.registry.getAllocation("ctx-a", "redis")).toBeUndefined();
    });

    it("raises ConflictError when the port is taken", () => {
      t.registry.createAllocation(allocationInput());

      let caught: unknown;
      try {
        t.registry.createAllocation(
          allocationInput({ contextHash: "ctx-b", service: "redis", port: 5432 })
        );
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConflictError);
      expect(caught).toMatchObject({ field: "port", port: 5432, contextHash: "ctx-b" });
      expect(t.registry.listAll()).toHaveLength(1);
    });

    it("raises ConflictError when the context already has the service", () => {
      t.registry.createAllocation(allocationInput());

      expect(() => t.registry.createAllocation(allocationInput({ port: 5433 }))).toThrow(
        "Service 'postgres' already has an allocation in context ctx-a"
      );
    });

    it("lists allocations of a context ordered by service", () => {
      t.registry.createAllocation(allocationInput({ service: "redis", port: 6379 }));
      t.registry.createAllocation(allocationInput({ service: "postgres", port: 5432 }));
      t.registry.createAllocation(allocationInput({ contextHash: "ctx-b", service: "kafka", port: 9092 }));

      expect(t.registry.listByContext("ctx-a").map((a) => a.service)).toEqual(["postgres", "redis"]);
    });

    it("lists all allocations ordered by label then service", () => {
      t.registry.createAllocation(
        allocationInput({ contextHash: "ctx-z", contextLabel: "zeta/main", service: "api", port: 10000 })
      );
      t.registry.createAllocation(allocationInput({ service: "redis", port: 6379 }));
      t.registry.createAllocation(allocationInput({ service: "kafka", port: 9092 }));

      expect(t.registry.listAll().map((a) => `${a.contextLabel} ${a.service}`)).toEqual([
        "a/main kafka",
        "a/main redis",
        "zeta/main api",
      ]);
    });

    it("reports every allocated port", () => {
      t.registry.createAllocation(allocationInput({ service: "redis", port: 6379 }));
      t.registry.createAllocation(allocationInput({ service: "postgres", port: 5432 }));

      expect(t.registry.allAllocatedPorts()).toEqual(new Set([5432, 6379]));
    });

    it("touch updates only the last access time", () => {
      const id = t.registry.createAllocation(allocationInput());
      t.clock.advanceDays(2);

      t.registry.touch(id);

      const allocation = t.registry.getAllocation("ctx-a", "postgres");
      expect(allocation?.createdAt).toBe("2026-01-01T00:00:00.000Z");
      expect(allocation?.lastAccessedAt).toBe("2026-01-03T00:00:00.000Z");
      expect(allocation?.port).toBe(5432);
    });

    it("deletes by id", () => {
      const id = t.registry.createAllocation(allocationInput());

      expect(t.registry.deleteById(id)).toBe(true);
      expect(t.registry.deleteById(id)).toBe(false);
      expect(t.registry.listAll()).toEqual([]);
    });

    it("deletes every allocation of a context", () => {
      t.registry.createAllocation(allocationInput({ service: "redis", port: 6379 }));
      t.registry.createAllocation(allocationInput({ service: "postgres", port: 5432 }));
      t.registry.createAllocation(allocationInput({ contextHash: "ctx-b", service: "kafka", port: 9092 }));

      expect(t.registry.deleteByContext("ctx-a")).toBe(2);
      expect(t.registry.listAll().map((a) => a.contextHash)).toEqual(["ctx-b"]);
    });

    it("deletes one service of a context", () => {
      t.registry.createAllocation(allocationInput());

      expect(t.registry.deleteByService("ctx-a", "redis")).toBe(false);
      expect(t.registry.deleteByService("ctx-a", "postgres")).toBe(true);
      expect(t.registry.getAllocation("ctx-a", "postgres")).toBeUndefined();
    });

    it("frees the port of a deleted allocation", () => {
      const id = t.registry.createAllocation(allocationInput());
      t.registry.deleteById(id);

      expect(() =>
        t.registry.createAllocation(allocationInput({ contextHash: "ctx-b", port: 5432 }))
      ).not.toThrow();
    });

    it("lists allocations not accessed within the threshold, oldest first", () => {
      t.registry.createAllocation(allocationInput({ service: "redis", port: 6379 }));
      t.clock.advanceDays(1);
      t.registry.createAllocation(allocationInput({ service: "postgres", port: 5432 }));
      t.clock.advanceDays(10);
      t.registry.createAllocation(allocationInput({ service: "kafka", port: 9092 }));

      expect(t.registry.listStale(5).map((a) => a.service)).toEqual(["redis", "postgres"]);
      expect(t.registry.listStale(10).map((a) => a.service)).toEqual(["redis"]);
      expect(t.registry.listStale(30)).toEqual([]);
    });

    it("rejects a stale threshold that is not a non-negative number", () => {
      expect(() => t.registry.listStale(Number.NaN)).toThrow(DevportsError);
      expect(() => t.registry.listStale(-1)).toThrow(
        "Stale threshold must be a non-negative number of days, got -1"
      );
      expect(() => t.registry.listStale(Number.POSITIVE_INFINITY)).toThrow(DevportsError);
    });

    it("is shared between registry instances on the same file", () => {
      t.registry.createAllocation(allocationInput());

      const other = new Registry({ path: t.registry.path });

      expect(other.getAllocation("ctx-a", "postgres")?.port).toBe(5432);
      expect(() => other.createAllocation(allocationInput({ contextHash: "ctx-b" }))).toThrow(ConflictError);
    });
  });
});
