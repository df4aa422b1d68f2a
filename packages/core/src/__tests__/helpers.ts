import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { CreateAllocationInput } from "@devports/shared";
import { Registry } from "../db/registry.js";
import type { PortProbe } from "../services/system-probe.js";

export const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Probe with a fixed set of listening ports and ports that refuse to bind
 */
export class FakeProbe implements PortProbe {
  listening = new Set<number>();
  unbindable = new Set<number>();
  bindChecks: number[] = [];

  async listeningPorts(): Promise<Set<number>> {
    return new Set(this.listening);
  }

  async isBindable(port: number): Promise<boolean> {
    this.bindChecks.push(port);
    return !this.unbindable.has(port);
  }
}

export class FakeClock {
  current: Date;

  constructor(start = "2026-01-01T00:00:00.000Z") {
    this.current = new Date(start);
  }

  now = (): Date => this.current;

  advanceDays(days: number): void {
    this.current = new Date(this.current.getTime() + days * DAY_MS);
  }
}

export interface TestRegistry {
  registry: Registry;
  clock: FakeClock;
  dir: string;
  cleanup: () => void;
}

export function createTestRegistry(): TestRegistry {
  const dir = mkdtempSync(join(tmpdir(), "devports-test-"));
  const clock = new FakeClock();
  const registry = new Registry({ path: join(dir, "registry.db"), now: clock.now });
  return {
    registry,
    clock,
    dir,
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

export function allocationInput(overrides: Partial<CreateAllocationInput> = {}): CreateAllocationInput {
  return {
    contextHash: "ctx-a",
    contextPath: "/projects/a",
    contextLabel: "a/main",
    service: "postgres",
    port: 5432,
    ...overrides,
  };
}
