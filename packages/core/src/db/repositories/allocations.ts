import type Database from "better-sqlite3";
import type { Allocation, CreateAllocationInput } from "@devports/shared";

interface AllocationRow {
  id: number;
  context_hash: string;
  context_path: string;
  context_label: string;
  service: string;
  port: number;
  container_port: number | null;
  env_var: string | null;
  source: string | null;
  created_at: string;
  last_accessed_at: string;
}

function rowToAllocation(row: AllocationRow): Allocation {
  return {
    id: row.id,
    contextHash: row.context_hash,
    contextPath: row.context_path,
    contextLabel: row.context_label,
    service: row.service,
    port: row.port,
    containerPort: row.container_port ?? undefined,
    envVar: row.env_var ?? undefined,
    source: row.source ?? undefined,
    createdAt: row.created_at,
    lastAccessedAt: row.last_accessed_at,
  };
}

/**
 * Insert an allocation, returning its id.
 * Throws the driver's constraint error when the port or context+service is taken.
 */
export function insertAllocation(
  db: Database.Database,
  input: CreateAllocationInput,
  now: string
): number {
  const stmt = db.prepare(`
    INSERT INTO allocations (
      context_hash, context_path, context_label, service, port,
      container_port, env_var, source, created_at, last_accessed_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);

  const result = stmt.run(
    input.contextHash,
    input.contextPath,
    input.contextLabel,
    input.service,
    input.port,
    input.containerPort ?? null,
    input.envVar ?? null,
    input.source ?? null,
    now,
    now
  );

  return Number(result.lastInsertRowid);
}

export function findAllocation(
  db: Database.Database,
  contextHash: string,
  service: string
): Allocation | undefined {
  const stmt = db.prepare("SELECT * FROM allocations WHERE context_hash = ? AND service = ?");
  const row = stmt.get(contextHash, service) as AllocationRow | undefined;
  return row ? rowToAllocation(row) : undefined;
}

export function findAllocationsByContext(db: Database.Database, contextHash: string): Allocation[] {
  const stmt = db.prepare("SELECT * FROM allocations WHERE context_hash = ? ORDER BY service");
  const rows = stmt.all(contextHash) as AllocationRow[];
  return rows.map(rowToAllocation);
}

export function findAllAllocations(db: Database.Database): Allocation[] {
  const stmt = db.prepare("SELECT * FROM allocations ORDER BY context_label, service");
  const rows = stmt.all() as AllocationRow[];
  return rows.map(rowToAllocation);
}

/**
 * Allocations last accessed before `cutoff`, oldest first
 */
export function findAllocationsAccessedBefore(db: Database.Database, cutoff: string): Allocation[] {
  const stmt = db.prepare(`
    SELECT * FROM allocations
    WHERE last_accessed_at < ?
    ORDER BY last_accessed_at
  `);
  const rows = stmt.all(cutoff) as AllocationRow[];
  return rows.map(rowToAllocation);
}

export function getAllocatedPorts(db: Database.Database): number[] {
  const stmt = db.prepare("SELECT port FROM allocations ORDER BY port");
  const rows = stmt.all() as Array<{ port: number }>;
  return rows.map((r) => r.port);
}

export function updateLastAccessed(db: Database.Database, id: number, now: string): void {
  db.prepare("UPDATE allocations SET last_accessed_at = ? WHERE id = ?").run(now, id);
}

export function deleteAllocation(db: Database.Database, id: number): boolean {
  const result = db.prepare("DELETE FROM allocations WHERE id = ?").run(id);
  return result.changes > 0;
}

export function deleteAllocationsByContext(db: Database.Database, contextHash: string): number {
  const result = db.prepare("DELETE FROM allocations WHERE context_hash = ?").run(contextHash);
  return result.changes;
}

export function deleteAllocationByService(
  db: Database.Database,
  contextHash: string,
  service: string
): boolean {
  const result = db
    .prepare("DELETE FROM allocations WHERE context_hash = ? AND service = ?")
    .run(contextHash, service);
  return result.changes > 0;
}
