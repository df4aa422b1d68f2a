import type Database from "better-sqlite3";
import type { PortRange } from "@devports/shared";

interface PortRangeRow {
  service: string;
  range_start: number;
  range_end: number;
}

function rowToPortRange(row: PortRangeRow): PortRange {
  return {
    service: row.service,
    start: row.range_start,
    end: row.range_end,
  };
}

export function findPortRange(db: Database.Database, service: string): PortRange | undefined {
  const stmt = db.prepare("SELECT * FROM port_ranges WHERE service = ?");
  const row = stmt.get(service) as PortRangeRow | undefined;
  return row ? rowToPortRange(row) : undefined;
}

export function upsertPortRange(db: Database.Database, range: PortRange): void {
  db.prepare(`
    INSERT INTO port_ranges (service, range_start, range_end)
    VALUES (?, ?, ?)
    ON CONFLICT(service) DO UPDATE SET
      range_start = excluded.range_start,
      range_end = excluded.range_end
  `).run(range.service, range.start, range.end);
}

export function findAllPortRanges(db: Database.Database): PortRange[] {
  const rows = db.prepare("SELECT * FROM port_ranges ORDER BY service").all() as PortRangeRow[];
  return rows.map(rowToPortRange);
}
