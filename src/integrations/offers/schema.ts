import type Database from 'better-sqlite3';
import { z } from 'zod';

// ─── Table ──────────────────────────────────────────────────────────────────

export const OFFERS_TABLE = 'offers';

/**
 * Base layout of the table. Columns added later live in COLUMN_MIGRATIONS
 * so that older databases and fresh ones converge on the same shape.
 */
export const CREATE_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS offers (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    raw_text TEXT NOT NULL,
    country TEXT,
    method TEXT,
    fee TEXT,
    rate TEXT,
    limits TEXT,
    conditions TEXT,
    status TEXT NOT NULL DEFAULT 'new',
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )
`;

export const CREATE_INDEX_SQL = `
  CREATE INDEX IF NOT EXISTS idx_offers_status ON offers(status);
`;

export interface ColumnMigration {
  column: string;
  definition: string;
}

/** Additive only, applied in order. Never drop or rewrite a column here. */
export const COLUMN_MIGRATIONS: readonly ColumnMigration[] = [
  { column: 'kind', definition: 'TEXT' },
  { column: 'fee_percent', definition: 'REAL' },
];

const TableInfoRowSchema = z.object({ name: z.string() });

export function listColumns(db: Database.Database, table: string = OFFERS_TABLE): Set<string> {
  const rows = db.prepare(`PRAGMA table_info(${table})`).all();
  return new Set(rows.map((row) => TableInfoRowSchema.parse(row).name));
}

/**
 * Adds every migration column the table is missing. Returns the columns added.
 */
export function applyColumnMigrations(
  db: Database.Database,
  migrations: readonly ColumnMigration[] = COLUMN_MIGRATIONS,
): string[] {
  const migrate = db.transaction(() => {
    const existing = listColumns(db);
    const added: string[] = [];

    for (const { column, definition } of migrations) {
      if (existing.has(column)) continue;
      db.exec(`ALTER TABLE ${OFFERS_TABLE} ADD COLUMN ${column} ${definition}`);
      added.push(column);
    }

    return added;
  });

  return migrate();
}
