/**
 * Offer Store — SQLite-backed Offer Catalog
 *
 * Persistent storage for payment-channel and merchant offers.
 * Uses better-sqlite3; every operation opens its own connection and
 * closes it before returning, so nothing stays open while the bot waits
 * on the interpreter.
 *
 * Usage:
 *   const store = new OfferStore('offers.db');
 *   store.init();
 *   const id = store.create({ country: 'RU', method: 'SBP' }, 'RU SBP 1.8%');
 *   const offers = store.search({ country: 'ru', maxFeePercent: 2 });
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import {
  OFFER_STATUSES,
  OfferDraftSchema,
  OfferKindSchema,
  OfferStatusSchema,
  SearchFilterSchema,
  type Offer,
  type OfferDraftInput,
  type OfferStatus,
  type OfferSummary,
  type SearchFilterInput,
} from '../../types/index.js';
import { StorageFault, ValidationError } from '../../kernel/errors.js';
import { createLogger, formatError } from '../../utils/logger.js';
import { CASEFOLD_FUNCTION, buildSearchClause } from './filter-builder.js';
import { CREATE_INDEX_SQL, CREATE_TABLE_SQL, applyColumnMigrations } from './schema.js';

const log = createLogger('offer-store');

// ─── Constants ──────────────────────────────────────────────────────────────

export const DEFAULT_RECENT_LIMIT = 10;
export const DEFAULT_SEARCH_LIMIT = 20;

const SUMMARY_COLUMNS = 'id, country, method, fee, fee_percent, rate, kind, status, created_at';

// ─── Row Schemas ────────────────────────────────────────────────────────────

const nullableText = z.string().nullable();

const SummaryRowSchema = z.object({
  id: z.number().int(),
  country: nullableText,
  method: nullableText,
  fee: nullableText,
  // Legacy rows may hold non-numeric text in this column
  fee_percent: z.unknown().transform((value) =>
    typeof value === 'number' && Number.isFinite(value) ? value : null,
  ),
  rate: nullableText,
  kind: OfferKindSchema.nullable().catch(null),
  status: OfferStatusSchema.catch('new'),
  created_at: z.string(),
});

const OfferRowSchema = SummaryRowSchema.extend({
  raw_text: z.string(),
  limits: nullableText,
  conditions: nullableText,
  updated_at: z.string(),
});

const CountRowSchema = z.object({ count: z.number() });
const StatusCountRowSchema = z.object({ status: z.string(), count: z.number() });

export interface InitReport {
  dbPath: string;
  addedColumns: string[];
}

// ─── OfferStore ─────────────────────────────────────────────────────────────

export class OfferStore {
  private readonly dbPath: string;
  private initialized = false;

  constructor(dbPath: string) {
    if (dbPath === ':memory:' || dbPath.trim() === '') {
      throw new ValidationError('OfferStore requires a file-backed database path');
    }
    this.dbPath = dbPath;
  }

  /**
   * Create the table if absent and add any missing columns. Safe to repeat.
   */
  init(): InitReport {
    mkdirSync(path.dirname(path.resolve(this.dbPath)), { recursive: true });

    const addedColumns = this.withConnection('init', (db) => {
      db.pragma('journal_mode = WAL');
      db.exec(CREATE_TABLE_SQL);
      const added = applyColumnMigrations(db);
      db.exec(CREATE_INDEX_SQL);
      return added;
    });

    this.initialized = true;
    log.info({ dbPath: this.dbPath, addedColumns }, 'Offer store initialized');
    return { dbPath: this.dbPath, addedColumns };
  }

  /**
   * Insert a new offer with status "new". Optional fields that are missing or
   * malformed are stored as NULL. Returns the assigned id.
   */
  create(draft: OfferDraftInput, rawText: string): number {
    this.ensureInit();
    if (rawText.trim() === '') {
      throw new ValidationError('Offer text must not be empty');
    }

    const offer = OfferDraftSchema.parse(draft);
    const now = new Date().toISOString();

    const id = this.withConnection('create', (db) => {
      const info = db.prepare(`
        INSERT INTO offers (
          raw_text, country, method, fee, rate, limits,
          conditions, status, created_at, updated_at,
          kind, fee_percent
        )
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        rawText,
        offer.country ?? null,
        offer.method ?? null,
        offer.fee ?? null,
        offer.rate ?? null,
        offer.limits ?? null,
        offer.conditions ?? null,
        'new',
        now,
        now,
        offer.kind ?? null,
        offer.feePercent ?? null,
      );
      return Number(info.lastInsertRowid);
    });

    log.info({ offerId: id, kind: offer.kind, country: offer.country }, 'Offer created');
    return id;
  }

  /**
   * Full record by id, or null when no row matches.
   */
  getById(id: number): Offer | null {
    this.ensureInit();
    if (!Number.isSafeInteger(id)) {
      throw new ValidationError(`Offer id must be an integer, got ${id}`);
    }

    const row = this.withConnection('getById', (db) =>
      db.prepare('SELECT * FROM offers WHERE id = ?').get(id),
    );
    if (row === undefined) return null;

    return this.rowToOffer(OfferRowSchema.parse(row));
  }

  /**
   * Most recently created offers, newest id first.
   */
  listRecent(limit: number = DEFAULT_RECENT_LIMIT): OfferSummary[] {
    this.ensureInit();
    assertLimit(limit);

    const rows = this.withConnection('listRecent', (db) =>
      db.prepare(`SELECT ${SUMMARY_COLUMNS} FROM offers ORDER BY id DESC LIMIT ?`).all(limit),
    );

    return rows.map((row) => this.rowToSummary(SummaryRowSchema.parse(row)));
  }

  /**
   * Offers matching every present filter criterion, newest id first.
   */
  search(filter: SearchFilterInput = {}, limit: number = DEFAULT_SEARCH_LIMIT): OfferSummary[] {
    this.ensureInit();
    assertLimit(limit);

    const { where, params } = buildSearchClause(SearchFilterSchema.parse(filter));

    const rows = this.withConnection('search', (db) =>
      db.prepare(`
        SELECT ${SUMMARY_COLUMNS}
        FROM offers
        WHERE ${where}
        ORDER BY id DESC
        LIMIT ?
      `).all(...params, limit),
    );

    log.debug({ where, paramCount: params.length, resultCount: rows.length }, 'Offer search executed');
    return rows.map((row) => this.rowToSummary(SummaryRowSchema.parse(row)));
  }

  count(): number {
    this.ensureInit();
    const row = this.withConnection('count', (db) =>
      db.prepare('SELECT COUNT(*) AS count FROM offers').get(),
    );
    return CountRowSchema.parse(row).count;
  }

  countByStatus(): Record<OfferStatus, number> {
    this.ensureInit();
    const rows = this.withConnection('countByStatus', (db) =>
      db.prepare('SELECT status, COUNT(*) AS count FROM offers GROUP BY status').all(),
    );

    const counts: Record<OfferStatus, number> = { new: 0, active: 0, paused: 0, closed: 0 };
    for (const raw of rows) {
      const row = StatusCountRowSchema.parse(raw);
      const status = OFFER_STATUSES.find((candidate) => candidate === row.status);
      if (status) counts[status] += row.count;
    }
    return counts;
  }

  // ─── Private Helpers ────────────────────────────────────────────────────────

  private ensureInit(): void {
    if (!this.initialized) {
      throw new StorageFault('OfferStore not initialized. Call init() first.', 'ensureInit');
    }
  }

  /**
   * Opens a connection for a single operation and always closes it.
   * Any driver error is rethrown as a StorageFault.
   */
  private withConnection<T>(operation: string, fn: (db: Database.Database) => T): T {
    let db: Database.Database | undefined;
    try {
      db = new Database(this.dbPath);
      db.pragma('busy_timeout = 5000');
      db.function(CASEFOLD_FUNCTION, { deterministic: true }, (value: unknown) =>
        typeof value === 'string' ? value.toLowerCase() : null,
      );
      return fn(db);
    } catch (error) {
      log.error({ operation, dbPath: this.dbPath, err: formatError(error) }, 'Storage operation failed');
      throw new StorageFault(
        `Storage operation "${operation}" failed: ${error instanceof Error ? error.message : String(error)}`,
        operation,
        error,
      );
    } finally {
      db?.close();
    }
  }

  private rowToSummary(row: z.infer<typeof SummaryRowSchema>): OfferSummary {
    return {
      id: row.id,
      country: row.country ?? undefined,
      method: row.method ?? undefined,
      fee: row.fee ?? undefined,
      feePercent: row.fee_percent ?? undefined,
      rate: row.rate ?? undefined,
      kind: row.kind ?? undefined,
      status: row.status,
      createdAt: row.created_at,
    };
  }

  private rowToOffer(row: z.infer<typeof OfferRowSchema>): Offer {
    return {
      ...this.rowToSummary(row),
      rawText: row.raw_text,
      limits: row.limits ?? undefined,
      conditions: row.conditions ?? undefined,
      updatedAt: row.updated_at,
    };
  }
}

function assertLimit(limit: number): void {
  if (!Number.isSafeInteger(limit) || limit < 1) {
    throw new ValidationError(`Limit must be a positive integer, got ${limit}`);
  }
}
