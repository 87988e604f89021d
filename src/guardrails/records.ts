import type Database from 'better-sqlite3';
import { ConfigError } from '../shared/errors.js';
import { createLogger, errorMessage } from '../shared/logger.js';
import { ok, err } from '../shared/result.js';
import type { Result } from '../shared/result.js';

const log = createLogger('guardrails');

/** External record store consulted by the count-based guardrails. */
export interface RecordSource {
  readonly name: string;
  countTotal(): number;
  countUnprocessed(): number;
  countNull(field: string): number;
  /** Create the backing store if it does not exist yet. */
  createIfMissing(): void;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

function assertIdentifier(value: string, what: string): void {
  if (!IDENTIFIER.test(value)) {
    throw new ConfigError(`Invalid ${what}: ${value}`);
  }
}

/**
 * RecordSource over a SQLite table shaped like
 * (id, che_number, company_name, processed, created_at, updated_at).
 */
export class SqliteRecordSource implements RecordSource {
  constructor(
    private readonly db: Database.Database,
    readonly name: string = 'data_processing',
  ) {
    assertIdentifier(name, 'table name');
  }

  countTotal(): number {
    return this.count(`SELECT COUNT(*) AS n FROM "${this.name}"`);
  }

  countUnprocessed(): number {
    return this.count(`SELECT COUNT(*) AS n FROM "${this.name}" WHERE processed = 0`);
  }

  countNull(field: string): number {
    assertIdentifier(field, 'field name');
    return this.count(`SELECT COUNT(*) AS n FROM "${this.name}" WHERE "${field}" IS NULL`);
  }

  createIfMissing(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS "${this.name}" (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        che_number TEXT NOT NULL UNIQUE,
        company_name TEXT,
        processed INTEGER NOT NULL DEFAULT 0 CHECK (processed IN (0,1)),
        created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
        updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);
  }

  private count(sql: string): number {
    const row = this.db.prepare(sql).get() as { n: number };
    return row.n;
  }
}

function asError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

/**
 * Read a count from the source. When the read fails the source is asked to
 * create its backing store and the read is retried once.
 */
export function readCount(
  source: RecordSource,
  read: (s: RecordSource) => number,
): Result<number, Error> {
  try {
    return ok(read(source));
  } catch (first) {
    log.warn('Record source unavailable, creating it and retrying', {
      source: source.name,
      error: errorMessage(first),
    });
  }
  try {
    source.createIfMissing();
    return ok(read(source));
  } catch (second) {
    return err(asError(second));
  }
}
