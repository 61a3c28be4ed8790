/**
 * Immutable, composable query over one catalog table.
 *
 * Each filter returns a new query; predicates are ANDed, so the order in
 * which filters are applied does not change the result. Results are
 * ordered by id.
 */
import type Database from 'better-sqlite3';
import { quoteIdentifier } from '../db/identifiers.js';
import { deletedTimestamp } from '../lifecycle/state.js';
import { runWrite } from '../lifecycle/write.js';

export type SqlValue = string | number | null;

export interface Predicate {
  sql: string;
  params: readonly SqlValue[];
}

export interface DeleteOptions {
  /** Hard delete instead of setting the deleted timestamp */
  override?: boolean;
}

/**
 * `column IN (?, ...)`. An empty list matches nothing.
 */
export function inList(column: string, values: readonly SqlValue[]): Predicate {
  if (values.length === 0) {
    return { sql: '0 = 1', params: [] };
  }
  return { sql: `${column} IN (${values.map(() => '?').join(', ')})`, params: values };
}

export abstract class BaseQuery<TRow, TRecord, TSelf> {
  protected constructor(
    protected readonly db: Database.Database,
    protected readonly table: string,
    protected readonly predicates: readonly Predicate[]
  ) {}

  protected abstract derive(predicates: readonly Predicate[]): TSelf;

  protected abstract toRecord(row: TRow): TRecord;

  protected where(sql: string, ...params: SqlValue[]): TSelf {
    return this.whereAll({ sql, params });
  }

  protected whereAll(predicate: Predicate): TSelf {
    return this.derive([...this.predicates, predicate]);
  }

  protected get quotedTable(): string {
    return quoteIdentifier(this.table);
  }

  protected whereClause(extra?: string): { sql: string; params: SqlValue[] } {
    const parts = this.predicates.map((p) => `(${p.sql})`);
    if (extra) {
      parts.push(extra);
    }
    return {
      sql: parts.length > 0 ? ` WHERE ${parts.join(' AND ')}` : '',
      params: this.predicates.flatMap((p) => p.params),
    };
  }

  /** Rows that are not soft-deleted. */
  active(): TSelf {
    return this.where('deleted IS NULL');
  }

  /** Soft-deleted rows. */
  deleted(): TSelf {
    return this.where('deleted IS NOT NULL');
  }

  whereIds(ids: readonly number[]): TSelf {
    return this.whereAll(inList('id', ids));
  }

  excludeIds(ids: readonly number[]): TSelf {
    const match = inList('id', ids);
    return this.whereAll({ sql: `NOT (${match.sql})`, params: match.params });
  }

  all(): TRecord[] {
    const { sql, params } = this.whereClause();
    const rows = this.db.prepare(`SELECT * FROM ${this.quotedTable}${sql} ORDER BY id`).all(...params) as TRow[];
    return rows.map((row) => this.toRecord(row));
  }

  first(): TRecord | null {
    const { sql, params } = this.whereClause();
    const row = this.db.prepare(`SELECT * FROM ${this.quotedTable}${sql} ORDER BY id LIMIT 1`).get(...params) as
      | TRow
      | undefined;
    return row ? this.toRecord(row) : null;
  }

  count(): number {
    const { sql, params } = this.whereClause();
    const row = this.db.prepare(`SELECT COUNT(*) AS count FROM ${this.quotedTable}${sql}`).get(...params) as {
      count: number;
    };
    return row.count;
  }

  exists(): boolean {
    const { sql, params } = this.whereClause();
    return this.db.prepare(`SELECT 1 FROM ${this.quotedTable}${sql} LIMIT 1`).get(...params) !== undefined;
  }

  ids(): number[] {
    const { sql, params } = this.whereClause();
    const rows = this.db.prepare(`SELECT id FROM ${this.quotedTable}${sql} ORDER BY id`).all(...params) as {
      id: number;
    }[];
    return rows.map((row) => row.id);
  }

  /**
   * Soft delete every matching row, or hard delete with `override`.
   * Rows that are already soft-deleted keep their original timestamp.
   * Returns the number of rows changed.
   */
  delete(options: DeleteOptions = {}): number {
    return runWrite(this.db, () => (options.override ? this.purge() : this.softDelete()), {
      table: this.table,
      override: options.override ?? false,
    });
  }

  /**
   * Clear the deleted timestamp of every matching row.
   */
  undelete(): number {
    return runWrite(
      this.db,
      () => {
        const { sql, params } = this.whereClause('deleted IS NOT NULL');
        return this.db.prepare(`UPDATE ${this.quotedTable} SET deleted = NULL${sql}`).run(...params).changes;
      },
      { table: this.table }
    );
  }

  protected softDelete(): number {
    const { sql, params } = this.whereClause('deleted IS NULL');
    return this.db.prepare(`UPDATE ${this.quotedTable} SET deleted = ?${sql}`).run(deletedTimestamp(), ...params)
      .changes;
  }

  protected purge(): number {
    const { sql, params } = this.whereClause();
    return this.db.prepare(`DELETE FROM ${this.quotedTable}${sql}`).run(...params).changes;
  }
}
