/**
 * Query builder for selection tables.
 */
import type Database from 'better-sqlite3';
import { quoteIdentifier } from '../db/identifiers.js';
import type { ModelRegistry } from '../models/registry.js';
import type { SelectionModel, SelectionRecord, SelectionRow, TenantId } from '../models/types.js';
import { BaseQuery, inList, type Predicate } from './base-query.js';
import { selectionRowToRecord } from './rows.js';

export class SelectionQuery extends BaseQuery<SelectionRow, SelectionRecord, SelectionQuery> {
  constructor(
    db: Database.Database,
    readonly model: SelectionModel,
    private readonly registry: ModelRegistry,
    predicates: readonly Predicate[] = []
  ) {
    super(db, model.table, predicates);
  }

  protected derive(predicates: readonly Predicate[]): SelectionQuery {
    return new SelectionQuery(this.db, this.model, this.registry, predicates);
  }

  protected toRecord(row: SelectionRow): SelectionRecord {
    return selectionRowToRecord(row);
  }

  forTenant(tenant: TenantId): SelectionQuery {
    return this.where('tenant_id = ?', tenant);
  }

  forOption(optionId: number): SelectionQuery {
    return this.where('option_id = ?', optionId);
  }

  forOptions(optionIds: readonly number[]): SelectionQuery {
    return this.whereAll(inList('option_id', optionIds));
  }

  /**
   * Selections whose option is soft-deleted.
   */
  withDeletedOption(): SelectionQuery {
    const optionTable = quoteIdentifier(this.registry.getOptionModel(this.model.optionModel).table);
    return this.where(`option_id IN (SELECT id FROM ${optionTable} WHERE deleted IS NOT NULL)`);
  }

  /** Distinct option ids of the matching selections. */
  optionIds(): number[] {
    const { sql, params } = this.whereClause();
    const rows = this.db
      .prepare(`SELECT DISTINCT option_id FROM ${this.quotedTable}${sql} ORDER BY option_id`)
      .all(...params) as { option_id: number }[];
    return rows.map((row) => row.option_id);
  }
}
