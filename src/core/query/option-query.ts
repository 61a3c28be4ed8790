/**
 * Query builder for option tables, including the tenant resolution rules:
 * which options a tenant can see and which it has selected.
 */
import type Database from 'better-sqlite3';
import { logger } from '../../utils/logger.js';
import { OptionType } from '../models/option-type.js';
import type { ModelRegistry } from '../models/registry.js';
import type { OptionModel, OptionRecord, OptionRow, TenantId, TenantQueryOptions } from '../models/types.js';
import { BaseQuery, inList, type Predicate } from './base-query.js';
import { optionRowToRecord } from './rows.js';
import { SelectionQuery } from './selection-query.js';

const log = logger.child('query');

export class OptionQuery extends BaseQuery<OptionRow, OptionRecord, OptionQuery> {
  constructor(
    db: Database.Database,
    readonly model: OptionModel,
    private readonly registry: ModelRegistry,
    predicates: readonly Predicate[] = []
  ) {
    super(db, model.table, predicates);
  }

  protected derive(predicates: readonly Predicate[]): OptionQuery {
    return new OptionQuery(this.db, this.model, this.registry, predicates);
  }

  protected toRecord(row: OptionRow): OptionRecord {
    return optionRowToRecord(row);
  }

  ofType(...types: OptionType[]): OptionQuery {
    return this.whereAll(inList('option_type', types));
  }

  customOptions(): OptionQuery {
    return this.ofType(OptionType.CUSTOM);
  }

  mandatoryOptions(): OptionQuery {
    return this.ofType(OptionType.MANDATORY);
  }

  optionalOptions(): OptionQuery {
    return this.ofType(OptionType.OPTIONAL);
  }

  /** Mandatory and optional options, the ones a default table manages. */
  defaultOptions(): OptionQuery {
    return this.ofType(OptionType.MANDATORY, OptionType.OPTIONAL);
  }

  /** Case-insensitive name match. */
  whereNames(names: readonly string[]): OptionQuery {
    return this.whereAll(inList('lower(name)', names.map((name) => name.toLowerCase())));
  }

  excludeNames(names: readonly string[]): OptionQuery {
    if (names.length === 0) {
      return this;
    }
    const match = inList('lower(name)', names.map((name) => name.toLowerCase()));
    return this.whereAll({ sql: `NOT (${match.sql})`, params: match.params });
  }

  forTenant(tenant: TenantId): OptionQuery {
    return this.where('tenant_id = ?', tenant);
  }

  tenantless(): OptionQuery {
    return this.where('tenant_id IS NULL');
  }

  /**
   * Options available to a tenant: every mandatory and optional option plus
   * the tenant's own custom options. Active only unless `includeDeleted`.
   */
  optionsForTenant(tenant: TenantId, options: TenantQueryOptions = {}): OptionQuery {
    const scoped = this.where(
      "option_type IN ('mandatory', 'optional') OR (option_type = 'custom' AND tenant_id = ?)",
      tenant
    );
    return options.includeDeleted ? scoped : scoped.active();
  }

  /**
   * Options a tenant has selected: every mandatory option, plus optional
   * options and the tenant's custom options that have an active selection
   * row for the tenant.
   */
  selectedOptionsForTenant(tenant: TenantId, options: TenantQueryOptions = {}): OptionQuery {
    log.debug(`selectedOptionsForTenant(${tenant}, includeDeleted=${options.includeDeleted ?? false}) on ${this.model.ref}`);

    const selectionModel = this.registry.selectionModelFor(this.model);
    let selectedIds: number[] = [];
    if (selectionModel) {
      selectedIds = new SelectionQuery(this.db, selectionModel, this.registry).active().forTenant(tenant).optionIds();
    } else {
      log.warn(`No selection model is registered for ${this.model.ref}; only mandatory options are selected`);
    }

    const picked = inList('id', selectedIds);
    const scoped = this.whereAll({
      sql:
        `option_type = 'mandatory' OR ((${picked.sql}) AND ` +
        `(option_type = 'optional' OR (option_type = 'custom' AND tenant_id = ?)))`,
      params: [...picked.params, tenant],
    });
    return options.includeDeleted ? scoped : scoped.active();
  }

  /** Names of the matching options, ordered by id. */
  names(): string[] {
    return this.all().map((option) => option.name);
  }

  /**
   * Hard delete. Referencing selections are soft-deleted first, in the same
   * transaction; the foreign key then removes them (cascade) or rejects the
   * delete (restrict).
   */
  protected override purge(): number {
    const ids = this.ids();
    for (const selectionModel of this.registry.selectionModelsReferencing(this.model)) {
      new SelectionQuery(this.db, selectionModel, this.registry).forOptions(ids).delete();
    }
    return super.purge();
  }
}
