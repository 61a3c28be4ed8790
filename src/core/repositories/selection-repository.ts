/**
 * Selection repository - a tenant's recorded choices of optional and
 * custom options for one selection model.
 */

import type Database from 'better-sqlite3';
import { logger } from '../../utils/logger.js';
import { IntegrityError, NoTenantProvidedError, NotFoundError, ValidationError } from '../../utils/errors.js';
import { quoteIdentifier } from '../db/identifiers.js';
import { unwrap } from '../lifecycle/result.js';
import { validateSelection } from '../lifecycle/validation.js';
import { runWrite } from '../lifecycle/write.js';
import type { ModelRegistry } from '../models/registry.js';
import type {
  OptionModel,
  OptionRecord,
  SelectionModel,
  SelectionRecord,
  TenantId,
  TenantQueryOptions,
} from '../models/types.js';
import type { DeleteOptions } from '../query/base-query.js';
import { OptionQuery } from '../query/option-query.js';
import { SelectionQuery } from '../query/selection-query.js';
import type { CreateSelectionInput, SelectionManager, SetSelectionsResult } from './types.js';

const log = logger.child('selections');

export class SelectionRepository implements SelectionManager {
  constructor(
    private readonly db: Database.Database,
    readonly model: SelectionModel,
    private readonly registry: ModelRegistry
  ) {}

  /** The option model this selection model points at. */
  get optionModel(): OptionModel {
    return this.registry.getOptionModel(this.model.optionModel);
  }

  query(): SelectionQuery {
    return new SelectionQuery(this.db, this.model, this.registry);
  }

  private options(): OptionQuery {
    return new OptionQuery(this.db, this.optionModel, this.registry);
  }

  get(id: number): SelectionRecord | null {
    return this.query().whereIds([id]).first();
  }

  private require(id: number): SelectionRecord {
    const selection = this.get(id);
    if (!selection) {
      throw new NotFoundError(`${this.model.ref} selection ${id} does not exist`, { model: this.model.ref, id });
    }
    return selection;
  }

  /**
   * Record a selection after validating it.
   */
  create(input: CreateSelectionInput): SelectionRecord {
    return runWrite(
      this.db,
      () => {
        unwrap(validateSelection(this.db, this.model, this.registry, { tenantId: input.tenant, optionId: input.option }));
        const result = this.db
          .prepare(`INSERT INTO ${quoteIdentifier(this.model.table)} (tenant_id, option_id) VALUES (?, ?)`)
          .run(input.tenant, input.option);
        return this.require(Number(result.lastInsertRowid));
      },
      { model: this.model.ref, tenant: input.tenant, option: input.option }
    );
  }

  /**
   * Select an option for a tenant. Returns the active selection if there
   * already is one; otherwise creates a new row, so history is kept.
   */
  select(tenant: TenantId, optionId: number): SelectionRecord {
    return runWrite(this.db, () => {
      const existing = this.query().active().forTenant(tenant).forOption(optionId).first();
      return existing ?? this.create({ tenant, option: optionId });
    });
  }

  /**
   * Soft delete the tenant's active selection of an option.
   * Returns the number of selections deselected.
   */
  deselect(tenant: TenantId, optionId: number): number {
    return this.query().active().forTenant(tenant).forOption(optionId).delete();
  }

  delete(id: number, options: DeleteOptions = {}): void {
    this.require(id);
    this.query().whereIds([id]).delete(options);
  }

  undelete(id: number): void {
    this.require(id);
    this.query().whereIds([id]).undelete();
  }

  /**
   * Replace a tenant's optional and custom selections with `optionIds`.
   * Mandatory options are implicit and ignored. Removals and additions run
   * in one transaction; a validation or integrity failure rolls both back
   * and is reported in the result with a logged warning.
   */
  setSelections(tenant: TenantId | null | undefined, optionIds: readonly number[]): SetSelectionsResult {
    if (tenant === null || tenant === undefined) {
      throw new NoTenantProvidedError('No tenant was provided when saving selections');
    }

    try {
      return runWrite(
        this.db,
        (): SetSelectionsResult => {
          const mandatory = new Set(this.options().mandatoryOptions().ids());
          const wanted = [...new Set(optionIds)].filter((id) => !mandatory.has(id));
          const current = this.query().active().forTenant(tenant).optionIds();
          const currentSelectable = new Set(
            this.options().whereIds(current).ofType('optional', 'custom').ids()
          );

          const removed = [...currentSelectable].filter((id) => !wanted.includes(id));
          const added = wanted.filter((id) => !current.includes(id));

          this.query().active().forTenant(tenant).forOptions(removed).delete();
          for (const optionId of added) {
            this.create({ tenant, option: optionId });
          }

          log.debug(`Tenant ${tenant} selections on ${this.model.ref}: +[${added.join(', ')}] -[${removed.join(', ')}]`);
          return { ok: true, added, removed };
        },
        { model: this.model.ref, tenant }
      );
    } catch (error) {
      if (error instanceof ValidationError || error instanceof IntegrityError) {
        log.warn(`Problem creating or deleting selections for tenant ${tenant}: ${error.message}`);
        return { ok: false, added: [], removed: [], error };
      }
      throw error;
    }
  }

  optionsForTenant(tenant: TenantId, options: TenantQueryOptions = {}): OptionRecord[] {
    return this.options().optionsForTenant(tenant, options).all();
  }

  selectedOptionsForTenant(tenant: TenantId, options: TenantQueryOptions = {}): OptionRecord[] {
    return this.options().selectedOptionsForTenant(tenant, options).all();
  }
}

/**
 * Default repository factory for selection models.
 */
export function createSelectionRepository(
  db: Database.Database,
  model: SelectionModel,
  registry: ModelRegistry
): SelectionRepository {
  return new SelectionRepository(db, model, registry);
}
