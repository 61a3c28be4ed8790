/**
 * Option repository - creation helpers, lifecycle operations and
 * default-option synchronization for one option model.
 */

import type Database from 'better-sqlite3';
import { logger } from '../../utils/logger.js';
import {
  InvalidArgumentError,
  InvalidDefaultOptionError,
  NameConflictError,
  NotFoundError,
} from '../../utils/errors.js';
import { quoteIdentifier } from '../db/identifiers.js';
import { unwrap } from '../lifecycle/result.js';
import { validateOption, validateOptionName } from '../lifecycle/validation.js';
import { runWrite } from '../lifecycle/write.js';
import { OptionType, isDefaultOptionType } from '../models/option-type.js';
import type { ModelRegistry } from '../models/registry.js';
import type {
  DefaultOptionConfig,
  OptionModel,
  OptionRecord,
  TenantId,
  TenantQueryOptions,
} from '../models/types.js';
import type { DeleteOptions } from '../query/base-query.js';
import { OptionQuery } from '../query/option-query.js';
import type { CreateOptionInput, OptionManager, SyncReport } from './types.js';

const log = logger.child('options');

/**
 * Type of a default-options entry. Entries without a type are mandatory;
 * custom or unknown types are rejected.
 */
export function resolveDefaultOptionType(
  name: string,
  config: DefaultOptionConfig
): typeof OptionType.MANDATORY | typeof OptionType.OPTIONAL {
  if (config.optionType === undefined) {
    return OptionType.MANDATORY;
  }
  if (!isDefaultOptionType(config.optionType)) {
    throw new InvalidDefaultOptionError(
      `Option defaults must be of type '${OptionType.MANDATORY}' or '${OptionType.OPTIONAL}'. ` +
        `You specified option_type = ${config.optionType} for '${name}'.`,
      { name, optionType: config.optionType }
    );
  }
  return config.optionType;
}

/**
 * Declared default names that collide case-insensitively, grouped by their
 * lowercased form in declaration order.
 */
export function findCaseDuplicateNames(names: readonly string[]): string[][] {
  const groups = new Map<string, string[]>();
  for (const name of names) {
    const key = name.toLowerCase();
    groups.set(key, [...(groups.get(key) ?? []), name]);
  }
  return [...groups.values()].filter((group) => group.length > 1);
}

/**
 * Repository for the options of one option model.
 * Every write is validated and runs in its own transaction.
 */
export class OptionRepository implements OptionManager {
  constructor(
    private readonly db: Database.Database,
    readonly model: OptionModel,
    private readonly registry: ModelRegistry
  ) {}

  /**
   * A fresh query over this model's table.
   */
  query(): OptionQuery {
    return new OptionQuery(this.db, this.model, this.registry);
  }

  /**
   * Get an option by id, whatever its state.
   */
  get(id: number): OptionRecord | null {
    return this.query().whereIds([id]).first();
  }

  private require(id: number): OptionRecord {
    const option = this.get(id);
    if (!option) {
      throw new NotFoundError(`${this.model.ref} option ${id} does not exist`, { model: this.model.ref, id });
    }
    return option;
  }

  /**
   * Create an option after validating it. The type defaults to optional.
   */
  create(input: CreateOptionInput): OptionRecord {
    const optionType = input.optionType ?? OptionType.OPTIONAL;
    const tenantId = input.tenant ?? null;
    const name = unwrap(validateOptionName(input.name));

    return runWrite(
      this.db,
      () => {
        unwrap(validateOption(this.db, this.model, this.registry, { name, optionType, tenantId }));
        const result = this.db
          .prepare(`INSERT INTO ${quoteIdentifier(this.model.table)} (name, option_type, tenant_id) VALUES (?, ?, ?)`)
          .run(name, optionType, tenantId);
        return this.require(Number(result.lastInsertRowid));
      },
      { model: this.model.ref, name, optionType, tenantId }
    );
  }

  /**
   * Create an option that every tenant has selected.
   */
  createMandatory(name: string): OptionRecord {
    return this.createDefault(name, OptionType.MANDATORY);
  }

  /**
   * Create an option every tenant may select.
   */
  createOptional(name: string): OptionRecord {
    return this.createDefault(name, OptionType.OPTIONAL);
  }

  /**
   * Create a custom option owned by a tenant.
   */
  createForTenant(tenant: TenantId | null | undefined, name: string): OptionRecord {
    if (tenant === null || tenant === undefined) {
      throw new InvalidArgumentError('A tenant is required to create a custom option', { model: this.model.ref, name });
    }
    return this.create({ name, optionType: OptionType.CUSTOM, tenant });
  }

  private createDefault(name: string, optionType: OptionType): OptionRecord {
    const trimmed = unwrap(validateOptionName(name));
    return runWrite(this.db, () => {
      const existing = this.query().active().tenantless().whereNames([trimmed]).first();
      if (existing) {
        throw new NameConflictError(`An active ${existing.optionType} option named '${existing.name}' already exists`, {
          model: this.model.ref,
          name: trimmed,
          existingId: existing.id,
        });
      }
      return this.create({ name: trimmed, optionType });
    });
  }

  /**
   * Rename an option, re-running validation.
   */
  rename(id: number, name: string): OptionRecord {
    const trimmed = unwrap(validateOptionName(name));
    return runWrite(
      this.db,
      () => {
        const option = this.require(id);
        unwrap(
          validateOption(this.db, this.model, this.registry, {
            id,
            name: trimmed,
            optionType: option.optionType,
            tenantId: option.tenantId,
          })
        );
        this.db.prepare(`UPDATE ${quoteIdentifier(this.model.table)} SET name = ? WHERE id = ?`).run(trimmed, id);
        return this.require(id);
      },
      { model: this.model.ref, id, name: trimmed }
    );
  }

  /**
   * Soft delete an option, or hard delete it with `override`. Soft delete
   * leaves its selections untouched.
   */
  delete(id: number, options: DeleteOptions = {}): void {
    this.require(id);
    this.query().whereIds([id]).delete(options);
  }

  undelete(id: number): void {
    this.require(id);
    this.query().whereIds([id]).undelete();
  }

  /**
   * Bring storage in line with the model's default-options table in one
   * transaction: create or restore every declared option, fix the type of a
   * same-named default declared with the other type, and soft-delete active
   * mandatory and optional options that are no longer declared.
   */
  syncDefaultOptions(): SyncReport {
    const declared = Object.entries(this.model.defaultOptions).map(([name, config]) => ({
      name: unwrap(validateOptionName(name)),
      optionType: resolveDefaultOptionType(name, config),
    }));

    const duplicates = findCaseDuplicateNames(declared.map((entry) => entry.name));
    if (duplicates.length > 0) {
      throw new InvalidDefaultOptionError(
        `Default option names must be unique ignoring case: ${duplicates.map((group) => group.join(' / ')).join(', ')}`,
        { model: this.model.ref, duplicates }
      );
    }

    return runWrite(
      this.db,
      () => {
        const report: SyncReport = {};
        const table = quoteIdentifier(this.model.table);

        for (const { name, optionType } of declared) {
          const existing = this.query().tenantless().whereNames([name]).first();

          if (!existing) {
            this.db.prepare(`INSERT INTO ${table} (name, option_type, tenant_id) VALUES (?, ?, NULL)`).run(name, optionType);
            report[name] = { action: 'created', optionType };
            log.debug(`Created ${optionType} option '${name}' for ${this.model.ref}`);
            continue;
          }

          const changed = existing.optionType !== optionType || existing.deleted !== null || existing.name !== name;
          if (changed) {
            this.db
              .prepare(`UPDATE ${table} SET name = ?, option_type = ?, deleted = NULL WHERE id = ?`)
              .run(name, optionType, existing.id);
            log.debug(`Updated option '${name}' for ${this.model.ref} (${existing.optionType} -> ${optionType})`);
          }
          report[name] = { action: changed ? 'updated' : 'verified', optionType };
        }

        const retired = this.query()
          .defaultOptions()
          .tenantless()
          .active()
          .excludeNames(declared.map((entry) => entry.name))
          .all();
        if (retired.length > 0) {
          this.query().whereIds(retired.map((option) => option.id)).delete();
        }
        for (const option of retired) {
          report[option.name] = { action: 'deleted', optionType: option.optionType };
          log.debug(`Soft-deleted option '${option.name}' for ${this.model.ref}; it is no longer a default`);
        }

        return report;
      },
      { model: this.model.ref }
    );
  }

  /**
   * Options available to a tenant.
   */
  optionsForTenant(tenant: TenantId, options: TenantQueryOptions = {}): OptionRecord[] {
    return this.query().optionsForTenant(tenant, options).all();
  }

  /**
   * Options a tenant has selected, mandatory options included.
   */
  selectedOptionsForTenant(tenant: TenantId, options: TenantQueryOptions = {}): OptionRecord[] {
    return this.query().selectedOptionsForTenant(tenant, options).all();
  }
}

/**
 * Default repository factory for option models.
 */
export function createOptionRepository(
  db: Database.Database,
  model: OptionModel,
  registry: ModelRegistry
): OptionRepository {
  return new OptionRepository(db, model, registry);
}
