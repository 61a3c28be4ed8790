/**
 * Entry point that builds repositories for registered models.
 */
import type Database from 'better-sqlite3';
import { ModelDefinitionError } from '../../utils/errors.js';
import type { ModelRegistry } from '../models/registry.js';
import type { ModelRef, OptionModel, SelectionModel, TenantId } from '../models/types.js';
import { TenantOptions } from './tenant-options.js';
import type { OptionManager, SelectionManager } from './types.js';

export function optionRepositoryFor(db: Database.Database, model: OptionModel, registry: ModelRegistry): OptionManager {
  if (!model.repository) {
    throw new ModelDefinitionError(`${model.ref} has no repository`, { model: model.ref });
  }
  return model.repository(db, model, registry);
}

export function selectionRepositoryFor(
  db: Database.Database,
  model: SelectionModel,
  registry: ModelRegistry
): SelectionManager {
  if (!model.repository) {
    throw new ModelDefinitionError(`${model.ref} has no repository`, { model: model.ref });
  }
  return model.repository(db, model, registry);
}

/**
 * Repositories over one database and registry.
 */
export class OptionsCatalog {
  constructor(
    private readonly db: Database.Database,
    readonly registry: ModelRegistry
  ) {}

  options(ref: ModelRef): OptionManager {
    return optionRepositoryFor(this.db, this.registry.getOptionModel(ref), this.registry);
  }

  selections(ref: ModelRef): SelectionManager {
    return selectionRepositoryFor(this.db, this.registry.getSelectionModel(ref), this.registry);
  }

  /**
   * Tenant-scoped view of an option model and its selection model.
   */
  forTenant(optionRef: ModelRef, tenant: TenantId | null | undefined): TenantOptions {
    const optionModel = this.registry.getOptionModel(optionRef);
    const selectionModel = this.registry.selectionModelFor(optionModel);
    if (!selectionModel) {
      throw new ModelDefinitionError(`${optionRef} has no selection model`, { model: optionRef });
    }
    return new TenantOptions(
      optionRepositoryFor(this.db, optionModel, this.registry),
      selectionRepositoryFor(this.db, selectionModel, this.registry),
      tenant
    );
  }
}
