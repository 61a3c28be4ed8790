/**
 * Build a model registry from the `option_models` and `selection_models`
 * sections of a config file.
 */
import {
  OPTION_CONSTRAINTS,
  SELECTION_CONSTRAINTS,
  defineOptionModel,
  defineSelectionModel,
  ModelRegistry,
  type ConstraintKind,
  type ConstraintSpec,
  type DefaultOptions,
  type TenantModel,
} from '../models/index.js';
import type { Config, TenantModelConfig } from './schema.js';

const CONSTRAINT_TEMPLATES: ReadonlyMap<ConstraintKind, ConstraintSpec> = new Map(
  [...OPTION_CONSTRAINTS, ...SELECTION_CONSTRAINTS].map((spec) => [spec.kind, spec])
);

function toTenantModel(value: TenantModelConfig | null): TenantModel | undefined {
  if (value === null) {
    return undefined;
  }
  return { table: value.table, displayColumn: value.display_column };
}

function toConstraints(kinds: ConstraintKind[] | undefined): ConstraintSpec[] | undefined {
  if (kinds === undefined) {
    return undefined;
  }
  const specs: ConstraintSpec[] = [];
  for (const kind of kinds) {
    const template = CONSTRAINT_TEMPLATES.get(kind);
    if (template) {
      specs.push({ ...template });
    }
  }
  return specs;
}

/**
 * Define and register every configured model. A model-level `tenant_model`
 * overrides the top-level one; `null` at either level means none.
 */
export function buildRegistry(config: Config, registry: ModelRegistry = new ModelRegistry()): ModelRegistry {
  const sharedTenant = toTenantModel(config.tenant_model);

  for (const entry of config.option_models) {
    const defaultOptions: DefaultOptions = {};
    for (const [name, option] of Object.entries(entry.default_options)) {
      defaultOptions[name] = option.option_type === undefined ? {} : { optionType: option.option_type };
    }

    registry.registerOption(
      defineOptionModel({
        app: entry.app,
        name: entry.name,
        table: entry.table,
        tenantModel: entry.tenant_model === undefined ? sharedTenant : toTenantModel(entry.tenant_model),
        selectionModel: entry.selection_model,
        defaultOptions,
        constraints: toConstraints(entry.constraints),
        tenantOnDelete: config.options.tenant_on_delete,
        repository: entry.repository === 'none' ? null : undefined,
      })
    );
  }

  for (const entry of config.selection_models) {
    registry.registerSelection(
      defineSelectionModel({
        app: entry.app,
        name: entry.name,
        table: entry.table,
        tenantModel: entry.tenant_model === undefined ? sharedTenant : toTenantModel(entry.tenant_model),
        optionModel: entry.option_model,
        constraints: toConstraints(entry.constraints),
        tenantOnDelete: config.options.tenant_on_delete,
        optionOnDelete: config.options.option_on_delete,
        allowDeletedOption: config.selections.allow_deleted_option,
        repository: entry.repository === 'none' ? null : undefined,
      })
    );
  }

  return registry;
}
