/**
 * Schema builder for concrete option and selection models.
 */
import { ModelDefinitionError } from '../../utils/errors.js';
import { isSafeIdentifier } from '../db/identifiers.js';
import { createOptionRepository } from '../repositories/option-repository.js';
import { createSelectionRepository } from '../repositories/selection-repository.js';
import { OPTION_CONSTRAINTS, SELECTION_CONSTRAINTS } from './constraints.js';
import { BASE_FIELDS, OPTION_FIELDS, composeFields, optionTrait, selectionTrait } from './traits.js';
import type {
  OptionModel,
  OptionModelDefinition,
  SelectionModel,
  SelectionModelDefinition,
} from './types.js';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

function validateIdentity(definition: OptionModelDefinition | SelectionModelDefinition): void {
  const { app, name } = definition;
  if (!IDENTIFIER.test(app)) {
    throw new ModelDefinitionError(`Invalid app label '${app}'`, { app });
  }
  if (!IDENTIFIER.test(name)) {
    throw new ModelDefinitionError(`Invalid model name '${name}'`, { app, name });
  }
  for (const table of [definition.table, definition.tenantModel?.table]) {
    if (table !== undefined && !isSafeIdentifier(table)) {
      throw new ModelDefinitionError(`Invalid table name '${table}' for ${app}.${name}`, { app, name, table });
    }
  }
  const displayColumn = definition.tenantModel?.displayColumn;
  if (displayColumn !== undefined && !IDENTIFIER.test(displayColumn)) {
    throw new ModelDefinitionError(`Invalid tenant display column '${displayColumn}'`, { app, name, displayColumn });
  }
}

/**
 * Build a concrete option model: base columns, option columns, the option
 * trait and any host columns.
 */
export function defineOptionModel(definition: OptionModelDefinition): OptionModel {
  validateIdentity(definition);
  const ref = `${definition.app}.${definition.name}`;
  const modelName = definition.name.toLowerCase();
  const tenantOnDelete = definition.tenantOnDelete ?? 'cascade';

  const fields = composeFields(
    ref,
    [...BASE_FIELDS, ...OPTION_FIELDS, ...(definition.fields ?? [])],
    [optionTrait(tenantOnDelete)]
  );

  return {
    kind: 'option',
    ref,
    app: definition.app,
    name: definition.name,
    modelName,
    table: definition.table ?? `${definition.app}_${modelName}`,
    tenantModel: definition.tenantModel,
    selectionModel: definition.selectionModel,
    defaultOptions: definition.defaultOptions ?? {},
    constraints: definition.constraints ?? [...OPTION_CONSTRAINTS],
    fields,
    tenantOnDelete,
    // null means "explicitly none"; the auditor reports it.
    repository: definition.repository === null ? undefined : (definition.repository ?? createOptionRepository),
  };
}

/**
 * Build a concrete selection model: base columns, the selection trait and
 * any host columns.
 */
export function defineSelectionModel(definition: SelectionModelDefinition): SelectionModel {
  validateIdentity(definition);
  const ref = `${definition.app}.${definition.name}`;
  const modelName = definition.name.toLowerCase();
  const tenantOnDelete = definition.tenantOnDelete ?? 'cascade';
  const optionOnDelete = definition.optionOnDelete ?? 'cascade';

  const fields = composeFields(
    ref,
    [...BASE_FIELDS, ...(definition.fields ?? [])],
    [selectionTrait(definition.optionModel, tenantOnDelete, optionOnDelete)]
  );

  return {
    kind: 'selection',
    ref,
    app: definition.app,
    name: definition.name,
    modelName,
    table: definition.table ?? `${definition.app}_${modelName}`,
    tenantModel: definition.tenantModel,
    optionModel: definition.optionModel,
    constraints: definition.constraints ?? [...SELECTION_CONSTRAINTS],
    fields,
    tenantOnDelete,
    optionOnDelete,
    allowDeletedOption: definition.allowDeletedOption ?? false,
    repository: definition.repository === null ? undefined : (definition.repository ?? createSelectionRepository),
  };
}
