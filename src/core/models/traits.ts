/**
 * Field traits composed into concrete option and selection models.
 *
 * A trait contributes the reference columns a model kind needs. Composition
 * happens once, when a model is defined; a model that already declares a
 * column a trait contributes is rejected instead of silently overridden.
 */
import { ModelDefinitionError } from '../../utils/errors.js';
import type { FieldSpec, ModelRef, OnDeletePolicy } from './types.js';

export interface ModelTrait {
  name: string;
  fields: FieldSpec[];
}

/** Columns every catalog table has. */
export const BASE_FIELDS: readonly FieldSpec[] = [
  { name: 'id', sqlType: 'INTEGER', nullable: false },
  { name: 'deleted', sqlType: 'TEXT', nullable: true },
];

/** Columns specific to option tables. */
export const OPTION_FIELDS: readonly FieldSpec[] = [
  { name: 'name', sqlType: 'TEXT', nullable: false },
  { name: 'option_type', sqlType: 'TEXT', nullable: false },
];

/**
 * Options reference a tenant only when they are custom, so the column is
 * nullable and the pairing is enforced by the tenant check constraint.
 */
export function optionTrait(tenantOnDelete: OnDeletePolicy): ModelTrait {
  return {
    name: 'OptionTrait',
    fields: [
      { name: 'tenant_id', sqlType: 'INTEGER', nullable: true, references: { target: 'tenant', onDelete: tenantOnDelete } },
    ],
  };
}

/**
 * Selections reference both a tenant and an option. The columns are
 * nullable at the type level; named check constraints reject NULLs so the
 * auditor can verify them by name.
 */
export function selectionTrait(
  optionModel: ModelRef | undefined,
  tenantOnDelete: OnDeletePolicy,
  optionOnDelete: OnDeletePolicy
): ModelTrait {
  return {
    name: 'SelectionTrait',
    fields: [
      { name: 'tenant_id', sqlType: 'INTEGER', nullable: true, references: { target: 'tenant', onDelete: tenantOnDelete } },
      {
        name: 'option_id',
        sqlType: 'INTEGER',
        nullable: true,
        references: { target: 'option', model: optionModel, onDelete: optionOnDelete },
      },
    ],
  };
}

/**
 * Compose declared fields with traits. Fails if any column would be
 * declared twice.
 */
export function composeFields(modelRef: ModelRef, declared: readonly FieldSpec[], traits: readonly ModelTrait[]): FieldSpec[] {
  const result: FieldSpec[] = [];
  const seen = new Set<string>();

  const add = (field: FieldSpec, source: string): void => {
    if (seen.has(field.name)) {
      throw new ModelDefinitionError(
        `Model ${modelRef} already has a field named '${field.name}' (contributed again by ${source})`,
        { model: modelRef, field: field.name, source }
      );
    }
    seen.add(field.name);
    result.push(field);
  };

  for (const field of declared) {
    add(field, 'model definition');
  }
  for (const trait of traits) {
    for (const field of trait.fields) {
      add(field, trait.name);
    }
  }

  return result;
}
