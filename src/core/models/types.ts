/**
 * Type definitions for option and selection models.
 */
import type Database from 'better-sqlite3';
import type { OptionType } from './option-type.js';
import type { ModelRegistry } from './registry.js';
import type { OptionManager, SelectionManager } from '../repositories/types.js';

/** Model identifier in `app.ModelName` form. */
export type ModelRef = string;

/** Primary key of a host tenant row. */
export type TenantId = number;

/** What happens to referencing rows when the referenced row is hard-deleted. */
export type OnDeletePolicy = 'cascade' | 'restrict';

/**
 * The host application's tenant table. Only its primary key matters to the
 * catalog; `displayColumn` is used for operator output.
 */
export interface TenantModel {
  table: string;
  displayColumn?: string;
}

/**
 * Where a foreign-key column points. Option tables are resolved through the
 * registry when DDL is generated.
 */
export type FieldReference =
  | { target: 'tenant'; onDelete: OnDeletePolicy }
  | { target: 'option'; model: ModelRef | undefined; onDelete: OnDeletePolicy };

export interface FieldSpec {
  /** Column name */
  name: string;
  sqlType: 'INTEGER' | 'TEXT';
  nullable: boolean;
  references?: FieldReference;
}

export type ConstraintKind =
  | 'unique_name'
  | 'tenant_check'
  | 'option_not_null'
  | 'tenant_not_null'
  | 'unique_active_selection';

/**
 * A declared constraint. `name` is a template expanded with
 * `%(app_label)s` and `%(class)s`.
 */
export interface ConstraintSpec {
  kind: ConstraintKind;
  name: string;
}

/** Configuration of one entry in a default-options table. */
export interface DefaultOptionConfig {
  /** Defaults to mandatory when omitted. Kept as a string so bad values can be reported. */
  optionType?: string;
}

export type DefaultOptions = Record<string, DefaultOptionConfig>;

export type OptionRepositoryFactory = (
  db: Database.Database,
  model: OptionModel,
  registry: ModelRegistry
) => OptionManager;

export type SelectionRepositoryFactory = (
  db: Database.Database,
  model: SelectionModel,
  registry: ModelRegistry
) => SelectionManager;

export interface OptionModelDefinition {
  app: string;
  name: string;
  table?: string;
  tenantModel?: TenantModel;
  selectionModel?: ModelRef;
  defaultOptions?: DefaultOptions;
  /** Replaces the standard constraint set when given. */
  constraints?: ConstraintSpec[];
  /** Extra host columns. */
  fields?: FieldSpec[];
  tenantOnDelete?: OnDeletePolicy;
  repository?: OptionRepositoryFactory | null;
}

export interface SelectionModelDefinition {
  app: string;
  name: string;
  table?: string;
  tenantModel?: TenantModel;
  optionModel?: ModelRef;
  constraints?: ConstraintSpec[];
  fields?: FieldSpec[];
  tenantOnDelete?: OnDeletePolicy;
  optionOnDelete?: OnDeletePolicy;
  /** Accept selections of soft-deleted options instead of rejecting them. */
  allowDeletedOption?: boolean;
  repository?: SelectionRepositoryFactory | null;
}

interface ModelBase {
  /** `app.Name` */
  ref: ModelRef;
  app: string;
  name: string;
  /** Lower-cased class name used in constraint and migration names */
  modelName: string;
  table: string;
  tenantModel: TenantModel | undefined;
  constraints: ConstraintSpec[];
  fields: FieldSpec[];
  tenantOnDelete: OnDeletePolicy;
}

export interface OptionModel extends ModelBase {
  kind: 'option';
  selectionModel: ModelRef | undefined;
  defaultOptions: DefaultOptions;
  repository: OptionRepositoryFactory | undefined;
}

export interface SelectionModel extends ModelBase {
  kind: 'selection';
  optionModel: ModelRef | undefined;
  optionOnDelete: OnDeletePolicy;
  allowDeletedOption: boolean;
  repository: SelectionRepositoryFactory | undefined;
}

export type CatalogModel = OptionModel | SelectionModel;

/**
 * An option row (camelCase, as returned by repositories).
 */
export interface OptionRecord {
  id: number;
  name: string;
  optionType: OptionType;
  tenantId: TenantId | null;
  /** ISO-8601 soft-delete timestamp */
  deleted: string | null;
}

export interface SelectionRecord {
  id: number;
  tenantId: TenantId;
  optionId: number;
  deleted: string | null;
}

/**
 * Database row types (snake_case as stored in SQLite).
 */
export interface OptionRow {
  id: number;
  name: string;
  option_type: OptionType;
  tenant_id: number | null;
  deleted: string | null;
}

export interface SelectionRow {
  id: number;
  tenant_id: number;
  option_id: number;
  deleted: string | null;
}

export interface TenantQueryOptions {
  includeDeleted?: boolean;
}
