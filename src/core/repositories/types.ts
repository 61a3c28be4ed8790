/**
 * Repository contracts for option and selection models.
 */
import type { IntegrityError, ValidationError } from '../../utils/errors.js';
import type { OptionType } from '../models/option-type.js';
import type {
  OptionModel,
  OptionRecord,
  SelectionModel,
  SelectionRecord,
  TenantId,
  TenantQueryOptions,
} from '../models/types.js';
import type { DeleteOptions } from '../query/base-query.js';
import type { OptionQuery } from '../query/option-query.js';
import type { SelectionQuery } from '../query/selection-query.js';

export interface CreateOptionInput {
  name: string;
  /** Defaults to optional */
  optionType?: OptionType;
  tenant?: TenantId | null;
}

export interface CreateSelectionInput {
  tenant: TenantId | null | undefined;
  option: number | null | undefined;
}

export type SyncAction = 'created' | 'verified' | 'updated' | 'deleted';

export interface SyncEntry {
  action: SyncAction;
  optionType: OptionType;
}

/** Default-option sync outcome keyed by option name. */
export type SyncReport = Record<string, SyncEntry>;

export type SetSelectionsResult =
  | { ok: true; added: number[]; removed: number[] }
  | { ok: false; added: []; removed: []; error: ValidationError | IntegrityError };

export interface OptionManager {
  readonly model: OptionModel;
  query(): OptionQuery;
  get(id: number): OptionRecord | null;
  create(input: CreateOptionInput): OptionRecord;
  createMandatory(name: string): OptionRecord;
  createOptional(name: string): OptionRecord;
  createForTenant(tenant: TenantId | null | undefined, name: string): OptionRecord;
  rename(id: number, name: string): OptionRecord;
  delete(id: number, options?: DeleteOptions): void;
  undelete(id: number): void;
  syncDefaultOptions(): SyncReport;
  optionsForTenant(tenant: TenantId, options?: TenantQueryOptions): OptionRecord[];
  selectedOptionsForTenant(tenant: TenantId, options?: TenantQueryOptions): OptionRecord[];
}

export interface SelectionManager {
  readonly model: SelectionModel;
  query(): SelectionQuery;
  get(id: number): SelectionRecord | null;
  create(input: CreateSelectionInput): SelectionRecord;
  select(tenant: TenantId, optionId: number): SelectionRecord;
  deselect(tenant: TenantId, optionId: number): number;
  delete(id: number, options?: DeleteOptions): void;
  undelete(id: number): void;
  setSelections(tenant: TenantId | null | undefined, optionIds: readonly number[]): SetSelectionsResult;
  optionsForTenant(tenant: TenantId, options?: TenantQueryOptions): OptionRecord[];
  selectedOptionsForTenant(tenant: TenantId, options?: TenantQueryOptions): OptionRecord[];
}
