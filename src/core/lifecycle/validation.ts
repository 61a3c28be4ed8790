/**
 * Validation rules run before every option and selection write.
 */
import type Database from 'better-sqlite3';
import { ErrorCodes } from '../../utils/errors.js';
import { OptionType } from '../models/option-type.js';
import type { ModelRegistry } from '../models/registry.js';
import type { OptionModel, SelectionModel, TenantId } from '../models/types.js';
import { OptionQuery } from '../query/option-query.js';
import { combine, fail, ok, type Result } from './result.js';

export const MAX_NAME_LENGTH = 100;

export interface OptionCandidate {
  /** Set when validating an update of an existing row */
  id?: number;
  name: string;
  optionType: OptionType;
  tenantId: TenantId | null;
}

export interface SelectionCandidate {
  tenantId: TenantId | null | undefined;
  optionId: number | null | undefined;
}

/**
 * Trim a name and check it is non-empty and within the length limit.
 */
export function validateOptionName(name: string): Result<string> {
  const trimmed = name.trim();
  if (trimmed.length === 0) {
    return fail({ code: ErrorCodes.EMPTY_NAME, message: 'Name cannot be empty or only whitespace', field: 'name' });
  }
  if (trimmed.length > MAX_NAME_LENGTH) {
    return fail({
      code: ErrorCodes.NAME_TOO_LONG,
      message: `Name must be at most ${MAX_NAME_LENGTH} characters (got ${trimmed.length})`,
      field: 'name',
    });
  }
  return ok(trimmed);
}

/**
 * Custom options must have a tenant; mandatory and optional options must not.
 */
export function validateTenantPairing(optionType: OptionType, tenantId: TenantId | null): Result {
  if (optionType === OptionType.CUSTOM && tenantId === null) {
    return fail({
      code: ErrorCodes.OPTION_TENANT_PAIRING,
      message: 'Custom options must belong to a tenant',
      field: 'tenant',
    });
  }
  if (optionType !== OptionType.CUSTOM && tenantId !== null) {
    return fail({
      code: ErrorCodes.OPTION_TENANT_PAIRING,
      message: `${optionType === OptionType.MANDATORY ? 'Mandatory' : 'Optional'} options cannot belong to a tenant`,
      field: 'tenant',
    });
  }
  return ok();
}

/**
 * Validate an option before it is written. Custom names may not match any
 * mandatory or optional name, case-insensitively.
 */
export function validateOption(
  db: Database.Database,
  model: OptionModel,
  registry: ModelRegistry,
  candidate: OptionCandidate
): Result {
  const name = validateOptionName(candidate.name);
  const results: Result<unknown>[] = [name, validateTenantPairing(candidate.optionType, candidate.tenantId)];

  if (name.ok && candidate.optionType === OptionType.CUSTOM) {
    const conflicting = new OptionQuery(db, model, registry)
      .defaultOptions()
      .whereNames([name.value])
      .excludeIds(candidate.id === undefined ? [] : [candidate.id]);
    if (conflicting.exists()) {
      results.push(
        fail({
          code: ErrorCodes.CUSTOM_SHADOWS_DEFAULT,
          message: 'A custom option cannot have the same name as a mandatory or optional option.',
          field: 'name',
        })
      );
    }
  }

  return combine(results);
}

/**
 * Validate a selection before it is written: both references set, the
 * option exists, is not soft-deleted (unless the model allows it) and is
 * available to the tenant.
 */
export function validateSelection(
  db: Database.Database,
  model: SelectionModel,
  registry: ModelRegistry,
  candidate: SelectionCandidate
): Result {
  const { tenantId, optionId } = candidate;
  if (tenantId === null || tenantId === undefined) {
    return fail({ code: ErrorCodes.SELECTION_MISSING_FIELD, message: 'Tenant is required', field: 'tenant' });
  }
  if (optionId === null || optionId === undefined) {
    return fail({ code: ErrorCodes.SELECTION_MISSING_FIELD, message: 'Option is required', field: 'option' });
  }

  const options = new OptionQuery(db, registry.getOptionModel(model.optionModel), registry);
  const option = options.whereIds([optionId]).first();
  if (!option) {
    return fail({
      code: ErrorCodes.SELECTION_UNKNOWN_OPTION,
      message: `Option ${optionId} does not exist`,
      field: 'option',
    });
  }

  if (option.tenantId !== null && option.tenantId !== tenantId) {
    return fail({
      code: ErrorCodes.SELECTION_TENANT_MISMATCH,
      message:
        `The selected custom option '${option.name}' belongs to tenant ${option.tenantId}, ` +
        `and is not available to tenant ${tenantId}.`,
      field: 'option',
    });
  }

  if (option.deleted !== null && !model.allowDeletedOption) {
    const alternatives = options.optionsForTenant(tenantId).count();
    return fail({
      code: ErrorCodes.SELECTION_DELETED_OPTION,
      message:
        `Option '${option.name}' has been deleted and cannot be selected. ` +
        `${alternatives} active option${alternatives === 1 ? ' is' : 's are'} available to tenant ${tenantId}.`,
      field: 'option',
    });
  }

  return ok();
}
