/**
 * Options and selections seen from one tenant.
 */
import { NoTenantProvidedError } from '../../utils/errors.js';
import type { OptionRecord, TenantId } from '../models/types.js';
import type { OptionManager, SelectionManager, SetSelectionsResult } from './types.js';

export class TenantOptions {
  readonly tenant: TenantId;

  constructor(
    private readonly options: OptionManager,
    private readonly selections: SelectionManager,
    tenant: TenantId | null | undefined
  ) {
    if (tenant === null || tenant === undefined) {
      throw new NoTenantProvidedError('No tenant was provided for tenant-scoped options');
    }
    this.tenant = tenant;
  }

  /** Options the tenant can choose from. */
  available(): OptionRecord[] {
    return this.options.optionsForTenant(this.tenant);
  }

  /** Options the tenant has selected, mandatory options included. */
  selected(): OptionRecord[] {
    return this.options.selectedOptionsForTenant(this.tenant);
  }

  createCustom(name: string): OptionRecord {
    return this.options.createForTenant(this.tenant, name);
  }

  setSelections(optionIds: readonly number[]): SetSelectionsResult {
    return this.selections.setSelections(this.tenant, optionIds);
  }
}
