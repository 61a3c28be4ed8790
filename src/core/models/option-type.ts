/**
 * Allowable option types.
 *
 * - mandatory: shown to every tenant, cannot be deselected
 * - optional: shown to every tenant, selectable per tenant
 * - custom: authored by one tenant, selectable by that tenant only
 */
export const OptionType = {
  MANDATORY: 'mandatory',
  OPTIONAL: 'optional',
  CUSTOM: 'custom',
} as const;

export type OptionType = (typeof OptionType)[keyof typeof OptionType];

export const OPTION_TYPE_LABELS: Record<OptionType, string> = {
  mandatory: 'Default Mandatory',
  optional: 'Default Optional',
  custom: 'Custom',
};

/** Types that may appear in a model's default-options table. */
export const DEFAULT_OPTION_TYPES: readonly OptionType[] = [OptionType.MANDATORY, OptionType.OPTIONAL];

export function isOptionType(value: unknown): value is OptionType {
  return value === OptionType.MANDATORY || value === OptionType.OPTIONAL || value === OptionType.CUSTOM;
}

export function isDefaultOptionType(value: unknown): value is 'mandatory' | 'optional' {
  return value === OptionType.MANDATORY || value === OptionType.OPTIONAL;
}
