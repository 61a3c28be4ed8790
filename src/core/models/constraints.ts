/**
 * Standard constraint sets and their naming templates.
 */
import type { ConstraintSpec } from './types.js';

/** Standard constraints every option model declares. */
export const OPTION_CONSTRAINTS: readonly ConstraintSpec[] = [
  { kind: 'unique_name', name: '%(app_label)s_%(class)s_unique_name' },
  { kind: 'tenant_check', name: '%(app_label)s_%(class)s_tenant_check' },
];

/** Standard constraints every selection model declares. */
export const SELECTION_CONSTRAINTS: readonly ConstraintSpec[] = [
  { kind: 'option_not_null', name: '%(app_label)s_%(class)s_option_not_null' },
  { kind: 'tenant_not_null', name: '%(app_label)s_%(class)s_tenant_not_null' },
  { kind: 'unique_active_selection', name: '%(app_label)s_%(class)s_unique_active_selection' },
];

/**
 * Expand a constraint name template for a model.
 */
export function expandConstraintName(template: string, app: string, modelName: string): string {
  return template.replaceAll('%(app_label)s', app).replaceAll('%(class)s', modelName);
}
