/**
 * Configuration schema for `.options/config.yaml`.
 */
import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * This helper makes the field optional and applies schema defaults when undefined.
 * Note: Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const OnDeletePolicySchema = z.enum(['cascade', 'restrict']);

export const DbVendorSchema = z.enum(['sqlite', 'postgresql', 'mysql', 'oracle']);

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const ConstraintKindSchema = z.enum([
  'unique_name',
  'tenant_check',
  'option_not_null',
  'tenant_not_null',
  'unique_active_selection',
]);

/** Host tenant table. */
export const TenantModelSchema = z.object({
  table: z.string().min(1),
  /** Column printed for tenants in CLI output */
  display_column: z.string().min(1).optional(),
});

/**
 * One default-options entry. `option_type` is kept as a plain string so
 * invalid values reach the auditor instead of failing the load.
 */
export const DefaultOptionSchema = withDefaults(
  z.object({
    option_type: z.string().optional(),
  })
);

const ModelBaseSchema = z.object({
  app: z.string().min(1),
  name: z.string().min(1),
  table: z.string().min(1).optional(),
  /** Overrides the top-level tenant model; null means none */
  tenant_model: TenantModelSchema.nullable().optional(),
  /** Replaces the standard constraint set when given */
  constraints: z.array(ConstraintKindSchema).optional(),
  /** `none` leaves the model without a repository */
  repository: z.enum(['default', 'none']).default('default'),
});

export const OptionModelConfigSchema = ModelBaseSchema.extend({
  selection_model: z.string().optional(),
  default_options: z.record(z.string(), DefaultOptionSchema).default({}),
});

export const SelectionModelConfigSchema = ModelBaseSchema.extend({
  option_model: z.string().optional(),
});

export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  database: withDefaults(
    z.object({
      /** SQLite file, relative to the project root, or :memory: */
      path: z.string().default('.options/options.db'),
      /** Vendor trigger SQL is generated for */
      vendor: DbVendorSchema.optional(),
    })
  ),
  migrations: withDefaults(
    z.object({
      dir: z.string().default('migrations'),
    })
  ),
  tenant_model: TenantModelSchema.nullable().default({ table: 'tenant' }),
  options: withDefaults(
    z.object({
      option_on_delete: OnDeletePolicySchema.default('cascade'),
      tenant_on_delete: OnDeletePolicySchema.default('cascade'),
    })
  ),
  selections: withDefaults(
    z.object({
      allow_deleted_option: z.boolean().default(false),
    })
  ),
  log_level: LogLevelSchema.default('info'),
  option_models: z.array(OptionModelConfigSchema).default([]),
  selection_models: z.array(SelectionModelConfigSchema).default([]),
});

export type Config = z.infer<typeof ConfigSchema>;
export type OptionModelConfig = z.infer<typeof OptionModelConfigSchema>;
export type SelectionModelConfig = z.infer<typeof SelectionModelConfigSchema>;
export type TenantModelConfig = z.infer<typeof TenantModelSchema>;
