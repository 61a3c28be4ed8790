/**
 * Error types and codes for the options catalog.
 * All errors raised by the core extend OptionsError.
 */

/**
 * Base error class for all options catalog errors.
 */
export class OptionsError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'OptionsError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Business-rule violations (bad option_type/tenant pairing, selecting a
 * deleted option, cross-tenant selection). Recoverable by the caller.
 */
export class ValidationError extends OptionsError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ValidationError';
  }
}

/**
 * A tenant-less option with the same name is already active.
 */
export class NameConflictError extends ValidationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.NAME_CONFLICT, message, details);
    this.name = 'NameConflictError';
  }
}

/**
 * Constraint violation raised by the store (unique index, check constraint,
 * trigger, foreign key). Not retried.
 */
export class IntegrityError extends OptionsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.INTEGRITY, message, details);
    this.name = 'IntegrityError';
  }
}

/**
 * A row addressed by id does not exist (or was purged).
 */
export class NotFoundError extends OptionsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.NOT_FOUND, message, details);
    this.name = 'NotFoundError';
  }
}

/**
 * Programmer error: an argument the operation cannot work without.
 */
export class InvalidArgumentError extends OptionsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.INVALID_ARGUMENT, message, details);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * A model's default-options table declares something other than
 * MANDATORY or OPTIONAL.
 */
export class InvalidDefaultOptionError extends OptionsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.INVALID_DEFAULT_OPTION, message, details);
    this.name = 'InvalidDefaultOptionError';
  }
}

/**
 * A tenant-scoped entry point was called without a tenant.
 */
export class NoTenantProvidedError extends OptionsError {
  constructor(message = 'No tenant was provided to a tenant-scoped operation') {
    super(ErrorCodes.NO_TENANT, message);
    this.name = 'NoTenantProvidedError';
  }
}

/**
 * Unsupported vendor or unsafe identifier while generating trigger SQL.
 */
export class TriggerGenerationError extends OptionsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.TRIGGER_GENERATION, message, details);
    this.name = 'TriggerGenerationError';
  }
}

/**
 * Invalid model definition or registration.
 */
export class ModelDefinitionError extends OptionsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.MODEL_DEFINITION, message, details);
    this.name = 'ModelDefinitionError';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends OptionsError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Migration file parsing or application errors.
 */
export class MigrationError extends OptionsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.MIGRATION, message, details);
    this.name = 'MigrationError';
  }
}

export const ErrorCodes = {
  // Validation (V001-V009)
  OPTION_TENANT_PAIRING: 'V001',
  CUSTOM_SHADOWS_DEFAULT: 'V002',
  EMPTY_NAME: 'V003',
  NAME_TOO_LONG: 'V004',
  SELECTION_MISSING_FIELD: 'V005',
  SELECTION_DELETED_OPTION: 'V006',
  SELECTION_TENANT_MISMATCH: 'V007',
  SELECTION_UNKNOWN_OPTION: 'V008',
  NAME_CONFLICT: 'V009',

  // Store
  INTEGRITY: 'D001',
  NOT_FOUND: 'D002',

  // Programmer / boundary errors
  INVALID_ARGUMENT: 'A001',
  NO_TENANT: 'A002',
  INVALID_DEFAULT_OPTION: 'A003',
  MODEL_DEFINITION: 'A004',

  // Tooling
  TRIGGER_GENERATION: 'T001',
  MIGRATION: 'T002',

  // Configuration
  CONFIG_LOAD_ERROR: 'C001',
  CONFIG_INVALID: 'C002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
