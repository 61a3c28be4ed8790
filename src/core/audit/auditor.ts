/**
 * Configuration auditor for registered option and selection models.
 *
 * Each check returns findings instead of throwing; every model is checked
 * even when an earlier one fails, and storage errors become warnings.
 */
import type Database from 'better-sqlite3';
import { InvalidDefaultOptionError } from '../../utils/errors.js';
import { quoteIdentifier } from '../db/identifiers.js';
import { OPTION_CONSTRAINTS, SELECTION_CONSTRAINTS, expandConstraintName } from '../models/constraints.js';
import type { ModelRegistry } from '../models/registry.js';
import type { CatalogModel, ConstraintSpec, OptionModel, SelectionModel } from '../models/types.js';
import { SelectionQuery } from '../query/selection-query.js';
import { OptionRepository, findCaseDuplicateNames, resolveDefaultOptionType } from '../repositories/option-repository.js';
import { SelectionRepository } from '../repositories/selection-repository.js';
import type { AuditFinding, AuditReport } from './types.js';

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ConfigAuditor {
  private findings: AuditFinding[] = [];
  private checks: string[] = [];

  constructor(
    private readonly db: Database.Database,
    private readonly registry: ModelRegistry
  ) {}

  private error(model: CatalogModel | null, message: string): void {
    this.findings.push({ severity: 'error', model: model?.ref ?? null, message: model ? `${model.ref}: ${message}` : message });
  }

  private warn(model: CatalogModel | null, message: string): void {
    this.findings.push({ severity: 'warning', model: model?.ref ?? null, message: model ? `${model.ref}: ${message}` : message });
  }

  private passed(message: string): void {
    this.checks.push(message);
  }

  /**
   * Audit every registered model.
   */
  audit(): AuditReport {
    this.findings = [];
    this.checks = [];

    const optionModels = this.registry.optionModels();
    const selectionModels = this.registry.selectionModels();

    if (optionModels.length === 0) {
      this.warn(null, 'No option models are registered.');
    } else {
      this.passed(`Found ${optionModels.length} option model(s)`);
    }
    for (const model of optionModels) {
      this.auditOptionModel(model);
    }

    if (selectionModels.length === 0) {
      this.warn(null, 'No selection models are registered.');
    } else {
      this.passed(`Found ${selectionModels.length} selection model(s)`);
    }
    for (const model of selectionModels) {
      this.auditSelectionModel(model);
    }

    const errors = this.findings.filter((f) => f.severity === 'error');
    return {
      errors,
      warnings: this.findings.filter((f) => f.severity === 'warning'),
      checks: this.checks,
      modelsChecked: optionModels.length + selectionModels.length,
      hasFatal: errors.length > 0,
    };
  }

  private auditOptionModel(model: OptionModel): void {
    this.passed(`Checking ${model.ref}...`);

    if (!model.repository) {
      this.error(model, 'Missing repository. Define the model without `repository: null`.');
    } else {
      try {
        const repository = model.repository(this.db, model, this.registry);
        if (!(repository instanceof OptionRepository)) {
          this.warn(model, "Repository is not an OptionRepository. Filtering may not work as expected.");
        }
        this.passed('  Repository configured');
      } catch (error) {
        this.warn(model, `Could not create repository: ${describe(error)}`);
      }
    }

    if (model.selectionModel === undefined) {
      this.error(model, 'selectionModel is not set');
    } else if (this.registry.get(model.selectionModel)?.kind !== 'selection') {
      this.error(model, `selectionModel '${model.selectionModel}' is not a registered selection model`);
    } else {
      this.passed(`  selectionModel = ${model.selectionModel}`);
    }

    this.auditTenantModel(model);
    this.auditDefaultOptions(model);
    this.auditDuplicateDefaults(model);
    this.auditConstraints(model, OPTION_CONSTRAINTS, 'Ensure the model keeps the standard option constraints.');
  }

  private auditSelectionModel(model: SelectionModel): void {
    this.passed(`Checking ${model.ref}...`);

    if (!model.repository) {
      this.error(model, 'Missing repository. Define the model without `repository: null`.');
    } else {
      try {
        const repository = model.repository(this.db, model, this.registry);
        if (!(repository instanceof SelectionRepository)) {
          this.warn(model, 'Repository is not a SelectionRepository. Filtering may not work as expected.');
        }
        this.passed('  Repository configured');
      } catch (error) {
        this.warn(model, `Could not create repository: ${describe(error)}`);
      }
    }

    let optionModelRegistered = false;
    if (model.optionModel === undefined) {
      this.error(model, 'optionModel is not set');
    } else if (this.registry.get(model.optionModel)?.kind !== 'option') {
      this.error(model, `optionModel '${model.optionModel}' is not a registered option model`);
    } else {
      optionModelRegistered = true;
      this.passed(`  optionModel = ${model.optionModel}`);
    }

    this.auditTenantModel(model);

    if (optionModelRegistered) {
      this.auditOrphans(model);
    }

    this.auditConstraints(model, SELECTION_CONSTRAINTS, 'Ensure the model keeps the standard selection constraints.');
  }

  private auditTenantModel(model: CatalogModel): void {
    if (!model.tenantModel) {
      this.error(model, 'tenantModel is not set');
    } else {
      this.passed(`  tenantModel = ${model.tenantModel.table}`);
    }
  }

  private auditDefaultOptions(model: OptionModel): void {
    const entries = Object.entries(model.defaultOptions);
    if (entries.length === 0) {
      this.warn(model, 'No default options defined. Consider defining mandatory or optional defaults for consistency.');
      return;
    }

    this.passed(`  ${entries.length} default options defined`);
    for (const [name, config] of entries) {
      try {
        resolveDefaultOptionType(name, config);
      } catch (error) {
        if (!(error instanceof InvalidDefaultOptionError)) {
          throw error;
        }
        this.error(
          model,
          `Invalid option_type for default option '${name}'. Must be mandatory or optional, got ${config.optionType ?? 'none'}`
        );
      }
    }

    for (const group of findCaseDuplicateNames(entries.map(([name]) => name))) {
      this.error(model, `Default option names differ only in case: ${group.join(', ')}`);
    }
  }

  private auditDuplicateDefaults(model: OptionModel): void {
    try {
      const rows = this.db
        .prepare(
          `SELECT lower(name) AS name, COUNT(*) AS count FROM ${quoteIdentifier(model.table)} ` +
            "WHERE deleted IS NULL AND option_type IN ('mandatory', 'optional') " +
            'GROUP BY lower(name) HAVING COUNT(*) > 1 ORDER BY lower(name)'
        )
        .all() as { name: string; count: number }[];
      if (rows.length > 0) {
        this.warn(
          model,
          `Duplicate default option names found in database: ${rows.map((r) => r.name).join(', ')}. ` +
            'This may cause unexpected behavior.'
        );
      }
    } catch (error) {
      this.warn(model, `Could not check for duplicates in database: ${describe(error)}`);
    }
  }

  private auditOrphans(model: SelectionModel): void {
    try {
      const orphaned = new SelectionQuery(this.db, model, this.registry).active().withDeletedOption().count();
      if (orphaned > 0) {
        this.warn(
          model,
          `Found ${orphaned} active selection(s) pointing to deleted options. Consider running data cleanup.`
        );
      } else {
        this.passed('  No orphaned selections found');
      }
    } catch (error) {
      this.warn(model, `Could not check for orphaned selections: ${describe(error)}`);
    }
  }

  private auditConstraints(model: CatalogModel, expected: readonly ConstraintSpec[], hint: string): void {
    const declared = new Set(
      model.constraints.map((constraint) => expandConstraintName(constraint.name, model.app, model.modelName))
    );
    const missing = expected
      .filter((constraint) => !declared.has(expandConstraintName(constraint.name, model.app, model.modelName)))
      .map((constraint) => constraint.kind);

    if (missing.length > 0) {
      this.warn(model, `Missing constraints: ${missing.join(', ')}. ${hint}`);
    } else {
      this.passed('  Database constraints properly configured');
    }
  }
}

/**
 * Audit a registry against a database.
 */
export function auditConfiguration(db: Database.Database, registry: ModelRegistry): AuditReport {
  return new ConfigAuditor(db, registry).audit();
}
