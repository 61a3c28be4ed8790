/**
 * Explicit registry of concrete option and selection models.
 *
 * Hosts register their models at startup and tools discover them from here;
 * `clear()` tears the registry down between test runs.
 */
import { ModelDefinitionError } from '../../utils/errors.js';
import type { CatalogModel, ModelRef, OptionModel, SelectionModel } from './types.js';

export class ModelRegistry {
  private readonly models = new Map<ModelRef, CatalogModel>();

  /**
   * Register a concrete option model. Each model ref may be registered once.
   */
  registerOption(model: OptionModel): OptionModel {
    this.add(model);
    return model;
  }

  /**
   * Register a concrete selection model.
   */
  registerSelection(model: SelectionModel): SelectionModel {
    this.add(model);
    return model;
  }

  private add(model: CatalogModel): void {
    if (this.models.has(model.ref)) {
      throw new ModelDefinitionError(`Model ${model.ref} is already registered`, { model: model.ref });
    }
    this.models.set(model.ref, model);
  }

  get(ref: ModelRef): CatalogModel | undefined {
    return this.models.get(ref);
  }

  has(ref: ModelRef): boolean {
    return this.models.has(ref);
  }

  /**
   * Resolve an option model by ref, failing if it is missing or of the
   * wrong kind.
   */
  getOptionModel(ref: ModelRef | undefined): OptionModel {
    const model = ref === undefined ? undefined : this.models.get(ref);
    if (!model || model.kind !== 'option') {
      throw new ModelDefinitionError(`Option model '${ref ?? '(unset)'}' is not registered`, { model: ref });
    }
    return model;
  }

  /**
   * Resolve a selection model by ref.
   */
  getSelectionModel(ref: ModelRef | undefined): SelectionModel {
    const model = ref === undefined ? undefined : this.models.get(ref);
    if (!model || model.kind !== 'selection') {
      throw new ModelDefinitionError(`Selection model '${ref ?? '(unset)'}' is not registered`, { model: ref });
    }
    return model;
  }

  /**
   * The selection model paired with an option model: the one it names, or
   * else the first selection model pointing at it.
   */
  selectionModelFor(option: OptionModel): SelectionModel | undefined {
    if (option.selectionModel !== undefined) {
      const named = this.models.get(option.selectionModel);
      return named?.kind === 'selection' ? named : undefined;
    }
    return this.selectionModels().find((m) => m.optionModel === option.ref);
  }

  /** Selection models whose option foreign key points at the given model. */
  selectionModelsReferencing(option: OptionModel): SelectionModel[] {
    return this.selectionModels().filter((m) => m.optionModel === option.ref);
  }

  /** Option models in registration order. */
  optionModels(): OptionModel[] {
    return [...this.models.values()].filter((m): m is OptionModel => m.kind === 'option');
  }

  /** Selection models in registration order. */
  selectionModels(): SelectionModel[] {
    return [...this.models.values()].filter((m): m is SelectionModel => m.kind === 'selection');
  }

  /** All models belonging to an app label. */
  modelsForApp(app: string): CatalogModel[] {
    return [...this.models.values()].filter((m) => m.app === app);
  }

  apps(): string[] {
    return [...new Set([...this.models.values()].map((m) => m.app))];
  }

  clear(): void {
    this.models.clear();
  }

  get size(): number {
    return this.models.size;
  }
}

/** Process-wide registry for hosts that want one. */
export const defaultRegistry = new ModelRegistry();
