/**
 * Selection models matched by a trigger target.
 */
import { minimatch } from 'minimatch';
import { InvalidArgumentError } from '../../utils/errors.js';
import type { ModelRegistry } from '../models/registry.js';
import type { SelectionModel } from '../models/types.js';
import type { TriggerTarget } from './types.js';

export function selectSelectionModels(registry: ModelRegistry, target: TriggerTarget): SelectionModel[] {
  const models = registry.selectionModels();
  const pattern = target.model;

  if (pattern !== undefined) {
    const matched = models.filter((model) => minimatch(model.ref, pattern, { nocase: true }));
    if (matched.length === 0) {
      throw new InvalidArgumentError(`No selection model matches '${pattern}'`, { model: pattern });
    }
    return matched;
  }

  if (target.app !== undefined) {
    const app = target.app;
    return models.filter((model) => model.app === app);
  }

  return models;
}
