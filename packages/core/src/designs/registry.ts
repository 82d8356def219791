/**
 * Design registry
 * Maps design names to rule factories. Each project run owns its registry.
 */

import type { DesignName } from '@lattice/types';
import { DesignError } from '../errors';
import type { DesignFactory, DesignOptions, DesignRule } from './rule';
import {
  createAgileRule,
  createContestRule,
  createKanbanRule,
  createLeanRule,
  createPertRule,
  createScrumRule,
  createSurveyRule,
  createWaterfallRule,
} from './variants';

export type DesignRegistry = Map<string, DesignFactory>;

export const FALLBACK_DESIGN: DesignName = 'waterfall';

const BUILT_IN: Record<DesignName, DesignFactory> = {
  waterfall: createWaterfallRule,
  kanban: createKanbanRule,
  contest: createContestRule,
  survey: createSurveyRule,
  pert: createPertRule,
  agile: createAgileRule,
  lean: createLeanRule,
  scrum: createScrumRule,
};

/**
 * Fresh registry holding the built-in designs
 */
export function createDesignRegistry(): DesignRegistry {
  return new Map(Object.entries(BUILT_IN));
}

/**
 * Look up a design; unknown names throw DesignError
 */
export function getDesign(
  name: string,
  registry: DesignRegistry,
  options: DesignOptions = {}
): DesignRule {
  const factory = registry.get(name.trim().toLowerCase());
  if (!factory) {
    throw new DesignError(name);
  }
  return factory(options);
}

export interface ResolvedDesign {
  rule: DesignRule;
  warning?: DesignError;
}

/**
 * Look up a design, falling back to waterfall for unknown names
 */
export function resolveDesign(
  name: string,
  registry: DesignRegistry,
  options: DesignOptions = {}
): ResolvedDesign {
  try {
    return { rule: getDesign(name, registry, options) };
  } catch (error) {
    if (!(error instanceof DesignError)) {
      throw error;
    }
    const fallback = registry.get(FALLBACK_DESIGN) ?? BUILT_IN[FALLBACK_DESIGN];
    return {
      rule: fallback(options),
      warning: new DesignError(
        name,
        `Unrecognized design "${name}", falling back to ${FALLBACK_DESIGN}`
      ),
    };
  }
}
