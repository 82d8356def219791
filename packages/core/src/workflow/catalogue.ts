/**
 * Catalogue of steps, their candidate techniques and technique parameters
 * Read-only after construction
 */

import { NONE_TECHNIQUE, type Parameters, type WorkflowDefinition } from '@lattice/types';
import { ConfigurationError } from '../errors';

export interface StepsLookupOptions {
  // Scrum workers may start with no steps
  allowEmpty?: boolean;
}

export class Catalogue {
  private constructor(
    private readonly stepTechniques: ReadonlyMap<string, readonly string[]>,
    private readonly workerSteps: ReadonlyMap<string, readonly string[]>,
    private readonly defaults: ReadonlyMap<string, Parameters>,
    private readonly overrides: ReadonlyMap<string, Parameters>,
    private readonly library: ReadonlySet<string> | null
  ) {}

  static fromDefinition(definition: WorkflowDefinition): Catalogue {
    const library = definition.techniques
      ? new Set([NONE_TECHNIQUE, ...Object.keys(definition.techniques)])
      : null;
    const stepTechniques = new Map<string, readonly string[]>();
    const workerSteps = new Map<string, readonly string[]>();

    for (const worker of definition.workers) {
      workerSteps.set(
        worker.name,
        Object.freeze(worker.steps.map((step) => step.name))
      );

      for (const step of worker.steps) {
        if (step.techniques.length === 0) {
          throw new ConfigurationError(
            `Step ${step.name} in worker ${worker.name} has no techniques`
          );
        }

        if (library) {
          const missing = step.techniques.filter((t) => !library.has(t));
          if (missing.length > 0) {
            throw new ConfigurationError(
              `Step ${step.name} references unknown techniques: ${missing.join(', ')}`,
              { step: step.name, missing }
            );
          }
        }

        const techniques = dedupe(step.techniques);
        const known = stepTechniques.get(step.name);
        if (known && !sameList(known, techniques)) {
          throw new ConfigurationError(
            `Step ${step.name} is declared with different techniques ` +
              `(${known.join(', ')} vs ${techniques.join(', ')})`
          );
        }
        stepTechniques.set(step.name, Object.freeze(techniques));
      }
    }

    return new Catalogue(
      stepTechniques,
      workerSteps,
      new Map(Object.entries(definition.techniques ?? {})),
      new Map(Object.entries(definition.parameters)),
      library
    );
  }

  workers(): string[] {
    return Array.from(this.workerSteps.keys());
  }

  /**
   * Ordered step names of a worker
   */
  stepsFor(worker: string, options: StepsLookupOptions = {}): readonly string[] {
    const steps = this.workerSteps.get(worker);
    if (!steps) {
      throw new ConfigurationError(`Unknown worker: ${worker}`);
    }
    if (steps.length === 0 && !options.allowEmpty) {
      throw new ConfigurationError(`Worker ${worker} has no steps`);
    }
    return steps;
  }

  /**
   * Candidate techniques of a step; the first one is the default
   */
  techniquesFor(step: string): readonly string[] {
    const techniques = this.stepTechniques.get(step);
    if (!techniques) {
      throw new ConfigurationError(`Unknown step: ${step}`);
    }
    return techniques;
  }

  /**
   * Library defaults overlaid with configured overrides
   */
  parametersFor(technique: string): Readonly<Parameters> {
    if (this.library && !this.library.has(technique)) {
      throw new ConfigurationError(`Unknown technique: ${technique}`);
    }
    return Object.freeze({
      ...(this.defaults.get(technique) ?? {}),
      ...(this.overrides.get(technique) ?? {}),
    });
  }
}

function dedupe(values: readonly string[]): string[] {
  return Array.from(new Set(values));
}

function sameList(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((value, index) => value === b[index]);
}
