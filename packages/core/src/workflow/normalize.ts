/**
 * Project normalization
 * Transforms the structured project input into a canonical WorkflowDefinition
 */

import { z } from 'zod';
import type { ParameterValue, WorkflowDefinition } from '@lattice/types';
import { ConfigurationError } from '../errors';

const ParameterValueSchema: z.ZodType<ParameterValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(ParameterValueSchema)])
);

const ParametersSchema = z.record(z.string(), ParameterValueSchema);

// A single string is a comma-separated list
const TechniqueListSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (typeof value === 'string' ? splitList(value) : value.map((t) => t.trim())));

export const ProjectSchema = z.object({
  name: z.string().min(1, 'Project must have a name'),
  workers: z.record(z.string(), z.record(z.string(), TechniqueListSchema)),
  design: z.string().optional(),
  designs: z.record(z.string(), z.string()).default({}),
  parameters: z.record(z.string(), ParametersSchema).default({}),
  techniques: z.record(z.string(), ParametersSchema).optional(),
  feedback: z.array(z.string()).default([]),
});

export type ProjectInput = z.input<typeof ProjectSchema>;

export const DEFAULT_DESIGN = 'waterfall';

/**
 * Normalize a project
 * - Workers and steps keep their configured order
 * - A worker without its own design takes the project design, then waterfall
 */
export function normalizeProject(raw: unknown): WorkflowDefinition {
  const parsed = ProjectSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ConfigurationError(`Invalid project: ${issues.join('; ')}`, parsed.error.issues);
  }

  const project = parsed.data;
  const workerNames = Object.keys(project.workers);

  if (workerNames.length === 0) {
    throw new ConfigurationError('Project must have at least one worker');
  }

  for (const name of [...Object.keys(project.designs), ...project.feedback]) {
    if (!workerNames.includes(name)) {
      throw new ConfigurationError(`Project ${project.name} configures unknown worker: ${name}`);
    }
  }

  const definition: WorkflowDefinition = {
    name: project.name,
    workers: workerNames.map((name) => ({
      name,
      design: project.designs[name] ?? project.design ?? DEFAULT_DESIGN,
      steps: Object.entries(project.workers[name]).map(([step, techniques]) => ({
        name: step,
        techniques,
      })),
      feedback: project.feedback.includes(name),
    })),
    parameters: project.parameters,
  };

  if (project.techniques) {
    definition.techniques = project.techniques;
  }

  validateUniqueWorkers(definition);
  validateStepReferences(definition);

  return definition;
}

/**
 * Validate that all worker names are unique
 */
export function validateUniqueWorkers(definition: WorkflowDefinition): void {
  const names = new Set<string>();
  const duplicates: string[] = [];

  for (const worker of definition.workers) {
    if (names.has(worker.name)) {
      duplicates.push(worker.name);
    }
    names.add(worker.name);
  }

  if (duplicates.length > 0) {
    throw new ConfigurationError(`Duplicate worker names: ${duplicates.join(', ')}`);
  }
}

/**
 * Validate that every step lists at least one technique
 */
export function validateStepReferences(definition: WorkflowDefinition): void {
  const errors: string[] = [];

  for (const worker of definition.workers) {
    for (const step of worker.steps) {
      if (step.techniques.length === 0) {
        errors.push(`Step ${step.name} in worker ${worker.name} has no techniques`);
      }
    }
  }

  if (errors.length > 0) {
    throw new ConfigurationError(errors.join('\n'));
  }
}

export function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
