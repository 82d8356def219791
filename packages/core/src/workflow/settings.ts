/**
 * Flat settings
 * Reads the section convention of ini-style project settings:
 *
 *   [cancer_project]   cancer_workers = wrangler, analyst
 *                      cancer_design = waterfall
 *   [analyst]          design = contest
 *                      analyst_steps = scale, split
 *                      scale_techniques = minmax, robust
 *   [minmax_parameters] copy = False
 */

import type { ParameterValue, Parameters, WorkflowDefinition } from '@lattice/types';
import { ConfigurationError } from '../errors';
import { normalizeProject, splitList, type ProjectInput } from './normalize';

export type SettingsSection = Record<string, unknown>;
export type Settings = Record<string, SettingsSection>;

const WORKERS_SUFFIX = '_workers';
const PARAMETERS_SUFFIX = '_parameters';

export function fromSettings(settings: Settings, project?: string): WorkflowDefinition {
  const located = locateProject(settings, project);
  const projectDesign = asString(located.section[`${located.name}_design`]);

  const workers: ProjectInput['workers'] = {};
  const designs: Record<string, string> = {};
  const feedback: string[] = [];

  for (const worker of asList(located.section[`${located.name}${WORKERS_SUFFIX}`])) {
    const section = settings[worker] ?? {};
    workers[worker] = readSteps(worker, section);

    const design = asString(section.design) ?? asString(section[`${worker}_design`]);
    if (design) {
      designs[worker] = design;
    }
    if (coerce(section[`${worker}_feedback`]) === true) {
      feedback.push(worker);
    }
  }

  const parameters: Record<string, Parameters> = {};
  for (const [sectionName, section] of Object.entries(settings)) {
    if (sectionName.endsWith(PARAMETERS_SUFFIX)) {
      const technique = sectionName.slice(0, -PARAMETERS_SUFFIX.length);
      parameters[technique] = coerceSection(section);
    }
  }

  return normalizeProject({
    name: located.name,
    workers,
    design: projectDesign,
    designs,
    parameters,
    feedback,
  });
}

function locateProject(
  settings: Settings,
  project: string | undefined
): { name: string; section: SettingsSection } {
  for (const [sectionName, section] of Object.entries(settings)) {
    for (const key of Object.keys(section)) {
      if (!key.endsWith(WORKERS_SUFFIX)) continue;

      const name = key.slice(0, -WORKERS_SUFFIX.length);
      if (project === undefined || project === name || project === sectionName) {
        return { name, section };
      }
    }
  }

  throw new ConfigurationError(
    project === undefined
      ? 'Settings have no section listing project workers'
      : `Settings have no workers for project ${project}`
  );
}

/**
 * <worker>_steps with <step>_techniques, or a single step from
 * <worker>_techniques. A listed step without its own techniques takes the
 * worker's techniques, or failing that runs as the technique of its name.
 */
function readSteps(worker: string, section: SettingsSection): Record<string, string[]> {
  const steps: Record<string, string[]> = {};
  const stepNames = asList(section[`${worker}_steps`]);
  const workerTechniques = asList(section[`${worker}_techniques`]);

  if (stepNames.length === 0) {
    if (workerTechniques.length > 0) {
      steps[worker] = workerTechniques;
    }
    return steps;
  }

  for (const step of stepNames) {
    const techniques = asList(section[`${step}_techniques`]);
    if (techniques.length > 0) {
      steps[step] = techniques;
    } else if (workerTechniques.length > 0) {
      steps[step] = [...workerTechniques];
    } else {
      steps[step] = [step];
    }
  }
  return steps;
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
}

function asList(value: unknown): string[] {
  if (typeof value === 'string') {
    return splitList(value);
  }
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string');
  }
  return [];
}

function coerceSection(section: SettingsSection): Parameters {
  const parameters: Parameters = {};
  for (const [key, value] of Object.entries(section)) {
    parameters[key] = coerce(value);
  }
  return parameters;
}

/**
 * Infer the type of an ini value
 */
export function coerce(value: unknown): ParameterValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number' || typeof value === 'boolean') return value;
  if (Array.isArray(value)) return value.map(coerce);
  if (typeof value !== 'string') return String(value);

  const text = value.trim();
  if (text.includes(',')) return splitList(text).map(coerce);
  if (/^true$/i.test(text)) return true;
  if (/^false$/i.test(text)) return false;
  if (/^none$/i.test(text)) return null;
  if (text !== '' && !Number.isNaN(Number(text))) return Number(text);
  return text;
}
