/**
 * Workflow definition types - the canonical form every configuration
 * source is normalized into before a graph is built
 */

// =============================================================================
// DESIGNS
// =============================================================================

export const DESIGN_NAMES = [
  'waterfall',
  'kanban',
  'contest',
  'survey',
  'pert',
  'agile',
  'lean',
  'scrum',
] as const;

export type DesignName = (typeof DESIGN_NAMES)[number];

/**
 * How the execution layer reconciles parallel pipelines of one worker
 */
export type Aggregation =
  | 'single'       // One pipeline, nothing to reconcile
  | 'select-best'  // Keep the best-scoring pipeline
  | 'average-all'; // Average scores across every pipeline

/**
 * Technique that stands for "skip this step"
 */
export const NONE_TECHNIQUE = 'none';

// =============================================================================
// DEFINITION TYPES
// =============================================================================

export type ParameterValue = string | number | boolean | null | ParameterValue[];

export type Parameters = Record<string, ParameterValue>;

export interface WorkflowDefinition {
  name: string;
  workers: WorkerDefinition[];                // Linked in this order
  parameters: Record<string, Parameters>;     // technique -> overrides
  techniques?: Record<string, Parameters>;    // Known techniques with defaults
}

export interface WorkerDefinition {
  name: string;                  // e.g. "wrangler", "analyst", "critic"
  design: string;                // As configured; resolved against a registry
  steps: StepDefinition[];
  feedback: boolean;             // Last step loops back to the first
}

export interface StepDefinition {
  name: string;                  // e.g. "scale"
  techniques: string[];          // First entry is the default
}
