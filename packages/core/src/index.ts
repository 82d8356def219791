/**
 * @lattice/core
 * Workflow graph construction and traversal
 * Pure functions over immutable graphs - no I/O apart from logging
 */

// Errors, configuration, logging
export * from './errors';
export * from './config';
export * from './logger';

// Workflow definitions
export * from './workflow/normalize';
export * from './workflow/settings';
export * from './workflow/catalogue';
export * from './workflow/project';

// Designs
export * from './designs/rule';
export * from './designs/variants';
export * from './designs/registry';

// Graph
export * from './dag/graph';
export * from './dag/build';
export * from './dag/link';
export * from './dag/validate';
export * from './dag/topo';

// Traversal and export
export * from './traverse/paths';
export * from './export/dot';
