export * from './definition';
export * from './graph';
