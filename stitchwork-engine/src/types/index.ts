export * from './graph.js';
export * from './execution.js';
export * from './events.js';
