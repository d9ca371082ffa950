export * from './graph-executor.js';
export * from './run-context.js';
export * from './semaphore.js';
export * from './fan-out.js';
export * from './types.js';
