/**
 * @stitchwork/engine - dependency-ordered execution of LLM agents over
 * source spans, with copy-on-write workspaces and deterministic patch
 * stitching.
 *
 * @example
 * ```typescript
 * import { StitchEngine, createCapabilityAgent } from '@stitchwork/engine';
 *
 * const engine = new StitchEngine({
 *   agent: createCapabilityAgent({ capabilities, profiles, output: 'patch' }),
 * });
 * const base = engine.registerBase({ 'src/app.ts': source });
 * const report = await engine.run({ descriptors, baseRef: base.ref });
 * ```
 */

export * from './types/index.js';
export * from './errors.js';
export * from './config.js';
export * from './logger.js';
export * from './graph/node-graph.js';
export * from './workspace/types.js';
export * from './workspace/path-validator.js';
export * from './workspace/workspace-manager.js';
export * from './events/event-bus.js';
export * from './stitcher/patch-stitcher.js';
export * from './results/result-handler.js';
export * from './checkpoint/checkpoint-store.js';
export * from './checkpoint/checkpoint-manager.js';
export * from './executor/index.js';
export * from './agents/capabilities.js';
export * from './agents/capability-agent.js';
export * from './agents/human-input.js';
export * from './context/context-builder.js';
export * from './discovery/descriptor-loader.js';
export * from './engine.js';
