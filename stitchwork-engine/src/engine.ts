/**
 * Stitch Engine
 *
 * Wires configuration, logging, telemetry, the workspace manager,
 * checkpointing and the graph executor together behind run() and resume().
 */

import { createTelemetryClient, type TelemetryClient } from '@stitchwork/telemetry';
import { CheckpointManager } from './checkpoint/checkpoint-manager.js';
import { FileCheckpointStore, type CheckpointStore } from './checkpoint/checkpoint-store.js';
import { config as defaultConfig, type EngineConfig } from './config.js';
import { CheckpointMismatchError } from './errors.js';
import { loadDescriptorManifest } from './discovery/descriptor-loader.js';
import type { EventBus } from './events/event-bus.js';
import { GraphExecutor } from './executor/graph-executor.js';
import type { AgentExecutor, GraphExecutorConfig } from './executor/types.js';
import { buildGraph } from './graph/node-graph.js';
import { createLogger, type Logger } from './logger.js';
import type {
  AgentGraph,
  BuildGraphOptions,
  NodeDescriptor,
  RunReport,
  StructuralValidator,
} from './types/index.js';
import type { BaseLayer, CommitStrategy } from './workspace/types.js';
import { WorkspaceManager } from './workspace/workspace-manager.js';

export interface StitchEngineOptions {
  agent: AgentExecutor;
  config?: EngineConfig;
  validator?: StructuralValidator;
  /** Defaults to a client configured from STITCHWORK_TELEMETRY_* */
  telemetry?: TelemetryClient;
  /** Defaults to JSON files under the configured checkpoint directory */
  checkpointStore?: CheckpointStore;
  commitStrategy?: CommitStrategy;
  executor?: Partial<GraphExecutorConfig>;
}

export type GraphInput =
  | { graph: AgentGraph }
  | { descriptors: NodeDescriptor[]; graphOptions?: BuildGraphOptions };

export type EngineRunOptions = GraphInput & {
  baseRef: string;
  runId?: string;
  signal?: AbortSignal;
  bus?: EventBus;
};

export class StitchEngine {
  readonly config: EngineConfig;
  readonly logger: Logger;
  readonly workspaces: WorkspaceManager;
  readonly checkpoints: CheckpointManager;
  readonly executor: GraphExecutor;
  private telemetry: TelemetryClient;

  constructor(options: StitchEngineOptions) {
    this.config = options.config ?? defaultConfig;
    this.telemetry = options.telemetry ?? createTelemetryClient({ serviceId: this.config.serviceId });
    this.logger = createLogger('StitchEngine', { level: this.config.logLevel, telemetry: this.telemetry });

    this.workspaces = new WorkspaceManager({
      defaultTtlMs: this.config.workspace.ttlMs,
      reaperIntervalMs: this.config.workspace.reaperIntervalMs,
      commitStrategy: options.commitStrategy,
      logger: this.logger.child('WorkspaceManager'),
    });

    this.checkpoints = new CheckpointManager(
      options.checkpointStore ?? new FileCheckpointStore(this.config.checkpoint.dir),
      this.logger.child('CheckpointManager')
    );

    this.executor = new GraphExecutor(
      {
        workspaces: this.workspaces,
        agent: options.agent,
        checkpoints: this.config.checkpoint.every > 0 ? this.checkpoints : undefined,
        validator: options.validator,
        logger: this.logger,
        telemetry: this.telemetry,
      },
      {
        maxConcurrency: this.config.executor.maxConcurrency,
        nodeTimeoutMs: this.config.executor.nodeTimeoutMs,
        nodeRetries: this.config.executor.nodeRetries,
        errorPolicy: this.config.executor.errorPolicy,
        checkpointEvery: this.config.checkpoint.every,
        queueLimit: this.config.events.queueLimit,
        ...options.executor,
      }
    );
  }

  registerBase(files: Record<string, string | Buffer> | Map<string, string | Buffer>): BaseLayer {
    return this.workspaces.registerBase(files);
  }

  registerBaseFromDirectory(dir: string): Promise<BaseLayer> {
    return this.workspaces.registerBaseFromDirectory(dir);
  }

  /**
   * Build a graph from a JSON or YAML descriptor manifest.
   */
  async loadGraph(manifestPath: string): Promise<AgentGraph> {
    const manifest = await loadDescriptorManifest(manifestPath);
    const graph = buildGraph(manifest.descriptors, manifest.options);
    this.logger.info(`Loaded graph ${graph.id} from ${manifestPath} (${graph.nodes.size} nodes)`);
    return graph;
  }

  async run(options: EngineRunOptions): Promise<RunReport> {
    return this.executor.run(toGraph(options), {
      baseRef: options.baseRef,
      runId: options.runId,
      signal: options.signal,
      bus: options.bus,
    });
  }

  /**
   * Continue a checkpointed run over the same graph and base layer.
   *
   * @throws CheckpointMismatchError when the checkpoint does not fit them
   */
  async resume(
    checkpointId: string,
    options: GraphInput & { baseRef: string; signal?: AbortSignal; bus?: EventBus }
  ): Promise<RunReport> {
    const graph = toGraph(options);
    const state = await this.checkpoints.resume(checkpointId, this.workspaces, {
      graphId: graph.id,
      baseRef: options.baseRef,
    });
    return this.executor.run(graph, {
      baseRef: options.baseRef,
      signal: options.signal,
      bus: options.bus,
      resumeFrom: state,
    });
  }

  /**
   * Continue a run from its most recent checkpoint.
   */
  async resumeLatest(
    runId: string,
    options: GraphInput & { baseRef: string; signal?: AbortSignal; bus?: EventBus }
  ): Promise<RunReport> {
    const latest = await this.checkpoints.latest(runId);
    if (!latest) {
      throw new CheckpointMismatchError(`No checkpoint recorded for run ${runId}`, { runId });
    }
    return this.resume(latest.id, options);
  }

  start(): void {
    this.workspaces.startReaper();
  }

  async shutdown(): Promise<void> {
    this.workspaces.stopReaper();
    await this.telemetry.shutdown();
  }
}

function toGraph(input: GraphInput): AgentGraph {
  return 'graph' in input ? input.graph : buildGraph(input.descriptors, input.graphOptions);
}
