/**
 * Graph Executor
 *
 * Runs an agent graph: ready nodes are admitted through a bounded
 * semaphore, each into its own copy-on-write workspace, and every outcome is
 * routed through the node's error policy. Children's results are stitched
 * into their parent's span before the parent starts, and root spans into
 * their documents once the run is over.
 */

import { v4 as uuid } from 'uuid';
import { EventEmitter } from 'events';
import type { TelemetryClient } from '@stitchwork/telemetry';
import type { CheckpointManager } from '../checkpoint/checkpoint-manager.js';
import { config } from '../config.js';
import {
  CancelledError,
  CheckpointMismatchError,
  EngineError,
  GraphDefinitionError,
  TimeoutError,
  WorkspaceError,
  abortReason,
  classifyNodeError,
} from '../errors.js';
import { EventBus } from '../events/event-bus.js';
import { downstreamClosure, readySet, requireNode } from '../graph/node-graph.js';
import { silentLogger, type Logger } from '../logger.js';
import { ResultHandler, type NodeTiming } from '../results/result-handler.js';
import { PatchStitcher, type StitchPatch } from '../stitcher/patch-stitcher.js';
import type {
  AgentGraph,
  AgentNode,
  AgentOutput,
  DocumentResult,
  ExecutorState,
  NodeContext,
  NodeId,
  ResultSummary,
  RunReport,
  RunStatus,
} from '../types/index.js';
import { validateWorkspacePath } from '../workspace/path-validator.js';
import type { WorkspaceHandle } from '../workspace/types.js';
import type { WorkspaceManager } from '../workspace/workspace-manager.js';
import { RunContext } from './run-context.js';
import { Semaphore } from './semaphore.js';
import type {
  AgentExecutor,
  GraphExecutorConfig,
  GraphExecutorDeps,
  RunOptions,
} from './types.js';

export interface ExecutorEvents {
  'run:start': (run: RunContext) => void;
  'run:complete': (report: RunReport) => void;
}

type AttemptOutcome =
  | { ok: true; summary: ResultSummary }
  | { ok: false; error: EngineError; time: NodeTiming };

export class GraphExecutor extends EventEmitter {
  private config: GraphExecutorConfig;
  private workspaces: WorkspaceManager;
  private agent: AgentExecutor;
  private checkpoints?: CheckpointManager;
  private stitcher: PatchStitcher;
  private results: ResultHandler;
  private logger: Logger;
  private telemetry?: TelemetryClient;
  private activeRuns = new Map<string, RunContext>();

  constructor(deps: GraphExecutorDeps, executorConfig: Partial<GraphExecutorConfig> = {}) {
    super();
    this.config = {
      maxConcurrency: executorConfig.maxConcurrency ?? config.executor.maxConcurrency,
      nodeTimeoutMs: executorConfig.nodeTimeoutMs ?? config.executor.nodeTimeoutMs,
      nodeRetries: executorConfig.nodeRetries ?? config.executor.nodeRetries,
      errorPolicy: executorConfig.errorPolicy ?? config.executor.errorPolicy,
      checkpointEvery: executorConfig.checkpointEvery ?? config.checkpoint.every,
      queueLimit: executorConfig.queueLimit ?? config.events.queueLimit,
      retainWorkspaces: executorConfig.retainWorkspaces ?? false,
    };
    this.workspaces = deps.workspaces;
    this.agent = deps.agent;
    this.checkpoints = deps.checkpoints;
    this.logger = deps.logger ?? silentLogger;
    this.telemetry = deps.telemetry;
    this.stitcher = new PatchStitcher({ validator: deps.validator, logger: this.logger.child('PatchStitcher') });
    this.results = new ResultHandler(this.stitcher, this.logger.child('ResultHandler'));
  }

  /**
   * Execute every node of `graph` and resolve with the run report once no
   * node is running and nothing else can be scheduled.
   *
   * @throws CheckpointMismatchError when `resumeFrom` belongs to another graph
   * @throws WorkspaceError when the base layer is not registered
   */
  async run(graph: AgentGraph, options: RunOptions): Promise<RunReport> {
    const resume = options.resumeFrom;
    if (resume && resume.graphId !== graph.id) {
      throw new CheckpointMismatchError(
        `Checkpointed state belongs to graph ${resume.graphId}, not ${graph.id}`,
        { expected: graph.id, actual: resume.graphId }
      );
    }
    if (!this.workspaces.hasBase(options.baseRef)) {
      throw new WorkspaceError('BASE_NOT_FOUND', `Base layer not registered: ${options.baseRef}`);
    }

    const runId = resume?.runId ?? options.runId ?? uuid();
    const controller = new AbortController();
    const external = options.signal;
    const onExternalAbort = () => controller.abort(external ? abortReason(external) : new CancelledError());
    if (external?.aborted) {
      onExternalAbort();
    } else {
      external?.addEventListener('abort', onExternalAbort, { once: true });
    }

    const logger = this.logger.child('GraphExecutor');
    const bus =
      options.bus ??
      new EventBus({
        queueLimit: this.config.queueLimit,
        runId,
        startSeq: resume?.lastEventSeq ?? 0,
        logger: this.logger.child('EventBus'),
      });

    const run = new RunContext({
      runId,
      graph,
      baseRef: options.baseRef,
      bus,
      ownsBus: options.bus === undefined,
      workspaces: this.workspaces,
      logger,
      signal: controller.signal,
    });

    this.activeRuns.set(runId, run);
    this.emit('run:start', run);

    try {
      const graphRun = new GraphRun(run, {
        config: this.config,
        agent: this.agent,
        checkpoints: this.checkpoints,
        stitcher: this.stitcher,
        results: this.results,
        telemetry: this.telemetry,
        restored: resume?.completed ?? new Map(),
      });
      const { report, fatal } = await graphRun.execute();

      run.close({ retainWorkspaces: this.config.retainWorkspaces });
      this.emit('run:complete', report);
      this.telemetry?.metric('engine.run.duration_ms', report.durationMs, { status: report.status });

      if (fatal) throw fatal;
      return report;
    } finally {
      run.close({ retainWorkspaces: this.config.retainWorkspaces });
      external?.removeEventListener('abort', onExternalAbort);
      this.activeRuns.delete(runId);
    }
  }

  getRun(runId: string): RunContext | undefined {
    return this.activeRuns.get(runId);
  }

  getStats(): { activeRuns: number; maxConcurrency: number } {
    return { activeRuns: this.activeRuns.size, maxConcurrency: this.config.maxConcurrency };
  }
}

interface GraphRunDeps {
  config: GraphExecutorConfig;
  agent: AgentExecutor;
  checkpoints?: CheckpointManager;
  stitcher: PatchStitcher;
  results: ResultHandler;
  telemetry?: TelemetryClient;
  restored: ReadonlyMap<NodeId, ResultSummary>;
}

/**
 * State of one run. Lives only as long as GraphExecutor.run().
 */
class GraphRun {
  private graph: AgentGraph;
  private summaries: Map<NodeId, ResultSummary>;
  private scheduled: Set<NodeId>;
  private inFlight = new Map<NodeId, Promise<void>>();
  private semaphore: Semaphore;
  private halted = false;
  private fatal: Error | null = null;
  private sinceCheckpoint = 0;
  private checkpointChain: Promise<void> = Promise.resolve();
  private startedAt = new Date();

  constructor(
    private readonly run: RunContext,
    private readonly deps: GraphRunDeps
  ) {
    this.graph = run.graph;
    this.summaries = new Map(deps.restored);
    this.semaphore = new Semaphore(deps.config.maxConcurrency);

    this.scheduled = new Set(this.summaries.keys());

    for (const node of this.graph.nodes.values()) {
      node.status = this.summaries.get(node.id)?.status ?? 'pending';
    }
    for (const summary of this.summaries.values()) {
      if (summary.status === 'succeeded' && summary.workspaceId && run.workspaces.get(summary.workspaceId)) {
        run.keepWorkspace(summary.nodeId, summary.workspaceId);
      }
    }
  }

  async execute(): Promise<{ report: RunReport; fatal: Error | null }> {
    const { run, graph } = this;
    const restored = this.summaries.size;

    run.emit('graph:start', { graphId: graph.id, nodeCount: graph.nodes.size, restored });
    run.logger.info(
      `Starting run ${run.runId}: ${graph.nodes.size} nodes` + (restored > 0 ? ` (${restored} restored)` : '')
    );

    for (;;) {
      if (!this.halted && !run.signal.aborted) {
        this.schedule();
      }
      if (this.inFlight.size === 0) break;
      await Promise.race(this.inFlight.values());
    }

    await this.checkpointChain;

    const reason = run.signal.aborted ? 'Run was cancelled before the node started' : 'Run halted before the node started';
    for (const id of graph.topology.sorted) {
      if (this.summaries.has(id)) continue;
      const node = requireNode(graph.nodes, id);
      this.commit(node, this.deps.results.skipped(node, reason));
    }

    const documents = await this.assembleDocuments();
    const status = this.runStatus(documents);
    const summaries = graph.topology.sorted.flatMap((id) => {
      const summary = this.summaries.get(id);
      return summary ? [summary] : [];
    });

    run.emit('graph:complete', { graphId: graph.id, status, summaries, documents });

    const completedAt = new Date();
    const report: RunReport = {
      runId: run.runId,
      graphId: graph.id,
      status,
      summaries,
      documents,
      startedAt: this.startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      durationMs: completedAt.getTime() - this.startedAt.getTime(),
    };

    run.logger.info(`Run ${run.runId} finished: ${status} in ${report.durationMs}ms`);
    return { report, fatal: this.fatal };
  }

  // Scheduling

  private schedule(): void {
    const completed = new Set(this.summaries.keys());
    for (const id of readySet(this.graph, completed, this.scheduled)) {
      const node = requireNode(this.graph.nodes, id);
      this.scheduled.add(id);
      node.status = 'ready';
      this.run.emit('node:ready', {}, id);

      const task = this.runNode(node)
        .catch((err) => {
          this.run.logger.error(`Unexpected failure while running node ${id}: ${String(err)}`);
          this.fatal ??= classifyNodeError(err);
          this.halted = true;
        })
        .finally(() => {
          this.inFlight.delete(id);
        });
      this.inFlight.set(id, task);
    }
  }

  private async runNode(node: AgentNode): Promise<void> {
    try {
      await this.semaphore.acquire(this.run.signal);
    } catch {
      // Only an aborted run rejects admission
      this.commit(node, this.deps.results.skipped(node, 'Run was cancelled before the node started'));
      return;
    }

    let outcome: AttemptOutcome;
    try {
      if (this.halted || this.run.signal.aborted) {
        const reason = this.halted ? 'Run halted before the node started' : 'Run was cancelled before the node started';
        this.commit(node, this.deps.results.skipped(node, reason));
        return;
      }
      outcome = await this.attempt(node);
    } finally {
      this.semaphore.release();
    }

    if (outcome.ok) {
      if (outcome.summary.workspaceId) {
        this.run.keepWorkspace(node.id, outcome.summary.workspaceId);
      }
      this.commit(node, outcome.summary);
    } else {
      this.commit(node, this.deps.results.failure(node, outcome.error, outcome.time));
      if (!this.run.signal.aborted) {
        this.applyPolicy(node, outcome.error);
      }
    }

    this.maybeCheckpoint();
  }

  /**
   * Run the agent for a node, retrying retryable errors. Failed attempts
   * dispose their workspace before anything else happens.
   */
  private async attempt(node: AgentNode): Promise<AttemptOutcome> {
    const maxAttempts = this.deps.config.nodeRetries + 1;
    const startedAt = new Date();

    node.status = 'running';
    let workspaceId = this.createWorkspace(node);
    this.run.emit('node:start', { attempt: 1, workspaceId }, node.id);

    let context: NodeContext;
    try {
      context = await this.buildContext(node, this.run.workspaces.handle(workspaceId));
    } catch (err) {
      this.run.workspaces.dispose(workspaceId);
      return { ok: false, error: classifyNodeError(err), time: { attempts: 1, startedAt, completedAt: new Date() } };
    }

    for (let attempt = 1; ; attempt++) {
      if (attempt > 1) {
        workspaceId = this.createWorkspace(node);
      }
      const handle = this.run.workspaces.handle(workspaceId);

      try {
        const output = await this.invokeAgent(node, context, handle, attempt);
        const summary = await this.deps.results.handle({
          node,
          context: context.text,
          output,
          workspace: handle,
          attempts: attempt,
          startedAt,
          completedAt: new Date(),
        });
        return { ok: true, summary };
      } catch (err) {
        const error = classifyNodeError(err);
        this.run.workspaces.dispose(workspaceId);

        if (error.retryable && attempt < maxAttempts && !this.run.signal.aborted) {
          this.run.logger.warn(`Node ${node.id} attempt ${attempt} failed (${error.code}); retrying`);
          this.run.emit('node:retry', { attempt: attempt + 1, error: error.toJSON() }, node.id);
          continue;
        }
        return { ok: false, error, time: { attempts: attempt, startedAt, completedAt: new Date() } };
      }
    }
  }

  private createWorkspace(node: AgentNode): string {
    return this.run.workspaces.create(this.run.baseRef, { nodeId: node.id, runId: this.run.runId }).id;
  }

  /**
   * Call the agent under the node deadline and the run's cancellation. The
   * call settles as soon as either fires, whether or not the agent honours
   * its signal.
   */
  private async invokeAgent(
    node: AgentNode,
    context: NodeContext,
    workspace: WorkspaceHandle,
    attempt: number
  ): Promise<AgentOutput> {
    const timeoutMs = this.deps.config.nodeTimeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new TimeoutError(`Node ${node.id} exceeded its ${timeoutMs}ms deadline`, timeoutMs));
    }, timeoutMs);
    const onRunAbort = () => controller.abort(abortReason(this.run.signal));
    if (this.run.signal.aborted) {
      onRunAbort();
    } else {
      this.run.signal.addEventListener('abort', onRunAbort, { once: true });
    }

    try {
      if (controller.signal.aborted) {
        throw abortReason(controller.signal);
      }
      const work = Promise.resolve().then(() =>
        this.deps.agent({ node, context, workspace, signal: controller.signal, attempt, run: this.run })
      );
      return await settleOrAbort(work, controller.signal);
    } finally {
      clearTimeout(timer);
      this.run.signal.removeEventListener('abort', onRunAbort);
    }
  }

  /**
   * The node's original span with every succeeded child's span text stitched
   * in, plus the summaries of its upstream nodes.
   */
  private async buildContext(node: AgentNode, workspace: WorkspaceHandle): Promise<NodeContext> {
    const original = this.originalText(node, workspace);
    const offset = node.descriptor.startByte;

    const childPatches: StitchPatch[] = node.children.flatMap((childId) => {
      const summary = this.summaries.get(childId);
      if (summary?.status !== 'succeeded' || summary.spanText === undefined) return [];
      const child = requireNode(this.graph.nodes, childId).descriptor;
      return [{ start: child.startByte - offset, end: child.endByte - offset, content: summary.spanText, nodeId: childId }];
    });

    let text = original;
    if (childPatches.length > 0) {
      try {
        text = await this.deps.stitcher.stitchText(original, childPatches, {
          nodeId: node.id,
          filePath: node.descriptor.filePath,
          scope: 'span',
        });
      } catch (err) {
        this.rejectStitch(node.id, err);
        throw err;
      }
      this.run.emit('stitch:applied', { target: node.id, patchCount: childPatches.length }, node.id);
    }

    const upstream = new Map<NodeId, ResultSummary>();
    for (const upstreamId of node.upstream) {
      const summary = this.summaries.get(upstreamId);
      if (summary) upstream.set(upstreamId, summary);
    }

    return { node, text, upstream };
  }

  private originalText(node: AgentNode, workspace: WorkspaceHandle): string {
    const { text, filePath, startByte, endByte } = node.descriptor;
    if (text !== undefined) return text;
    if (filePath === undefined) return '';

    const file = workspace.read(filePath);
    if (!file) {
      throw new GraphDefinitionError(`Node ${node.id} refers to ${filePath}, which is not in the base layer`, {
        nodeId: node.id,
      });
    }
    if (endByte > file.length) {
      throw new GraphDefinitionError(
        `Node ${node.id} span [${startByte}, ${endByte}) runs past the end of ${filePath} (${file.length} bytes)`,
        { nodeId: node.id }
      );
    }
    return file.subarray(startByte, endByte).toString('utf-8');
  }

  // Completion

  private commit(node: AgentNode, summary: ResultSummary): void {
    node.status = summary.status;
    this.summaries.set(node.id, summary);
    this.scheduled.add(node.id);
    this.run.emit('node:complete', { status: summary.status, summary }, node.id);

    if (summary.status === 'failed') {
      this.run.logger.warn(`Node ${node.id} failed: ${summary.error?.message ?? 'unknown error'}`);
      this.deps.telemetry?.metric('engine.node.failed', 1, { nodeId: node.id, code: summary.error?.code });
    } else {
      this.run.logger.debug(`Node ${node.id} ${summary.status}`);
    }
    if (summary.attempts > 0) {
      this.deps.telemetry?.metric('engine.node.duration_ms', summary.durationMs, {
        nodeId: node.id,
        status: summary.status,
      });
    }
  }

  private applyPolicy(node: AgentNode, error: EngineError): void {
    const policy = node.descriptor.errorPolicy ?? this.deps.config.errorPolicy;

    switch (policy) {
      case 'stop_graph':
        if (!this.halted) {
          this.run.logger.warn(`Halting run ${this.run.runId} after ${node.id} failed (${error.code})`);
        }
        this.halted = true;
        break;

      case 'skip_downstream':
        for (const id of downstreamClosure(this.graph, node.id)) {
          if (this.summaries.has(id) || this.scheduled.has(id)) continue;
          const downstream = requireNode(this.graph.nodes, id);
          this.commit(downstream, this.deps.results.skipped(downstream, `Upstream node ${node.id} failed`));
        }
        break;

      case 'continue':
        break;
    }
  }

  /**
   * Capture state and workspaces in one synchronous step, then persist in
   * the background; saves are serialized in capture order.
   */
  private maybeCheckpoint(): void {
    const { checkpoints } = this.deps;
    const every = this.deps.config.checkpointEvery;
    if (!checkpoints || every <= 0 || this.run.signal.aborted || this.fatal || this.halted) return;

    this.sinceCheckpoint++;
    if (this.sinceCheckpoint < every) return;
    this.sinceCheckpoint = 0;

    const state: ExecutorState = {
      runId: this.run.runId,
      graphId: this.graph.id,
      completed: new Map(this.summaries),
      pending: new Set(this.graph.topology.sorted.filter((id) => !this.summaries.has(id))),
      lastEventSeq: this.run.bus.lastSeq,
    };
    const workspaceSnapshot = this.run.workspaces.snapshot(this.run.keptWorkspaces());

    this.checkpointChain = this.checkpointChain
      .then(async () => {
        if (this.fatal) return;
        const checkpointId = await checkpoints.snapshot(state, workspaceSnapshot);
        this.run.emit('checkpoint:saved', {
          checkpointId,
          completed: state.completed.size,
          pending: state.pending.size,
        });
      })
      .catch((err) => {
        this.run.logger.error(`Checkpoint failed for run ${this.run.runId}: ${String(err)}`);
        this.fatal ??= classifyNodeError(err);
        this.halted = true;
      });
  }

  // Documents

  /**
   * Stitch each file's root spans into its base content. A rejected batch
   * leaves that document exactly as it was in the base layer.
   */
  private async assembleDocuments(): Promise<DocumentResult[]> {
    const { workspaces, baseRef } = this.run;
    if (!workspaces.hasBase(baseRef)) return [];

    const roots = new Map<string, AgentNode[]>();
    for (const node of this.graph.nodes.values()) {
      const { filePath, parentId } = node.descriptor;
      if (parentId !== undefined || filePath === undefined) continue;
      const key = validateWorkspacePath(filePath).normalizedPath;
      if (key === undefined) {
        this.run.logger.warn(`Node ${node.id} names an unusable document path ${filePath}; skipping`);
        continue;
      }
      roots.set(key, [...(roots.get(key) ?? []), node]);
    }

    const documents: DocumentResult[] = [];
    for (const filePath of Array.from(roots.keys()).sort()) {
      const original = workspaces.readBase(baseRef, filePath);
      if (!original) {
        this.run.logger.warn(`Document ${filePath} is not in the base layer; skipping`);
        continue;
      }
      const originalText = original.toString('utf-8');

      const patches: StitchPatch[] = (roots.get(filePath) ?? []).flatMap((node) => {
        const summary = this.summaries.get(node.id);
        if (summary?.status !== 'succeeded' || summary.spanText === undefined) return [];
        return [{ start: node.descriptor.startByte, end: node.descriptor.endByte, content: summary.spanText, nodeId: node.id }];
      });

      if (patches.length === 0) {
        documents.push({ path: filePath, status: 'unchanged', content: originalText });
        continue;
      }

      try {
        const content = await this.deps.stitcher.stitchText(originalText, patches, { filePath, scope: 'document' });
        this.run.emit('stitch:applied', { target: filePath, patchCount: patches.length });
        documents.push({ path: filePath, status: content === originalText ? 'unchanged' : 'merged', content });
      } catch (err) {
        const error = this.rejectStitch(filePath, err);
        documents.push({ path: filePath, status: 'rejected', content: originalText, error: error.toJSON() });
      }
    }

    return documents;
  }

  private rejectStitch(target: string, err: unknown): EngineError {
    const error = classifyNodeError(err);
    this.run.logger.warn(`Stitch rejected for ${target}: ${error.message}`);
    this.run.emit('stitch:rejected', { target, error: error.toJSON() });
    this.deps.telemetry?.metric('engine.stitch.rejected', 1, { target, code: error.code });
    return error;
  }

  private runStatus(documents: DocumentResult[]): RunStatus {
    if (this.run.signal.aborted) return 'cancelled';
    if (this.fatal || this.halted) return 'failed';

    const summaries = Array.from(this.summaries.values());
    const succeeded = summaries.filter((summary) => summary.status === 'succeeded').length;
    if (summaries.length > 0 && succeeded === 0) return 'failed';

    const degraded =
      succeeded < summaries.length || documents.some((document) => document.status === 'rejected');
    return degraded ? 'partial' : 'succeeded';
  }
}

/**
 * Settle with `work`, or reject with the abort reason as soon as `signal`
 * fires. A late rejection from `work` is ignored once settled.
 */
function settleOrAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}
