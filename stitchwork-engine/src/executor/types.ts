/**
 * Executor Types
 */

import type { TelemetryClient } from '@stitchwork/telemetry';
import type { CheckpointManager } from '../checkpoint/checkpoint-manager.js';
import type { EventBus } from '../events/event-bus.js';
import type { Logger } from '../logger.js';
import type {
  AgentNode,
  AgentOutput,
  ErrorPolicy,
  ExecutorState,
  NodeContext,
  StructuralValidator,
} from '../types/index.js';
import type { WorkspaceHandle } from '../workspace/types.js';
import type { WorkspaceManager } from '../workspace/workspace-manager.js';
import type { RunContext } from './run-context.js';

export interface AgentInvocation {
  node: AgentNode;
  context: NodeContext;
  /** Bound to this node's own overlay */
  workspace: WorkspaceHandle;
  /** Aborted on node deadline or run cancellation */
  signal: AbortSignal;
  /** 1-based; above 1 after a retryable failure */
  attempt: number;
  run: RunContext;
}

/**
 * The work done for one node. Anything thrown or rejected becomes the
 * node's error and goes through the error policy.
 */
export type AgentExecutor = (invocation: AgentInvocation) => Promise<AgentOutput>;

export interface GraphExecutorConfig {
  maxConcurrency: number;
  nodeTimeoutMs: number;
  /** Extra attempts for errors marked retryable */
  nodeRetries: number;
  errorPolicy: ErrorPolicy;
  /** Checkpoint after every N finished nodes; 0 disables */
  checkpointEvery: number;
  queueLimit: number;
  /** Keep result workspaces retained after the run instead of handing them to the reaper */
  retainWorkspaces: boolean;
}

export interface GraphExecutorDeps {
  workspaces: WorkspaceManager;
  agent: AgentExecutor;
  checkpoints?: CheckpointManager;
  validator?: StructuralValidator;
  logger?: Logger;
  telemetry?: TelemetryClient;
}

export interface RunOptions {
  /** Base layer every node workspace is created over */
  baseRef: string;
  runId?: string;
  signal?: AbortSignal;
  /** Continue a checkpointed run instead of starting fresh */
  resumeFrom?: ExecutorState;
  /** Caller-owned bus; left open after the run */
  bus?: EventBus;
}
