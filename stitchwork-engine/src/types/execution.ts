/**
 * Execution Types
 *
 * Types for graph runs, agent outputs and per-node results.
 */

import type { SerializedError } from '../errors.js';
import type { AgentNode, NodeId, NodeStatus } from './graph.js';

export type RunStatus = 'succeeded' | 'partial' | 'failed' | 'cancelled';

/**
 * Byte-range replacement. Offsets are half-open and byte-addressed against
 * the buffer the patch is submitted with.
 */
export interface Patch {
  start: number;
  end: number;
  content: string;
  nodeId: NodeId;
}

export type PatchProposal = Omit<Patch, 'nodeId'>;

export interface ArtifactProposal {
  path: string;
  content: string;
}

export type AgentOutput =
  | { kind: 'patch'; patches: PatchProposal[]; message?: string }
  | { kind: 'artifact'; artifacts: ArtifactProposal[]; message?: string }
  | { kind: 'noop'; message?: string };

export interface ArtifactRecord {
  path: string;
  bytes: number;
  sha256: string;
}

export interface ResultSummary {
  nodeId: NodeId;
  status: NodeStatus;
  patches: Patch[];
  artifacts: ArtifactRecord[];
  /** Node span after its children and its own patches were applied */
  spanText?: string;
  /** Overlay paths written while persisting the result */
  writes: string[];
  /** Workspace holding the node's overlay, retained after success */
  workspaceId?: string;
  message?: string;
  error?: SerializedError;
  attempts: number;
  startedAt?: string;
  completedAt?: string;
  durationMs: number;
}

export interface ValidationTarget {
  nodeId?: NodeId;
  filePath?: string;
  scope: 'patch' | 'span' | 'document';
}

export interface ValidationResult {
  valid: boolean;
  diagnostics?: string[];
}

/**
 * Structural checker (typically a parser). Given merged content, decides
 * whether the result is still well-formed.
 */
export type StructuralValidator = (
  content: string,
  target: ValidationTarget
) => ValidationResult | Promise<ValidationResult>;

export interface ExecutorState {
  runId: string;
  graphId: string;
  completed: Map<NodeId, ResultSummary>;
  pending: Set<NodeId>;
  lastEventSeq: number;
}

export type DocumentStatus = 'merged' | 'unchanged' | 'rejected';

export interface DocumentResult {
  path: string;
  status: DocumentStatus;
  content: string;
  error?: SerializedError;
}

export interface RunReport {
  runId: string;
  graphId: string;
  status: RunStatus;
  summaries: ResultSummary[];
  documents: DocumentResult[];
  startedAt: string;
  completedAt: string;
  durationMs: number;
}

/**
 * What an agent sees of the node it works on.
 */
export interface NodeContext {
  node: AgentNode;
  /** Current span text: the original span with finished children stitched in */
  text: string;
  /** Summaries of upstream nodes that reached a terminal state */
  upstream: ReadonlyMap<NodeId, ResultSummary>;
  /** Rendered recent-activity digest, when the agent keeps one */
  memory?: string;
}
