/**
 * Graph Types
 *
 * Node descriptors come from an external discovery step (a CST walker,
 * a file lister). The engine turns them into an arena of AgentNodes indexed
 * by id; relationships are id lists, never object references.
 */

export type NodeId = string;

export type NodeStatus =
  | 'pending'
  | 'ready'
  | 'running'
  | 'succeeded'
  | 'failed'
  | 'skipped';

export const ERROR_POLICIES = ['stop_graph', 'skip_downstream', 'continue'] as const;

/**
 * What a node failure does to the rest of the run:
 * - stop_graph: no new node starts; running nodes finish; the run fails
 * - skip_downstream: the failed node's transitive downstream is skipped
 * - continue: downstream runs without the failed node's output
 */
export type ErrorPolicy = (typeof ERROR_POLICIES)[number];

export const TERMINAL_STATUSES: ReadonlySet<NodeStatus> = new Set(['succeeded', 'failed', 'skipped']);

export interface NodeDescriptor {
  id: NodeId;
  name?: string;
  /** e.g. "file", "class", "function" */
  kind?: string;
  /** Base-layer path of the buffer this span lives in */
  filePath?: string;
  /** Half-open byte range within the file */
  startByte: number;
  endByte: number;
  /** Raw span text; filled from the base layer when omitted */
  text?: string;
  parentId?: NodeId;
  dependsOn?: NodeId[];
  priority?: number;
  /** Overrides the executor-wide policy for this node's failures */
  errorPolicy?: ErrorPolicy;
  metadata?: Record<string, unknown>;
}

export interface AgentNode {
  id: NodeId;
  name: string;
  descriptor: NodeDescriptor;
  upstream: NodeId[];
  downstream: NodeId[];
  children: NodeId[];
  priority: number;
  status: NodeStatus;
}

export interface GraphTopology {
  sorted: NodeId[];
  levels: Map<NodeId, number>;
  roots: NodeId[];
  leaves: NodeId[];
}

export interface AgentGraph {
  /** Content hash of the descriptors; stable across processes */
  id: string;
  nodes: Map<NodeId, AgentNode>;
  topology: GraphTopology;
  builtAt: Date;
}

export interface BuildGraphOptions {
  /**
   * 'sequential' chains siblings (same parent, same file) by start offset so
   * each waits for the previous one; 'parallel' leaves them independent.
   */
  siblingOrder?: 'parallel' | 'sequential';
}
