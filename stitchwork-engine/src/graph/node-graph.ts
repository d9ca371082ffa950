/**
 * Node Graph
 *
 * Builds the dependency topology of agent nodes from discovery descriptors.
 * Everything here is a pure function of its inputs: the executor calls
 * readySet() on every scheduling pass.
 */

import { createHash } from 'crypto';
import { CycleError, GraphDefinitionError } from '../errors.js';
import type {
  AgentGraph,
  AgentNode,
  BuildGraphOptions,
  GraphTopology,
  NodeDescriptor,
  NodeId,
} from '../types/index.js';

/**
 * Build an immutable topology from descriptors.
 *
 * Edges come from three places: explicit `dependsOn`, children feeding their
 * parent (a parent runs after all of its children), and, with
 * `siblingOrder: 'sequential'`, each sibling waiting on the previous one.
 *
 * @throws GraphDefinitionError for inconsistent descriptors
 * @throws CycleError when the resulting edges are not acyclic
 */
export function buildGraph(descriptors: NodeDescriptor[], options: BuildGraphOptions = {}): AgentGraph {
  validateDescriptors(descriptors);

  const nodes = new Map<NodeId, AgentNode>();
  for (const descriptor of descriptors) {
    nodes.set(descriptor.id, {
      id: descriptor.id,
      name: descriptor.name ?? (descriptor.kind ? `${descriptor.kind}:${descriptor.id}` : descriptor.id),
      descriptor,
      upstream: [],
      downstream: [],
      children: [],
      priority: descriptor.priority ?? 0,
      status: 'pending',
    });
  }

  const byStart = (a: NodeDescriptor, b: NodeDescriptor) => a.startByte - b.startByte || a.id.localeCompare(b.id);
  const siblingGroups = new Map<string, NodeDescriptor[]>();

  for (const descriptor of descriptors) {
    const groupKey = descriptor.parentId !== undefined
      ? `parent:${descriptor.parentId}`
      : `file:${descriptor.filePath ?? ''}`;
    const group = siblingGroups.get(groupKey) ?? [];
    group.push(descriptor);
    siblingGroups.set(groupKey, group);
  }

  for (const group of siblingGroups.values()) {
    group.sort(byStart);
    group.forEach((descriptor, index) => {
      const node = requireNode(nodes, descriptor.id);
      if (descriptor.parentId !== undefined) {
        const parent = requireNode(nodes, descriptor.parentId);
        parent.children.push(descriptor.id);
        addEdge(nodes, descriptor.id, parent.id);
      }
      if (options.siblingOrder === 'sequential' && index > 0) {
        addEdge(nodes, group[index - 1].id, node.id);
      }
    });
  }

  for (const descriptor of descriptors) {
    for (const dependency of descriptor.dependsOn ?? []) {
      addEdge(nodes, dependency, descriptor.id);
    }
  }

  detectCycles(nodes);

  return {
    id: graphFingerprint(descriptors),
    nodes,
    topology: buildTopology(nodes),
    builtAt: new Date(),
  };
}

/**
 * Nodes whose entire upstream set is in `completed` and that have not been
 * scheduled yet, highest priority first, then in topological order.
 */
export function readySet(
  graph: AgentGraph,
  completed: ReadonlySet<NodeId>,
  scheduled: ReadonlySet<NodeId> = completed
): NodeId[] {
  const ready: NodeId[] = [];
  for (const id of graph.topology.sorted) {
    if (scheduled.has(id) || completed.has(id)) continue;
    const node = requireNode(graph.nodes, id);
    if (node.upstream.every((upstreamId) => completed.has(upstreamId))) {
      ready.push(id);
    }
  }

  // Array.prototype.sort is stable, so equal priorities keep topological order
  return ready.sort((a, b) => requireNode(graph.nodes, b).priority - requireNode(graph.nodes, a).priority);
}

/**
 * All nodes in dependency order (every node after its upstream).
 */
export function topologicalSort(graph: AgentGraph): AgentNode[] {
  return graph.topology.sorted.map((id) => requireNode(graph.nodes, id));
}

/**
 * Group nodes into parallel-safe batches: batch N only depends on batches < N.
 */
export function executionBatches(graph: AgentGraph): NodeId[][] {
  const batches: NodeId[][] = [];
  for (const id of graph.topology.sorted) {
    const level = graph.topology.levels.get(id) ?? 0;
    while (batches.length <= level) batches.push([]);
    batches[level].push(id);
  }
  return batches;
}

/**
 * Transitive downstream closure of a node, excluding the node itself.
 */
export function downstreamClosure(graph: AgentGraph, id: NodeId): NodeId[] {
  const seen = new Set<NodeId>();
  const stack = [...requireNode(graph.nodes, id).downstream];
  while (stack.length > 0) {
    const next = stack.pop();
    if (next === undefined || seen.has(next)) continue;
    seen.add(next);
    stack.push(...requireNode(graph.nodes, next).downstream);
  }
  return graph.topology.sorted.filter((nodeId) => seen.has(nodeId));
}

export function requireNode(nodes: ReadonlyMap<NodeId, AgentNode>, id: NodeId): AgentNode {
  const node = nodes.get(id);
  if (!node) {
    throw new GraphDefinitionError(`Unknown node: ${id}`, { nodeId: id });
  }
  return node;
}

/**
 * Stable content hash of the descriptors, independent of input order.
 */
export function graphFingerprint(descriptors: NodeDescriptor[]): string {
  const canonical = [...descriptors]
    .sort((a, b) => a.id.localeCompare(b.id))
    .map((d) => [
      d.id,
      d.kind ?? null,
      d.filePath ?? null,
      d.startByte,
      d.endByte,
      d.parentId ?? null,
      d.dependsOn ?? [],
      d.text ?? null,
    ]);
  return createHash('sha256').update(JSON.stringify(canonical)).digest('hex').slice(0, 16);
}

// Private helpers

function validateDescriptors(descriptors: NodeDescriptor[]): void {
  const byId = new Map<NodeId, NodeDescriptor>();

  for (const descriptor of descriptors) {
    if (!descriptor.id) {
      throw new GraphDefinitionError('Node descriptor missing id');
    }
    if (byId.has(descriptor.id)) {
      throw new GraphDefinitionError(`Duplicate node id: ${descriptor.id}`, { nodeId: descriptor.id });
    }
    if (
      !Number.isInteger(descriptor.startByte) ||
      !Number.isInteger(descriptor.endByte) ||
      descriptor.startByte < 0 ||
      descriptor.endByte < descriptor.startByte
    ) {
      throw new GraphDefinitionError(
        `Invalid byte range for ${descriptor.id}: [${descriptor.startByte}, ${descriptor.endByte})`,
        { nodeId: descriptor.id }
      );
    }
    byId.set(descriptor.id, descriptor);
  }

  for (const descriptor of descriptors) {
    if (descriptor.parentId !== undefined) {
      const parent = byId.get(descriptor.parentId);
      if (!parent) {
        throw new GraphDefinitionError(
          `Node ${descriptor.id} references unknown parent: ${descriptor.parentId}`,
          { nodeId: descriptor.id }
        );
      }
      if (parent.id === descriptor.id) {
        throw new CycleError([descriptor.id, descriptor.id]);
      }
      if ((parent.filePath ?? '') !== (descriptor.filePath ?? '')) {
        throw new GraphDefinitionError(
          `Node ${descriptor.id} lives in a different file than its parent ${parent.id}`,
          { nodeId: descriptor.id }
        );
      }
      if (descriptor.startByte < parent.startByte || descriptor.endByte > parent.endByte) {
        throw new GraphDefinitionError(
          `Node ${descriptor.id} span [${descriptor.startByte}, ${descriptor.endByte}) is outside its parent ` +
            `${parent.id} [${parent.startByte}, ${parent.endByte})`,
          { nodeId: descriptor.id }
        );
      }
    }

    for (const dependency of descriptor.dependsOn ?? []) {
      if (!byId.has(dependency)) {
        throw new GraphDefinitionError(
          `Node ${descriptor.id} depends on unknown node: ${dependency}`,
          { nodeId: descriptor.id }
        );
      }
    }
  }
}

function addEdge(nodes: Map<NodeId, AgentNode>, from: NodeId, to: NodeId): void {
  const source = requireNode(nodes, from);
  const target = requireNode(nodes, to);
  if (!target.upstream.includes(from)) target.upstream.push(from);
  if (!source.downstream.includes(to)) source.downstream.push(to);
}

const WHITE = 0;
const GRAY = 1;
const BLACK = 2;

/**
 * Depth-first three-colour walk over upstream edges. A GRAY node reached
 * again closes a cycle; the reported path runs in dependency order.
 */
function detectCycles(nodes: Map<NodeId, AgentNode>): void {
  const colour = new Map<NodeId, number>();
  const path: NodeId[] = [];

  const visit = (id: NodeId): void => {
    colour.set(id, GRAY);
    path.push(id);

    for (const upstreamId of requireNode(nodes, id).upstream) {
      const state = colour.get(upstreamId) ?? WHITE;
      if (state === GRAY) {
        const cycle = path.slice(path.indexOf(upstreamId));
        cycle.push(upstreamId);
        throw new CycleError(cycle.reverse());
      }
      if (state === WHITE) {
        visit(upstreamId);
      }
    }

    path.pop();
    colour.set(id, BLACK);
  };

  for (const id of nodes.keys()) {
    if ((colour.get(id) ?? WHITE) === WHITE) {
      visit(id);
    }
  }
}

/**
 * Kahn's algorithm; a node's level is one more than its deepest upstream.
 */
function buildTopology(nodes: Map<NodeId, AgentNode>): GraphTopology {
  const inDegree = new Map<NodeId, number>();
  const levels = new Map<NodeId, number>();
  const queue: NodeId[] = [];
  const roots: NodeId[] = [];

  for (const node of nodes.values()) {
    inDegree.set(node.id, node.upstream.length);
    if (node.upstream.length === 0) {
      queue.push(node.id);
      roots.push(node.id);
      levels.set(node.id, 0);
    }
  }

  const sorted: NodeId[] = [];
  for (let head = 0; head < queue.length; head++) {
    const id = queue[head];
    sorted.push(id);

    for (const downstreamId of requireNode(nodes, id).downstream) {
      const level = Math.max(levels.get(downstreamId) ?? 0, (levels.get(id) ?? 0) + 1);
      levels.set(downstreamId, level);

      const remaining = (inDegree.get(downstreamId) ?? 0) - 1;
      inDegree.set(downstreamId, remaining);
      if (remaining === 0) {
        queue.push(downstreamId);
      }
    }
  }

  if (sorted.length !== nodes.size) {
    throw new GraphDefinitionError('Graph contains cycles');
  }

  const leaves = sorted.filter((id) => requireNode(nodes, id).downstream.length === 0);

  return { sorted, levels, roots, leaves };
}
