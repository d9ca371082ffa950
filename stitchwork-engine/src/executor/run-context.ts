/**
 * Run Context
 *
 * Everything one run shares: its id, graph, event bus, workspace manager and
 * logger. Created by the executor when a run starts and torn down when it
 * ends, so concurrent runs never see each other's events.
 */

import type { EventBus, EmitOptions } from '../events/event-bus.js';
import type { Logger } from '../logger.js';
import type { AgentGraph, EngineEvent, EventPayloads, EventType, NodeId } from '../types/index.js';
import type { WorkspaceManager } from '../workspace/workspace-manager.js';

export interface RunContextInit {
  runId: string;
  graph: AgentGraph;
  baseRef: string;
  bus: EventBus;
  /** False when the caller supplied the bus and keeps it after the run */
  ownsBus: boolean;
  workspaces: WorkspaceManager;
  logger: Logger;
  signal: AbortSignal;
}

export class RunContext {
  readonly runId: string;
  readonly graph: AgentGraph;
  readonly baseRef: string;
  readonly bus: EventBus;
  readonly workspaces: WorkspaceManager;
  readonly logger: Logger;
  /** Aborted when the run is cancelled */
  readonly signal: AbortSignal;
  private ownsBus: boolean;
  private nodeWorkspaces = new Map<NodeId, string>();
  private closed = false;

  constructor(init: RunContextInit) {
    this.runId = init.runId;
    this.graph = init.graph;
    this.baseRef = init.baseRef;
    this.bus = init.bus;
    this.ownsBus = init.ownsBus;
    this.workspaces = init.workspaces;
    this.logger = init.logger;
    this.signal = init.signal;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  emit<K extends EventType>(type: K, payload: EventPayloads[K], nodeId?: NodeId): EngineEvent<K> {
    const options: EmitOptions = { runId: this.runId, nodeId };
    return this.bus.emit(type, payload, options);
  }

  /**
   * Remember the workspace that holds a node's accepted result.
   */
  keepWorkspace(nodeId: NodeId, workspaceId: string): void {
    this.nodeWorkspaces.set(nodeId, workspaceId);
    this.workspaces.retain(workspaceId);
  }

  workspaceOf(nodeId: NodeId): string | undefined {
    return this.nodeWorkspaces.get(nodeId);
  }

  keptWorkspaces(): string[] {
    return Array.from(this.nodeWorkspaces.values());
  }

  /**
   * End the run. Kept workspaces either stay retained or go back under the
   * TTL reaper; an owned bus is closed.
   */
  close(options: { retainWorkspaces: boolean }): void {
    if (this.closed) return;
    this.closed = true;

    if (!options.retainWorkspaces) {
      for (const workspaceId of this.nodeWorkspaces.values()) {
        if (this.workspaces.get(workspaceId)) {
          this.workspaces.retain(workspaceId, false);
        }
      }
    }

    if (this.ownsBus) {
      this.bus.close();
    }
    this.logger.debug(`Run ${this.runId} closed`);
  }
}
