/**
 * Event Types
 *
 * Payload shapes for every event the engine emits, keyed by event type.
 */

import type { SerializedError } from '../errors.js';
import type { NodeId, NodeStatus } from './graph.js';
import type { DocumentResult, ResultSummary, RunStatus } from './execution.js';

export interface EventPayloads {
  'graph:start': { graphId: string; nodeCount: number; restored: number };
  'graph:complete': {
    graphId: string;
    status: RunStatus;
    summaries: ResultSummary[];
    documents: DocumentResult[];
  };
  'node:ready': Record<string, never>;
  'node:start': { attempt: number; workspaceId: string };
  'node:retry': { attempt: number; error: SerializedError };
  'node:complete': { status: NodeStatus; summary: ResultSummary };
  'stitch:applied': { target: string; patchCount: number };
  'stitch:rejected': { target: string; error: SerializedError };
  'checkpoint:saved': { checkpointId: string; completed: number; pending: number };
  'agent:action': { action: string; outcome: 'success' | 'error'; summary: string };
  'human:input:request': { requestId: string; question: string; options?: string[] };
  'human:input:response': { requestId: string; response: string };
}

export type EventType = keyof EventPayloads;

export interface EngineEvent<K extends EventType = EventType> {
  readonly seq: number;
  readonly type: K;
  readonly payload: EventPayloads[K];
  readonly runId?: string;
  readonly nodeId?: NodeId;
  readonly timestamp: string;
}

/**
 * Narrow an event to one type so its payload is typed precisely.
 */
export function isEventType<K extends EventType>(event: EngineEvent, type: K): event is EngineEvent<K> {
  return event.type === type;
}
