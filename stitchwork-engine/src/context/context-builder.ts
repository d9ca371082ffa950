/**
 * Context Builder
 *
 * Two-track memory fed from the event stream: a rolling window of recent
 * agent actions, and one line of accumulated knowledge per finished node.
 * Agents render it into their prompts.
 */

import type { EventBus } from '../events/event-bus.js';
import { isEventType, type EngineEvent, type NodeId, type ResultSummary } from '../types/index.js';

export interface RecentAction {
  nodeId?: NodeId;
  action: string;
  outcome: 'success' | 'error';
  summary: string;
  timestamp: string;
}

export interface ContextBuilderOptions {
  /** Recent actions kept in the rolling window */
  windowSize?: number;
  /** Recent actions shown when rendering */
  renderLimit?: number;
}

/**
 * One-line description of a node result.
 */
export function briefSummary(summary: ResultSummary): string {
  if (summary.status === 'failed') {
    return `failed: ${summary.error?.message ?? summary.message ?? 'unknown error'}`;
  }
  if (summary.status === 'skipped') {
    return `skipped${summary.message ? `: ${summary.message}` : ''}`;
  }

  const parts: string[] = [];
  if (summary.patches.length > 0) {
    parts.push(`${summary.patches.length} ${summary.patches.length === 1 ? 'patch' : 'patches'}`);
  }
  if (summary.artifacts.length > 0) {
    parts.push(`${summary.artifacts.length} ${summary.artifacts.length === 1 ? 'artifact' : 'artifacts'}`);
  }
  const detail = parts.length > 0 ? parts.join(', ') : 'no changes';
  return summary.message ? `${summary.status}: ${detail} (${truncate(summary.message, 80)})` : `${summary.status}: ${detail}`;
}

export class ContextBuilder {
  private recent: RecentAction[] = [];
  private knowledge = new Map<NodeId, string>();
  private windowSize: number;
  private renderLimit: number;

  constructor(options: ContextBuilderOptions = {}) {
    this.windowSize = Math.max(1, options.windowSize ?? 20);
    this.renderLimit = Math.max(1, options.renderLimit ?? 10);
  }

  /**
   * Follow a bus; returns the function that stops following it.
   */
  attach(bus: EventBus): () => void {
    return bus.listen(['agent:action', 'node:complete'], (event) => this.handle(event));
  }

  handle(event: EngineEvent<'agent:action' | 'node:complete'>): void {
    if (isEventType(event, 'agent:action')) {
      this.recordAction({
        nodeId: event.nodeId,
        action: event.payload.action,
        outcome: event.payload.outcome,
        summary: truncate(event.payload.summary, 100),
        timestamp: event.timestamp,
      });
    } else if (isEventType(event, 'node:complete')) {
      this.ingestSummary(event.payload.summary);
    }
  }

  recordAction(action: RecentAction): void {
    this.recent.push(action);
    if (this.recent.length > this.windowSize) {
      this.recent.splice(0, this.recent.length - this.windowSize);
    }
  }

  ingestSummary(summary: ResultSummary): void {
    this.knowledge.set(summary.nodeId, briefSummary(summary));
  }

  getRecentActions(): RecentAction[] {
    return [...this.recent];
  }

  getKnowledge(): Map<NodeId, string> {
    return new Map(this.knowledge);
  }

  /**
   * Prompt section with the latest actions and, for the given upstream ids
   * (all known nodes when omitted), what is known about them.
   */
  render(relatedIds?: readonly NodeId[]): string {
    const lines = ['## Recent Actions'];
    for (const action of this.recent.slice(-this.renderLimit)) {
      const mark = action.outcome === 'success' ? '✓' : '✗';
      lines.push(`- ${mark} ${action.action}${action.nodeId ? ` (${action.nodeId})` : ''}: ${action.summary}`);
    }

    const ids = relatedIds ?? Array.from(this.knowledge.keys());
    const known = ids.flatMap((id) => {
      const line = this.knowledge.get(id);
      return line === undefined ? [] : [`- ${id}: ${line}`];
    });
    if (known.length > 0) {
      lines.push('', '## Knowledge', ...known);
    }

    return lines.join('\n');
  }

  clear(): void {
    this.recent = [];
    this.knowledge.clear();
  }
}

function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength - 3)}...` : text;
}
