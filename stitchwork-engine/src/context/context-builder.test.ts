import { describe, it, expect } from 'vitest';
import { EventBus } from '../events/event-bus.js';
import type { ResultSummary } from '../types/index.js';
import { ContextBuilder, briefSummary } from './context-builder.js';

const summary = (overrides: Partial<ResultSummary>): ResultSummary => ({
  nodeId: 'n1',
  status: 'succeeded',
  patches: [],
  artifacts: [],
  writes: [],
  attempts: 1,
  durationMs: 1,
  ...overrides,
});

describe('briefSummary', () => {
  it('describes each outcome on one line', () => {
    expect(briefSummary(summary({}))).toBe('succeeded: no changes');
    expect(
      briefSummary(
        summary({
          patches: [
            { start: 0, end: 1, content: 'a', nodeId: 'n1' },
            { start: 2, end: 3, content: 'b', nodeId: 'n1' },
          ],
          artifacts: [{ path: 'a.md', bytes: 1, sha256: 'x' }],
          message: 'Rewritten by shout',
        })
      )
    ).toBe('succeeded: 2 patches, 1 artifact (Rewritten by shout)');
    expect(
      briefSummary(
        summary({
          status: 'failed',
          error: { name: 'TimeoutError', code: 'TIMEOUT', message: 'too slow', retryable: false },
        })
      )
    ).toBe('failed: too slow');
    expect(briefSummary(summary({ status: 'skipped', message: 'Upstream node x failed' }))).toBe(
      'skipped: Upstream node x failed'
    );
  });
});

describe('ContextBuilder', () => {
  it('keeps a rolling window of recent actions', () => {
    const builder = new ContextBuilder({ windowSize: 2 });
    for (const action of ['one', 'two', 'three']) {
      builder.recordAction({ action, outcome: 'success', summary: 'ok', timestamp: '2026-01-01T00:00:00.000Z' });
    }

    expect(builder.getRecentActions().map((action) => action.action)).toEqual(['two', 'three']);
  });

  it('renders recent actions and knowledge for related nodes', () => {
    const builder = new ContextBuilder({ renderLimit: 1 });
    builder.recordAction({ action: 'lint', outcome: 'success', summary: 'clean', timestamp: 't1' });
    builder.recordAction({ nodeId: 'b', action: 'shout', outcome: 'error', summary: 'model offline', timestamp: 't2' });
    builder.ingestSummary(summary({ nodeId: 'a' }));
    builder.ingestSummary(summary({ nodeId: 'b', status: 'skipped' }));

    expect(builder.render(['a'])).toBe(
      ['## Recent Actions', '- ✗ shout (b): model offline', '', '## Knowledge', '- a: succeeded: no changes'].join('\n')
    );
    expect(builder.render()).toContain('- b: skipped');
  });

  it('follows a bus until detached', () => {
    const bus = new EventBus();
    const builder = new ContextBuilder();
    const detach = builder.attach(bus);

    bus.emit('agent:action', { action: 'shout', outcome: 'success', summary: 'generated 3 bytes' }, { nodeId: 'a' });
    bus.emit('node:complete', { status: 'succeeded', summary: summary({ nodeId: 'a' }) }, { nodeId: 'a' });
    detach();
    bus.emit('agent:action', { action: 'late', outcome: 'success', summary: 'ignored' });

    expect(builder.getRecentActions().map((action) => action.action)).toEqual(['shout']);
    expect(builder.getKnowledge()).toEqual(new Map([['a', 'succeeded: no changes']]));

    builder.clear();
    expect(builder.render()).toBe('## Recent Actions');
  });
});
