import { describe, it, expect } from 'vitest';
import { CancelledError, TimeoutError } from '../errors.js';
import { EventBus } from '../events/event-bus.js';
import { RunContext } from '../executor/run-context.js';
import { buildGraph } from '../graph/node-graph.js';
import { silentLogger } from '../logger.js';
import { WorkspaceManager } from '../workspace/workspace-manager.js';
import { requestHumanInput, respondToHumanInput } from './human-input.js';

function runContext(bus = new EventBus()): RunContext {
  return new RunContext({
    runId: 'run-1',
    graph: buildGraph([]),
    baseRef: 'base',
    bus,
    ownsBus: true,
    workspaces: new WorkspaceManager(),
    logger: silentLogger,
    signal: new AbortController().signal,
  });
}

describe('requestHumanInput', () => {
  it('resolves with the matching response', async () => {
    const bus = new EventBus();
    const questions: Array<{ question: string; options?: string[] }> = [];
    bus.listen(['human:input:request'], (event) => {
      questions.push({ question: event.payload.question, options: event.payload.options });
      respondToHumanInput(bus, 'someone-else', 'reject');
      respondToHumanInput(bus, event.payload.requestId, 'approve');
    });

    const answer = await requestHumanInput(runContext(bus), 'n1', 'Apply the rewrite?', {
      options: ['approve', 'reject'],
    });

    expect(answer).toBe('approve');
    expect(questions).toEqual([{ question: 'Apply the rewrite?', options: ['approve', 'reject'] }]);
  });

  it('times out when nobody answers', async () => {
    await expect(requestHumanInput(runContext(), 'n1', 'Anyone?', { timeoutMs: 10 })).rejects.toBeInstanceOf(
      TimeoutError
    );
  });

  it('refuses to ask once the run has ended', async () => {
    const run = runContext();
    run.close({ retainWorkspaces: false });

    await expect(requestHumanInput(run, 'n1', 'Still there?')).rejects.toBeInstanceOf(CancelledError);
  });
});
