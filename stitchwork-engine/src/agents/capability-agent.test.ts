import { describe, it, expect, vi } from 'vitest';
import { ContextBuilder } from '../context/context-builder.js';
import { EventBus } from '../events/event-bus.js';
import { GraphExecutor } from '../executor/graph-executor.js';
import { buildGraph } from '../graph/node-graph.js';
import { isEventType, type NodeContext, type NodeDescriptor } from '../types/index.js';
import { WorkspaceManager } from '../workspace/workspace-manager.js';
import type { Capabilities } from './capabilities.js';
import { createCapabilityAgent, type CapabilityAgentOptions } from './capability-agent.js';

function fakeCapabilities(overrides: Partial<Capabilities> = {}): Capabilities {
  return {
    relevance: vi.fn(async (intent: string) => (intent.includes('docs') ? 'Yes.' : 'no')),
    generate: vi.fn(async (intent: string, context: NodeContext) => {
      if (intent.startsWith('upper')) return '```\n' + context.text.toUpperCase() + '\n```';
      if (intent.startsWith('wrap')) return `[${context.text}]`;
      return `${intent}: ${context.text}`;
    }),
    ...overrides,
  };
}

async function runAgent(
  options: CapabilityAgentOptions,
  descriptors: NodeDescriptor[] = [{ id: 'N', startByte: 0, endByte: 0, text: 'alpha' }]
) {
  const workspaces = new WorkspaceManager();
  const base = workspaces.registerBase({ 'README.md': 'readme' });
  const executor = new GraphExecutor(
    { workspaces, agent: createCapabilityAgent(options) },
    { maxConcurrency: 1, nodeTimeoutMs: 1000, nodeRetries: 0, checkpointEvery: 0 }
  );
  const bus = new EventBus();
  const events = bus.subscribe();
  options.memory?.attach(bus);
  const report = await executor.run(buildGraph(descriptors), { baseRef: base.ref, bus });
  return { report, workspaces, events: events.drain() };
}

describe('createCapabilityAgent', () => {
  it('chains relevant patch profiles over the span', async () => {
    const capabilities = fakeCapabilities();
    const { report, events } = await runAgent({
      capabilities,
      output: 'patch',
      profiles: [
        { name: 'shout', intent: 'upper docs' },
        { name: 'ignored', intent: 'lint' },
        { name: 'wrap', intent: 'wrap docs' },
      ],
    });

    expect(report.summaries[0]).toMatchObject({
      status: 'succeeded',
      spanText: '[ALPHA]',
      message: 'Rewritten by shout, wrap',
      patches: [{ start: 0, end: 5, content: '[ALPHA]', nodeId: 'N' }],
    });
    expect(capabilities.relevance).toHaveBeenCalledTimes(3);
    expect(capabilities.generate).toHaveBeenCalledTimes(2);
    expect(events.flatMap((event) => (isEventType(event, 'agent:action') ? [event.payload] : []))).toEqual([
      { action: 'shout', outcome: 'success', summary: 'generated 5 bytes' },
      { action: 'wrap', outcome: 'success', summary: 'generated 7 bytes' },
    ]);
  });

  it('returns a noop when no profile applies', async () => {
    const capabilities = fakeCapabilities();
    const { report } = await runAgent({
      capabilities,
      output: 'patch',
      profiles: [{ name: 'lint', intent: 'lint' }],
    });

    expect(report.summaries[0]).toMatchObject({
      status: 'succeeded',
      spanText: 'alpha',
      message: 'No profile applies to this node',
      patches: [],
    });
    expect(capabilities.generate).not.toHaveBeenCalled();
  });

  it('returns a noop when generation leaves the span as it was', async () => {
    const { report } = await runAgent({
      capabilities: fakeCapabilities({ generate: vi.fn(async (_intent: string, context: NodeContext) => context.text) }),
      output: 'patch',
      profiles: [{ name: 'echo', intent: 'echo docs' }],
    });

    expect(report.summaries[0]).toMatchObject({ patches: [], message: 'echo left the span unchanged' });
  });

  it('writes one artifact per relevant profile', async () => {
    const { report, workspaces } = await runAgent({
      capabilities: fakeCapabilities(),
      output: 'artifact',
      profiles: [
        { name: 'summary', intent: 'summarize docs' },
        { name: 'notes', intent: 'notes docs', artifactPath: (node) => `notes/${node.id}.md` },
      ],
    });

    const summary = report.summaries[0];
    expect(summary.message).toBe('Artifacts from summary, notes');
    expect(summary.artifacts.map((artifact) => [artifact.path, artifact.bytes])).toEqual([
      ['.stitchwork/artifacts/N/summary.md', 21],
      ['notes/N.md', 17],
    ]);
    expect(workspaces.read(summary.workspaceId ?? '', 'notes/N.md')?.toString()).toBe('notes docs: alpha');
  });

  it('fails the node on an unparseable relevance answer', async () => {
    const { report } = await runAgent({
      capabilities: fakeCapabilities({ relevance: vi.fn(async () => 'maybe') }),
      output: 'patch',
      profiles: [{ name: 'shout', intent: 'upper docs' }],
    });

    expect(report.summaries[0].error).toMatchObject({
      code: 'CAPABILITY',
      message: 'Unparseable relevance answer: "maybe"',
      retryable: true,
    });
  });

  it('reports a failed generation as an error action', async () => {
    const { report, events } = await runAgent({
      capabilities: fakeCapabilities({
        generate: vi.fn(async () => {
          throw new Error('model offline');
        }),
      }),
      output: 'patch',
      profiles: [{ name: 'shout', intent: 'upper docs' }],
    });

    expect(report.summaries[0].error?.message).toBe('generate call failed: model offline');
    expect(events.flatMap((event) => (isEventType(event, 'agent:action') ? [event.payload] : []))).toEqual([
      { action: 'shout', outcome: 'error', summary: 'generate call failed: model offline' },
    ]);
  });

  it('bounds each capability call by its own deadline', async () => {
    const { report } = await runAgent({
      capabilities: fakeCapabilities({ relevance: vi.fn(() => new Promise<boolean>(() => undefined)) }),
      output: 'patch',
      profiles: [{ name: 'shout', intent: 'upper docs' }],
      callTimeoutMs: 10,
    });

    expect(report.summaries[0].error).toMatchObject({ code: 'TIMEOUT', message: 'relevance call exceeded 10ms' });
  });

  it('adds upstream knowledge and recent actions to the context', async () => {
    const memories = new Map<string, string | undefined>();
    const capabilities = fakeCapabilities({
      relevance: vi.fn(async (_intent: string, context: NodeContext) => {
        memories.set(context.node.id, context.memory);
        return true;
      }),
    });

    await runAgent(
      {
        capabilities,
        output: 'patch',
        profiles: [{ name: 'shout', intent: 'upper' }],
        memory: new ContextBuilder(),
      },
      [
        { id: 'A', startByte: 0, endByte: 0, text: 'a' },
        { id: 'B', startByte: 0, endByte: 0, text: 'b', dependsOn: ['A'] },
      ]
    );

    expect(memories.get('A')).toBe('## Recent Actions');
    expect(memories.get('B')).toBe(
      ['## Recent Actions', '- ✓ shout (A): generated 1 bytes', '', '## Knowledge', '- A: succeeded: 1 patch (Rewritten by shout)'].join('\n')
    );
  });
});
