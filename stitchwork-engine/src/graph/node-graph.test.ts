import { describe, it, expect } from 'vitest';
import { CycleError, GraphDefinitionError } from '../errors.js';
import type { NodeDescriptor } from '../types/index.js';
import {
  buildGraph,
  downstreamClosure,
  executionBatches,
  graphFingerprint,
  readySet,
  topologicalSort,
} from './node-graph.js';

const span = (id: string, startByte: number, endByte: number, extra: Partial<NodeDescriptor> = {}): NodeDescriptor => ({
  id,
  filePath: 'src/app.ts',
  startByte,
  endByte,
  ...extra,
});

describe('buildGraph', () => {
  it('makes children upstream of their parent', () => {
    const graph = buildGraph([
      span('file', 0, 100),
      span('classA', 0, 40, { parentId: 'file' }),
      span('classB', 50, 90, { parentId: 'file' }),
    ]);

    expect(graph.nodes.get('file')?.upstream).toEqual(['classA', 'classB']);
    expect(graph.nodes.get('file')?.children).toEqual(['classA', 'classB']);
    expect(graph.nodes.get('classA')?.downstream).toEqual(['file']);
    expect(graph.topology.roots).toEqual(['classA', 'classB']);
    expect(graph.topology.leaves).toEqual(['file']);
  });

  it('chains siblings by start offset in sequential mode', () => {
    const graph = buildGraph(
      [span('second', 50, 60), span('first', 0, 10), span('third', 70, 80)],
      { siblingOrder: 'sequential' }
    );

    expect(topologicalSort(graph).map((node) => node.id)).toEqual(['first', 'second', 'third']);
    expect(graph.nodes.get('third')?.upstream).toEqual(['second']);
  });

  it('adds explicit dependsOn edges', () => {
    const graph = buildGraph([
      { id: 'A', startByte: 0, endByte: 0 },
      { id: 'B', startByte: 0, endByte: 0, dependsOn: ['A'] },
      { id: 'C', startByte: 0, endByte: 0, dependsOn: ['B'] },
    ]);

    expect(executionBatches(graph)).toEqual([['A'], ['B'], ['C']]);
    expect(graph.topology.levels.get('C')).toBe(2);
  });

  it('reports the cycle path in dependency order', () => {
    const build = () =>
      buildGraph([
        { id: 'A', startByte: 0, endByte: 0, dependsOn: ['C'] },
        { id: 'B', startByte: 0, endByte: 0, dependsOn: ['A'] },
        { id: 'C', startByte: 0, endByte: 0, dependsOn: ['B'] },
      ]);

    expect(build).toThrow(CycleError);
    try {
      build();
    } catch (err) {
      expect(err).toBeInstanceOf(CycleError);
      if (err instanceof CycleError) {
        expect(err.cycle).toEqual(['A', 'B', 'C', 'A']);
        expect(err.code).toBe('CYCLE');
      }
    }
  });

  it('rejects inconsistent descriptors', () => {
    expect(() => buildGraph([span('a', 0, 5), span('a', 5, 9)])).toThrow(GraphDefinitionError);
    expect(() => buildGraph([span('a', 9, 5)])).toThrow(/Invalid byte range/);
    expect(() => buildGraph([span('a', 0, 5, { parentId: 'ghost' })])).toThrow(/unknown parent/);
    expect(() => buildGraph([span('p', 0, 10), span('c', 5, 20, { parentId: 'p' })])).toThrow(/outside its parent/);
    expect(() => buildGraph([span('a', 0, 5, { dependsOn: ['ghost'] })])).toThrow(/depends on unknown node/);
  });

  it('treats a node that is its own parent as a cycle', () => {
    expect(() => buildGraph([span('a', 0, 5, { parentId: 'a' })])).toThrow(CycleError);
  });
});

describe('readySet', () => {
  const graph = buildGraph([
    { id: 'A', startByte: 0, endByte: 0 },
    { id: 'B', startByte: 0, endByte: 0, dependsOn: ['A'] },
    { id: 'C', startByte: 0, endByte: 0, dependsOn: ['A'], priority: 5 },
    { id: 'D', startByte: 0, endByte: 0, dependsOn: ['B', 'C'] },
  ]);

  it('returns nodes whose upstream is complete, highest priority first', () => {
    expect(readySet(graph, new Set())).toEqual(['A']);
    expect(readySet(graph, new Set(['A']))).toEqual(['C', 'B']);
    expect(readySet(graph, new Set(['A', 'B']))).toEqual(['C']);
    expect(readySet(graph, new Set(['A', 'B', 'C']))).toEqual(['D']);
  });

  it('excludes nodes that are already scheduled', () => {
    expect(readySet(graph, new Set(['A']), new Set(['A', 'C']))).toEqual(['B']);
  });

  it('is pure', () => {
    const completed = new Set(['A']);
    readySet(graph, completed);
    expect(readySet(graph, completed)).toEqual(readySet(graph, completed));
    expect(Array.from(completed)).toEqual(['A']);
  });
});

describe('graph helpers', () => {
  it('computes the transitive downstream closure', () => {
    const graph = buildGraph([
      { id: 'A', startByte: 0, endByte: 0 },
      { id: 'B', startByte: 0, endByte: 0, dependsOn: ['A'] },
      { id: 'C', startByte: 0, endByte: 0, dependsOn: ['B'] },
      { id: 'X', startByte: 0, endByte: 0 },
    ]);

    expect(downstreamClosure(graph, 'A')).toEqual(['B', 'C']);
    expect(downstreamClosure(graph, 'X')).toEqual([]);
  });

  it('fingerprints descriptors independently of their order', () => {
    const a = span('a', 0, 5);
    const b = span('b', 6, 9);
    expect(graphFingerprint([a, b])).toBe(graphFingerprint([b, a]));
    expect(graphFingerprint([a, b])).not.toBe(graphFingerprint([a, { ...b, endByte: 10 }]));
    expect(buildGraph([a, b]).id).toHaveLength(16);
  });
});
