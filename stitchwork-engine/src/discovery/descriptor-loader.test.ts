import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect } from 'vitest';
import { GraphDefinitionError } from '../errors.js';
import { formatForPath, loadDescriptorManifest, parseDescriptorManifest } from './descriptor-loader.js';

describe('parseDescriptorManifest', () => {
  it('reads a JSON manifest with options', () => {
    const manifest = parseDescriptorManifest(
      JSON.stringify({
        siblingOrder: 'sequential',
        nodes: [{ id: 'file', filePath: 'src/a.ts', startByte: 0, endByte: 10 }],
      }),
      'json'
    );

    expect(manifest.options).toEqual({ siblingOrder: 'sequential' });
    expect(manifest.descriptors).toEqual([{ id: 'file', filePath: 'src/a.ts', startByte: 0, endByte: 10 }]);
  });

  it('accepts a bare YAML list', () => {
    const manifest = parseDescriptorManifest(
      [
        '- id: file',
        '  filePath: src/a.ts',
        '  startByte: 0',
        '  endByte: 10',
        '- id: fn',
        '  filePath: src/a.ts',
        '  startByte: 2',
        '  endByte: 8',
        '  parentId: file',
        '  errorPolicy: continue',
      ].join('\n'),
      'yaml'
    );

    expect(manifest.options).toEqual({});
    expect(manifest.descriptors[1]).toEqual({
      id: 'fn',
      filePath: 'src/a.ts',
      startByte: 2,
      endByte: 8,
      parentId: 'file',
      errorPolicy: 'continue',
    });
  });

  it('names the offending field', () => {
    expect(() =>
      parseDescriptorManifest(JSON.stringify({ nodes: [{ id: 'x', startByte: 5, endByte: 2 }] }), 'json')
    ).toThrow('Invalid descriptor manifest: nodes.0.endByte: endByte must not be before startByte');
    const unknownPolicy = JSON.stringify({ nodes: [{ id: 'x', startByte: 0, endByte: 1, errorPolicy: 'retry' }] });
    expect(() => parseDescriptorManifest(unknownPolicy, 'json')).toThrow(GraphDefinitionError);
  });

  it('rejects text that does not parse', () => {
    expect(() => parseDescriptorManifest('{ nodes: ', 'json')).toThrow(/^Descriptor manifest is not valid JSON/);
  });
});

describe('loadDescriptorManifest', () => {
  it('picks the format from the extension', async () => {
    expect(formatForPath('graph.YML')).toBe('yaml');
    expect(formatForPath('graph.json')).toBe('json');

    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'stitchwork-manifest-'));
    try {
      const file = path.join(dir, 'graph.yaml');
      await fs.writeFile(file, 'nodes:\n  - id: only\n    startByte: 0\n    endByte: 0\n    text: hi\n');

      const manifest = await loadDescriptorManifest(file);

      expect(manifest.descriptors).toEqual([{ id: 'only', startByte: 0, endByte: 0, text: 'hi' }]);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
