import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { WorkspaceError } from '../errors.js';
import type { CommitStrategy } from './types.js';
import { WorkspaceManager } from './workspace-manager.js';

function reasonOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof WorkspaceError ? err.reason : undefined;
  }
  return undefined;
}

describe('WorkspaceManager', () => {
  const files = { 'src/a.ts': 'A', 'README.md': 'r' };

  afterEach(() => {
    vi.useRealTimers();
  });

  it('deduplicates identical base layers', () => {
    const manager = new WorkspaceManager();
    const base = manager.registerBase(files);
    expect(base.ref).toMatch(/^[0-9a-f]{64}$/);
    expect(manager.registerBase({ 'README.md': 'r', './src/a.ts': 'A' }).ref).toBe(base.ref);
    expect(manager.getStats().bases).toBe(1);
    expect(Array.from(base.files.keys())).toEqual(['README.md', 'src/a.ts']);
  });

  it('keeps sibling overlays isolated', () => {
    const manager = new WorkspaceManager();
    const base = manager.registerBase(files);
    const first = manager.create(base.ref, { nodeId: 'first' });
    const second = manager.create(base.ref, { nodeId: 'second' });

    manager.write(first.id, 'src/a.ts', 'A1');
    manager.write(second.id, 'src/b.ts', 'B');

    expect(manager.read(first.id, 'src/a.ts')?.toString()).toBe('A1');
    expect(manager.read(second.id, 'src/a.ts')?.toString()).toBe('A');
    expect(manager.read(first.id, 'src/b.ts')).toBeUndefined();
    expect(base.files.get('src/a.ts')?.toString()).toBe('A');
  });

  it('keeps the base layer intact when a returned copy is changed', () => {
    const manager = new WorkspaceManager();
    const base = manager.registerBase({ 'a.txt': 'hello' });
    const workspace = manager.create(base.ref);

    const copy = manager.getBase(base.ref);
    const content = copy?.files.get('a.txt');
    if (content) content[0] = 0x4a;
    base.files.get('a.txt')?.fill(0x5a);

    expect(content?.toString()).toBe('Jello');
    expect(manager.read(workspace.id, 'a.txt')?.toString()).toBe('hello');
    expect(manager.readBase(base.ref, 'a.txt')?.toString()).toBe('hello');
    expect(manager.getBase(base.ref)?.files.get('a.txt')?.toString()).toBe('hello');
  });

  it('reads single base files by ref', () => {
    const manager = new WorkspaceManager();
    const base = manager.registerBase(files);

    expect(manager.hasBase(base.ref)).toBe(true);
    expect(manager.readBase(base.ref, './src/a.ts')?.toString()).toBe('A');
    expect(manager.readBase(base.ref, 'missing.ts')).toBeUndefined();
    expect(manager.readBase(base.ref, '../escape.ts')).toBeUndefined();
    expect(manager.readBase('unknown', 'src/a.ts')).toBeUndefined();
  });

  it('hides deleted base files behind a whiteout', () => {
    const manager = new WorkspaceManager();
    const base = manager.registerBase(files);
    const workspace = manager.create(base.ref);

    manager.write(workspace.id, 'src/a.ts', 'A1');
    manager.delete(workspace.id, 'README.md');
    manager.write(workspace.id, 'src/tmp.ts', 'T');
    manager.delete(workspace.id, 'src/tmp.ts');

    expect(manager.read(workspace.id, 'README.md')).toBeUndefined();
    expect(manager.list(workspace.id)).toEqual([{ path: 'src/a.ts', source: 'overlay', bytes: 2 }]);
    expect(manager.diff(workspace.id)).toEqual([
      { path: 'README.md', kind: 'delete' },
      { path: 'src/a.ts', kind: 'write', bytes: 2 },
    ]);
  });

  it('lists a directory as the union of base and overlay', () => {
    const manager = new WorkspaceManager();
    const base = manager.registerBase(files);
    const workspace = manager.create(base.ref);
    manager.write(workspace.id, 'src/b.ts', 'BB');

    expect(manager.list(workspace.id, 'src')).toEqual([
      { path: 'src/a.ts', source: 'base', bytes: 1 },
      { path: 'src/b.ts', source: 'overlay', bytes: 2 },
    ]);
    expect(reasonOf(() => manager.list(workspace.id, '../outside'))).toBe('INVALID_PATH');
  });

  it('refuses unknown bases and invalid paths', () => {
    const manager = new WorkspaceManager();
    const base = manager.registerBase(files);
    const workspace = manager.create(base.ref);

    expect(reasonOf(() => manager.create('missing'))).toBe('BASE_NOT_FOUND');
    expect(reasonOf(() => manager.write(workspace.id, '../escape.ts', 'x'))).toBe('INVALID_PATH');
    expect(reasonOf(() => manager.write(workspace.id, '.git/HEAD', 'x'))).toBe('INVALID_PATH');
  });

  it('disposes a workspace once', () => {
    const manager = new WorkspaceManager();
    const base = manager.registerBase(files);
    const workspace = manager.create(base.ref);

    expect(manager.dispose(workspace.id)).toBe(true);
    expect(manager.dispose(workspace.id)).toBe(false);
    expect(reasonOf(() => manager.read(workspace.id, 'README.md'))).toBe('NOT_FOUND');
  });

  it('resets the overlay without disposing', () => {
    const manager = new WorkspaceManager();
    const base = manager.registerBase(files);
    const workspace = manager.create(base.ref);
    manager.write(workspace.id, 'src/a.ts', 'changed');

    manager.reset(workspace.id);

    expect(manager.diff(workspace.id)).toEqual([]);
    expect(manager.read(workspace.id, 'src/a.ts')?.toString()).toBe('A');
  });

  it('reaps expired workspaces that are not retained', () => {
    const manager = new WorkspaceManager();
    const base = manager.registerBase(files);
    const loose = manager.create(base.ref, { ttlMs: 1000 });
    const kept = manager.create(base.ref, { ttlMs: 1000, retain: true });
    const later = new Date(Date.now() + 5000);

    expect(manager.isExpired(loose.id, later)).toBe(true);
    expect(manager.cleanupExpired(later)).toBe(1);
    expect(manager.get(loose.id)).toBeUndefined();
    expect(manager.get(kept.id)?.state).toBe('active');
    expect(manager.getStats()).toEqual({ total: 1, retained: 1, bases: 1 });
  });

  it('refuses access to an expired workspace', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    const manager = new WorkspaceManager();
    const base = manager.registerBase(files);
    const workspace = manager.create(base.ref, { ttlMs: 10 });

    vi.setSystemTime(new Date('2026-01-01T00:00:01Z'));

    expect(reasonOf(() => manager.read(workspace.id, 'README.md'))).toBe('EXPIRED');
    manager.reopen(workspace.id);
    expect(manager.read(workspace.id, 'README.md')?.toString()).toBe('r');
  });

  it('refuses to commit without a strategy', async () => {
    const manager = new WorkspaceManager();
    const base = manager.registerBase(files);
    const workspace = manager.create(base.ref);
    manager.write(workspace.id, 'src/a.ts', 'A1');

    await expect(manager.commit(workspace.id)).rejects.toMatchObject({ reason: 'COMMIT_UNSUPPORTED' });
    expect(manager.read(workspace.id, 'src/a.ts')?.toString()).toBe('A1');
  });

  it('commits through a configured strategy', async () => {
    const strategy: CommitStrategy = {
      commit: vi.fn<CommitStrategy['commit']>(async ({ workspace, changes, read }) => ({
        workspaceId: workspace.id,
        baseRef: 'promoted',
        applied: changes.map((change) => `${change.path}=${read(change.path)?.toString() ?? ''}`),
      })),
    };
    const manager = new WorkspaceManager({ commitStrategy: strategy });
    const base = manager.registerBase(files);
    const workspace = manager.create(base.ref);
    manager.write(workspace.id, 'src/a.ts', 'A1');

    const result = await manager.commit(workspace.id);

    expect(result).toEqual({ workspaceId: workspace.id, baseRef: 'promoted', applied: ['src/a.ts=A1'] });
  });

  it('binds a handle to one workspace', () => {
    const manager = new WorkspaceManager();
    const base = manager.registerBase(files);
    const workspace = manager.create(base.ref);
    const handle = manager.handle(workspace.id);

    handle.write('notes/todo.md', 'x');

    expect(handle.id).toBe(workspace.id);
    expect(handle.readText('notes/todo.md')).toBe('x');
    expect(handle.exists('README.md')).toBe(true);
    expect(handle.exists('missing.md')).toBe(false);
    expect(handle.diff()).toEqual([{ path: 'notes/todo.md', kind: 'write', bytes: 1 }]);
  });

  it('restores snapshots into another manager under the same ids', () => {
    const manager = new WorkspaceManager();
    const base = manager.registerBase(files);
    const workspace = manager.create(base.ref, { nodeId: 'n1', runId: 'run-1' });
    manager.write(workspace.id, 'src/a.ts', 'A1');
    manager.delete(workspace.id, 'README.md');

    const snapshot = manager.snapshot([workspace.id]);
    expect(snapshot.workspaces[0].entries).toEqual([
      { path: 'README.md', kind: 'delete' },
      { path: 'src/a.ts', kind: 'write', content: Buffer.from('A1').toString('base64') },
    ]);

    const fresh = new WorkspaceManager();
    fresh.registerBase(files);
    const [restored] = fresh.restore(snapshot);

    expect(restored.id).toBe(workspace.id);
    expect(restored.retained).toBe(true);
    expect(restored.nodeId).toBe('n1');
    expect(fresh.read(workspace.id, 'src/a.ts')?.toString()).toBe('A1');
    expect(fresh.read(workspace.id, 'README.md')).toBeUndefined();
  });

  it('refuses to restore onto a missing base', () => {
    const manager = new WorkspaceManager();
    const base = manager.registerBase(files);
    const workspace = manager.create(base.ref);
    const snapshot = manager.snapshot([workspace.id]);

    expect(reasonOf(() => new WorkspaceManager().restore(snapshot))).toBe('BASE_NOT_FOUND');
  });

  it('loads a base layer from a directory, skipping blocked paths', async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), 'stitchwork-base-'));
    try {
      await fs.mkdir(path.join(root, 'src'));
      await fs.mkdir(path.join(root, '.git'));
      await fs.writeFile(path.join(root, 'src', 'a.ts'), 'export {};\n');
      await fs.writeFile(path.join(root, '.git', 'config'), '[core]\n');
      await fs.writeFile(path.join(root, '.env'), 'TOKEN=test-secret\n');

      const manager = new WorkspaceManager();
      const base = await manager.registerBaseFromDirectory(root);

      expect(Array.from(base.files.keys())).toEqual(['src/a.ts']);
      expect(base.files.get('src/a.ts')?.toString()).toBe('export {};\n');
    } finally {
      await fs.rm(root, { recursive: true, force: true });
    }
  });
});
