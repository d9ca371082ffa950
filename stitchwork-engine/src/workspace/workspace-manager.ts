/**
 * Workspace Manager
 *
 * Copy-on-write isolation for agent nodes. Reads resolve overlay-first and
 * fall through to the shared base layer; writes and deletions only ever
 * touch the owning workspace's overlay.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { createHash } from 'crypto';
import { v4 as uuid } from 'uuid';
import { WorkspaceError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { normalizeDirectory, validateWorkspacePath } from './path-validator.js';
import {
  DEFAULT_WORKSPACE_CONFIG,
  type BaseLayer,
  type CommitResult,
  type CreateWorkspaceOptions,
  type OverlayChange,
  type OverlayEntry,
  type SnapshotEntry,
  type Workspace,
  type WorkspaceEntry,
  type WorkspaceHandle,
  type WorkspaceManagerConfig,
  type WorkspaceSnapshot,
  type WorkspaceSnapshotRecord,
} from './types.js';

/** Internal record of a base layer; callers only ever see copies of its files */
interface StoredBase {
  ref: string;
  files: Map<string, Buffer>;
  createdAt: Date;
}

export class WorkspaceManager {
  private config: WorkspaceManagerConfig;
  private logger: Logger;
  private bases = new Map<string, StoredBase>();
  private workspaces = new Map<string, Workspace>();
  private reaper: NodeJS.Timeout | null = null;

  constructor(config: Partial<WorkspaceManagerConfig> = {}) {
    this.config = { ...DEFAULT_WORKSPACE_CONFIG, ...config };
    this.logger = this.config.logger ?? silentLogger;
  }

  // ---------------------------------------------------------------------------
  // Base layers
  // ---------------------------------------------------------------------------

  /**
   * Register an immutable base layer. Registering identical content twice
   * returns the existing layer.
   */
  registerBase(files: Record<string, string | Buffer> | Map<string, string | Buffer>): BaseLayer {
    const entries = files instanceof Map ? Array.from(files.entries()) : Object.entries(files);
    const normalized = new Map<string, Buffer>();

    for (const [filePath, content] of entries) {
      const key = this.normalizePath(filePath);
      normalized.set(key, Buffer.from(content));
    }

    const ref = hashLayer(normalized);
    const existing = this.bases.get(ref);
    if (existing) return exposeBase(existing);

    const sorted = new Map([...normalized.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
    const layer: StoredBase = { ref, files: sorted, createdAt: new Date() };
    this.bases.set(ref, layer);

    this.logger.debug(`Registered base layer ${ref.slice(0, 12)} (${sorted.size} files)`);
    return exposeBase(layer);
  }

  /**
   * Load every regular file below `rootDir` into a new base layer.
   */
  async registerBaseFromDirectory(rootDir: string): Promise<BaseLayer> {
    const files = new Map<string, Buffer>();

    const walk = async (dir: string): Promise<void> => {
      const entries = await fs.readdir(dir, { withFileTypes: true });
      for (const entry of entries) {
        const absolute = path.join(dir, entry.name);
        const relative = path.relative(rootDir, absolute).split(path.sep).join('/');
        if (entry.isDirectory()) {
          if (validateWorkspacePath(relative, this.config.blockedPaths).valid) {
            await walk(absolute);
          }
        } else if (entry.isFile() && validateWorkspacePath(relative, this.config.blockedPaths).valid) {
          files.set(relative, await fs.readFile(absolute));
        }
      }
    };

    await walk(rootDir);
    return this.registerBase(files);
  }

  /**
   * A detached copy of a base layer. Changing it does not affect the layer
   * the workspaces read through.
   */
  getBase(ref: string): BaseLayer | undefined {
    const base = this.bases.get(ref);
    return base ? exposeBase(base) : undefined;
  }

  hasBase(ref: string): boolean {
    return this.bases.has(ref);
  }

  /**
   * Copy of one base file, or undefined when the layer, the path or the
   * file is unknown.
   */
  readBase(ref: string, filePath: string): Buffer | undefined {
    const key = validateWorkspacePath(filePath, this.config.blockedPaths).normalizedPath;
    if (key === undefined) return undefined;
    const content = this.bases.get(ref)?.files.get(key);
    return content ? Buffer.from(content) : undefined;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Create a workspace with an empty overlay over `baseRef`.
   */
  create(baseRef: string, options: CreateWorkspaceOptions = {}): Workspace {
    if (!this.bases.has(baseRef)) {
      throw new WorkspaceError('BASE_NOT_FOUND', `Base layer not registered: ${baseRef}`);
    }

    const ttlMs = options.ttlMs ?? this.config.defaultTtlMs;
    const now = new Date();
    const workspace: Workspace = {
      id: uuid(),
      baseRef,
      nodeId: options.nodeId,
      runId: options.runId,
      overlay: new Map(),
      createdAt: now,
      expiresAt: new Date(now.getTime() + ttlMs),
      ttlMs,
      retained: options.retain ?? false,
      state: 'active',
      metadata: options.metadata ?? {},
    };

    this.workspaces.set(workspace.id, workspace);
    this.logger.debug(`Created workspace ${workspace.id}${options.nodeId ? ` for node ${options.nodeId}` : ''}`);

    return workspace;
  }

  get(workspaceId: string): Workspace | undefined {
    return this.workspaces.get(workspaceId);
  }

  /**
   * Reactivate an existing workspace and restart its TTL.
   */
  reopen(workspaceId: string): Workspace {
    const workspace = this.workspaces.get(workspaceId);
    if (!workspace) {
      throw new WorkspaceError('NOT_FOUND', `Workspace not found: ${workspaceId}`, workspaceId);
    }
    if (workspace.state === 'disposed') {
      throw new WorkspaceError('DISPOSED', `Workspace was disposed: ${workspaceId}`, workspaceId);
    }

    workspace.expiresAt = new Date(Date.now() + workspace.ttlMs);
    return workspace;
  }

  /**
   * Drop the overlay. Returns false when the workspace is unknown or
   * already disposed.
   */
  dispose(workspaceId: string): boolean {
    const workspace = this.workspaces.get(workspaceId);
    if (!workspace || workspace.state === 'disposed') return false;

    workspace.overlay.clear();
    workspace.state = 'disposed';
    this.workspaces.delete(workspaceId);
    this.logger.debug(`Disposed workspace ${workspaceId}`);
    return true;
  }

  /**
   * Discard every overlay write, keeping the workspace itself.
   */
  reset(workspaceId: string): void {
    this.requireActive(workspaceId).overlay.clear();
  }

  retain(workspaceId: string, retained = true): void {
    this.requireActive(workspaceId).retained = retained;
  }

  isExpired(workspaceId: string, now = new Date()): boolean {
    const workspace = this.workspaces.get(workspaceId);
    if (!workspace) return true;
    if (!workspace.expiresAt) return false;
    return now > workspace.expiresAt;
  }

  /**
   * Dispose expired workspaces that are not retained.
   */
  cleanupExpired(now = new Date()): number {
    let cleaned = 0;

    for (const [id, workspace] of Array.from(this.workspaces.entries())) {
      if (!workspace.retained && workspace.expiresAt && workspace.expiresAt < now) {
        if (this.dispose(id)) {
          cleaned++;
        }
      }
    }

    if (cleaned > 0) {
      this.logger.info(`Reaped ${cleaned} expired workspaces`);
    }

    return cleaned;
  }

  startReaper(intervalMs = this.config.reaperIntervalMs): void {
    if (this.reaper) return;
    this.reaper = setInterval(() => this.cleanupExpired(), intervalMs);
    this.reaper.unref();
  }

  stopReaper(): void {
    if (this.reaper) {
      clearInterval(this.reaper);
      this.reaper = null;
    }
  }

  // ---------------------------------------------------------------------------
  // Copy-on-write access
  // ---------------------------------------------------------------------------

  read(workspaceId: string, filePath: string): Buffer | undefined {
    const workspace = this.requireActive(workspaceId);
    const key = this.normalizePath(filePath, workspaceId);

    const entry = workspace.overlay.get(key);
    if (entry) {
      return entry.kind === 'write' ? Buffer.from(entry.content) : undefined;
    }

    const baseContent = this.requireBase(workspace).files.get(key);
    return baseContent ? Buffer.from(baseContent) : undefined;
  }

  write(workspaceId: string, filePath: string, content: string | Buffer): void {
    const workspace = this.requireActive(workspaceId);
    const key = this.normalizePath(filePath, workspaceId);
    workspace.overlay.set(key, { kind: 'write', content: Buffer.from(content) });
  }

  /**
   * Record a deletion. Base files are hidden by a whiteout entry; overlay-only
   * files simply disappear.
   */
  delete(workspaceId: string, filePath: string): void {
    const workspace = this.requireActive(workspaceId);
    const key = this.normalizePath(filePath, workspaceId);

    if (this.requireBase(workspace).files.has(key)) {
      workspace.overlay.set(key, { kind: 'delete' });
    } else {
      workspace.overlay.delete(key);
    }
  }

  /**
   * Union of base and overlay files below `dir`, overlay entries shadowing
   * base entries of the same path and whiteouts hiding them.
   */
  list(workspaceId: string, dir = ''): WorkspaceEntry[] {
    const workspace = this.requireActive(workspaceId);
    const prefix = normalizeDirectory(dir);
    if (prefix === null) {
      throw new WorkspaceError('INVALID_PATH', `Invalid directory: ${dir}`, workspaceId);
    }

    const entries = new Map<string, WorkspaceEntry>();
    for (const [filePath, content] of this.requireBase(workspace).files) {
      if (filePath.startsWith(prefix)) {
        entries.set(filePath, { path: filePath, source: 'base', bytes: content.length });
      }
    }
    for (const [filePath, entry] of workspace.overlay) {
      if (!filePath.startsWith(prefix)) continue;
      if (entry.kind === 'delete') {
        entries.delete(filePath);
      } else {
        entries.set(filePath, { path: filePath, source: 'overlay', bytes: entry.content.length });
      }
    }

    return Array.from(entries.values()).sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  }

  diff(workspaceId: string): OverlayChange[] {
    const workspace = this.requireActive(workspaceId);
    return Array.from(workspace.overlay.entries())
      .map(([filePath, entry]): OverlayChange =>
        entry.kind === 'write'
          ? { path: filePath, kind: 'write', bytes: entry.content.length }
          : { path: filePath, kind: 'delete' }
      )
      .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  }

  /**
   * Promote an overlay through the configured CommitStrategy. Without one the
   * commit is refused and the overlay stays exactly as it was.
   */
  async commit(workspaceId: string): Promise<CommitResult> {
    const workspace = this.requireActive(workspaceId);
    const strategy = this.config.commitStrategy;
    if (!strategy) {
      throw new WorkspaceError(
        'COMMIT_UNSUPPORTED',
        `Committing workspace overlays is not supported without a commit strategy (workspace ${workspaceId})`,
        workspaceId
      );
    }

    const result = await strategy.commit({
      workspace,
      base: exposeBase(this.requireBase(workspace)),
      changes: this.diff(workspaceId),
      read: (filePath) => this.read(workspaceId, filePath),
    });
    this.logger.info(`Committed workspace ${workspaceId} into base ${result.baseRef.slice(0, 12)}`);
    return result;
  }

  /**
   * Bind a handle to one workspace for an agent.
   */
  handle(workspaceId: string): WorkspaceHandle {
    const workspace = this.requireActive(workspaceId);
    return {
      id: workspace.id,
      baseRef: workspace.baseRef,
      read: (filePath) => this.read(workspaceId, filePath),
      readText: (filePath) => this.read(workspaceId, filePath)?.toString('utf-8'),
      exists: (filePath) => this.read(workspaceId, filePath) !== undefined,
      write: (filePath, content) => this.write(workspaceId, filePath, content),
      delete: (filePath) => this.delete(workspaceId, filePath),
      list: (dir) => this.list(workspaceId, dir),
      diff: () => this.diff(workspaceId),
    };
  }

  // ---------------------------------------------------------------------------
  // Snapshots
  // ---------------------------------------------------------------------------

  /**
   * Capture the overlays of the given workspaces (all active ones by
   * default). Synchronous, so no write can interleave with the capture.
   */
  snapshot(workspaceIds?: Iterable<string>): WorkspaceSnapshot {
    const ids = workspaceIds ? Array.from(workspaceIds) : Array.from(this.workspaces.keys());

    const records: WorkspaceSnapshotRecord[] = ids
      .map((id) => this.requireActive(id))
      .map((workspace) => ({
        id: workspace.id,
        baseRef: workspace.baseRef,
        nodeId: workspace.nodeId,
        runId: workspace.runId,
        entries: Array.from(workspace.overlay.entries())
          .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
          .map(([filePath, entry]): SnapshotEntry =>
            entry.kind === 'write'
              ? { path: filePath, kind: 'write', content: entry.content.toString('base64') }
              : { path: filePath, kind: 'delete' }
          ),
      }))
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));

    return {
      ref: createHash('sha256').update(JSON.stringify(records)).digest('hex'),
      takenAt: new Date().toISOString(),
      workspaces: records,
    };
  }

  /**
   * Recreate the workspaces captured in a snapshot, retained, under their
   * original ids.
   */
  restore(snapshot: WorkspaceSnapshot): Workspace[] {
    for (const record of snapshot.workspaces) {
      if (!this.bases.has(record.baseRef)) {
        throw new WorkspaceError(
          'BASE_NOT_FOUND',
          `Snapshot workspace ${record.id} needs base layer ${record.baseRef}, which is not registered`,
          record.id
        );
      }
    }

    return snapshot.workspaces.map((record) => {
      const now = new Date();
      const workspace: Workspace = {
        id: record.id,
        baseRef: record.baseRef,
        nodeId: record.nodeId,
        runId: record.runId,
        overlay: new Map(
          record.entries.map((entry): [string, OverlayEntry] => [
            entry.path,
            entry.kind === 'write'
              ? { kind: 'write', content: Buffer.from(entry.content ?? '', 'base64') }
              : { kind: 'delete' },
          ])
        ),
        createdAt: now,
        expiresAt: new Date(now.getTime() + this.config.defaultTtlMs),
        ttlMs: this.config.defaultTtlMs,
        retained: true,
        state: 'active',
        metadata: { restoredFrom: snapshot.ref },
      };
      this.workspaces.set(workspace.id, workspace);
      return workspace;
    });
  }

  getStats(): { total: number; retained: number; bases: number } {
    let retained = 0;
    for (const workspace of this.workspaces.values()) {
      if (workspace.retained) retained++;
    }
    return { total: this.workspaces.size, retained, bases: this.bases.size };
  }

  // Private methods

  private requireActive(workspaceId: string): Workspace {
    const workspace = this.workspaces.get(workspaceId);
    if (!workspace || workspace.state === 'disposed') {
      throw new WorkspaceError('NOT_FOUND', `Workspace not found or disposed: ${workspaceId}`, workspaceId);
    }
    if (!workspace.retained && this.isExpired(workspaceId)) {
      throw new WorkspaceError('EXPIRED', `Workspace expired: ${workspaceId}`, workspaceId);
    }
    return workspace;
  }

  private requireBase(workspace: Workspace): StoredBase {
    const base = this.bases.get(workspace.baseRef);
    if (!base) {
      throw new WorkspaceError('BASE_NOT_FOUND', `Base layer not registered: ${workspace.baseRef}`, workspace.id);
    }
    return base;
  }

  private normalizePath(filePath: string, workspaceId?: string): string {
    const result = validateWorkspacePath(filePath, this.config.blockedPaths);
    if (!result.valid || !result.normalizedPath) {
      throw new WorkspaceError('INVALID_PATH', result.error ?? `Invalid path: ${filePath}`, workspaceId);
    }
    return result.normalizedPath;
  }
}

function hashLayer(files: Map<string, Buffer>): string {
  const hash = createHash('sha256');
  for (const [filePath, content] of [...files.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    hash.update(filePath).update('\0').update(String(content.length)).update('\0').update(content);
  }
  return hash.digest('hex');
}

function exposeBase(base: StoredBase): BaseLayer {
  const files = new Map<string, Buffer>();
  for (const [filePath, content] of base.files) {
    files.set(filePath, Buffer.from(content));
  }
  return Object.freeze({ ref: base.ref, files, createdAt: new Date(base.createdAt) });
}
