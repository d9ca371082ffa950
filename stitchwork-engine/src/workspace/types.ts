/**
 * Workspace Types
 *
 * Copy-on-write workspaces: a shared, frozen base layer plus one private
 * overlay per agent node.
 */

import type { Logger } from '../logger.js';

export interface BaseLayer {
  /** sha256 of the layer content */
  ref: string;
  files: ReadonlyMap<string, Buffer>;
  createdAt: Date;
}

export type OverlayEntry =
  | { kind: 'write'; content: Buffer }
  | { kind: 'delete' };

export type WorkspaceState = 'active' | 'disposed';

export interface Workspace {
  id: string;
  baseRef: string;
  nodeId?: string;
  runId?: string;
  overlay: Map<string, OverlayEntry>;
  createdAt: Date;
  expiresAt?: Date;
  ttlMs: number;
  /** Retained workspaces survive node completion and the reaper */
  retained: boolean;
  state: WorkspaceState;
  metadata: Record<string, unknown>;
}

export interface CreateWorkspaceOptions {
  nodeId?: string;
  runId?: string;
  ttlMs?: number;
  retain?: boolean;
  metadata?: Record<string, unknown>;
}

export interface WorkspaceEntry {
  path: string;
  source: 'base' | 'overlay';
  bytes: number;
}

export interface OverlayChange {
  path: string;
  kind: 'write' | 'delete';
  bytes?: number;
}

export interface CommitResult {
  workspaceId: string;
  /** Base layer the overlay was promoted into */
  baseRef: string;
  applied: string[];
}

/**
 * Promotion policy for overlays. The engine ships none: conflict resolution
 * against a shared base is left to the embedding application.
 */
export interface CommitStrategy {
  commit(input: {
    workspace: Workspace;
    base: BaseLayer;
    changes: OverlayChange[];
    read(path: string): Buffer | undefined;
  }): Promise<CommitResult>;
}

export interface WorkspaceManagerConfig {
  defaultTtlMs: number;
  reaperIntervalMs: number;
  blockedPaths: string[];
  commitStrategy?: CommitStrategy;
  logger?: Logger;
}

export interface SnapshotEntry {
  path: string;
  kind: 'write' | 'delete';
  /** base64 content for writes */
  content?: string;
}

export interface WorkspaceSnapshotRecord {
  id: string;
  baseRef: string;
  nodeId?: string;
  runId?: string;
  entries: SnapshotEntry[];
}

export interface WorkspaceSnapshot {
  /** sha256 of the captured overlays */
  ref: string;
  takenAt: string;
  workspaces: WorkspaceSnapshotRecord[];
}

/**
 * The view of a workspace handed to an agent: bound to one id, so it can
 * only ever see the base layer and its own overlay.
 */
export interface WorkspaceHandle {
  readonly id: string;
  readonly baseRef: string;
  read(path: string): Buffer | undefined;
  readText(path: string): string | undefined;
  exists(path: string): boolean;
  write(path: string, content: string | Buffer): void;
  delete(path: string): void;
  list(dir?: string): WorkspaceEntry[];
  diff(): OverlayChange[];
}

export const DEFAULT_BLOCKED_PATHS: string[] = [
  '.git/**',
  '**/.env*',
  '**/*.pem',
  '**/*.key',
];

export const DEFAULT_WORKSPACE_CONFIG: WorkspaceManagerConfig = {
  defaultTtlMs: 60 * 60 * 1000,
  reaperIntervalMs: 60 * 1000,
  blockedPaths: DEFAULT_BLOCKED_PATHS,
};
