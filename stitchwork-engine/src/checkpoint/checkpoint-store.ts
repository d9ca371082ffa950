/**
 * Checkpoint Stores
 *
 * Persistence for checkpoint records. Records are plain JSON; anything read
 * back is validated before the executor ever sees it.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { CheckpointMismatchError, type EngineErrorCode } from '../errors.js';
import type { NodeStatus } from '../types/index.js';

const NODE_STATUSES = ['pending', 'ready', 'running', 'succeeded', 'failed', 'skipped'] as const satisfies readonly NodeStatus[];

const ENGINE_ERROR_CODES = [
  'CYCLE',
  'GRAPH_DEFINITION',
  'WORKSPACE',
  'MERGE_CONFLICT',
  'VALIDATION',
  'TIMEOUT',
  'CHECKPOINT_MISMATCH',
  'SUBSCRIBER_OVERRUN',
  'CAPABILITY',
  'CANCELLED',
  'INTERNAL',
] as const satisfies readonly EngineErrorCode[];

const serializedErrorSchema = z.object({
  name: z.string(),
  code: z.enum(ENGINE_ERROR_CODES),
  message: z.string(),
  retryable: z.boolean(),
  details: z.record(z.unknown()).optional(),
});

const resultSummarySchema = z.object({
  nodeId: z.string().min(1),
  status: z.enum(NODE_STATUSES),
  patches: z.array(
    z.object({
      start: z.number().int().nonnegative(),
      end: z.number().int().nonnegative(),
      content: z.string(),
      nodeId: z.string(),
    })
  ),
  artifacts: z.array(z.object({ path: z.string(), bytes: z.number().int(), sha256: z.string() })),
  spanText: z.string().optional(),
  writes: z.array(z.string()),
  workspaceId: z.string().optional(),
  message: z.string().optional(),
  error: serializedErrorSchema.optional(),
  attempts: z.number().int().nonnegative(),
  startedAt: z.string().optional(),
  completedAt: z.string().optional(),
  durationMs: z.number().nonnegative(),
});

const workspaceSnapshotSchema = z.object({
  ref: z.string(),
  takenAt: z.string(),
  workspaces: z.array(
    z.object({
      id: z.string(),
      baseRef: z.string(),
      nodeId: z.string().optional(),
      runId: z.string().optional(),
      entries: z.array(
        z.object({
          path: z.string(),
          kind: z.enum(['write', 'delete']),
          content: z.string().optional(),
        })
      ),
    })
  ),
});

export const checkpointRecordSchema = z.object({
  version: z.literal(1),
  id: z.string().min(1),
  runId: z.string().min(1),
  graphId: z.string().min(1),
  createdAt: z.string(),
  lastEventSeq: z.number().int().nonnegative(),
  completed: z.array(resultSummarySchema),
  pending: z.array(z.string()),
  workspaces: workspaceSnapshotSchema,
});

export type CheckpointRecord = z.infer<typeof checkpointRecordSchema>;

export interface CheckpointMeta {
  id: string;
  runId: string;
  graphId: string;
  createdAt: string;
  lastEventSeq: number;
  completed: number;
  pending: number;
}

export interface CheckpointStore {
  save(record: CheckpointRecord): Promise<void>;
  load(id: string): Promise<CheckpointRecord | null>;
  list(): Promise<CheckpointMeta[]>;
  delete(id: string): Promise<boolean>;
}

export function toMeta(record: CheckpointRecord): CheckpointMeta {
  return {
    id: record.id,
    runId: record.runId,
    graphId: record.graphId,
    createdAt: record.createdAt,
    lastEventSeq: record.lastEventSeq,
    completed: record.completed.length,
    pending: record.pending.length,
  };
}

/**
 * Validate raw JSON as a checkpoint record.
 *
 * @throws CheckpointMismatchError when the shape is wrong
 */
export function parseCheckpointRecord(raw: unknown, source: string): CheckpointRecord {
  const parsed = checkpointRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.slice(0, 5).map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new CheckpointMismatchError(`Malformed checkpoint ${source}: ${problems.join('; ')}`, { source });
  }
  return parsed.data;
}

/** Oldest first; within one millisecond, by event sequence */
function byCreatedAt(a: CheckpointMeta, b: CheckpointMeta): number {
  if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? -1 : 1;
  return a.lastEventSeq - b.lastEventSeq;
}

/**
 * In-process store; records are deep-copied in and out.
 */
export class MemoryCheckpointStore implements CheckpointStore {
  private records = new Map<string, string>();

  async save(record: CheckpointRecord): Promise<void> {
    this.records.set(record.id, JSON.stringify(record));
  }

  async load(id: string): Promise<CheckpointRecord | null> {
    const raw = this.records.get(id);
    return raw === undefined ? null : parseCheckpointRecord(JSON.parse(raw), id);
  }

  async list(): Promise<CheckpointMeta[]> {
    return Array.from(this.records.entries())
      .map(([id, raw]) => toMeta(parseCheckpointRecord(JSON.parse(raw), id)))
      .sort(byCreatedAt);
  }

  async delete(id: string): Promise<boolean> {
    return this.records.delete(id);
  }
}

const CHECKPOINT_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * One JSON file per checkpoint, `<dir>/<id>.json`. Writes go through a
 * temporary file and a rename so a crash never leaves half a record.
 */
export class FileCheckpointStore implements CheckpointStore {
  constructor(private readonly dir: string) {}

  async save(record: CheckpointRecord): Promise<void> {
    const target = this.fileFor(record.id);
    const temp = `${target}.tmp`;
    await fs.mkdir(this.dir, { recursive: true });
    await fs.writeFile(temp, JSON.stringify(record, null, 2), 'utf-8');
    await fs.rename(temp, target);
  }

  async load(id: string): Promise<CheckpointRecord | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.fileFor(id), 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new CheckpointMismatchError(
        `Checkpoint ${id} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
        { checkpointId: id }
      );
    }
    return parseCheckpointRecord(json, id);
  }

  async list(): Promise<CheckpointMeta[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.dir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }

    const metas: CheckpointMeta[] = [];
    for (const file of files.filter((name) => name.endsWith('.json')).sort()) {
      const record = await this.load(file.slice(0, -'.json'.length));
      if (record) metas.push(toMeta(record));
    }
    return metas.sort(byCreatedAt);
  }

  async delete(id: string): Promise<boolean> {
    try {
      await fs.unlink(this.fileFor(id));
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  private fileFor(id: string): string {
    if (!CHECKPOINT_ID_PATTERN.test(id)) {
      throw new CheckpointMismatchError(`Invalid checkpoint id: ${id}`, { checkpointId: id });
    }
    return path.join(this.dir, `${id}.json`);
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
