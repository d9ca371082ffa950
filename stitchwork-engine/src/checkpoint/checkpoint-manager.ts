/**
 * Checkpoint Manager
 *
 * Records executor progress plus the matching workspace snapshot so an
 * interrupted run can continue without re-running finished nodes.
 */

import { v4 as uuid } from 'uuid';
import { CheckpointMismatchError, WorkspaceError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { ExecutorState, NodeId } from '../types/index.js';
import type { WorkspaceManager } from '../workspace/workspace-manager.js';
import type { WorkspaceSnapshot } from '../workspace/types.js';
import { parseCheckpointRecord, type CheckpointMeta, type CheckpointStore } from './checkpoint-store.js';

export interface ResumeExpectations {
  /** Graph the caller intends to continue; must equal the checkpoint's */
  graphId?: string;
  /** Base layer the caller runs against; every snapshot workspace must use it */
  baseRef?: string;
}

export class CheckpointManager {
  private logger: Logger;

  constructor(
    private readonly store: CheckpointStore,
    logger?: Logger
  ) {
    this.logger = logger ?? silentLogger;
  }

  /**
   * Persist a checkpoint. The record is built before the first await, so it
   * reflects exactly the state passed in even if the executor moves on while
   * the store is writing.
   */
  async snapshot(state: ExecutorState, workspaces: WorkspaceSnapshot): Promise<string> {
    const overlap = Array.from(state.pending).filter((id) => state.completed.has(id));
    if (overlap.length > 0) {
      throw new CheckpointMismatchError(`Nodes both completed and pending: ${overlap.join(', ')}`, {
        nodes: overlap,
      });
    }

    const record = parseCheckpointRecord(
      JSON.parse(
        JSON.stringify({
          version: 1,
          id: uuid(),
          runId: state.runId,
          graphId: state.graphId,
          createdAt: new Date().toISOString(),
          lastEventSeq: state.lastEventSeq,
          completed: Array.from(state.completed.values()),
          pending: Array.from(state.pending),
          workspaces,
        })
      ),
      'snapshot'
    );

    await this.store.save(record);
    this.logger.debug(
      `Saved checkpoint ${record.id} (${record.completed.length} completed, ${record.pending.length} pending)`
    );
    return record.id;
  }

  /**
   * Load a checkpoint, restore its workspace overlays into `workspaces` and
   * return the executor state to continue from.
   *
   * @throws CheckpointMismatchError when the checkpoint is missing, belongs to
   * another graph, or refers to a base layer `workspaces` does not have
   */
  async resume(
    checkpointId: string,
    workspaces: WorkspaceManager,
    expected: ResumeExpectations = {}
  ): Promise<ExecutorState> {
    const record = await this.store.load(checkpointId);
    if (!record) {
      throw new CheckpointMismatchError(`Checkpoint not found: ${checkpointId}`, { checkpointId });
    }

    if (expected.graphId !== undefined && expected.graphId !== record.graphId) {
      throw new CheckpointMismatchError(
        `Checkpoint ${checkpointId} was taken for graph ${record.graphId}, not ${expected.graphId}`,
        { checkpointId, expected: expected.graphId, actual: record.graphId }
      );
    }

    const foreign = record.workspaces.workspaces.find(
      (workspace) => expected.baseRef !== undefined && workspace.baseRef !== expected.baseRef
    );
    if (foreign) {
      throw new CheckpointMismatchError(
        `Checkpoint ${checkpointId} workspace ${foreign.id} uses base ${foreign.baseRef}, not ${expected.baseRef}`,
        { checkpointId, expected: expected.baseRef, actual: foreign.baseRef }
      );
    }

    try {
      workspaces.restore(record.workspaces);
    } catch (err) {
      if (err instanceof WorkspaceError && err.reason === 'BASE_NOT_FOUND') {
        throw new CheckpointMismatchError(
          `Checkpoint ${checkpointId} does not match the available workspace base: ${err.message}`,
          { checkpointId, workspaceId: err.workspaceId }
        );
      }
      throw err;
    }

    const completed = new Map(record.completed.map((summary) => [summary.nodeId, summary] as const));
    const pending = new Set<NodeId>(record.pending);

    this.logger.info(`Resuming run ${record.runId} from checkpoint ${checkpointId} (${completed.size} completed)`);

    return {
      runId: record.runId,
      graphId: record.graphId,
      completed,
      pending,
      lastEventSeq: record.lastEventSeq,
    };
  }

  async list(runId?: string): Promise<CheckpointMeta[]> {
    const all = await this.store.list();
    return runId === undefined ? all : all.filter((meta) => meta.runId === runId);
  }

  /**
   * Most recent checkpoint of a run, or null.
   */
  async latest(runId: string): Promise<CheckpointMeta | null> {
    const metas = await this.list(runId);
    return metas.length > 0 ? metas[metas.length - 1] : null;
  }

  async delete(checkpointId: string): Promise<boolean> {
    return this.store.delete(checkpointId);
  }
}
