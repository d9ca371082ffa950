/**
 * Result Handler
 *
 * Turns an agent's output into a ResultSummary: patches are checked one by
 * one against the node's context, then stitched into the node's span text;
 * artifacts are written into the node's overlay. The patch set itself is
 * recorded in the overlay as well so the workspace alone explains the
 * result.
 */

import { createHash } from 'crypto';
import type { EngineError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { PatchStitcher } from '../stitcher/patch-stitcher.js';
import type {
  AgentNode,
  AgentOutput,
  ArtifactRecord,
  NodeStatus,
  Patch,
  ResultSummary,
} from '../types/index.js';
import type { WorkspaceHandle } from '../workspace/types.js';

export const PATCH_RECORD_DIR = '.stitchwork/patches';

export interface NodeTiming {
  attempts: number;
  startedAt?: Date;
  completedAt?: Date;
}

export interface HandleResultInput extends NodeTiming {
  node: AgentNode;
  /** The context text the agent was given; patch offsets refer to it */
  context: string;
  output: AgentOutput;
  workspace: WorkspaceHandle;
}

export function patchRecordPath(nodeId: string): string {
  return `${PATCH_RECORD_DIR}/${encodeURIComponent(nodeId)}.json`;
}

export class ResultHandler {
  private logger: Logger;

  constructor(
    private readonly stitcher: PatchStitcher,
    logger?: Logger
  ) {
    this.logger = logger ?? silentLogger;
  }

  /**
   * Validate and persist a successful agent output.
   *
   * @throws ValidationError when a patch or the stitched span is rejected
   * @throws MergeConflictError when the node's own patches overlap
   * @throws WorkspaceError when an artifact path is not allowed
   */
  async handle(input: HandleResultInput): Promise<ResultSummary> {
    const { node, output, workspace } = input;
    const contextBuffer = Buffer.from(input.context, 'utf-8');
    const filePath = node.descriptor.filePath;

    let patches: Patch[] = [];
    let artifacts: ArtifactRecord[] = [];
    let spanText = input.context;
    const writes: string[] = [];

    switch (output.kind) {
      case 'patch': {
        patches = output.patches.map((proposal) => ({ ...proposal, nodeId: node.id }));
        for (const patch of patches) {
          await this.stitcher.checkPatch(contextBuffer, patch, { nodeId: node.id, filePath, scope: 'patch' });
        }
        const merged = await this.stitcher.stitch(contextBuffer, patches, { nodeId: node.id, filePath, scope: 'span' });
        spanText = merged.toString('utf-8');

        const recordPath = patchRecordPath(node.id);
        workspace.write(
          recordPath,
          JSON.stringify(
            {
              nodeId: node.id,
              filePath: filePath ?? null,
              span: [node.descriptor.startByte, node.descriptor.endByte],
              contextSha256: sha256(contextBuffer),
              patches,
            },
            null,
            2
          )
        );
        writes.push(recordPath);
        break;
      }

      case 'artifact': {
        artifacts = output.artifacts.map((artifact) => {
          const content = Buffer.from(artifact.content, 'utf-8');
          workspace.write(artifact.path, content);
          writes.push(artifact.path);
          return { path: artifact.path, bytes: content.length, sha256: sha256(content) };
        });
        break;
      }

      case 'noop':
        break;
    }

    this.logger.debug(
      `Node ${node.id} produced ${patches.length} patches and ${artifacts.length} artifacts`
    );

    return {
      ...timing(input),
      nodeId: node.id,
      status: 'succeeded',
      patches,
      artifacts,
      spanText,
      writes,
      workspaceId: workspace.id,
      message: output.message,
    };
  }

  /**
   * Summary for a node that failed; it keeps no span text, so parents and
   * documents fall back to the original bytes.
   */
  failure(node: AgentNode, error: EngineError, time: NodeTiming): ResultSummary {
    return this.terminal(node, 'failed', time, { error: error.toJSON(), message: error.message });
  }

  /**
   * Summary for a node that never ran.
   */
  skipped(node: AgentNode, reason: string): ResultSummary {
    return this.terminal(node, 'skipped', { attempts: 0 }, { message: reason });
  }

  private terminal(
    node: AgentNode,
    status: NodeStatus,
    time: NodeTiming,
    extra: Pick<ResultSummary, 'error' | 'message'>
  ): ResultSummary {
    return {
      ...timing(time),
      nodeId: node.id,
      status,
      patches: [],
      artifacts: [],
      writes: [],
      ...extra,
    };
  }
}

function timing(time: NodeTiming): Pick<ResultSummary, 'attempts' | 'startedAt' | 'completedAt' | 'durationMs'> {
  return {
    attempts: time.attempts,
    startedAt: time.startedAt?.toISOString(),
    completedAt: time.completedAt?.toISOString(),
    durationMs:
      time.startedAt && time.completedAt ? time.completedAt.getTime() - time.startedAt.getTime() : 0,
  };
}

function sha256(content: Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}
