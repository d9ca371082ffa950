/**
 * Patch Stitcher
 *
 * Merges a batch of byte-range patches into one buffer. Offsets are
 * half-open and always refer to the buffer as submitted; patches are applied
 * from the highest start offset down so earlier offsets never shift. The
 * input buffer is never modified: every failure leaves it exactly as it was.
 */

import { MergeConflictError, ValidationError, type PatchRange } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { PatchProposal, StructuralValidator, ValidationTarget } from '../types/index.js';

export type StitchPatch = PatchProposal & { nodeId?: string };

export interface PatchStitcherOptions {
  validator?: StructuralValidator;
  logger?: Logger;
}

/**
 * Canonical order: start, end, then node id and content so ties between
 * zero-width insertions resolve the same way on every run.
 */
export function comparePatches(a: StitchPatch, b: StitchPatch): number {
  return (
    a.start - b.start ||
    a.end - b.end ||
    (a.nodeId ?? '').localeCompare(b.nodeId ?? '') ||
    (a.content < b.content ? -1 : a.content > b.content ? 1 : 0)
  );
}

/**
 * Every overlapping pair in a batch. Ranges that only touch
 * (`a.end === b.start`) are disjoint, as are zero-width insertions at the
 * same offset.
 */
export function findConflicts(patches: readonly StitchPatch[]): Array<[PatchRange, PatchRange]> {
  const sorted = [...patches].sort(comparePatches);
  const conflicts: Array<[PatchRange, PatchRange]> = [];

  for (let i = 0; i < sorted.length; i++) {
    for (let j = i + 1; j < sorted.length && sorted[j].start < sorted[i].end; j++) {
      const a = sorted[i];
      const b = sorted[j];
      if (a.start < b.end && b.start < a.end) {
        conflicts.push([
          { start: a.start, end: a.end, nodeId: a.nodeId },
          { start: b.start, end: b.end, nodeId: b.nodeId },
        ]);
      }
    }
  }

  return conflicts;
}

/**
 * Check that each range lies within a buffer of `length` bytes.
 */
export function checkRanges(patches: readonly StitchPatch[], length: number): string[] {
  const diagnostics: string[] = [];
  for (const patch of patches) {
    const owner = patch.nodeId ? ` from ${patch.nodeId}` : '';
    if (!Number.isInteger(patch.start) || !Number.isInteger(patch.end)) {
      diagnostics.push(`Patch${owner} has non-integer offsets [${patch.start}, ${patch.end})`);
    } else if (patch.start < 0 || patch.end < patch.start || patch.end > length) {
      diagnostics.push(`Patch${owner} range [${patch.start}, ${patch.end}) is outside [0, ${length})`);
    }
  }
  return diagnostics;
}

/**
 * Apply an already-checked batch without validation.
 */
export function applyPatches(buffer: Buffer, patches: readonly StitchPatch[]): Buffer {
  let result = buffer;
  const descending = [...patches].sort(comparePatches).reverse();

  for (const patch of descending) {
    result = Buffer.concat([
      result.subarray(0, patch.start),
      Buffer.from(patch.content, 'utf-8'),
      result.subarray(patch.end),
    ]);
  }

  return result;
}

export class PatchStitcher {
  private validator?: StructuralValidator;
  private logger: Logger;

  constructor(options: PatchStitcherOptions = {}) {
    this.validator = options.validator;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Merge `patches` into `buffer` and run the structural validator over the
   * result.
   *
   * @throws ValidationError for out-of-range patches or a rejected result
   * @throws MergeConflictError when any two ranges overlap
   */
  async stitch(
    buffer: Buffer | string,
    patches: readonly StitchPatch[],
    target: ValidationTarget = { scope: 'document' }
  ): Promise<Buffer> {
    const original = typeof buffer === 'string' ? Buffer.from(buffer, 'utf-8') : buffer;
    if (patches.length === 0) {
      return original;
    }

    const rangeProblems = checkRanges(patches, original.length);
    if (rangeProblems.length > 0) {
      throw new ValidationError(`Invalid patch ranges for ${describe(target)}`, rangeProblems);
    }

    const conflicts = findConflicts(patches);
    if (conflicts.length > 0) {
      this.logger.warn(`Rejected ${patches.length} patches for ${describe(target)}: ${conflicts.length} overlaps`);
      throw new MergeConflictError(conflicts);
    }

    const merged = applyPatches(original, patches);

    if (this.validator) {
      const result = await this.validator(merged.toString('utf-8'), target);
      if (!result.valid) {
        throw new ValidationError(
          `Merged content failed structural validation for ${describe(target)}`,
          result.diagnostics ?? []
        );
      }
    }

    this.logger.debug(`Stitched ${patches.length} patches into ${describe(target)}`);
    return merged;
  }

  /**
   * String-in, string-out variant of stitch().
   */
  async stitchText(text: string, patches: readonly StitchPatch[], target?: ValidationTarget): Promise<string> {
    return (await this.stitch(text, patches, target)).toString('utf-8');
  }

  /**
   * Validate a single patch in isolation against its buffer: range check,
   * then the validator over the buffer with only that patch applied.
   */
  async checkPatch(buffer: Buffer, patch: StitchPatch, target: ValidationTarget): Promise<void> {
    const rangeProblems = checkRanges([patch], buffer.length);
    if (rangeProblems.length > 0) {
      throw new ValidationError(`Invalid patch range for ${describe(target)}`, rangeProblems);
    }
    if (!this.validator) return;

    const result = await this.validator(applyPatches(buffer, [patch]).toString('utf-8'), target);
    if (!result.valid) {
      throw new ValidationError(`Patch failed structural validation for ${describe(target)}`, result.diagnostics ?? []);
    }
  }
}

function describe(target: ValidationTarget): string {
  return target.nodeId ?? target.filePath ?? target.scope;
}
