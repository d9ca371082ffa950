/**
 * Engine Error Taxonomy
 *
 * Every failure the engine reports is an EngineError subclass carrying a
 * machine-readable code. The executor uses `retryable` to decide whether a
 * node gets another attempt, and `toJSON()` is what lands in ResultSummary
 * entries and checkpoint files.
 */

// =============================================================================
// Error Codes
// =============================================================================

export type EngineErrorCode =
  | "CYCLE"                 // Dependency graph contains a cycle
  | "GRAPH_DEFINITION"      // Descriptors are inconsistent (duplicates, dangling refs)
  | "WORKSPACE"             // Isolation or lifecycle violation
  | "MERGE_CONFLICT"        // Overlapping patch ranges in one batch
  | "VALIDATION"            // Structural validation rejected a patch or batch
  | "TIMEOUT"               // Node deadline or wait timeout exceeded
  | "CHECKPOINT_MISMATCH"   // Resume target does not match the checkpoint
  | "SUBSCRIBER_OVERRUN"    // Event consumer could not keep up
  | "CAPABILITY"            // Relevance/generation call failed or returned garbage
  | "CANCELLED"             // Run or node was cancelled
  | "INTERNAL";             // Anything unclassified

export type WorkspaceErrorCode =
  | "NOT_FOUND"
  | "DISPOSED"
  | "EXPIRED"
  | "BASE_NOT_FOUND"
  | "INVALID_PATH"
  | "COMMIT_UNSUPPORTED";

export interface SerializedError {
  name: string;
  code: EngineErrorCode;
  message: string;
  retryable: boolean;
  details?: Record<string, unknown>;
}

// =============================================================================
// Error Classes
// =============================================================================

export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(opts: {
    message: string;
    code: EngineErrorCode;
    retryable?: boolean;
    details?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(opts.message, { cause: opts.cause });
    this.name = "EngineError";
    this.code = opts.code;
    this.retryable = opts.retryable ?? false;
    this.details = opts.details;
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

export class CycleError extends EngineError {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super({
      message: `Dependency graph contains a cycle: ${cycle.join(" -> ")}`,
      code: "CYCLE",
      details: { cycle },
    });
    this.name = "CycleError";
    this.cycle = cycle;
  }
}

export class GraphDefinitionError extends EngineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ message, code: "GRAPH_DEFINITION", details });
    this.name = "GraphDefinitionError";
  }
}

export class WorkspaceError extends EngineError {
  readonly reason: WorkspaceErrorCode;
  readonly workspaceId?: string;

  constructor(reason: WorkspaceErrorCode, message: string, workspaceId?: string) {
    super({ message, code: "WORKSPACE", details: { reason, workspaceId } });
    this.name = "WorkspaceError";
    this.reason = reason;
    this.workspaceId = workspaceId;
  }
}

export interface PatchRange {
  start: number;
  end: number;
  nodeId?: string;
}

export class MergeConflictError extends EngineError {
  readonly conflicts: Array<[PatchRange, PatchRange]>;

  constructor(conflicts: Array<[PatchRange, PatchRange]>) {
    const [first, second] = conflicts[0];
    super({
      message:
        `Patch ranges overlap: [${first.start}, ${first.end}) and [${second.start}, ${second.end})` +
        (conflicts.length > 1 ? ` (+${conflicts.length - 1} more)` : ""),
      code: "MERGE_CONFLICT",
      details: { conflicts },
    });
    this.name = "MergeConflictError";
    this.conflicts = conflicts;
  }
}

export class ValidationError extends EngineError {
  readonly diagnostics: string[];

  constructor(message: string, diagnostics: string[] = []) {
    super({ message, code: "VALIDATION", retryable: true, details: { diagnostics } });
    this.name = "ValidationError";
    this.diagnostics = diagnostics;
  }
}

export class TimeoutError extends EngineError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super({ message, code: "TIMEOUT", details: { timeoutMs } });
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class CheckpointMismatchError extends EngineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ message, code: "CHECKPOINT_MISMATCH", details });
    this.name = "CheckpointMismatchError";
  }
}

export class SubscriberOverrunError extends EngineError {
  readonly subscriptionId: string;

  constructor(subscriptionId: string, limit: number) {
    super({
      message: `Subscriber ${subscriptionId} fell behind by more than ${limit} events and was disconnected`,
      code: "SUBSCRIBER_OVERRUN",
      details: { subscriptionId, limit },
    });
    this.name = "SubscriberOverrunError";
    this.subscriptionId = subscriptionId;
  }
}

export class CapabilityError extends EngineError {
  readonly capability: "relevance" | "generate";

  constructor(capability: "relevance" | "generate", message: string, cause?: unknown) {
    super({ message, code: "CAPABILITY", retryable: true, details: { capability }, cause });
    this.name = "CapabilityError";
    this.capability = capability;
  }
}

export class CancelledError extends EngineError {
  constructor(message = "Operation was cancelled") {
    super({ message, code: "CANCELLED" });
    this.name = "CancelledError";
  }
}

// =============================================================================
// Classification Helpers
// =============================================================================

/**
 * Turn anything a node threw into an EngineError so it can be summarized,
 * serialized and routed through the error policy.
 */
export function classifyNodeError(err: unknown): EngineError {
  if (err instanceof EngineError) {
    return err;
  }

  if (err instanceof Error) {
    if (err.name === "AbortError") {
      return new CancelledError(err.message);
    }
    return new EngineError({ message: err.message, code: "INTERNAL", cause: err });
  }

  return new EngineError({ message: String(err), code: "INTERNAL" });
}

/**
 * Error attached to an aborted signal, or a CancelledError when the reason
 * is not an Error.
 */
export function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new CancelledError();
}
