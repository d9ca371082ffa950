/**
 * Human-in-the-loop questions, carried over the run's event bus.
 */

import { v4 as uuid } from 'uuid';
import { CancelledError } from '../errors.js';
import type { EventBus } from '../events/event-bus.js';
import type { RunContext } from '../executor/run-context.js';
import type { NodeId } from '../types/index.js';

export interface HumanInputOptions {
  options?: string[];
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Emit a `human:input:request` and wait for the matching response.
 *
 * @throws TimeoutError when nobody answers within `timeoutMs`
 */
export async function requestHumanInput(
  run: RunContext,
  nodeId: NodeId,
  question: string,
  input: HumanInputOptions = {}
): Promise<string> {
  if (run.bus.closed) {
    throw new CancelledError(`Run ${run.runId} has ended; cannot ask for human input`);
  }
  const requestId = uuid();

  // Register before emitting so an answer given synchronously is not missed
  const answer = run.bus.waitForType(
    'human:input:response',
    (event) => event.payload.requestId === requestId,
    { timeoutMs: input.timeoutMs, signal: input.signal }
  );

  run.logger.info(`Node ${nodeId} is waiting for human input (${requestId})`);
  run.emit('human:input:request', { requestId, question, options: input.options }, nodeId);

  const event = await answer;
  return event.payload.response;
}

/**
 * Answer a pending request.
 */
export function respondToHumanInput(bus: EventBus, requestId: string, response: string): void {
  bus.emit('human:input:response', { requestId, response });
}
