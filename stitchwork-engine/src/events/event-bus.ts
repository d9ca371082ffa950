/**
 * Event Bus
 *
 * Typed, ordered publish/subscribe channel for one run. Every emitted event
 * gets the next sequence number and is appended to a log; subscribers pull
 * from their own bounded FIFO queue, so a slow consumer can never block the
 * emitter or other consumers.
 */

import { EventEmitter } from 'events';
import { v4 as uuid } from 'uuid';
import {
  CancelledError,
  EngineError,
  SubscriberOverrunError,
  TimeoutError,
  abortReason,
} from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { EngineEvent, EventPayloads, EventType, NodeId } from '../types/index.js';

export interface EventBusConfig {
  /** Per-subscriber queue bound */
  queueLimit: number;
  /** Oldest log entries are dropped past this size; 0 keeps everything */
  historyLimit: number;
  /** Sequence number of the last event already seen (resumed runs) */
  startSeq: number;
  runId?: string;
  logger?: Logger;
}

export interface EmitOptions {
  nodeId?: NodeId;
  runId?: string;
}

export interface SubscribeOptions {
  /** Overrides the bus-wide queue bound for this subscriber */
  limit?: number;
  /** Replay logged events with a larger sequence number before live ones */
  fromSeq?: number;
}

export interface WaitForOptions<K extends EventType> {
  types?: readonly K[];
  timeoutMs?: number;
  signal?: AbortSignal;
}

const DEFAULT_EVENT_BUS_CONFIG: EventBusConfig = {
  queueLimit: 1000,
  historyLimit: 0,
  startSeq: 0,
};

/** What the bus needs from a subscription, whatever its event types */
interface EventSink {
  deliver(event: EngineEvent): void;
  close(): void;
}

function matchesTypes<K extends EventType>(
  event: EngineEvent,
  types: ReadonlySet<EventType> | null
): event is EngineEvent<K> {
  return types === null || types.has(event.type);
}

/**
 * One subscriber's cursor over the bus. Events arrive in emission order;
 * `next()` resolves null once the subscription is closed and drained.
 */
export class Subscription<K extends EventType = EventType> implements EventSink, AsyncIterable<EngineEvent<K>> {
  readonly id = uuid();
  private queue: EngineEvent<K>[] = [];
  private waiting: Array<{ resolve: (event: EngineEvent<K> | null) => void; reject: (err: Error) => void }> = [];
  private failure: Error | null = null;
  private isClosed = false;

  constructor(
    private readonly types: ReadonlySet<EventType> | null,
    private readonly limit: number,
    private readonly onClose: (subscription: EventSink) => void,
    private readonly logger: Logger
  ) {}

  get closed(): boolean {
    return this.isClosed;
  }

  /** Set when the subscriber was disconnected for falling behind */
  get error(): Error | null {
    return this.failure;
  }

  get pending(): number {
    return this.queue.length;
  }

  /** @internal called by the bus for every emitted event */
  deliver(event: EngineEvent): void {
    if (this.isClosed || !matchesTypes<K>(event, this.types)) return;

    const waiter = this.waiting.shift();
    if (waiter) {
      waiter.resolve(event);
      return;
    }

    if (this.queue.length >= this.limit) {
      this.logger.warn(`Subscriber ${this.id} overran its queue of ${this.limit} events; disconnecting`);
      this.fail(new SubscriberOverrunError(this.id, this.limit));
      return;
    }

    this.queue.push(event);
  }

  /**
   * Next event in order. Rejects with SubscriberOverrunError after an
   * overrun; resolves null once closed and drained.
   */
  next(): Promise<EngineEvent<K> | null> {
    const queued = this.queue.shift();
    if (queued) return Promise.resolve(queued);
    if (this.failure) return Promise.reject(this.failure);
    if (this.isClosed) return Promise.resolve(null);

    return new Promise((resolve, reject) => {
      this.waiting.push({ resolve, reject });
    });
  }

  /** Take everything queued without waiting */
  drain(): EngineEvent<K>[] {
    const events = this.queue;
    this.queue = [];
    return events;
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    for (const waiter of this.waiting.splice(0)) {
      waiter.resolve(null);
    }
    this.onClose(this);
  }

  async *[Symbol.asyncIterator](): AsyncIterator<EngineEvent<K>> {
    for (;;) {
      const event = await this.next();
      if (event === null) return;
      yield event;
    }
  }

  private fail(err: Error): void {
    this.failure = err;
    this.queue = [];
    this.isClosed = true;
    for (const waiter of this.waiting.splice(0)) {
      waiter.reject(err);
    }
    this.onClose(this);
  }
}

interface Waiter {
  types: ReadonlySet<EventType> | null;
  predicate: (event: EngineEvent) => boolean;
  resolve: (event: EngineEvent) => void;
  reject: (err: Error) => void;
}

export class EventBus {
  private config: EventBusConfig;
  private logger: Logger;
  private log: EngineEvent[] = [];
  private seq: number;
  private subscriptions = new Set<EventSink>();
  private waiters = new Set<Waiter>();
  private listeners = new EventEmitter();
  private isClosed = false;

  constructor(busConfig: Partial<EventBusConfig> = {}) {
    this.config = { ...DEFAULT_EVENT_BUS_CONFIG, ...busConfig };
    this.logger = this.config.logger ?? silentLogger;
    this.seq = this.config.startSeq;
    this.listeners.setMaxListeners(0);
  }

  get lastSeq(): number {
    return this.seq;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Append an event to the log and dispatch it, synchronously, to every
   * matching subscriber, waiter and listener.
   */
  emit<K extends EventType>(type: K, payload: EventPayloads[K], options: EmitOptions = {}): EngineEvent<K> {
    if (this.isClosed) {
      throw new EngineError({ message: `Event bus is closed; cannot emit ${type}`, code: 'INTERNAL' });
    }

    const event: EngineEvent<K> = Object.freeze({
      seq: ++this.seq,
      type,
      payload,
      runId: options.runId ?? this.config.runId,
      nodeId: options.nodeId,
      timestamp: new Date().toISOString(),
    });

    this.log.push(event);
    if (this.config.historyLimit > 0 && this.log.length > this.config.historyLimit) {
      this.log.splice(0, this.log.length - this.config.historyLimit);
    }

    for (const subscription of this.subscriptions) {
      subscription.deliver(event);
    }

    for (const waiter of Array.from(this.waiters)) {
      if (waiter.types !== null && !waiter.types.has(type)) continue;
      let matched: boolean;
      try {
        matched = waiter.predicate(event);
      } catch (err) {
        this.waiters.delete(waiter);
        waiter.reject(err instanceof Error ? err : new Error(String(err)));
        continue;
      }
      if (matched) {
        this.waiters.delete(waiter);
        waiter.resolve(event);
      }
    }

    this.listeners.emit('event', event);

    return event;
  }

  /**
   * Open a subscription for the given event types (all types when omitted).
   */
  subscribe<K extends EventType = EventType>(
    types?: readonly K[],
    options: SubscribeOptions = {}
  ): Subscription<K> {
    const typeSet = types && types.length > 0 ? new Set<EventType>(types) : null;
    const subscription = new Subscription<K>(
      typeSet,
      options.limit ?? this.config.queueLimit,
      (closed) => this.subscriptions.delete(closed),
      this.logger
    );

    if (this.isClosed) {
      subscription.close();
      return subscription;
    }

    if (options.fromSeq !== undefined) {
      for (const event of this.history(options.fromSeq)) {
        subscription.deliver(event);
      }
    }

    // A replay that overran the queue has already closed the subscription
    if (!subscription.closed) {
      this.subscriptions.add(subscription);
    }
    return subscription;
  }

  /**
   * Callback listener for the given types; returns the unsubscribe function.
   * A throwing handler is logged and does not affect other consumers.
   */
  listen<K extends EventType>(types: readonly K[], handler: (event: EngineEvent<K>) => void): () => void {
    const typeSet = new Set<EventType>(types);
    const listener = (event: EngineEvent) => {
      if (!matchesTypes<K>(event, typeSet)) return;
      try {
        handler(event);
      } catch (err) {
        this.logger.warn(`Listener failed on ${event.type}: ${err instanceof Error ? err.message : String(err)}`);
      }
    };
    this.listeners.on('event', listener);
    return () => {
      this.listeners.off('event', listener);
    };
  }

  /**
   * Resolve with the first future event matching the predicate.
   *
   * @throws TimeoutError when `timeoutMs` elapses first
   */
  waitFor<K extends EventType = EventType>(
    predicate: (event: EngineEvent<K>) => boolean,
    options: WaitForOptions<K> = {}
  ): Promise<EngineEvent<K>> {
    const { types, timeoutMs, signal } = options;
    const typeSet = types && types.length > 0 ? new Set<EventType>(types) : null;

    if (this.isClosed) {
      return Promise.reject(new CancelledError('Event bus is closed'));
    }
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }

    return new Promise<EngineEvent<K>>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;

      const cleanup = () => {
        this.waiters.delete(waiter);
        if (timer) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };

      const onAbort = () => {
        cleanup();
        reject(signal ? abortReason(signal) : new CancelledError());
      };

      const waiter: Waiter = {
        types: typeSet,
        predicate: (event) => matchesTypes<K>(event, typeSet) && predicate(event),
        resolve: (event) => {
          cleanup();
          if (matchesTypes<K>(event, typeSet)) resolve(event);
        },
        reject: (err) => {
          cleanup();
          reject(err);
        },
      };

      this.waiters.add(waiter);

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          cleanup();
          reject(new TimeoutError(`No matching event within ${timeoutMs}ms`, timeoutMs));
        }, timeoutMs);
      }
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Shorthand for waiting on one event type.
   */
  waitForType<K extends EventType>(
    type: K,
    predicate: (event: EngineEvent<K>) => boolean = () => true,
    options: Omit<WaitForOptions<K>, 'types'> = {}
  ): Promise<EngineEvent<K>> {
    return this.waitFor<K>(predicate, { ...options, types: [type] });
  }

  /**
   * Logged events with a sequence number greater than `fromSeq`.
   */
  history(fromSeq = 0): EngineEvent[] {
    return this.log.filter((event) => event.seq > fromSeq);
  }

  /**
   * Drop logged events with a sequence number below `beforeSeq`.
   */
  prune(beforeSeq: number): number {
    const keepFrom = this.log.findIndex((event) => event.seq >= beforeSeq);
    const removed = keepFrom === -1 ? this.log.length : keepFrom;
    this.log.splice(0, removed);
    return removed;
  }

  /**
   * Close every subscription and reject pending waits. Further emits throw.
   */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;

    for (const subscription of Array.from(this.subscriptions)) {
      subscription.close();
    }
    for (const waiter of Array.from(this.waiters)) {
      waiter.reject(new CancelledError('Event bus is closed'));
    }
    this.listeners.removeAllListeners();
  }

  getStats(): { lastSeq: number; logged: number; subscribers: number; waiters: number } {
    return {
      lastSeq: this.seq,
      logged: this.log.length,
      subscribers: this.subscriptions.size,
      waiters: this.waiters.size,
    };
  }
}
