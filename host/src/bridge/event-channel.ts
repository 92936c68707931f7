// Long-poll delivery of bridge events to browser extension clients

import { getLogger, Logger } from '../logger';

export type BridgeEventName = 'toggle-mic';

export interface BridgeEvent {
  event: BridgeEventName;
  correlationId?: string;
  timestamp: number;
}

export interface BridgeDispatcher {
  dispatch(event: BridgeEvent): void;
  // Drops an undelivered event whose correlation ended without a confirmation
  withdraw(correlationId: string): void;
}

export interface NextEventOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface EventChannelOptions {
  maxQueued?: number;
  maxEventAgeMs?: number;
  logger?: Logger;
  now?: () => number;
}

interface Waiter {
  settle(event: BridgeEvent | null): void;
}

export class BridgeEventChannel implements BridgeDispatcher {
  private waiters = new Set<Waiter>();
  private queue: BridgeEvent[] = [];
  private closed = false;
  private maxQueued: number;
  private maxEventAgeMs: number;
  private logger: Logger;
  private now: () => number;

  constructor(options: EventChannelOptions = {}) {
    this.maxQueued = options.maxQueued ?? 16;
    this.maxEventAgeMs = options.maxEventAgeMs ?? 5000;
    this.logger = options.logger ?? getLogger();
    this.now = options.now ?? Date.now;
  }

  get waiting(): number {
    return this.waiters.size;
  }

  get queued(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  setMaxEventAge(ms: number): void {
    this.maxEventAgeMs = ms;
  }

  // Hands the event to every waiting poller, or queues it until one arrives
  dispatch(event: BridgeEvent): void {
    if (this.closed) {
      this.logger.warn('Dropping bridge event, channel closed', { event: event.event }, 'BridgeEventChannel');
      return;
    }

    if (this.waiters.size > 0) {
      const waiters = [...this.waiters];
      this.logger.debug('Broadcasting bridge event', {
        event: event.event,
        correlationId: event.correlationId,
        pollers: waiters.length
      }, 'BridgeEventChannel');
      for (const waiter of waiters) {
        waiter.settle(event);
      }
      return;
    }

    this.queue.push(event);
    if (this.queue.length > this.maxQueued) {
      const dropped = this.queue.shift();
      this.logger.warn('Bridge event queue full, dropped oldest', {
        correlationId: dropped?.correlationId
      }, 'BridgeEventChannel');
    }
    this.logger.debug('Queued bridge event', { event: event.event, queued: this.queue.length }, 'BridgeEventChannel');
  }

  withdraw(correlationId: string): void {
    const before = this.queue.length;
    this.queue = this.queue.filter(event => event.correlationId !== correlationId);
    if (this.queue.length < before) {
      this.logger.debug('Withdrew queued bridge event', { correlationId }, 'BridgeEventChannel');
    }
  }

  // Resolves with the next event, or null on timeout, abort or close
  next(options: NextEventOptions): Promise<BridgeEvent | null> {
    const queued = this.takeQueued();
    if (queued) {
      return Promise.resolve(queued);
    }

    if (this.closed || options.signal?.aborted) {
      return Promise.resolve(null);
    }

    return new Promise<BridgeEvent | null>((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const waiter: Waiter = {
        settle: (event) => {
          if (!this.waiters.delete(waiter)) return;
          if (timer !== undefined) {
            clearTimeout(timer);
          }
          options.signal?.removeEventListener('abort', onAbort);
          resolve(event);
        }
      };
      const onAbort = (): void => waiter.settle(null);

      this.waiters.add(waiter);
      timer = setTimeout(() => waiter.settle(null), options.timeoutMs);
      options.signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  close(): void {
    this.closed = true;
    this.queue = [];
    for (const waiter of [...this.waiters]) {
      waiter.settle(null);
    }
  }

  open(): void {
    this.closed = false;
  }

  private takeQueued(): BridgeEvent | null {
    const cutoff = this.now() - this.maxEventAgeMs;
    while (this.queue.length > 0) {
      const event = this.queue.shift();
      if (event && event.timestamp >= cutoff) {
        return event;
      }
      this.logger.debug('Discarding stale bridge event', { correlationId: event?.correlationId }, 'BridgeEventChannel');
    }
    return null;
  }
}
