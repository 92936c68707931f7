// Pending-confirmation state machine for bridge-routed microphone toggles
//
// idle -> awaiting-confirmation -> (resolved | timed out | superseded | cancelled) -> idle
//
// One correlation is live at a time. The confirmation and the timer race to
// settle the single slot; whichever settles first wins and the timer is always
// cleared. An unconfirmed correlation takes its undelivered event with it.

import { getLogger, Logger } from '../logger';
import type { BridgePolicy } from '../settings';
import type { BridgeDispatcher } from './event-channel';

export type BridgeState = 'idle' | 'awaiting-confirmation';

export type BridgeOutcome =
  | { status: 'ok'; correlationId: string; muted: boolean }
  | { status: 'timeout'; correlationId: string }
  | { status: 'superseded'; correlationId: string }
  | { status: 'cancelled'; correlationId: string }
  // correlationId names the request that is still outstanding
  | { status: 'busy'; correlationId: string };

export type ConfirmResult = 'resolved' | 'reported' | 'discarded';

export interface BridgeReport {
  muted: boolean;
  correlationId?: string;
}

export interface PendingBridgeRequest {
  id: string;
  createdAt: number;
  deadline: number;
  resolved: boolean;
  result?: { muted: boolean };
}

interface PendingEntry extends PendingBridgeRequest {
  timer: ReturnType<typeof setTimeout>;
  resolve: (outcome: BridgeOutcome) => void;
}

export interface CorrelatorOptions {
  timeoutMs?: number;
  policy?: BridgePolicy;
  logger?: Logger;
  generateId?: () => string;
  now?: () => number;
}

export function generateCorrelationId(): string {
  return `corr_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
}

export class BridgeCorrelator {
  private slot: PendingEntry | null = null;
  private lastReported: boolean | null = null;
  private readonly dispatcher: BridgeDispatcher;
  private timeoutMs: number;
  private policy: BridgePolicy;
  private logger: Logger;
  private generateId: () => string;
  private now: () => number;

  constructor(dispatcher: BridgeDispatcher, options: CorrelatorOptions = {}) {
    this.dispatcher = dispatcher;
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.policy = options.policy ?? 'reject';
    this.logger = options.logger ?? getLogger();
    this.generateId = options.generateId ?? generateCorrelationId;
    this.now = options.now ?? Date.now;
  }

  get state(): BridgeState {
    return this.slot ? 'awaiting-confirmation' : 'idle';
  }

  get pending(): PendingBridgeRequest | null {
    if (!this.slot) return null;
    const { id, createdAt, deadline, resolved, result } = this.slot;
    return { id, createdAt, deadline, resolved, result };
  }

  // Last state the extension reported, tagged or not
  get lastReportedState(): boolean | null {
    return this.lastReported;
  }

  configure(options: Pick<CorrelatorOptions, 'timeoutMs' | 'policy'>): void {
    if (options.timeoutMs !== undefined) {
      this.timeoutMs = options.timeoutMs;
    }
    if (options.policy !== undefined) {
      this.policy = options.policy;
    }
  }

  request(): Promise<BridgeOutcome> {
    const outstanding = this.slot;
    if (outstanding) {
      if (this.policy === 'reject') {
        this.logger.info('Bridge toggle rejected, confirmation pending', { pendingId: outstanding.id }, 'BridgeCorrelator');
        return Promise.resolve({ status: 'busy', correlationId: outstanding.id });
      }
      this.settle(outstanding, { status: 'superseded', correlationId: outstanding.id });
    }

    return new Promise<BridgeOutcome>((resolve) => {
      const id = this.generateId();
      const createdAt = this.now();
      const entry: PendingEntry = {
        id,
        createdAt,
        deadline: createdAt + this.timeoutMs,
        resolved: false,
        resolve,
        timer: setTimeout(() => {
          this.settle(entry, { status: 'timeout', correlationId: id });
        }, this.timeoutMs)
      };

      this.slot = entry;
      this.logger.info('Awaiting bridge confirmation', { correlationId: id, timeoutMs: this.timeoutMs }, 'BridgeCorrelator');

      try {
        this.dispatcher.dispatch({ event: 'toggle-mic', correlationId: id, timestamp: createdAt });
      } catch (error) {
        clearTimeout(entry.timer);
        entry.resolved = true;
        this.slot = null;
        throw error;
      }
    });
  }

  confirm(report: BridgeReport): ConfirmResult {
    const entry = this.slot;

    if (report.correlationId !== undefined && (!entry || entry.id !== report.correlationId)) {
      this.logger.info('Discarding confirmation for an expired correlation', {
        correlationId: report.correlationId,
        pendingId: entry?.id ?? null
      }, 'BridgeCorrelator');
      return 'discarded';
    }

    this.lastReported = report.muted;

    if (!entry) {
      this.logger.debug('Extension reported state', { muted: report.muted }, 'BridgeCorrelator');
      return 'reported';
    }

    entry.result = { muted: report.muted };
    this.settle(entry, { status: 'ok', correlationId: entry.id, muted: report.muted });
    return 'resolved';
  }

  cancel(): void {
    const entry = this.slot;
    if (entry) {
      this.settle(entry, { status: 'cancelled', correlationId: entry.id });
    }
  }

  private settle(entry: PendingEntry, outcome: BridgeOutcome): boolean {
    if (entry.resolved) {
      return false;
    }

    entry.resolved = true;
    clearTimeout(entry.timer);
    if (this.slot === entry) {
      this.slot = null;
    }
    if (outcome.status !== 'ok') {
      this.dispatcher.withdraw(entry.id);
    }

    this.logger.info('Bridge correlation settled', {
      correlationId: entry.id,
      status: outcome.status,
      elapsedMs: this.now() - entry.createdAt
    }, 'BridgeCorrelator');
    entry.resolve(outcome);
    return true;
  }
}
