// Bridge client for the mic-remote extension
// Long-polls the local host for toggle events and reports the call's mic state back

import { z } from 'zod';

export const DEFAULT_BRIDGE_URL = 'http://localhost:8765';

const BridgeEventSchema = z.object({
  event: z.literal('toggle-mic'),
  correlationId: z.string().optional(),
  timestamp: z.number()
});

const MicStateReplySchema = z.object({
  status: z.enum(['resolved', 'reported', 'discarded']),
  muted: z.boolean()
});

export type BridgeEvent = z.infer<typeof BridgeEventSchema>;
export type MicStateReply = z.infer<typeof MicStateReplySchema>;

export interface ConnectionStatus {
  isConnected: boolean;
  lastError?: string;
  lastConnectAttempt: number;
  connectionAttempts: number;
  status: 'connected' | 'disconnected' | 'connecting' | 'error';
}

export interface FetchResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}

export type FetchLike = (url: string, init?: RequestInit) => Promise<FetchResponse>;

// Resolves with the call's mic state once the tab has acted, or null when no tab handled it
export type BridgeEventHandler = (event: BridgeEvent) => Promise<{ muted: boolean } | null>;

export interface BridgeClientOptions {
  onEvent: BridgeEventHandler;
  baseUrl?: string;
  fetch?: FetchLike;
  retryDelayMs?: number;
  // Client-side cap, a little above the host's own poll timeout
  pollTimeoutMs?: number;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    }
    signal.addEventListener('abort', done, { once: true });
  });
}

export class BridgeClient {
  private readonly onEvent: BridgeEventHandler;
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly retryDelayMs: number;
  private readonly pollTimeoutMs: number;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private running = false;
  private loopDone: Promise<void> | null = null;
  private runAbort: AbortController | null = null;
  private listeners = new Set<(status: ConnectionStatus) => void>();
  private connectionStatus: ConnectionStatus = {
    isConnected: false,
    lastConnectAttempt: 0,
    connectionAttempts: 0,
    status: 'disconnected'
  };

  constructor(options: BridgeClientOptions) {
    this.onEvent = options.onEvent;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BRIDGE_URL).replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.retryDelayMs = options.retryDelayMs ?? 5000;
    this.pollTimeoutMs = options.pollTimeoutMs ?? 65000;
    this.sleep = options.sleep ?? abortableSleep;
  }

  get isRunning(): boolean {
    return this.running;
  }

  getConnectionStatus(): ConnectionStatus {
    return { ...this.connectionStatus };
  }

  onStatusChange(listener: (status: ConnectionStatus) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // One long poll; null when the host had nothing to deliver or the poll was cut short
  async pollOnce(signal?: AbortSignal): Promise<BridgeEvent | null> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.pollTimeoutMs);
    const forwardAbort = (): void => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      const response = await this.fetchImpl(`${this.baseUrl}/bridge/poll`, { signal: controller.signal });
      if (response.status === 204) {
        return null;
      }
      if (!response.ok) {
        throw new Error(`Poll failed with HTTP ${response.status}`);
      }

      const parsed = BridgeEventSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error('Host sent an unrecognised bridge event');
      }
      return parsed.data;
    } catch (error) {
      if (controller.signal.aborted) {
        return null;
      }
      throw error;
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  async reportState(muted: boolean, correlationId?: string): Promise<MicStateReply> {
    const response = await this.fetchImpl(`${this.baseUrl}/bridge/mic-state`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ muted, correlationId })
    });
    if (!response.ok) {
      throw new Error(`Mic state report failed with HTTP ${response.status}`);
    }

    const parsed = MicStateReplySchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('Host sent an unrecognised mic state reply');
    }
    return parsed.data;
  }

  start(): void {
    if (this.running) return;

    this.running = true;
    this.runAbort = new AbortController();
    this.loopDone = this.loop(this.runAbort.signal).catch((error) => {
      console.error('Bridge polling loop stopped unexpectedly:', error);
      this.running = false;
    });
  }

  async stop(): Promise<void> {
    if (!this.running) return;

    this.running = false;
    this.runAbort?.abort();
    await this.loopDone;
    this.loopDone = null;
    this.runAbort = null;
    this.updateConnectionStatus({ isConnected: false, status: 'disconnected' });
  }

  private async loop(signal: AbortSignal): Promise<void> {
    while (this.running) {
      if (!this.connectionStatus.isConnected) {
        this.updateConnectionStatus({ status: 'connecting', lastConnectAttempt: Date.now() });
      }

      try {
        const event = await this.pollOnce(signal);
        if (!this.running) break;

        if (!this.connectionStatus.isConnected) {
          this.updateConnectionStatus({ isConnected: true, status: 'connected', connectionAttempts: 0, lastError: undefined });
        }
        if (event) {
          await this.handleEvent(event);
        }
      } catch (error) {
        if (!this.running) break;

        const message = error instanceof Error ? error.message : String(error);
        console.warn(`Bridge poll failed, retrying in ${this.retryDelayMs}ms:`, message);
        this.updateConnectionStatus({
          isConnected: false,
          status: 'error',
          lastError: message,
          connectionAttempts: this.connectionStatus.connectionAttempts + 1
        });
        await this.sleep(this.retryDelayMs, signal);
      }
    }
  }

  private async handleEvent(event: BridgeEvent): Promise<void> {
    try {
      const result = await this.onEvent(event);
      if (result) {
        await this.reportState(result.muted, event.correlationId);
      }
    } catch (error) {
      console.warn(`Failed to handle bridge event ${event.correlationId ?? event.event}:`, error);
    }
  }

  private updateConnectionStatus(status: Partial<ConnectionStatus>): void {
    this.connectionStatus = { ...this.connectionStatus, ...status };
    const snapshot = this.getConnectionStatus();
    this.listeners.forEach(listener => listener(snapshot));
  }
}
