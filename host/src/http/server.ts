// Local HTTP control endpoint
// Serves the toggle, status and volume routes plus the browser bridge routes

import * as http from 'http';
import type { AudioService } from '../audio/audio-service';
import type { BridgeCorrelator } from '../bridge/correlator';
import type { BridgeEventChannel } from '../bridge/event-channel';
import { AdapterError, ErrorType, HostError, PortInUseError, ValidationError } from '../errors';
import { getLogger, Logger } from '../logger';
import type { SettingsStore } from '../settings';
import {
  BridgeModeSchema,
  LogsQuerySchema,
  MicStateSchema,
  PollQuerySchema,
  VolumeSetSchema,
  parseInput,
  queryObject
} from './schemas';

export interface ControlServerDeps {
  audio: AudioService;
  correlator: BridgeCorrelator;
  channel: BridgeEventChannel;
  settings: SettingsStore;
  logger?: Logger;
}

export interface ControlServerOptions {
  pollTimeoutMs?: number;
  maxBodyBytes?: number;
  // Grace period before open connections are dropped on stop
  closeTimeoutMs?: number;
}

export interface RouteResult {
  statusCode: number;
  // No body means 204-style empty response
  body?: unknown;
}

const CORS_HEADERS = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
  'Access-Control-Allow-Headers': 'Accept, Authorization, Content-Type, Origin'
};

function ok(body: unknown): RouteResult {
  return { statusCode: 200, body };
}

export class ControlServer {
  private server: http.Server | null = null;
  private boundPort: number | null = null;
  private readonly audio: AudioService;
  private readonly correlator: BridgeCorrelator;
  private readonly channel: BridgeEventChannel;
  private readonly settings: SettingsStore;
  private logger: Logger;
  private pollTimeoutMs: number;
  private maxBodyBytes: number;
  private closeTimeoutMs: number;

  constructor(deps: ControlServerDeps, options: ControlServerOptions = {}) {
    this.audio = deps.audio;
    this.correlator = deps.correlator;
    this.channel = deps.channel;
    this.settings = deps.settings;
    this.logger = deps.logger ?? getLogger();
    this.pollTimeoutMs = options.pollTimeoutMs ?? 30000;
    this.maxBodyBytes = options.maxBodyBytes ?? 64 * 1024;
    this.closeTimeoutMs = options.closeTimeoutMs ?? 1000;
  }

  get isRunning(): boolean {
    return this.server !== null;
  }

  get port(): number | null {
    return this.boundPort;
  }

  async start(): Promise<void> {
    if (this.server) {
      this.logger.debug('HTTP server already running', { port: this.boundPort }, 'ControlServer');
      return;
    }

    const { httpPort, bindAddress } = this.settings.settings;
    const server = http.createServer((req, res) => {
      this.handle(req, res).catch((error) => {
        this.logger.error('Unhandled request failure', error, 'ControlServer');
      });
    });

    this.logger.info('Starting HTTP server', { port: httpPort, host: bindAddress }, 'ControlServer');

    try {
      await new Promise<void>((resolve, reject) => {
        const onError = (error: NodeJS.ErrnoException): void => {
          server.off('listening', onListening);
          reject(error.code === 'EADDRINUSE' ? new PortInUseError(httpPort) : error);
        };
        const onListening = (): void => {
          server.off('error', onError);
          resolve();
        };
        server.once('error', onError);
        server.once('listening', onListening);
        server.listen(httpPort, bindAddress);
      });
    } catch (error) {
      this.logger.error('HTTP server failed to start', error, 'ControlServer');
      throw error;
    }

    server.on('error', (error) => {
      this.logger.error('HTTP server error', error, 'ControlServer');
    });

    const address = server.address();
    this.boundPort = address !== null && typeof address === 'object' ? address.port : httpPort;
    this.server = server;
    this.channel.open();
    this.logger.info('HTTP server started', { port: this.boundPort, host: bindAddress }, 'ControlServer');
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;

    this.server = null;
    this.boundPort = null;

    // Release suspended requests so their responses go out before close
    this.correlator.cancel();
    this.channel.close();

    await new Promise<void>((resolve, reject) => {
      const force = setTimeout(() => server.closeAllConnections(), this.closeTimeoutMs);
      server.close((error) => {
        clearTimeout(force);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
      server.closeIdleConnections();
    });

    this.logger.info('HTTP server stopped', undefined, 'ControlServer');
  }

  async restart(): Promise<void> {
    await this.stop();
    await this.start();
  }

  private async handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const method = req.method ?? 'GET';
    const url = new URL(req.url ?? '/', 'http://localhost');
    const operation = `${method} ${url.pathname}`;
    const timerId = this.logger.startTimer(operation);

    // Lets a long poll give up when its client goes away
    const disconnect = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) {
        disconnect.abort();
      }
    });

    let result: RouteResult;
    try {
      result = await this.route(method, url, req, disconnect.signal);
    } catch (error) {
      result = this.errorResult(error, operation);
    } finally {
      this.logger.endTimer(timerId, operation, 'ControlServer');
    }

    this.logger.debug('Request handled', { method, path: url.pathname, status: result.statusCode }, 'ControlServer');
    this.send(res, result);
  }

  private async route(method: string, url: URL, req: http.IncomingMessage, signal: AbortSignal): Promise<RouteResult> {
    if (method === 'OPTIONS') {
      return { statusCode: 204 };
    }

    switch (`${method} ${url.pathname}`) {
      case 'GET /status':
        return this.status();

      case 'POST /toggle-mic':
        return this.toggleMic();

      case 'GET /volume':
        return ok({ volume: await this.audio.getVolume(), muted: await this.audio.getOutputMuted() });

      case 'POST /volume/increase':
        return ok({ volume: await this.audio.increase() });

      case 'POST /volume/decrease':
        return ok({ volume: await this.audio.decrease() });

      case 'POST /volume/toggle-mute': {
        const muted = await this.audio.toggleOutputMute();
        return ok({ volume: await this.audio.getVolume(), muted });
      }

      case 'POST /volume/set': {
        const { volume } = parseInput(VolumeSetSchema, await this.readJsonBody(req));
        return ok({ volume: await this.audio.setVolume(volume) });
      }

      case 'GET /bridge/poll':
        return this.poll(url, signal);

      case 'POST /bridge/mic-state': {
        const report = parseInput(MicStateSchema, await this.readJsonBody(req));
        const status = this.correlator.confirm(report);
        return ok({ status, muted: report.muted });
      }

      case 'GET /bridge/mode':
        return ok({ enabled: this.settings.settings.bridgeMode });

      case 'POST /bridge/mode': {
        const { enabled } = parseInput(BridgeModeSchema, await this.readJsonBody(req));
        this.settings.update({ bridgeMode: enabled });
        if (!enabled) {
          this.correlator.cancel();
        }
        this.logger.info('Bridge mode changed', { enabled }, 'ControlServer');
        return ok({ enabled });
      }

      case 'GET /logs': {
        const { limit } = parseInput(LogsQuerySchema, queryObject(url, ['limit']));
        return ok({ entries: this.logger.recent(limit ?? 100) });
      }

      default:
        return {
          statusCode: 404,
          body: { status: 'error', error: `Not found: ${method} ${url.pathname}` }
        };
    }
  }

  private async status(): Promise<RouteResult> {
    const state = await this.audio.getState();
    const settings = this.settings.settings;
    const reported = this.correlator.lastReportedState;

    return ok({
      muted: settings.bridgeMode && reported !== null ? reported : state.micMuted,
      outputVolume: state.outputVolume,
      outputMuted: state.outputMuted,
      muteMode: this.audio.mode,
      bridgeMode: settings.bridgeMode,
      bridgeState: this.correlator.state,
      requestCount: settings.requestCount
    });
  }

  private async toggleMic(): Promise<RouteResult> {
    this.settings.incrementRequestCount();

    if (!this.settings.settings.bridgeMode) {
      const muted = await this.audio.toggleMute();
      return ok({ status: 'ok', muted });
    }

    const outcome = await this.correlator.request();
    switch (outcome.status) {
      case 'ok':
        return ok({ status: 'ok', muted: outcome.muted });
      case 'busy':
        return { statusCode: 409, body: { status: 'busy' } };
      default:
        return ok({ status: outcome.status });
    }
  }

  private async poll(url: URL, signal: AbortSignal): Promise<RouteResult> {
    const { timeout } = parseInput(PollQuerySchema, queryObject(url, ['timeout']));
    const event = await this.channel.next({ timeoutMs: timeout ?? this.pollTimeoutMs, signal });
    if (!event) {
      return { statusCode: 204 };
    }
    return ok(event);
  }

  private readJsonBody(req: http.IncomingMessage): Promise<unknown> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let size = 0;
      let tooLarge = false;

      req.on('data', (chunk: Buffer) => {
        size += chunk.length;
        if (size > this.maxBodyBytes) {
          tooLarge = true;
          return;
        }
        chunks.push(chunk);
      });

      req.on('end', () => {
        if (tooLarge) {
          reject(new ValidationError(`Request body exceeds ${this.maxBodyBytes} bytes`));
          return;
        }

        const text = Buffer.concat(chunks).toString('utf8').trim();
        if (!text) {
          resolve({});
          return;
        }

        try {
          resolve(JSON.parse(text));
        } catch {
          reject(new ValidationError('Malformed JSON body'));
        }
      });

      req.on('error', reject);
    });
  }

  private errorResult(error: unknown, operation: string): RouteResult {
    if (error instanceof ValidationError) {
      this.logger.warn('Rejected request', { operation, error: error.message }, 'ControlServer');
      return {
        statusCode: error.statusCode,
        body: { status: 'error', error: error.message, field: error.field }
      };
    }

    if (error instanceof AdapterError) {
      this.logger.error(`Audio control failed for ${operation}`, error, 'ControlServer');
      return {
        statusCode: error.statusCode,
        body: { status: 'error', error: error.message, code: error.code }
      };
    }

    const type = error instanceof HostError ? error.type : ErrorType.UNKNOWN;
    this.logger.error(`Request failed for ${operation}`, { type, error }, 'ControlServer');
    return { statusCode: 500, body: { status: 'error', error: 'Internal server error' } };
  }

  private send(res: http.ServerResponse, result: RouteResult): void {
    if (res.destroyed || res.writableEnded) {
      return;
    }

    if (result.body === undefined) {
      res.writeHead(result.statusCode, CORS_HEADERS);
      res.end();
      return;
    }

    const payload = JSON.stringify(result.body);
    res.writeHead(result.statusCode, {
      ...CORS_HEADERS,
      'Content-Type': 'application/json; charset=utf-8',
      'Content-Length': Buffer.byteLength(payload)
    });
    res.end(payload);
  }
}
