import * as http from 'http';
import * as net from 'net';
import { AudioService } from '../audio/audio-service';
import { MemoryAudioController } from '../audio/memory';
import { BridgeCorrelator } from '../bridge/correlator';
import { BridgeEventChannel } from '../bridge/event-channel';
import { AdapterError, PortInUseError } from '../errors';
import { Logger } from '../logger';
import { AppSettings, SettingsStore } from '../settings';
import { ControlServer } from './server';

const logger = new Logger({ enableConsole: false, enableFile: false });

interface Reply {
  status: number;
  headers: http.IncomingHttpHeaders;
  body: unknown;
}

function request(port: number, method: string, path: string, body?: unknown): Promise<Reply> {
  return new Promise((resolve, reject) => {
    const payload = body === undefined ? undefined : typeof body === 'string' ? body : JSON.stringify(body);
    const req = http.request({
      host: '127.0.0.1',
      port,
      method,
      path,
      agent: false,
      headers: payload === undefined ? {} : { 'Content-Type': 'application/json' }
    }, (res) => {
      const chunks: Buffer[] = [];
      res.on('data', (chunk: Buffer) => chunks.push(chunk));
      res.on('end', () => {
        const text = Buffer.concat(chunks).toString('utf8');
        resolve({
          status: res.statusCode ?? 0,
          headers: res.headers,
          body: text ? JSON.parse(text) : undefined
        });
      });
    });
    req.on('error', reject);
    if (payload !== undefined) {
      req.write(payload);
    }
    req.end();
  });
}

async function waitFor(condition: () => boolean): Promise<void> {
  for (let attempt = 0; attempt < 200; attempt++) {
    if (condition()) return;
    await new Promise(resolve => setTimeout(resolve, 5));
  }
  throw new Error('condition not met');
}

function setup(settingsPatch: Partial<AppSettings> = {}, bridgeTimeoutMs = 1000, overrides: Partial<AppSettings> = {}) {
  const controller = new MemoryAudioController();
  const settings = new SettingsStore({
    filePath: null,
    overrides: { httpPort: 0, bindAddress: '127.0.0.1', ...overrides },
    logger
  });
  if (Object.keys(settingsPatch).length > 0) {
    settings.update(settingsPatch);
  }
  const audio = new AudioService(controller, { logger });
  const channel = new BridgeEventChannel({ logger });
  let sequence = 0;
  const correlator = new BridgeCorrelator(channel, {
    logger,
    timeoutMs: bridgeTimeoutMs,
    generateId: () => `corr-${++sequence}`
  });
  const server = new ControlServer({ audio, correlator, channel, settings, logger }, { pollTimeoutMs: 1000 });
  return { controller, settings, audio, channel, correlator, server };
}

function portOf(server: ControlServer): number {
  const port = server.port;
  if (port === null) {
    throw new Error('server is not running');
  }
  return port;
}

describe('ControlServer', () => {
  let ctx: ReturnType<typeof setup>;

  afterEach(async () => {
    await ctx.server.stop();
  });

  describe('volume routes', () => {
    beforeEach(async () => {
      ctx = setup();
      await ctx.server.start();
    });

    test('should set and read back the output volume', async () => {
      const port = portOf(ctx.server);

      const set = await request(port, 'POST', '/volume/set', { volume: 0.3 });
      expect(set).toMatchObject({ status: 200, body: { volume: 0.3 } });

      const read = await request(port, 'GET', '/volume');
      expect(read.body).toEqual({ volume: 0.3, muted: false });
    });

    test('should accept both ends of the volume range', async () => {
      const port = portOf(ctx.server);

      expect((await request(port, 'POST', '/volume/set', { volume: 0 })).body).toEqual({ volume: 0 });
      expect((await request(port, 'GET', '/volume')).body).toEqual({ volume: 0, muted: false });

      expect((await request(port, 'POST', '/volume/set', { volume: 1 })).body).toEqual({ volume: 1 });
      expect((await request(port, 'GET', '/volume')).body).toEqual({ volume: 1, muted: false });

      expect(ctx.controller.writes).toEqual(['setOutputVolume:0', 'setOutputVolume:1']);
    });

    test('should reject a volume just below zero', async () => {
      const reply = await request(portOf(ctx.server), 'POST', '/volume/set', { volume: -0.01 });

      expect(reply.status).toBe(400);
      expect(reply.body).toEqual({
        status: 'error',
        error: 'volume: must be between 0.0 and 1.0',
        field: 'volume'
      });
      expect(ctx.controller.writes).toEqual([]);
    });

    test('should reject an out-of-range volume without touching the device', async () => {
      const port = portOf(ctx.server);

      const reply = await request(port, 'POST', '/volume/set', { volume: 1.5 });

      expect(reply.status).toBe(400);
      expect(reply.body).toEqual({
        status: 'error',
        error: 'volume: must be between 0.0 and 1.0',
        field: 'volume'
      });
      expect(ctx.controller.writes).toEqual([]);
    });

    test('should reject a malformed body', async () => {
      const reply = await request(portOf(ctx.server), 'POST', '/volume/set', '{"volume":');

      expect(reply.status).toBe(400);
      expect(reply.body).toMatchObject({ status: 'error', error: 'Malformed JSON body' });
    });

    test('should step the volume up and down', async () => {
      const port = portOf(ctx.server);

      expect((await request(port, 'POST', '/volume/increase')).body).toEqual({ volume: 0.6 });
      expect((await request(port, 'POST', '/volume/decrease')).body).toEqual({ volume: 0.5 });
    });

    test('should toggle output mute', async () => {
      const reply = await request(portOf(ctx.server), 'POST', '/volume/toggle-mute');

      expect(reply.body).toEqual({ volume: 0.5, muted: true });
    });

    test('should map adapter failures to a 500 with the error code', async () => {
      ctx.controller.setFailure(new AdapterError('osascript failed: boom'));

      const reply = await request(portOf(ctx.server), 'GET', '/volume');

      expect(reply.status).toBe(500);
      expect(reply.body).toEqual({ status: 'error', error: 'osascript failed: boom', code: 'OS_CALL_FAILED' });
    });
  });

  describe('direct microphone toggle', () => {
    beforeEach(async () => {
      ctx = setup();
      await ctx.server.start();
    });

    test('should flip the microphone on each toggle', async () => {
      const port = portOf(ctx.server);

      const first = await request(port, 'POST', '/toggle-mic');
      const second = await request(port, 'POST', '/toggle-mic');

      expect(first.body).toEqual({ status: 'ok', muted: true });
      expect(second.body).toEqual({ status: 'ok', muted: false });
      expect(ctx.settings.settings.requestCount).toBe(2);
    });

    test('should report status', async () => {
      await request(portOf(ctx.server), 'POST', '/toggle-mic');

      const reply = await request(portOf(ctx.server), 'GET', '/status');

      expect(reply.body).toEqual({
        muted: true,
        outputVolume: 0.5,
        outputMuted: false,
        muteMode: 'hardware-mute',
        bridgeMode: false,
        bridgeState: 'idle',
        requestCount: 1
      });
    });
  });

  describe('bridge routes', () => {
    test('should answer timeout when the extension never confirms', async () => {
      ctx = setup({ bridgeMode: true }, 50);
      await ctx.server.start();

      const reply = await request(portOf(ctx.server), 'POST', '/toggle-mic');

      expect(reply).toMatchObject({ status: 200, body: { status: 'timeout' } });
      expect(ctx.correlator.state).toBe('idle');
      expect(ctx.controller.writes).toEqual([]);
    });

    test('should resolve a toggle through poll and mic-state', async () => {
      ctx = setup({ bridgeMode: true });
      await ctx.server.start();
      const port = portOf(ctx.server);

      const poll = request(port, 'GET', '/bridge/poll?timeout=1000');
      const toggle = request(port, 'POST', '/toggle-mic');

      const event = await poll;
      expect(event.status).toBe(200);
      expect(event.body).toMatchObject({ event: 'toggle-mic', correlationId: 'corr-1' });

      const confirm = await request(port, 'POST', '/bridge/mic-state', { muted: true, correlationId: 'corr-1' });
      expect(confirm.body).toEqual({ status: 'resolved', muted: true });

      expect((await toggle).body).toEqual({ status: 'ok', muted: true });

      const status = await request(port, 'GET', '/status');
      expect(status.body).toMatchObject({ muted: true, bridgeMode: true, bridgeState: 'idle' });
    });

    test('should refuse a second toggle while one is pending', async () => {
      ctx = setup({ bridgeMode: true });
      await ctx.server.start();
      const port = portOf(ctx.server);

      const first = request(port, 'POST', '/toggle-mic');
      await waitFor(() => ctx.correlator.state === 'awaiting-confirmation');

      const second = await request(port, 'POST', '/toggle-mic');
      expect(second).toMatchObject({ status: 409, body: { status: 'busy' } });

      await request(port, 'POST', '/bridge/mic-state', { muted: false });
      expect((await first).body).toEqual({ status: 'ok', muted: false });
    });

    test('should discard a confirmation for an unknown correlation', async () => {
      ctx = setup({ bridgeMode: true });
      await ctx.server.start();

      const reply = await request(portOf(ctx.server), 'POST', '/bridge/mic-state', { muted: true, correlationId: 'corr-9' });

      expect(reply.body).toEqual({ status: 'discarded', muted: true });
      expect(ctx.correlator.lastReportedState).toBeNull();
    });

    test('should answer 204 when a poll times out', async () => {
      ctx = setup();
      await ctx.server.start();

      const reply = await request(portOf(ctx.server), 'GET', '/bridge/poll?timeout=20');

      expect(reply.status).toBe(204);
      expect(reply.body).toBeUndefined();
    });

    test('should switch bridge mode and cancel the pending toggle when disabled', async () => {
      ctx = setup({ bridgeMode: true });
      await ctx.server.start();
      const port = portOf(ctx.server);

      const toggle = request(port, 'POST', '/toggle-mic');
      await waitFor(() => ctx.correlator.state === 'awaiting-confirmation');

      const mode = await request(port, 'POST', '/bridge/mode', { enabled: false });
      expect(mode.body).toEqual({ enabled: false });
      expect((await toggle).body).toEqual({ status: 'cancelled' });
      expect((await request(port, 'GET', '/bridge/mode')).body).toEqual({ enabled: false });
    });

    test('should leave bridge mode over HTTP even when it was enabled at start-up', async () => {
      ctx = setup({}, 50, { bridgeMode: true });
      await ctx.server.start();
      const port = portOf(ctx.server);
      expect((await request(port, 'GET', '/bridge/mode')).body).toEqual({ enabled: true });

      await request(port, 'POST', '/bridge/mode', { enabled: false });

      expect((await request(port, 'GET', '/bridge/mode')).body).toEqual({ enabled: false });
      expect((await request(port, 'POST', '/toggle-mic')).body).toEqual({ status: 'ok', muted: true });
    });

    test('should not deliver a toggle that was cancelled before any poll', async () => {
      ctx = setup({ bridgeMode: true });
      await ctx.server.start();
      const port = portOf(ctx.server);

      const toggle = request(port, 'POST', '/toggle-mic');
      await waitFor(() => ctx.correlator.state === 'awaiting-confirmation');
      await request(port, 'POST', '/bridge/mode', { enabled: false });
      expect((await toggle).body).toEqual({ status: 'cancelled' });

      const poll = await request(port, 'GET', '/bridge/poll?timeout=20');
      expect(poll.status).toBe(204);
    });

    test('should cancel a pending toggle on stop', async () => {
      ctx = setup({ bridgeMode: true });
      await ctx.server.start();

      const toggle = request(portOf(ctx.server), 'POST', '/toggle-mic');
      await waitFor(() => ctx.correlator.state === 'awaiting-confirmation');
      await ctx.server.stop();

      expect((await toggle).body).toEqual({ status: 'cancelled' });
    });
  });

  describe('plumbing', () => {
    beforeEach(async () => {
      ctx = setup();
      await ctx.server.start();
    });

    test('should answer 404 with an error body for unknown routes', async () => {
      const reply = await request(portOf(ctx.server), 'GET', '/nope');

      expect(reply.status).toBe(404);
      expect(reply.body).toEqual({ status: 'error', error: 'Not found: GET /nope' });
    });

    test('should answer preflight requests with CORS headers', async () => {
      const reply = await request(portOf(ctx.server), 'OPTIONS', '/toggle-mic');

      expect(reply.status).toBe(204);
      expect(reply.headers['access-control-allow-origin']).toBe('*');
      expect(reply.headers['access-control-allow-methods']).toBe('GET, POST, OPTIONS');
    });

    test('should return recent log entries', async () => {
      const reply = await request(portOf(ctx.server), 'GET', '/logs?limit=5');

      expect(reply.status).toBe(200);
      expect(reply.body).toEqual({ entries: expect.any(Array) });
    });

    test('should treat repeated start and stop as no-ops', async () => {
      const port = ctx.server.port;
      await ctx.server.start();
      expect(ctx.server.port).toBe(port);

      await ctx.server.stop();
      await ctx.server.stop();
      expect(ctx.server.isRunning).toBe(false);
      expect(ctx.server.port).toBeNull();
    });
  });

  describe('startup failures', () => {
    let blocker: net.Server;

    beforeEach(async () => {
      blocker = net.createServer();
      await new Promise<void>(resolve => blocker.listen(0, '127.0.0.1', resolve));
    });

    afterEach(async () => {
      await new Promise<void>(resolve => blocker.close(() => resolve()));
    });

    test('should report a port already in use and stay stopped', async () => {
      const address = blocker.address();
      const port = address !== null && typeof address === 'object' ? address.port : 0;
      ctx = setup();
      const settings = new SettingsStore({
        filePath: null,
        overrides: { httpPort: port, bindAddress: '127.0.0.1' },
        logger
      });
      const server = new ControlServer({ audio: ctx.audio, correlator: ctx.correlator, channel: ctx.channel, settings, logger });

      await expect(server.start()).rejects.toBeInstanceOf(PortInUseError);
      await expect(server.start()).rejects.toThrow(`Port ${port} is already in use`);
      expect(server.isRunning).toBe(false);
    });
  });
});
