import * as fs from 'fs';
import * as net from 'net';
import * as os from 'os';
import * as path from 'path';
import { MemoryAudioController } from './audio/memory';
import { MicRemoteHost } from './host';
import { Logger } from './logger';
import { SettingsStore } from './settings';

describe('MicRemoteHost', () => {
  const logger = new Logger({ enableConsole: false, enableFile: false });
  let dir: string;
  let filePath: string;
  let host: MicRemoteHost;

  function writeSettings(values: Record<string, unknown>): void {
    fs.writeFileSync(filePath, JSON.stringify(values), 'utf8');
  }

  function createHost(): MicRemoteHost {
    const settings = new SettingsStore({
      filePath,
      overrides: { httpPort: 0, bindAddress: '127.0.0.1' },
      logger
    });
    return new MicRemoteHost({ settings, controller: new MemoryAudioController(), logger });
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mic-remote-host-'));
    filePath = path.join(dir, 'settings.json');
  });

  afterEach(async () => {
    await host.stop();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('should start the HTTP server when enabled', async () => {
    host = createHost();

    await expect(host.start()).resolves.toBe(true);
    expect(host.server.isRunning).toBe(true);
    expect(host.server.port).toBeGreaterThan(0);
  });

  test('should stay stopped when the HTTP server is disabled', async () => {
    writeSettings({ httpServerEnabled: false });
    host = createHost();

    await expect(host.start()).resolves.toBe(false);
    expect(host.server.isRunning).toBe(false);
  });

  test('should build the audio service and correlator from settings', () => {
    writeSettings({ muteMode: 'volume-zero', volumeStep: 0.05, bridgePolicy: 'supersede' });
    host = createHost();

    expect(host.audio.mode).toBe('volume-zero');
    expect(host.audio.step).toBe(0.05);
  });

  test('should apply reloaded settings', async () => {
    host = createHost();
    await host.start();

    writeSettings({ muteMode: 'device-switch', volumeStep: 0.2 });
    await expect(host.reload()).resolves.toBe(true);

    expect(host.audio.mode).toBe('device-switch');
    expect(host.audio.step).toBe(0.2);
    expect(host.server.isRunning).toBe(true);
  });

  test('should stop the server when a reload disables it', async () => {
    host = createHost();
    await host.start();

    writeSettings({ httpServerEnabled: false });
    await expect(host.reload()).resolves.toBe(false);

    expect(host.server.isRunning).toBe(false);
  });

  test('should cancel a pending bridge toggle when a reload turns bridge mode off', async () => {
    writeSettings({ bridgeMode: true });
    host = createHost();

    const outcome = host.correlator.request();
    writeSettings({ bridgeMode: false });
    await host.reload();

    await expect(outcome).resolves.toMatchObject({ status: 'cancelled' });
  });

  test('should stay up when the port is taken and start once a reload frees it', async () => {
    const blocker = net.createServer();
    await new Promise<void>(resolve => blocker.listen(0, '127.0.0.1', resolve));
    const address = blocker.address();
    const takenPort = address !== null && typeof address === 'object' ? address.port : 0;

    try {
      writeSettings({ httpPort: takenPort });
      const settings = new SettingsStore({ filePath, overrides: { bindAddress: '127.0.0.1' }, logger });
      host = new MicRemoteHost({ settings, controller: new MemoryAudioController(), logger });

      await expect(host.launch()).resolves.toBe(false);
      expect(host.server.isRunning).toBe(false);

      writeSettings({ httpPort: 0 });
      await expect(host.reload()).resolves.toBe(true);
      expect(host.server.isRunning).toBe(true);
      expect(host.server.port).not.toBe(takenPort);
    } finally {
      await new Promise<void>(resolve => blocker.close(() => resolve()));
    }
  });

  test('should launch like start when the port is free', async () => {
    host = createHost();

    await expect(host.launch()).resolves.toBe(true);
    expect(host.server.isRunning).toBe(true);
  });
});
