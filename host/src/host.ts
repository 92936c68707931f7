// Wires settings, audio, bridge and HTTP endpoint together for the mic-remote host

import { AudioService } from './audio/audio-service';
import { AudioController, createAudioController } from './audio';
import { BridgeCorrelator } from './bridge/correlator';
import { BridgeEventChannel } from './bridge/event-channel';
import { PortInUseError } from './errors';
import { ControlServer, ControlServerOptions } from './http/server';
import { getLogger, Logger } from './logger';
import { SettingsStore } from './settings';

export interface MicRemoteHostOptions {
  settings: SettingsStore;
  controller?: AudioController;
  simulate?: boolean;
  server?: ControlServerOptions;
  logger?: Logger;
}

export class MicRemoteHost {
  readonly settings: SettingsStore;
  readonly audio: AudioService;
  readonly channel: BridgeEventChannel;
  readonly correlator: BridgeCorrelator;
  readonly server: ControlServer;
  private logger: Logger;

  constructor(options: MicRemoteHostOptions) {
    this.logger = options.logger ?? getLogger();
    this.settings = options.settings;

    const current = this.settings.settings;
    const controller = options.controller
      ?? createAudioController({ simulate: options.simulate, logger: this.logger });

    this.audio = new AudioService(controller, {
      muteMode: current.muteMode,
      volumeStep: current.volumeStep,
      nullDeviceUid: current.nullDeviceUid,
      logger: this.logger
    });
    this.channel = new BridgeEventChannel({
      maxEventAgeMs: current.bridgeTimeoutMs,
      logger: this.logger
    });
    this.correlator = new BridgeCorrelator(this.channel, {
      timeoutMs: current.bridgeTimeoutMs,
      policy: current.bridgePolicy,
      logger: this.logger
    });
    this.server = new ControlServer({
      audio: this.audio,
      correlator: this.correlator,
      channel: this.channel,
      settings: this.settings,
      logger: this.logger
    }, options.server);

    this.audio.onChange((state) => {
      this.logger.debug('Audio state changed', state, 'MicRemoteHost');
    });

    this.logger.info('Host initialized', { controller: controller.name, muteMode: current.muteMode }, 'MicRemoteHost');
  }

  // Resolves false when the HTTP server is disabled in settings
  async start(): Promise<boolean> {
    if (!this.settings.settings.httpServerEnabled) {
      this.logger.info('HTTP server disabled in settings', undefined, 'MicRemoteHost');
      return false;
    }

    await this.server.start();
    return true;
  }

  // Start-up path for the process: a taken port is logged and the host stays up,
  // so a reload with a free port can still bring the endpoint online
  async launch(): Promise<boolean> {
    try {
      return await this.start();
    } catch (error) {
      if (!(error instanceof PortInUseError)) {
        throw error;
      }
      this.logger.error(`${error.message}; waiting for a settings reload`, error, 'MicRemoteHost');
      return false;
    }
  }

  // Re-reads the settings file and applies it, restarting the server when needed
  async reload(): Promise<boolean> {
    const previous = this.settings.settings;
    const next = this.settings.load();
    this.applySettings();

    const endpointChanged = previous.httpPort !== next.httpPort || previous.bindAddress !== next.bindAddress;

    if (!next.httpServerEnabled) {
      await this.server.stop();
      this.logger.info('Settings reloaded, HTTP server disabled', undefined, 'MicRemoteHost');
      return false;
    }

    if (!this.server.isRunning) {
      await this.server.start();
    } else if (endpointChanged) {
      await this.server.restart();
    }

    this.logger.info('Settings reloaded', { port: this.server.port }, 'MicRemoteHost');
    return true;
  }

  async stop(): Promise<void> {
    await this.server.stop();
    this.logger.info('Host stopped', undefined, 'MicRemoteHost');
  }

  private applySettings(): void {
    const current = this.settings.settings;
    this.audio.configure({
      muteMode: current.muteMode,
      volumeStep: current.volumeStep,
      nullDeviceUid: current.nullDeviceUid
    });
    this.correlator.configure({ timeoutMs: current.bridgeTimeoutMs, policy: current.bridgePolicy });
    this.channel.setMaxEventAge(current.bridgeTimeoutMs);
    if (!current.bridgeMode) {
      this.correlator.cancel();
    }
  }
}
