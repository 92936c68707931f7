// Audio control adapter used by the HTTP endpoint
// Wraps a platform controller with clamping, mute modes, and change notifications

import { EventEmitter } from 'events';
import { AdapterError, ValidationError, toAdapterError } from '../errors';
import { getLogger, Logger } from '../logger';
import type { MuteMode } from '../settings';
import type { AudioController } from './index';

export interface AudioState {
  outputVolume: number;
  outputMuted: boolean;
  micMuted: boolean;
}

export type AudioChangeListener = (state: AudioState) => void;

export interface AudioServiceOptions {
  muteMode?: MuteMode;
  volumeStep?: number;
  nullDeviceUid?: string;
  logger?: Logger;
}

const VOLUME_EPSILON = 0.0005;
const DEFAULT_RESTORE_VOLUME = 1;

export function clampVolume(volume: number): number {
  return Math.max(0, Math.min(1, volume));
}

// Keeps repeated steps from drifting, 0.7 + 0.1 lands on 0.8
function roundVolume(volume: number): number {
  return Math.round(volume * 10000) / 10000;
}

export class AudioService {
  private readonly emitter = new EventEmitter();
  private readonly controller: AudioController;
  private logger: Logger;
  private muteMode: MuteMode;
  private volumeStep: number;
  private nullDeviceUid?: string;
  private savedInputVolume: number | null = null;
  private realMicUid: string | null = null;

  constructor(controller: AudioController, options: AudioServiceOptions = {}) {
    this.controller = controller;
    this.logger = options.logger ?? getLogger();
    this.muteMode = options.muteMode ?? 'hardware-mute';
    this.volumeStep = options.volumeStep ?? 0.1;
    this.nullDeviceUid = options.nullDeviceUid;
  }

  get mode(): MuteMode {
    return this.muteMode;
  }

  get step(): number {
    return this.volumeStep;
  }

  configure(options: Pick<AudioServiceOptions, 'muteMode' | 'volumeStep' | 'nullDeviceUid'>): void {
    if (options.muteMode !== undefined && options.muteMode !== this.muteMode) {
      this.logger.info('Mute mode changed', { from: this.muteMode, to: options.muteMode }, 'AudioService');
      this.muteMode = options.muteMode;
    }
    if (options.volumeStep !== undefined) {
      this.volumeStep = options.volumeStep;
    }
    this.nullDeviceUid = options.nullDeviceUid;
  }

  onChange(listener: AudioChangeListener): () => void {
    this.emitter.on('change', listener);
    return () => {
      this.emitter.off('change', listener);
    };
  }

  async getVolume(): Promise<number> {
    return this.call('getOutputVolume', () => this.controller.getOutputVolume());
  }

  async setVolume(volume: number): Promise<number> {
    if (!Number.isFinite(volume)) {
      throw new ValidationError('Volume must be a finite number', 'volume', volume);
    }

    const target = clampVolume(volume);
    const current = await this.getVolume();
    if (Math.abs(current - target) < VOLUME_EPSILON) {
      return current;
    }

    await this.call('setOutputVolume', () => this.controller.setOutputVolume(target));
    const updated = await this.getVolume();
    this.logger.info('Output volume set', { volume: updated }, 'AudioService');
    await this.notify();
    return updated;
  }

  async increase(): Promise<number> {
    const current = await this.getVolume();
    return this.setVolume(roundVolume(clampVolume(current + this.volumeStep)));
  }

  async decrease(): Promise<number> {
    const current = await this.getVolume();
    return this.setVolume(roundVolume(clampVolume(current - this.volumeStep)));
  }

  async getOutputMuted(): Promise<boolean> {
    return this.call('getOutputMuted', () => this.controller.getOutputMuted());
  }

  async toggleOutputMute(): Promise<boolean> {
    const muted = await this.getOutputMuted();
    await this.call('setOutputMuted', () => this.controller.setOutputMuted(!muted));
    this.logger.info('Output mute toggled', { muted: !muted }, 'AudioService');
    await this.notify();
    return !muted;
  }

  async getMuteState(): Promise<boolean> {
    switch (this.muteMode) {
      case 'hardware-mute':
        try {
          return await this.call('getInputMuted', () => this.controller.getInputMuted());
        } catch (error) {
          if (isUnsupported(error)) {
            return this.isInputVolumeZero();
          }
          throw error;
        }
      case 'volume-zero':
        return this.isInputVolumeZero();
      case 'device-switch': {
        if (!this.nullDeviceUid) {
          return this.isInputVolumeZero();
        }
        const current = await this.call('getDefaultInputDevice', () => this.controller.getDefaultInputDevice());
        if (current.uid === this.nullDeviceUid) {
          return true;
        }
        return this.isInputVolumeZero();
      }
    }
  }

  async toggleMute(): Promise<boolean> {
    return this.logger.timeAsync('toggleMute', async () => {
      const muted = await this.getMuteState();
      const next = !muted;

      switch (this.muteMode) {
        case 'hardware-mute':
          await this.toggleViaHardwareMute(next);
          break;
        case 'volume-zero':
          await this.toggleViaVolume(next);
          break;
        case 'device-switch':
          await this.toggleViaDeviceSwitch(next);
          break;
      }

      this.logger.info('Microphone toggled', { muted: next, mode: this.muteMode }, 'AudioService');
      await this.notify();
      return next;
    }, 'AudioService');
  }

  async getState(): Promise<AudioState> {
    const [outputVolume, outputMuted, micMuted] = await Promise.all([
      this.getVolume(),
      this.getOutputMuted(),
      this.getMuteState()
    ]);
    return { outputVolume, outputMuted, micMuted };
  }

  private async toggleViaHardwareMute(muted: boolean): Promise<void> {
    try {
      await this.call('setInputMuted', () => this.controller.setInputMuted(muted));
    } catch (error) {
      if (!isUnsupported(error)) {
        throw error;
      }
      this.logger.debug('Hardware mute not supported, falling back to volume', undefined, 'AudioService');
      await this.toggleViaVolume(muted);
    }
  }

  private async toggleViaVolume(muted: boolean): Promise<void> {
    if (muted) {
      const current = await this.call('getInputVolume', () => this.controller.getInputVolume());
      await this.call('setInputVolume', () => this.controller.setInputVolume(0));
      if (current > VOLUME_EPSILON) {
        this.savedInputVolume = current;
      }
      return;
    }

    const restore = this.savedInputVolume ?? DEFAULT_RESTORE_VOLUME;
    await this.call('setInputVolume', () => this.controller.setInputVolume(restore));
    this.savedInputVolume = null;
  }

  private async toggleViaDeviceSwitch(muted: boolean): Promise<void> {
    const nullDeviceUid = this.nullDeviceUid;
    if (!nullDeviceUid) {
      this.logger.warn('Null device not configured, falling back to volume', undefined, 'AudioService');
      await this.toggleViaVolume(muted);
      return;
    }

    const devices = await this.call('listInputDevices', () => this.controller.listInputDevices());
    const current = await this.call('getDefaultInputDevice', () => this.controller.getDefaultInputDevice());

    if (muted) {
      if (!devices.some(device => device.uid === nullDeviceUid)) {
        this.logger.warn('Null device not found, falling back to volume', { nullDeviceUid }, 'AudioService');
        await this.toggleViaVolume(true);
        return;
      }
      await this.call('setDefaultInputDevice', () => this.controller.setDefaultInputDevice(nullDeviceUid));
      this.realMicUid = current.uid;
      return;
    }

    if (current.uid !== nullDeviceUid) {
      // Muted through the volume fallback
      await this.toggleViaVolume(false);
      return;
    }

    const realMic = devices.find(device => device.uid === this.realMicUid)
      ?? devices.find(device => device.uid !== nullDeviceUid);
    if (!realMic) {
      throw new AdapterError('No microphone available to restore', 'NO_DEVICE');
    }
    await this.call('setDefaultInputDevice', () => this.controller.setDefaultInputDevice(realMic.uid));
    this.realMicUid = null;
  }

  private async isInputVolumeZero(): Promise<boolean> {
    const volume = await this.call('getInputVolume', () => this.controller.getInputVolume());
    return volume < VOLUME_EPSILON;
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw toAdapterError(error, operation);
    }
  }

  private async notify(): Promise<void> {
    if (this.emitter.listenerCount('change') === 0) return;

    try {
      const state = await this.getState();
      this.emitter.emit('change', state);
    } catch (error) {
      this.logger.warn('Failed to read audio state for listeners', {
        error: error instanceof Error ? error.message : String(error)
      }, 'AudioService');
    }
  }
}

function isUnsupported(error: unknown): boolean {
  return error instanceof AdapterError && error.code === 'UNSUPPORTED';
}
