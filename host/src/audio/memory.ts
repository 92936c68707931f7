// In-process mixer used by --simulate and by the tests
// Mirrors the behaviour of a real device, including missing devices and failing OS calls

import { AdapterError } from '../errors';
import type { AudioController, AudioDevice } from './index';

export interface MemoryAudioOptions {
  outputVolume?: number;
  outputMuted?: boolean;
  inputVolume?: number;
  inputMuted?: boolean;
  supportsInputMute?: boolean;
  devices?: AudioDevice[];
  // null simulates a machine without an input device
  defaultInputUid?: string | null;
}

export const SIMULATED_DEVICES: readonly AudioDevice[] = [
  { uid: 'simulated-mic', name: 'Simulated Microphone' },
  { uid: 'simulated-null', name: 'Simulated Null Input' }
];

export class MemoryAudioController implements AudioController {
  readonly name = 'memory';
  // Every mutating call, in order, e.g. "setOutputVolume:0.3"
  readonly writes: string[] = [];

  private outputVolume: number;
  private outputMuted: boolean;
  private inputVolume: number;
  private inputMuted: boolean;
  private supportsInputMute: boolean;
  private devices: AudioDevice[];
  private defaultInputUid: string | null;
  private failure: AdapterError | null = null;

  constructor(options: MemoryAudioOptions = {}) {
    this.outputVolume = options.outputVolume ?? 0.5;
    this.outputMuted = options.outputMuted ?? false;
    this.inputVolume = options.inputVolume ?? 1;
    this.inputMuted = options.inputMuted ?? false;
    this.supportsInputMute = options.supportsInputMute ?? true;
    this.devices = [...(options.devices ?? SIMULATED_DEVICES)];
    this.defaultInputUid = options.defaultInputUid === undefined
      ? this.devices[0]?.uid ?? null
      : options.defaultInputUid;
  }

  // While set, every call rejects with this error
  setFailure(error: AdapterError | null): void {
    this.failure = error;
  }

  setDevices(devices: AudioDevice[], defaultInputUid: string | null): void {
    this.devices = [...devices];
    this.defaultInputUid = defaultInputUid;
  }

  async getOutputVolume(): Promise<number> {
    this.check();
    return this.outputVolume;
  }

  async setOutputVolume(volume: number): Promise<void> {
    this.check();
    this.outputVolume = volume;
    this.writes.push(`setOutputVolume:${volume}`);
  }

  async getOutputMuted(): Promise<boolean> {
    this.check();
    return this.outputMuted;
  }

  async setOutputMuted(muted: boolean): Promise<void> {
    this.check();
    this.outputMuted = muted;
    this.writes.push(`setOutputMuted:${muted}`);
  }

  async getInputVolume(): Promise<number> {
    this.checkInput();
    return this.inputVolume;
  }

  async setInputVolume(volume: number): Promise<void> {
    this.checkInput();
    this.inputVolume = volume;
    this.writes.push(`setInputVolume:${volume}`);
  }

  async getInputMuted(): Promise<boolean> {
    this.checkInput();
    this.checkInputMute();
    return this.inputMuted;
  }

  async setInputMuted(muted: boolean): Promise<void> {
    this.checkInput();
    this.checkInputMute();
    this.inputMuted = muted;
    this.writes.push(`setInputMuted:${muted}`);
  }

  async listInputDevices(): Promise<AudioDevice[]> {
    this.check();
    return this.devices.map(device => ({ ...device }));
  }

  async getDefaultInputDevice(): Promise<AudioDevice> {
    this.checkInput();
    const device = this.devices.find(candidate => candidate.uid === this.defaultInputUid);
    if (!device) {
      throw new AdapterError('Default input device is not available', 'NO_DEVICE');
    }
    return { ...device };
  }

  async setDefaultInputDevice(uid: string): Promise<void> {
    this.check();
    if (!this.devices.some(device => device.uid === uid)) {
      throw new AdapterError(`Input device not found: ${uid}`, 'NO_DEVICE');
    }
    this.defaultInputUid = uid;
    this.writes.push(`setDefaultInputDevice:${uid}`);
  }

  private check(): void {
    if (this.failure) {
      throw this.failure;
    }
  }

  private checkInput(): void {
    this.check();
    if (this.defaultInputUid === null) {
      throw new AdapterError('No default input device', 'NO_DEVICE');
    }
  }

  private checkInputMute(): void {
    if (!this.supportsInputMute) {
      throw new AdapterError('Input device does not expose a mute control', 'UNSUPPORTED');
    }
  }
}
