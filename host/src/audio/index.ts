import * as os from 'os';
import { AdapterError } from '../errors';
import type { Logger } from '../logger';
import { MacOSAudioController } from './macos';
import { MemoryAudioController } from './memory';

export interface AudioDevice {
  uid: string;
  name: string;
}

// Volumes are scalars in [0, 1]
export interface AudioController {
  readonly name: string;
  getOutputVolume(): Promise<number>;
  setOutputVolume(volume: number): Promise<void>;
  getOutputMuted(): Promise<boolean>;
  setOutputMuted(muted: boolean): Promise<void>;
  getInputVolume(): Promise<number>;
  setInputVolume(volume: number): Promise<void>;
  getInputMuted(): Promise<boolean>;
  setInputMuted(muted: boolean): Promise<void>;
  listInputDevices(): Promise<AudioDevice[]>;
  getDefaultInputDevice(): Promise<AudioDevice>;
  setDefaultInputDevice(uid: string): Promise<void>;
}

export interface CreateAudioControllerOptions {
  platform?: NodeJS.Platform;
  simulate?: boolean;
  logger?: Logger;
}

export function createAudioController(options: CreateAudioControllerOptions = {}): AudioController {
  if (options.simulate) {
    return new MemoryAudioController();
  }

  const platform = options.platform ?? os.platform();

  switch (platform) {
    case 'darwin':
      return new MacOSAudioController({ logger: options.logger });
    default:
      throw new AdapterError(
        `Audio control is not available on ${platform}; run with --simulate to use the in-memory mixer`,
        'UNSUPPORTED'
      );
  }
}

export * from './macos';
export * from './memory';
export * from './audio-service';
