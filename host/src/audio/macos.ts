import { spawn } from 'child_process';
import { z } from 'zod';
import { AdapterError, toAdapterError } from '../errors';
import { getLogger, Logger } from '../logger';
import type { AudioController, AudioDevice } from './index';

export type CommandRunner = (command: string, args: string[]) => Promise<string>;

export interface VolumeSettings {
  outputVolume: number | null;
  inputVolume: number | null;
  outputMuted: boolean | null;
}

export interface MacOSAudioOptions {
  logger?: Logger;
  runner?: CommandRunner;
  switchAudioSource?: string;
}

const DeviceLineSchema = z.object({
  name: z.string(),
  uid: z.string().min(1),
  type: z.string().optional()
});

// Parses the record printed by `get volume settings`, e.g.
// "output volume:50, input volume:75, alert volume:100, output muted:false"
export function parseVolumeSettings(text: string): VolumeSettings {
  const fields = new Map<string, string>();
  for (const part of text.split(',')) {
    const separator = part.indexOf(':');
    if (separator === -1) continue;
    fields.set(part.slice(0, separator).trim(), part.slice(separator + 1).trim());
  }

  const number = (key: string): number | null => {
    const value = fields.get(key);
    if (value === undefined || value === 'missing value') return null;
    const parsed = parseInt(value, 10);
    return Number.isNaN(parsed) ? null : Math.max(0, Math.min(100, parsed));
  };

  const mutedText = fields.get('output muted');
  return {
    outputVolume: number('output volume'),
    inputVolume: number('input volume'),
    outputMuted: mutedText === 'true' ? true : mutedText === 'false' ? false : null
  };
}

// SwitchAudioSource prints one JSON object per line with `-f json`
export function parseDeviceList(text: string): AudioDevice[] {
  const devices: AudioDevice[] = [];
  for (const line of text.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch {
      continue;
    }

    const result = DeviceLineSchema.safeParse(parsed);
    if (result.success && (result.data.type === undefined || result.data.type === 'input')) {
      devices.push({ uid: result.data.uid, name: result.data.name });
    }
  }
  return devices;
}

export function runCommand(command: string, args: string[]): Promise<string> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args);
    let output = '';
    let error = '';

    child.stdout.on('data', (data) => {
      output += data.toString();
    });

    child.stderr.on('data', (data) => {
      error += data.toString();
    });

    child.on('error', (spawnError: NodeJS.ErrnoException) => {
      if (spawnError.code === 'ENOENT') {
        reject(new AdapterError(`${command} is not installed`, 'UNSUPPORTED'));
      } else {
        reject(spawnError);
      }
    });

    child.on('close', (code) => {
      if (code === 0) {
        resolve(output.trim());
      } else {
        reject(new Error(`${command} exited with code ${code}: ${error.trim()}`));
      }
    });
  });
}

export class MacOSAudioController implements AudioController {
  readonly name = 'macos';
  private logger: Logger;
  private runner: CommandRunner;
  private switchAudioSource: string;

  constructor(options: MacOSAudioOptions = {}) {
    this.logger = options.logger ?? getLogger();
    this.runner = options.runner ?? runCommand;
    this.switchAudioSource = options.switchAudioSource ?? 'SwitchAudioSource';
  }

  async getOutputVolume(): Promise<number> {
    const { outputVolume } = await this.getVolumeSettings();
    if (outputVolume === null) {
      throw new AdapterError('No default output device', 'NO_DEVICE');
    }
    return outputVolume / 100;
  }

  async setOutputVolume(volume: number): Promise<void> {
    await this.executeAppleScript(`set volume output volume ${toPercent(volume)}`);
  }

  async getOutputMuted(): Promise<boolean> {
    const { outputMuted } = await this.getVolumeSettings();
    if (outputMuted === null) {
      throw new AdapterError('No default output device', 'NO_DEVICE');
    }
    return outputMuted;
  }

  async setOutputMuted(muted: boolean): Promise<void> {
    await this.executeAppleScript(`set volume output muted ${muted}`);
  }

  async getInputVolume(): Promise<number> {
    const { inputVolume } = await this.getVolumeSettings();
    if (inputVolume === null) {
      throw new AdapterError('No default input device', 'NO_DEVICE');
    }
    return inputVolume / 100;
  }

  async setInputVolume(volume: number): Promise<void> {
    await this.executeAppleScript(`set volume input volume ${toPercent(volume)}`);
  }

  // AppleScript exposes no input mute flag
  async getInputMuted(): Promise<boolean> {
    throw new AdapterError('Hardware input mute is not available through AppleScript', 'UNSUPPORTED');
  }

  async setInputMuted(_muted: boolean): Promise<void> {
    throw new AdapterError('Hardware input mute is not available through AppleScript', 'UNSUPPORTED');
  }

  async listInputDevices(): Promise<AudioDevice[]> {
    const output = await this.execute(this.switchAudioSource, ['-a', '-t', 'input', '-f', 'json']);
    return parseDeviceList(output);
  }

  async getDefaultInputDevice(): Promise<AudioDevice> {
    const output = await this.execute(this.switchAudioSource, ['-c', '-t', 'input', '-f', 'json']);
    const [device] = parseDeviceList(output);
    if (!device) {
      throw new AdapterError('No default input device', 'NO_DEVICE');
    }
    return device;
  }

  async setDefaultInputDevice(uid: string): Promise<void> {
    await this.execute(this.switchAudioSource, ['-t', 'input', '-u', uid]);
    this.logger.debug('Switched default input device', { uid }, 'MacOSAudioController');
  }

  private async getVolumeSettings(): Promise<VolumeSettings> {
    const output = await this.executeAppleScript('get volume settings');
    return parseVolumeSettings(output);
  }

  private executeAppleScript(script: string): Promise<string> {
    return this.execute('osascript', ['-e', script]);
  }

  private async execute(command: string, args: string[]): Promise<string> {
    try {
      return await this.runner(command, args);
    } catch (error) {
      this.logger.debug('Command failed', {
        command,
        args,
        error: error instanceof Error ? error.message : String(error)
      }, 'MacOSAudioController');
      throw toAdapterError(error, command);
    }
  }
}

function toPercent(volume: number): number {
  return Math.round(Math.max(0, Math.min(1, volume)) * 100);
}
