// Persistent settings for the mic-remote host
// Stored as JSON under ~/.config/mic-remote and validated on every load and update

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { fromZodError } from './errors';
import { getLogger, Logger } from './logger';

export const MUTE_MODES = ['hardware-mute', 'volume-zero', 'device-switch'] as const;
export type MuteMode = typeof MUTE_MODES[number];

export const BRIDGE_POLICIES = ['reject', 'supersede'] as const;
export type BridgePolicy = typeof BRIDGE_POLICIES[number];

export const SettingsSchema = z.object({
  httpServerEnabled: z.boolean().default(true),
  httpPort: z.number().int().min(0).max(65535).default(8765),
  bindAddress: z.string().min(1).default('0.0.0.0'),
  muteMode: z.enum(MUTE_MODES).default('hardware-mute'),
  volumeStep: z.number().gt(0).max(1).default(0.1),
  bridgeMode: z.boolean().default(false),
  bridgeTimeoutMs: z.number().int().positive().default(5000),
  bridgePolicy: z.enum(BRIDGE_POLICIES).default('reject'),
  nullDeviceUid: z.string().min(1).optional(),
  requestCount: z.number().int().nonnegative().default(0)
});

export type AppSettings = z.infer<typeof SettingsSchema>;

const SETTING_KEYS = SettingsSchema.keyof().options;

export const DEFAULT_SETTINGS: Readonly<AppSettings> = Object.freeze(SettingsSchema.parse({}));

export function defaultSettingsPath(): string {
  return process.env.MIC_REMOTE_SETTINGS
    || path.join(os.homedir(), '.config', 'mic-remote', 'settings.json');
}

export interface SettingsStoreOptions {
  // null keeps settings in memory only
  filePath?: string | null;
  // Applied on top of the file, never written back
  overrides?: Partial<AppSettings>;
  logger?: Logger;
}

export class SettingsStore {
  private readonly filePath: string | null;
  private overrides: Partial<AppSettings>;
  private persisted: AppSettings;
  private current: AppSettings;
  private logger: Logger;

  constructor(options: SettingsStoreOptions = {}) {
    this.filePath = options.filePath === undefined ? defaultSettingsPath() : options.filePath;
    this.overrides = options.overrides ?? {};
    this.logger = options.logger ?? getLogger();
    this.persisted = { ...DEFAULT_SETTINGS };
    this.current = this.withOverrides(this.persisted);
    this.load();
  }

  get settings(): Readonly<AppSettings> {
    return this.current;
  }

  get path(): string | null {
    return this.filePath;
  }

  load(): Readonly<AppSettings> {
    this.persisted = this.readFile();
    this.current = this.withOverrides(this.persisted);
    return this.current;
  }

  update(patch: Partial<AppSettings>): Readonly<AppSettings> {
    const result = SettingsSchema.safeParse({ ...this.persisted, ...patch });
    if (!result.success) {
      throw fromZodError(result.error, 'Invalid settings');
    }

    this.persisted = result.data;
    this.releaseOverrides(patch);
    this.current = this.withOverrides(this.persisted);
    this.save();
    this.logger.debug('Settings updated', { keys: Object.keys(patch) }, 'SettingsStore');
    return this.current;
  }

  incrementRequestCount(): number {
    this.persisted = { ...this.persisted, requestCount: this.persisted.requestCount + 1 };
    this.current = this.withOverrides(this.persisted);
    this.save();
    return this.current.requestCount;
  }

  save(): boolean {
    if (!this.filePath) return true;

    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, JSON.stringify(this.persisted, null, 2) + '\n', 'utf8');
      return true;
    } catch (error) {
      this.logger.error('Failed to save settings', error, 'SettingsStore');
      return false;
    }
  }

  private readFile(): AppSettings {
    if (!this.filePath || !fs.existsSync(this.filePath)) {
      this.logger.debug('Using default settings', { path: this.filePath }, 'SettingsStore');
      return { ...DEFAULT_SETTINGS };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, 'utf8'));
    } catch (error) {
      this.logger.warn('Settings file is not valid JSON, using defaults', {
        path: this.filePath,
        error: error instanceof Error ? error.message : String(error)
      }, 'SettingsStore');
      return { ...DEFAULT_SETTINGS };
    }

    const result = SettingsSchema.safeParse(raw);
    if (!result.success) {
      this.logger.warn('Settings file failed validation, using defaults', {
        path: this.filePath,
        error: fromZodError(result.error).message
      }, 'SettingsStore');
      return { ...DEFAULT_SETTINGS };
    }

    this.logger.info('Settings loaded', { path: this.filePath }, 'SettingsStore');
    return result.data;
  }

  // A runtime update takes precedence over a start-up override of the same key
  private releaseOverrides(patch: Partial<AppSettings>): void {
    const overrides = { ...this.overrides };
    for (const key of SETTING_KEYS) {
      if (key in patch) {
        delete overrides[key];
      }
    }
    this.overrides = overrides;
  }

  private withOverrides(settings: AppSettings): AppSettings {
    const result = SettingsSchema.safeParse({ ...settings, ...this.overrides });
    if (!result.success) {
      throw fromZodError(result.error, 'Invalid settings override');
    }
    return result.data;
  }
}
