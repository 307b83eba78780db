/**
 * @fileoverview Server configuration with debounced persistence.
 *
 * The stored file is read synchronously at construction, so startup code sees the saved
 * values before anything else runs. Updates (the command-line overrides) are sanitized field
 * by field and written back shortly after. Writes go through a temporary file and a rename,
 * the same way the catalog is saved.
 *
 * The configuration file lives in the data directory (`DATA_DIR` or `./data`).
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  AppConfig,
  CONFIG_KEYS,
  DEFAULT_CONFIG,
  isValidConfigKey,
  sanitizeConfig
} from '../types/config';
import { getConfigFilePath } from '../utils/setup';
import { logError, logInfo, logWarning } from '../utils/logging';

const SAVE_DEBOUNCE_MS = 100;

function changedKeysBetween(previous: AppConfig, next: AppConfig): Array<keyof AppConfig> {
  return CONFIG_KEYS.filter(key => previous[key] !== next[key]);
}

/**
 * True when the file content is not exactly the sanitized configuration
 * (unknown keys, missing keys or replaced values)
 */
function needsNormalizing(stored: unknown, sanitized: AppConfig): boolean {
  if (typeof stored !== 'object' || stored === null || Array.isArray(stored)) {
    return true;
  }

  const entries = new Map<string, unknown>(Object.entries(stored));
  if ([...entries.keys()].some(key => !isValidConfigKey(key))) {
    return true;
  }
  return CONFIG_KEYS.some(key => entries.get(key) !== sanitized[key]);
}

export class ConfigManager {
  private static instance: ConfigManager | null = null;

  private readonly configPath: string;
  private current: AppConfig = DEFAULT_CONFIG;
  private saveTimer: NodeJS.Timeout | null = null;
  private saving: Promise<void> | null = null;

  constructor(configPath: string = getConfigFilePath()) {
    this.configPath = configPath;
    this.load();
  }

  public static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  /**
   * Frozen copy of the whole configuration
   */
  public getConfig(): Readonly<AppConfig> {
    return Object.freeze({ ...this.current });
  }

  public get<K extends keyof AppConfig>(key: K): AppConfig[K] {
    return this.current[key];
  }

  /**
   * Merge and sanitize; an invalid value leaves its key at the default. Returns the keys
   * that changed.
   */
  public updateConfig(updates: Partial<AppConfig>): Array<keyof AppConfig> {
    const next = sanitizeConfig({ ...this.current, ...updates });
    const changedKeys = changedKeysBetween(this.current, next);
    if (changedKeys.length > 0) {
      this.current = next;
      this.scheduleSave();
    }
    return changedKeys;
  }

  /**
   * Writes a pending change now
   */
  public async dispose(): Promise<void> {
    if (this.saveTimer) {
      this.cancelScheduledSave();
      await this.saveToFile();
      logInfo('Config', 'Pending configuration saved during shutdown');
    }

    if (ConfigManager.instance === this) {
      ConfigManager.instance = null;
    }
  }

  /**
   * A missing file keeps the defaults; an unreadable one is logged and overwritten on the
   * next save
   */
  private load(): void {
    if (!fs.existsSync(this.configPath)) {
      return;
    }

    let stored: unknown;
    try {
      stored = JSON.parse(fs.readFileSync(this.configPath, 'utf8'));
    } catch (error) {
      logError('Config', 'Failed to load config file, using defaults:', error);
      this.scheduleSave();
      return;
    }

    this.current = sanitizeConfig(stored);

    if (needsNormalizing(stored, this.current)) {
      logWarning('Config', 'Stored configuration was normalized, scheduling save');
      this.scheduleSave();
    }
  }

  private cancelScheduledSave(): void {
    if (this.saveTimer) {
      clearTimeout(this.saveTimer);
      this.saveTimer = null;
    }
  }

  private scheduleSave(): void {
    this.cancelScheduledSave();
    this.saveTimer = setTimeout(() => {
      this.saveTimer = null;
      this.saveToFile().catch(error => {
        logError('Config', 'Failed to save config:', error);
      });
    }, SAVE_DEBOUNCE_MS);
    this.saveTimer.unref();
  }

  /**
   * Saves run one at a time; a save requested during another waits for it
   */
  private async saveToFile(): Promise<void> {
    while (this.saving) {
      await this.saving;
    }

    this.saving = this.writeFile();
    try {
      await this.saving;
    } finally {
      this.saving = null;
    }
  }

  private async writeFile(): Promise<void> {
    const tempPath = `${this.configPath}.tmp`;
    await fs.promises.mkdir(path.dirname(this.configPath), { recursive: true });
    await fs.promises.writeFile(tempPath, JSON.stringify(this.current, null, 2), 'utf8');
    await fs.promises.rename(tempPath, this.configPath);
  }
}

export function getConfigManager(): ConfigManager {
  return ConfigManager.getInstance();
}
