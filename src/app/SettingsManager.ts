import { DEFAULT_SETTINGS, copySettings, defaultSettings } from '../core/settings.js';
import type { HintSettings } from '../core/types.js';

export type SettingsStorage = Pick<Storage, 'getItem' | 'setItem'>;

function isValidSetting<K extends keyof HintSettings>(key: K, value: unknown): value is HintSettings[K] {
  switch (key) {
    case 'longDurationMs':
    case 'minCompressibleBytes':
      return typeof value === 'number' && Number.isFinite(value) && value >= 0;
    case 'disabledRules':
      return Array.isArray(value) && value.every(name => typeof name === 'string');
    default:
      return false;
  }
}

function isSettingKey(key: string): key is keyof HintSettings {
  return Object.hasOwn(DEFAULT_SETTINGS, key);
}

/**
 * Manages hint settings with localStorage persistence
 */
export class SettingsManager {
  private static readonly STORAGE_KEY = 'tracehints-settings';
  private settings: HintSettings;
  private changeCallback: ((settings: HintSettings) => void) | null = null;

  constructor(private readonly storage?: SettingsStorage) {
    this.settings = defaultSettings();
    this.loadSettings();
  }

  private getStorage(): SettingsStorage {
    return this.storage ?? localStorage;
  }

  /**
   * Copy every well-formed setting from `source` over `target`. Returns the
   * first key that was unknown or malformed, if any.
   */
  private applySettings(target: HintSettings, source: Record<string, unknown>): string | null {
    for (const [key, value] of Object.entries(source)) {
      if (!isSettingKey(key)) return key;
      switch (key) {
        case 'longDurationMs':
        case 'minCompressibleBytes':
          if (!isValidSetting(key, value)) return key;
          target[key] = value;
          break;
        case 'disabledRules':
          if (!isValidSetting(key, value)) return key;
          target.disabledRules = [...value];
          break;
      }
    }
    return null;
  }

  /**
   * Load settings from localStorage
   */
  private loadSettings(): void {
    try {
      const saved = this.getStorage().getItem(SettingsManager.STORAGE_KEY);
      if (!saved) return;
      const parsed: unknown = JSON.parse(saved);
      if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new Error('stored settings are not an object');
      }
      // Merge with defaults, dropping anything this version does not know
      const merged = defaultSettings();
      for (const [key, value] of Object.entries(parsed)) {
        this.applySettings(merged, { [key]: value });
      }
      this.settings = merged;
    } catch (error) {
      console.warn('Failed to load settings from localStorage:', error);
      this.settings = defaultSettings();
    }
  }

  /**
   * Save settings to localStorage
   */
  private saveSettings(): void {
    try {
      this.getStorage().setItem(SettingsManager.STORAGE_KEY, JSON.stringify(this.settings));
    } catch (error) {
      console.warn('Failed to save settings to localStorage:', error);
    }
  }

  getSettings(): HintSettings {
    return copySettings(this.settings);
  }

  updateSetting<K extends keyof HintSettings>(key: K, value: HintSettings[K]): void {
    this.settings[key] = value;
    this.saveSettings();
    this.notifyChange();
  }

  /**
   * Enable or disable a rule by name
   */
  setRuleEnabled(ruleName: string, enabled: boolean): void {
    const disabled = this.settings.disabledRules.filter(name => name !== ruleName);
    if (!enabled) disabled.push(ruleName);
    this.updateSetting('disabledRules', disabled);
  }

  resetToDefaults(): void {
    this.settings = defaultSettings();
    this.saveSettings();
    this.notifyChange();
  }

  /**
   * Set callback for when settings change
   */
  onChange(callback: (settings: HintSettings) => void): void {
    this.changeCallback = callback;
  }

  private notifyChange(): void {
    if (this.changeCallback) {
      this.changeCallback(this.getSettings());
    }
  }

  /**
   * Import settings from JSON string. Unknown keys and malformed values
   * reject the whole import.
   */
  importSettings(jsonString: string): boolean {
    try {
      const imported: unknown = JSON.parse(jsonString);
      if (typeof imported !== 'object' || imported === null || Array.isArray(imported)) {
        throw new Error('Settings must be a JSON object');
      }

      const merged = defaultSettings();
      const badKey = this.applySettings(merged, { ...imported });
      if (badKey !== null) {
        throw new Error(`Unknown or invalid setting: ${badKey}`);
      }

      this.settings = merged;
      this.saveSettings();
      this.notifyChange();
      return true;
    } catch (error) {
      console.warn('Failed to import settings:', error);
      return false;
    }
  }

  exportSettings(): string {
    return JSON.stringify(this.settings, null, 2);
  }
}
