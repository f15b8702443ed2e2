/**
 * Default hint settings, shared by the host page and the worker
 */

import type { HintSettings } from './types.js';

export interface ReadonlyHintSettings {
  readonly longDurationMs: number;
  readonly minCompressibleBytes: number;
  readonly disabledRules: readonly string[];
}

export const DEFAULT_SETTINGS: ReadonlyHintSettings = Object.freeze({
  longDurationMs: 100,
  minCompressibleBytes: 150,
  disabledRules: Object.freeze([]),
});

export function copySettings(settings: ReadonlyHintSettings): HintSettings {
  return { ...settings, disabledRules: [...settings.disabledRules] };
}

export function defaultSettings(): HintSettings {
  return copySettings(DEFAULT_SETTINGS);
}
