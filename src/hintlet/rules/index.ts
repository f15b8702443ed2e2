import type { SettingsSource } from '../../core/types.js';
import type { HintletApi } from '../api.js';
import { registerStaticCacheRule } from './caching.js';
import { registerCompressionRule } from './compression.js';
import { registerLongDurationRule } from './duration.js';

export { COMPRESSION_RULE } from './compression.js';
export { LONG_DURATION_RULE } from './duration.js';
export { STATIC_CACHE_RULE } from './caching.js';

/**
 * Register the rules that ship with the engine, in a fixed order.
 */
export function registerBuiltinRules(api: HintletApi, getSettings: SettingsSource): void {
  registerCompressionRule(api, getSettings);
  registerLongDurationRule(api, getSettings);
  registerStaticCacheRule(api, getSettings);
}
