import type { HintletClient } from './HintletClient.js';
import type { SettingsManager } from './SettingsManager.js';

/**
 * Push the current settings to the client, then every change after.
 */
export function connectSettings(manager: SettingsManager, client: HintletClient): void {
  client.configure(manager.getSettings());
  manager.onChange(settings => client.configure(settings));
}
