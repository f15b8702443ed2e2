import type { SettingsSource } from '../../core/types.js';
import { Severity } from '../../core/types.js';
import type { HintletApi } from '../api.js';
import { RecordType, ResourceType, ResourceTypeCode } from '../constants.js';
import { getResourceType, hasHeader, headerContains } from '../utils.js';

export const STATIC_CACHE_RULE = 'static-cache';

const STATIC_TYPES = new Set<ResourceTypeCode>([
  ResourceType.IMAGE,
  ResourceType.FAVICON,
  ResourceType.SCRIPT,
  ResourceType.STYLESHEET,
]);

/**
 * Static resources should carry a freshness lifetime so repeat views skip
 * the network.
 */
export function registerStaticCacheRule(api: HintletApi, getSettings: SettingsSource): void {
  api.register(STATIC_CACHE_RULE, record => {
    if (getSettings().disabledRules.includes(STATIC_CACHE_RULE)) return;
    if (record.type !== RecordType.NETWORK_RESOURCE_RESPONSE) return;
    if (!STATIC_TYPES.has(getResourceType(record))) return;

    const headers = record.data.headers;
    if (typeof hasHeader(headers, 'Expires') === 'string') return;
    if (headerContains(headers, 'Cache-Control', 'max-age')) return;

    api.addHint(
      STATIC_CACHE_RULE,
      record.time,
      `Resource ${record.data.url ?? '[unknown]'} has no Expires or Cache-Control max-age header`,
      record.sequence,
      Severity.INFO
    );
  });
}
