import type { SettingsSource } from '../../core/types.js';
import { Severity } from '../../core/types.js';
import type { HintletApi } from '../api.js';
import { RecordType, ResourceType, ResourceTypeCode } from '../constants.js';
import { getResourceType, hasHeader, isCompressed } from '../utils.js';

export const COMPRESSION_RULE = 'gzip-compression';

const TEXTUAL_TYPES = new Set<ResourceTypeCode>([
  ResourceType.DOCUMENT,
  ResourceType.SCRIPT,
  ResourceType.STYLESHEET,
]);

/**
 * Flags textual responses served without Content-Encoding.
 */
export function registerCompressionRule(api: HintletApi, getSettings: SettingsSource): void {
  api.register(COMPRESSION_RULE, record => {
    const settings = getSettings();
    if (settings.disabledRules.includes(COMPRESSION_RULE)) return;
    if (record.type !== RecordType.NETWORK_RESOURCE_RESPONSE) return;
    if (!TEXTUAL_TYPES.has(getResourceType(record))) return;

    const headers = record.data.headers;
    if (isCompressed(headers)) return;

    const length = parseInt(hasHeader(headers, 'Content-Length') ?? '', 10);
    if (Number.isNaN(length) || length < settings.minCompressibleBytes) return;

    api.addHint(
      COMPRESSION_RULE,
      record.time,
      `Resource ${record.data.url ?? '[unknown]'} was sent uncompressed (${length} bytes)`,
      record.sequence,
      Severity.WARNING
    );
  });
}
