/**
 * JSON envelopes exchanged between the host page and the hintlet worker
 */

import type { DataRecord, HintRecord, HintSettings, Result, SeverityLevel } from '../core/types.js';
import { Severity } from '../core/types.js';
import { toDataRecord } from '../parser/records.js';
import { MessageType } from './constants.js';

// Worker -> host
export type HintletMessage =
  | { type: typeof MessageType.LOG; payload: string }
  | { type: typeof MessageType.HINT; payload: HintRecord };

// Host -> worker
export type HostMessage =
  | { type: 'record'; record: DataRecord }
  | { type: 'configure'; settings: HintSettings };

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSeverity(value: unknown): value is SeverityLevel {
  return value === Severity.CRITICAL || value === Severity.WARNING || value === Severity.INFO;
}

function toHintRecord(value: unknown): HintRecord | null {
  if (!isObject(value)) return null;
  const { hintletRule, timestamp, description, refRecord, severity } = value;
  if (typeof hintletRule !== 'string' || typeof timestamp !== 'number') return null;
  if (typeof description !== 'string' || !isSeverity(severity)) return null;
  if (refRecord !== undefined && typeof refRecord !== 'number') return null;
  return { hintletRule, timestamp, description, refRecord, severity };
}

function toHintSettings(value: unknown): HintSettings | null {
  if (!isObject(value)) return null;
  const { longDurationMs, minCompressibleBytes, disabledRules } = value;
  if (typeof longDurationMs !== 'number' || typeof minCompressibleBytes !== 'number') return null;
  if (!Array.isArray(disabledRules)) return null;
  const names = disabledRules.filter((name): name is string => typeof name === 'string');
  if (names.length !== disabledRules.length) return null;
  return { longDurationMs, minCompressibleBytes, disabledRules: names };
}

function parseJson(json: string): Result<unknown> {
  try {
    return { success: true, data: JSON.parse(json) };
  } catch (error) {
    return { success: false, error: error instanceof Error ? error.message : String(error) };
  }
}

// JSON drops undefined, so a header present without a value is sent as null
function toWireRecord(record: DataRecord): object {
  const headers = record.data.headers;
  if (!headers) return record;
  const wireHeaders: Record<string, string | null> = {};
  for (const [name, value] of Object.entries(headers)) {
    wireHeaders[name] = value ?? null;
  }
  return { ...record, data: { ...record.data, headers: wireHeaders } };
}

export function encodeMessage(message: HintletMessage | HostMessage): string {
  if (message.type === 'record') {
    return JSON.stringify({ type: message.type, record: toWireRecord(message.record) });
  }
  return JSON.stringify(message);
}

/**
 * Decode a worker -> host envelope.
 */
export function decodeMessage(json: string): Result<HintletMessage> {
  const parsed = parseJson(json);
  if (!parsed.success) return parsed;

  const envelope = parsed.data;
  if (!isObject(envelope)) {
    return { success: false, error: 'Message is not an object' };
  }

  if (envelope.type === MessageType.LOG) {
    if (typeof envelope.payload !== 'string') {
      return { success: false, error: 'Log message payload must be a string' };
    }
    return { success: true, data: { type: MessageType.LOG, payload: envelope.payload } };
  }

  if (envelope.type === MessageType.HINT) {
    const hint = toHintRecord(envelope.payload);
    if (!hint) {
      return { success: false, error: 'Malformed hint record' };
    }
    return { success: true, data: { type: MessageType.HINT, payload: hint } };
  }

  return { success: false, error: `Unknown message type: ${String(envelope.type)}` };
}

/**
 * Decode a host -> worker envelope.
 */
export function decodeHostMessage(json: string): Result<HostMessage> {
  const parsed = parseJson(json);
  if (!parsed.success) return parsed;

  const envelope = parsed.data;
  if (!isObject(envelope)) {
    return { success: false, error: 'Message is not an object' };
  }

  switch (envelope.type) {
    case 'record': {
      const record = toDataRecord(envelope.record);
      return record
        ? { success: true, data: { type: 'record', record } }
        : { success: false, error: 'Malformed data record' };
    }
    case 'configure': {
      const settings = toHintSettings(envelope.settings);
      return settings
        ? { success: true, data: { type: 'configure', settings } }
        : { success: false, error: 'Malformed settings' };
    }
    default:
      return { success: false, error: `Unknown message type: ${String(envelope.type)}` };
  }
}
