/**
 * Validation of browser data records and loading of saved record dumps
 */

import type { HeaderMap, RecordData } from '../core/types.js';
import type { DataRecord, Result } from './types.js';

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function toHeaderMap(value: unknown): HeaderMap | undefined {
  if (!isObject(value)) return undefined;
  const headers: HeaderMap = {};
  for (const [name, headerValue] of Object.entries(value)) {
    // JSON has no undefined; a null header is "present without a value"
    headers[name] = typeof headerValue === 'string' ? headerValue : undefined;
  }
  return headers;
}

/**
 * Validate an unknown value (usually fresh from JSON.parse) as a data record.
 * Returns null when the value does not have the shape of one.
 */
export function toDataRecord(value: unknown): DataRecord | null {
  if (!isObject(value)) return null;

  const { type, time, sequence, duration, data } = value;
  if (!isFiniteNumber(type) || !isFiniteNumber(time)) return null;

  let source: Record<string, unknown> = {};
  if (data !== undefined) {
    if (!isObject(data)) return null;
    source = data;
  }

  const recordData: RecordData = {};
  for (const [key, entry] of Object.entries(source)) {
    if (key === 'url' || key === 'headers') continue;
    recordData[key] = entry;
  }
  if (typeof source.url === 'string') {
    recordData.url = source.url;
  }
  const headers = toHeaderMap(source.headers);
  if (headers) {
    recordData.headers = headers;
  }

  const record: DataRecord = { type, time, data: recordData };
  if (isFiniteNumber(sequence)) record.sequence = sequence;
  if (isFiniteNumber(duration)) record.duration = duration;
  return record;
}

/**
 * Parser for saved profiling sessions: a JSON array of records or one JSON
 * record per line, optionally gzipped.
 */
export class RecordDumpParser {
  /**
   * Parse a Blob or File (handles gzip detection and decompression)
   */
  async parseFile(blob: Blob): Promise<Result<DataRecord[]>> {
    // Read first 2 bytes to detect gzip magic bytes
    const chunk = await blob.slice(0, 2).arrayBuffer();
    const bytes = new Uint8Array(chunk);
    const isGzipped = bytes.length >= 2 && bytes[0] === 0x1f && bytes[1] === 0x8b;

    if (!isGzipped) {
      return this.parseString(await blob.text());
    }

    try {
      const decompressedStream = blob.stream().pipeThrough(new DecompressionStream('gzip'));
      const content = await new Response(decompressedStream).text();
      return this.parseString(content);
    } catch (error) {
      return {
        success: false,
        error: `Failed to decompress record dump: ${error instanceof Error ? error.message : String(error)}`,
      };
    }
  }

  parseString(content: string): Result<DataRecord[]> {
    const trimmed = content.trim();
    if (!trimmed) {
      return { success: true, data: [] };
    }
    return trimmed.startsWith('[') ? this.parseArray(trimmed) : this.parseLines(content);
  }

  private parseArray(content: string): Result<DataRecord[]> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      return {
        success: false,
        error: `Failed to parse record dump: ${error instanceof Error ? error.message : String(error)}`,
      };
    }
    if (!Array.isArray(parsed)) {
      return { success: false, error: 'Record dump must be a JSON array' };
    }

    const records: DataRecord[] = [];
    for (let i = 0; i < parsed.length; i++) {
      const record = toDataRecord(parsed[i]);
      if (!record) {
        return { success: false, error: `Invalid record at index ${i}` };
      }
      records.push(record);
    }
    return { success: true, data: records };
  }

  private parseLines(content: string): Result<DataRecord[]> {
    const records: DataRecord[] = [];
    const lines = content.split('\n');

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i].trim();
      if (!line) continue;

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (error) {
        return {
          success: false,
          error: `Failed to parse record on line ${i + 1}: ${error instanceof Error ? error.message : String(error)}`,
        };
      }

      const record = toDataRecord(parsed);
      if (!record) {
        return { success: false, error: `Invalid record on line ${i + 1}` };
      }
      records.push(record);
    }

    return { success: true, data: records };
  }
}
