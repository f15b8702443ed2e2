/**
 * Utility functions for processing browser data records
 */

import type { DataRecord, HeaderMap } from '../core/types.js';
import {
  RECORD_TYPE_LIST,
  RecordType,
  RecordTypeName,
  ResourceType,
  ResourceTypeCode,
} from './constants.js';

const MIME_TYPE_REGEXP = /^[^/;]+\/[^/;]+/;
const IMAGE_TYPE_REGEXP = /^image\//;
const FAVICON_REGEXP = /\/favicon\.ico$/;

const MIME_RESOURCE_TYPES: Readonly<Record<string, ResourceTypeCode>> = {
  'text/plain': ResourceType.DOCUMENT,
  'text/html': ResourceType.DOCUMENT,
  'text/xml': ResourceType.DOCUMENT,
  'application/xml': ResourceType.DOCUMENT,
  'application/json': ResourceType.DOCUMENT,
  'text/css': ResourceType.STYLESHEET,
  'text/javascript': ResourceType.SCRIPT,
};

const COMPRESSION_TOKENS = new Set([
  'compress',
  'deflate',
  'gzip',
  'pack200-gzip', // Java archives
  'bzip2', // not registered with IANA
  'sdch', // not registered with IANA
]);

function isRecordTypeName(name: string): name is RecordTypeName {
  return Object.hasOwn(RecordType, name);
}

/**
 * Translate a record type code to its name.
 */
export function typeToString(typeNumber: number): string | undefined {
  if (!Number.isInteger(typeNumber) || typeNumber < 0 || typeNumber >= RECORD_TYPE_LIST.length) {
    return undefined;
  }
  return RECORD_TYPE_LIST[typeNumber];
}

/**
 * Translate a record type name to its code.
 */
export function stringToType(typeString: string): number | undefined {
  return isRecordTypeName(typeString) ? RecordType[typeString] : undefined;
}

/**
 * Look up a header by case-insensitive name.
 * @returns the header value; null if the header is present without a value;
 *   undefined if it is absent
 */
export function hasHeader(headers: HeaderMap | undefined, targetHeader: string): string | null | undefined {
  if (!headers) return undefined;
  const targetHeaderLc = targetHeader.toLowerCase();
  for (const name of Object.keys(headers)) {
    if (name.toLowerCase() === targetHeaderLc) {
      const value = headers[name];
      return value === undefined ? null : value;
    }
  }
  return undefined;
}

/**
 * True iff the header is present and its value matches `targetString`
 * as a case-insensitive regular expression.
 */
export function headerContains(
  headers: HeaderMap | undefined,
  targetHeader: string,
  targetString: string
): boolean {
  const value = hasHeader(headers, targetHeader);
  if (value === undefined || value === null) return false;
  return new RegExp(targetString, 'im').test(value);
}

/**
 * True if the Content-Encoding header says the response body is compressed.
 */
export function isCompressed(headers?: HeaderMap): boolean {
  const encoding = hasHeader(headers, 'Content-Encoding');
  if (encoding === undefined || encoding === null) return false;
  return COMPRESSION_TOKENS.has(encoding.toLowerCase());
}

/**
 * Classify a network response record by the MIME type in its Content-Type
 * header.
 */
export function getResourceType(record: DataRecord): ResourceTypeCode {
  const contentType = hasHeader(record.data.headers, 'Content-Type');
  if (contentType === undefined || contentType === null) {
    return ResourceType.OTHER;
  }

  const match = contentType.match(MIME_TYPE_REGEXP);
  if (!match) {
    return ResourceType.OTHER;
  }
  const mimeType = match[0];

  const known = MIME_RESOURCE_TYPES[mimeType];
  if (known !== undefined) {
    return known;
  }
  if (mimeType === 'image/vnd.microsoft.icon' || (record.data.url && FAVICON_REGEXP.test(record.data.url))) {
    return ResourceType.FAVICON;
  }
  if (IMAGE_TYPE_REGEXP.test(mimeType)) {
    return ResourceType.IMAGE;
  }
  return ResourceType.OTHER;
}

/**
 * Format milliseconds as seconds, e.g. formatSeconds(2500, 2) === "2.50s".
 */
export function formatSeconds(ms: number, decimalPlaces: number): string {
  return (ms / 1000).toFixed(decimalPlaces) + 's';
}

export function formatMilliseconds(ms: number, decimalPlaces: number): string {
  return ms.toFixed(decimalPlaces) + 'ms';
}
