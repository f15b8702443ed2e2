/**
 * Core type definitions shared by the stack-frame view and the hintlet engine
 */

// Stack trace model

export interface StackFrame {
  resourceUrl: string;
  resourceName: string; // last path segment of resourceUrl
  resourceBase: string; // resourceUrl up to and including the last '/'
  symbolName: string;
  lineNumber: number;
  colNumber: number;
}

export type StackTrace = StackFrame[]; // innermost frame first

export interface JsSymbol {
  symbolName: string;
  resourceUrl: string;
  lineNumber: number;
}

// Browser data records

export type HeaderMap = Record<string, string | undefined>;

export interface RecordData {
  url?: string;
  headers?: HeaderMap;
  [key: string]: unknown;
}

export interface DataRecord {
  type: number;
  time: number;
  sequence?: number;
  duration?: number;
  data: RecordData;
}

// Hintlet model

export const Severity = {
  CRITICAL: 1,
  WARNING: 2,
  INFO: 3,
} as const;

export type SeverityLevel = (typeof Severity)[keyof typeof Severity];

export type HintletCallback = (record: DataRecord) => void;

export interface HintletRule {
  name: string;
  callback: HintletCallback;
}

export interface HintRecord {
  hintletRule: string;
  timestamp: number;
  description: string;
  refRecord: number | undefined;
  severity: SeverityLevel;
}

export interface HintSettings {
  longDurationMs: number;
  minCompressibleBytes: number;
  disabledRules: string[];
}

// Result type that can represent success or failure
export type Result<T> = { success: true; data: T } | { success: false; error: string };

export type SettingsSource = () => HintSettings;
