/**
 * Types for the parser module
 */

export type { StackFrame, StackTrace, JsSymbol, DataRecord, Result } from '../core/types.js';

// DevTools protocol call frame, as found in timeline records
export interface CallFrame {
  functionName: string;
  url: string;
  lineNumber: number;
  columnNumber: number;
}
