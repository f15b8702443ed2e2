/**
 * Parser module - stack traces, symbol maps and saved record dumps
 *
 * Public API:
 * - StackTraceParser: V8 stack text and DevTools call frames
 * - SymbolMap: obfuscated name -> source symbol lookup
 * - RecordDumpParser: saved sessions (plain or gzipped)
 */

export * from './types.js';
export { StackTraceParser, splitResourceUrl } from './parser.js';
export { SymbolMap } from './symbols.js';
export { RecordDumpParser, toDataRecord } from './records.js';
