/**
 * tracehints - stack-frame view and hintlet engine
 */

export * from './core/types.js';
export { StackTraceParser, splitResourceUrl, SymbolMap, RecordDumpParser, toDataRecord } from './parser/index.js';
export type { CallFrame } from './parser/index.js';
export { HintletApi } from './hintlet/api.js';
export type { MessageSink, ScriptLoader } from './hintlet/api.js';
export { HintletEngine } from './hintlet/engine.js';
export * from './hintlet/constants.js';
export * from './hintlet/utils.js';
export { encodeMessage, decodeMessage, decodeHostMessage } from './hintlet/messages.js';
export type { HintletMessage, HostMessage } from './hintlet/messages.js';
export { registerBuiltinRules, COMPRESSION_RULE, LONG_DURATION_RULE, STATIC_CACHE_RULE } from './hintlet/rules/index.js';
export { HintletClient, DEFAULT_WORKER_URL } from './app/HintletClient.js';
export type { HintletClientOptions, WorkerPort } from './app/HintletClient.js';
export { DEFAULT_SETTINGS, copySettings, defaultSettings } from './core/settings.js';
export type { ReadonlyHintSettings } from './core/settings.js';
export { SettingsManager } from './app/SettingsManager.js';
export type { SettingsStorage } from './app/SettingsManager.js';
export { connectSettings } from './app/connect.js';
export { EventCleanup } from './ui/EventCleanup.js';
export { StackFrameRenderer, renderStackFrame, DEFAULT_STACK_FRAME_CSS } from './ui/StackFrameRenderer.js';
export type { StackFrameCss, FrameClickHandler } from './ui/StackFrameRenderer.js';
export { StackTraceView } from './ui/StackTraceView.js';
export type { StackTraceViewOptions } from './ui/StackTraceView.js';
