/**
 * Worker-side hintlet engine: owns the rule API, the built-in rules and the
 * current settings, and turns host messages into rule dispatches.
 */

import type { DataRecord, HintSettings } from '../core/types.js';
import { DEFAULT_SETTINGS, copySettings } from '../core/settings.js';
import { HintletApi, MessageSink, ScriptLoader } from './api.js';
import { decodeHostMessage } from './messages.js';
import { registerBuiltinRules } from './rules/index.js';

export interface HintletEngineOptions {
  loader?: ScriptLoader;
  settings?: HintSettings;
  builtinRules?: boolean; // default true
}

export class HintletEngine {
  readonly api: HintletApi;
  private settings: HintSettings;

  constructor(sink: MessageSink, options: HintletEngineOptions = {}) {
    this.settings = copySettings(options.settings ?? DEFAULT_SETTINGS);
    this.api = new HintletApi(sink, options.loader);
    if (options.builtinRules ?? true) {
      registerBuiltinRules(this.api, () => this.settings);
    }
  }

  configure(settings: HintSettings): void {
    this.settings = copySettings(settings);
  }

  getSettings(): HintSettings {
    return copySettings(this.settings);
  }

  processRecord(record: DataRecord): void {
    this.api.dispatch(record);
  }

  /**
   * Handle one JSON message from the host page.
   */
  handleMessage(json: string): void {
    const result = decodeHostMessage(json);
    if (!result.success) {
      this.api.log(`Ignoring malformed host message: ${result.error}`);
      return;
    }

    const message = result.data;
    switch (message.type) {
      case 'record':
        this.processRecord(message.record);
        break;
      case 'configure':
        this.configure(message.settings);
        break;
    }
  }
}
