/**
 * API for hintlet rule writers.
 *
 * Rules register a callback that receives every data record the browser
 * sends. They report findings with addHint() and diagnostics with log();
 * both are posted to the host page as JSON envelopes.
 */

import type { DataRecord, HintRecord, HintletCallback, HintletRule, SeverityLevel } from '../core/types.js';
import { Severity } from '../core/types.js';
import { MessageType } from './constants.js';
import { encodeMessage } from './messages.js';

export interface MessageSink {
  postMessage(message: string): void;
}

export type ScriptLoader = (path: string) => void | Promise<unknown>;

export class HintletApi {
  private readonly registered: HintletRule[] = [];

  constructor(
    private readonly sink: MessageSink,
    private readonly loader?: ScriptLoader
  ) {}

  /**
   * Rules in registration order. Duplicate names are kept.
   */
  get rules(): readonly HintletRule[] {
    return this.registered;
  }

  register(name: string, callback: HintletCallback): void {
    this.registered.push({ name, callback });
    this.log(`Registered hintlet: ${name}`);
  }

  /**
   * Build a hint record. Throws if the timestamp is missing.
   */
  formatHint(
    hintletRule: string,
    timestamp: number | null | undefined,
    description: string,
    refRecord?: number,
    severity?: SeverityLevel
  ): HintRecord {
    if (timestamp === undefined || timestamp === null) {
      throw new Error(`${hintletRule}: timestamp must be defined`);
    }
    return {
      hintletRule,
      timestamp,
      description,
      refRecord,
      severity: severity ?? Severity.INFO,
    };
  }

  /**
   * Send a hint record to the host page.
   */
  addHint(
    hintletRule: string,
    timestamp: number | null | undefined,
    description: string,
    refRecord?: number,
    severity?: SeverityLevel
  ): void {
    const payload = this.formatHint(hintletRule, timestamp, description, refRecord, severity);
    this.sink.postMessage(encodeMessage({ type: MessageType.HINT, payload }));
  }

  log(message: string): void {
    this.sink.postMessage(encodeMessage({ type: MessageType.LOG, payload: message }));
  }

  /**
   * Load another rule file, relative to the engine root.
   */
  async load(path: string): Promise<void> {
    if (!this.loader) {
      throw new Error(`Cannot load ${path}: no script loader available`);
    }
    await this.loader(path);
  }

  /**
   * Hand a record to every rule. A throwing rule is reported and skipped.
   */
  dispatch(record: DataRecord): void {
    for (const rule of this.registered) {
      try {
        rule.callback(record);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.log(`Exception in hintlet rule ${rule.name}: ${message}`);
      }
    }
  }
}
