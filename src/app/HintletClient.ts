/**
 * Host-side client for the hintlet engine
 */

import { DEFAULT_SETTINGS, copySettings } from '../core/settings.js';
import type { DataRecord, HintRecord, HintSettings } from '../core/types.js';
import { MessageType } from '../hintlet/constants.js';
import { HintletEngine } from '../hintlet/engine.js';
import { decodeMessage, encodeMessage } from '../hintlet/messages.js';

// Where `tsc` emits src/workers/hintlet-worker.ts
export const DEFAULT_WORKER_URL = './dist/src/workers/hintlet-worker.js';

/**
 * The part of a Worker the client uses
 */
export interface WorkerPort {
  onmessage: ((event: MessageEvent) => void) | null;
  onerror: ((event: ErrorEvent) => void) | null;
  postMessage(message: string): void;
  terminate(): void;
}

export interface HintletClientOptions {
  workerUrl?: string;
  settings?: HintSettings;
  onHint?: (hint: HintRecord) => void;
  onLog?: (message: string) => void;
  // Defaults to a module Worker when the page has one
  createWorker?: (url: string) => WorkerPort;
}

function createModuleWorker(url: string): WorkerPort {
  return new Worker(url, { type: 'module' });
}

/**
 * Feeds data records to the hintlet engine and collects the hints it sends
 * back. The engine runs in a web worker when one can be created, otherwise
 * in-process behind the same message encoding.
 */
export class HintletClient {
  private worker: WorkerPort | null = null;
  private engine: HintletEngine | null = null;
  private hints: HintRecord[] = [];
  private settings: HintSettings;
  private destroyed = false;
  // Records posted before the worker has said anything; replayed if it fails to start
  private unconfirmed: DataRecord[] = [];
  private workerStarted = false;

  constructor(private readonly options: HintletClientOptions = {}) {
    this.settings = copySettings(options.settings ?? DEFAULT_SETTINGS);
    this.initWorker();
    if (!this.worker) {
      this.startInProcessEngine();
    }
  }

  private initWorker(): void {
    let createWorker = this.options.createWorker;
    if (!createWorker) {
      if (typeof window === 'undefined' || typeof Worker === 'undefined') {
        return;
      }
      createWorker = createModuleWorker;
    }

    try {
      this.worker = createWorker(this.options.workerUrl || DEFAULT_WORKER_URL);
    } catch (error) {
      console.warn('Failed to create hintlet worker:', error);
      this.worker = null;
      return;
    }

    this.worker.onmessage = (event: MessageEvent) => {
      // The engine logs its rule registrations on startup
      this.workerStarted = true;
      this.unconfirmed = [];
      if (typeof event.data === 'string') {
        this.handleMessage(event.data);
      } else {
        console.warn('Ignoring non-string message from hintlet worker');
      }
    };

    this.worker.onerror = error => {
      console.warn('Hintlet worker error, continuing in-process:', error.message);
      this.worker?.terminate();
      this.worker = null;
      this.startInProcessEngine();

      const replay = this.unconfirmed;
      this.unconfirmed = [];
      for (const record of replay) {
        this.engine?.processRecord(record);
      }
    };

    this.worker.postMessage(encodeMessage({ type: 'configure', settings: this.settings }));
  }

  private startInProcessEngine(): void {
    this.engine = new HintletEngine(
      { postMessage: message => this.handleMessage(message) },
      { settings: this.settings }
    );
  }

  /**
   * Decode one envelope from the engine.
   */
  private handleMessage(json: string): void {
    const result = decodeMessage(json);
    if (!result.success) {
      console.warn('Failed to decode hintlet message:', result.error);
      return;
    }

    const message = result.data;
    if (message.type === MessageType.LOG) {
      if (this.options.onLog) {
        this.options.onLog(message.payload);
      } else {
        console.log(`[hintlet] ${message.payload}`);
      }
      return;
    }

    this.hints.push(message.payload);
    this.options.onHint?.(message.payload);
  }

  addRecord(record: DataRecord): void {
    if (this.destroyed) {
      throw new Error('HintletClient has been destroyed');
    }
    if (this.worker) {
      this.worker.postMessage(encodeMessage({ type: 'record', record }));
      if (!this.workerStarted) {
        this.unconfirmed.push(record);
      }
    } else {
      this.engine?.processRecord(record);
    }
  }

  configure(settings: HintSettings): void {
    this.settings = copySettings(settings);
    if (this.worker) {
      this.worker.postMessage(encodeMessage({ type: 'configure', settings }));
    } else {
      this.engine?.configure(settings);
    }
  }

  /**
   * Hints received so far, in arrival order
   */
  getHints(): HintRecord[] {
    return [...this.hints];
  }

  clearHints(): void {
    this.hints = [];
  }

  get inWorker(): boolean {
    return this.worker !== null;
  }

  /**
   * Clean up worker resources
   */
  destroy(): void {
    if (this.worker) {
      this.worker.terminate();
      this.worker = null;
    }
    this.unconfirmed = [];
    this.engine = null;
    this.destroyed = true;
  }
}
