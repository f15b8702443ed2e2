/**
 * Web Worker entry for the hintlet engine
 */

import { HintletEngine } from '../hintlet/engine.js';
import { createScriptLoader, handleWorkerData } from './runtime.js';

const engine = new HintletEngine(
  { postMessage: message => self.postMessage(message) },
  { loader: createScriptLoader(self) }
);

self.addEventListener('message', (event: MessageEvent) => {
  handleWorkerData(engine, event.data);
});
