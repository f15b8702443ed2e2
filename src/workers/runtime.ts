/**
 * Worker-global plumbing for the hintlet engine, kept apart from the entry
 * script so it can run against a stand-in scope
 */

import type { ScriptLoader } from '../hintlet/api.js';
import type { HintletEngine } from '../hintlet/engine.js';

export type ModuleImporter = (path: string) => Promise<unknown>;

/**
 * Classic workers have importScripts; module workers only have import().
 */
export function createScriptLoader(
  scope: object,
  importModule: ModuleImporter = path => import(path)
): ScriptLoader {
  return path => {
    if ('importScripts' in scope && typeof scope.importScripts === 'function') {
      scope.importScripts(path);
      return;
    }
    return importModule(path);
  };
}

export function handleWorkerData(engine: HintletEngine, data: unknown): void {
  if (typeof data !== 'string') {
    engine.api.log(`Ignoring non-string host message of type ${typeof data}`);
    return;
  }
  engine.handleMessage(data);
}
