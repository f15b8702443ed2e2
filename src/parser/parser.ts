/**
 * Core parser for JavaScript stack traces
 */

import type { CallFrame, Result, StackFrame, StackTrace } from './types.js';

// "at fn (url:line:col)" or "at url:line:col"
const LOCATED_FRAME = /^\s*at\s+(?:(.+?)\s+\()?(.+):(\d+):(\d+)\)?\s*$/;
// "at fn (native)" and friends carry no position
const UNLOCATED_FRAME = /^\s*at\s+(.+?)\s+\((native|<anonymous>|unknown location)\)\s*$/;

/**
 * Split a resource URL into its base (through the last '/') and file name.
 */
export function splitResourceUrl(url: string): { base: string; name: string } {
  const slash = url.lastIndexOf('/');
  return {
    base: url.slice(0, slash + 1),
    name: url.slice(slash + 1),
  };
}

function makeFrame(symbolName: string, url: string, line: number, col: number): StackFrame {
  const { base, name } = splitResourceUrl(url);
  return {
    resourceUrl: url,
    resourceName: name,
    resourceBase: base,
    symbolName,
    lineNumber: line,
    colNumber: col,
  };
}

/**
 * Stack trace parser
 */
export class StackTraceParser {
  /**
   * Parse V8 `Error.stack` text. Lines that are not frames (the message
   * header, blank lines) are skipped.
   */
  parseString(content: string): Result<StackTrace> {
    const frames: StackTrace = [];
    if (!content.trim()) {
      return { success: true, data: frames };
    }

    const lines = content.split('\n');
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i];
      if (!/^\s*at\s/.test(line)) continue;

      const located = line.match(LOCATED_FRAME);
      if (located) {
        frames.push(
          makeFrame(located[1] ?? '', located[2], parseInt(located[3], 10), parseInt(located[4], 10))
        );
        continue;
      }

      const unlocated = line.match(UNLOCATED_FRAME);
      if (unlocated) {
        frames.push(makeFrame(unlocated[1], '', 0, 0));
        continue;
      }

      return {
        success: false,
        error: `Failed to parse stack frame on line ${i + 1}: "${line.trim()}"`,
      };
    }

    return { success: true, data: frames };
  }

  /**
   * Build a trace from DevTools call frames. Their positions are 0-based,
   * ours are 1-based.
   */
  fromCallFrames(callFrames: CallFrame[]): StackTrace {
    return callFrames.map(frame =>
      makeFrame(frame.functionName, frame.url, frame.lineNumber + 1, frame.columnNumber + 1)
    );
  }
}
