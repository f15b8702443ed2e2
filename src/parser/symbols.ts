/**
 * Symbol map used to resymbolize obfuscated stack frames
 */

import type { JsSymbol, Result } from './types.js';

const MANIFEST_COLUMNS = 6; // jsName,jsniIdent,className,memberName,sourceUri,sourceLine

export class SymbolMap {
  private symbols = new Map<string, JsSymbol>();

  /**
   * Parse a compiler symbol manifest. Comment lines start with '#'.
   */
  static parse(content: string): Result<SymbolMap> {
    const map = new SymbolMap();
    const lines = content.split('\n');

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i].trim();
      if (!line || line.startsWith('#')) continue;

      const columns = line.split(',');
      if (columns.length < MANIFEST_COLUMNS) {
        return {
          success: false,
          error: `Symbol map line ${i + 1}: expected ${MANIFEST_COLUMNS} columns, got ${columns.length}`,
        };
      }

      const [jsName, , className, memberName, sourceUri, sourceLine] = columns;
      const lineNumber = parseInt(sourceLine, 10);
      map.put(jsName, {
        symbolName: memberName ? `${className}::${memberName}` : className,
        resourceUrl: sourceUri,
        lineNumber: Number.isNaN(lineNumber) ? 0 : lineNumber,
      });
    }

    return { success: true, data: map };
  }

  put(obfuscatedName: string, symbol: JsSymbol): void {
    this.symbols.set(obfuscatedName, symbol);
  }

  lookup(obfuscatedName: string): JsSymbol | undefined {
    return this.symbols.get(obfuscatedName);
  }

  get size(): number {
    return this.symbols.size;
  }
}
