/**
 * Renders a whole stack trace, one StackFrameRenderer per frame
 */

import type { JsSymbol, StackFrame, StackTrace } from '../core/types.js';
import type { SymbolMap } from '../parser/symbols.js';
import { StackFrameCss, StackFrameRenderer } from './StackFrameRenderer.js';

export interface StackTraceViewOptions {
  css?: StackFrameCss;
  onFrameClick?: (frame: StackFrame, event: MouseEvent) => void;
}

export class StackTraceView {
  private renderers: StackFrameRenderer[] = [];

  constructor(
    private readonly container: Element,
    private readonly options: StackTraceViewOptions = {}
  ) {}

  render(trace: StackTrace): void {
    this.detach();
    this.renderers = trace.map(frame => {
      const renderer = new StackFrameRenderer(this.container, frame, this.options.css);
      renderer.renderFrame(event => this.options.onFrameClick?.(frame, event));
      return renderer;
    });
  }

  /**
   * Add the source-level symbol under every frame the map knows.
   * @returns the number of frames resymbolized
   */
  resymbolize(
    symbolMap: SymbolMap,
    sourceServer: string,
    onSymbolClick: (symbol: JsSymbol, event: MouseEvent) => void
  ): number {
    let count = 0;
    for (const renderer of this.renderers) {
      const symbol = symbolMap.lookup(renderer.frame.symbolName);
      if (!symbol) continue;
      renderer.reSymbolize(sourceServer, symbol, event => onSymbolClick(symbol, event));
      count++;
    }
    return count;
  }

  get frameCount(): number {
    return this.renderers.length;
  }

  detach(): void {
    this.renderers.forEach(renderer => renderer.detach());
    this.renderers = [];
  }
}
