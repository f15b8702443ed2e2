/**
 * DOM rendering for stack frames, with an optional resymbolized line under
 * each obfuscated one.
 */

import type { JsSymbol, StackFrame } from '../core/types.js';
import { EventCleanup } from './EventCleanup.js';

export interface StackFrameCss {
  stackFrame: string;
  resymbolizedSymbol: string;
}

export const DEFAULT_STACK_FRAME_CSS: StackFrameCss = {
  stackFrame: 'stackFrame',
  resymbolizedSymbol: 'resymbolizedSymbol',
};

export type FrameClickHandler = (event: MouseEvent) => void;

export class StackFrameRenderer extends EventCleanup {
  private readonly element: HTMLDivElement;

  constructor(
    parent: Element,
    private readonly stackFrame: StackFrame,
    private readonly css: StackFrameCss = DEFAULT_STACK_FRAME_CSS
  ) {
    super();
    this.element = parent.ownerDocument.createElement('div');
    this.element.className = css.stackFrame;
    parent.appendChild(this.element);
  }

  get frame(): StackFrame {
    return this.stackFrame;
  }

  getElement(): HTMLDivElement {
    return this.element;
  }

  /**
   * Render "resource::symbol() Line N Col M". The line/col link gets the
   * click handler, usually to open a source viewer.
   */
  renderFrame(symbolClickHandler: FrameClickHandler): void {
    const document = this.element.ownerDocument;
    this.cleanupRemovers();
    this.element.textContent = '';

    const frame = this.stackFrame;
    const resourceName = frame.resourceName === '' ? frame.resourceBase : frame.resourceName;
    const symbolName = frame.symbolName === '' ? '[unknown] ' : `${frame.symbolName}() `;

    this.element.appendChild(document.createTextNode(`${resourceName}::`));
    this.element.appendChild(document.createTextNode(symbolName));

    const lineLink = document.createElement('a');
    lineLink.textContent = `Line ${frame.lineNumber} Col ${frame.colNumber}`;
    lineLink.href = 'javascript:;';
    this.element.appendChild(lineLink);
    this.element.appendChild(document.createElement('br'));
    this.listenForClicks(lineLink, symbolClickHandler);
  }

  /**
   * Append the source-level symbol for this frame.
   *
   * @param sourceServer - base URL that source paths are relative to
   */
  reSymbolize(sourceServer: string, sourceSymbol: JsSymbol, resymbolizedSymbolClickHandler: FrameClickHandler): void {
    const document = this.element.ownerDocument;

    const symbolLink = document.createElement('a');
    symbolLink.textContent = sourceSymbol.symbolName;
    symbolLink.href = 'javascript:;';
    symbolLink.className = this.css.resymbolizedSymbol;
    symbolLink.title = `${sourceServer}${sourceSymbol.resourceUrl}:${sourceSymbol.lineNumber}`;
    this.element.appendChild(symbolLink);
    this.element.appendChild(document.createElement('br'));
    this.listenForClicks(symbolLink, resymbolizedSymbolClickHandler);
  }

  /**
   * Remove listeners and take the frame out of the document.
   */
  detach(): void {
    this.cleanupRemovers();
    this.element.remove();
  }
}

/**
 * Create a renderer under `parent` and render `frame` into it.
 */
export function renderStackFrame(
  parent: Element,
  frame: StackFrame,
  onSymbolClick: FrameClickHandler,
  css?: StackFrameCss
): StackFrameRenderer {
  const renderer = new StackFrameRenderer(parent, frame, css);
  renderer.renderFrame(onSymbolClick);
  return renderer;
}
