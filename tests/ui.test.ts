/**
 * DOM tests for the stack-frame renderer and the stack trace view, run
 * against a jsdom document
 */

import { JSDOM } from 'jsdom';
import type { JsSymbol, StackFrame } from '../src/core/types.js';
import { StackTraceParser, SymbolMap } from '../src/parser/index.js';
import { StackFrameRenderer, renderStackFrame } from '../src/ui/StackFrameRenderer.js';
import { StackTraceView } from '../src/ui/StackTraceView.js';
import { TEST_DATA, assertEqual, test } from './shared-test-data.js';

const dom = new JSDOM('<!DOCTYPE html><html><body></body></html>');
const document = dom.window.document;

function freshContainer(): HTMLElement {
  const container = document.createElement('div');
  document.body.appendChild(container);
  return container;
}

const renderFrame: StackFrame = {
  resourceUrl: 'https://example.test/static/app.js',
  resourceName: 'app.js',
  resourceBase: 'https://example.test/static/',
  symbolName: 'render',
  lineNumber: 120,
  colNumber: 17,
};

const widgetSymbol: JsSymbol = {
  symbolName: 'com.example.client.Widget::render',
  resourceUrl: 'com/example/client/Widget.java',
  lineNumber: 88,
};

function anchors(element: Element): HTMLAnchorElement[] {
  return Array.from(element.querySelectorAll('a'));
}

await test('renderFrame builds the frame line', () => {
  const container = freshContainer();
  let clicks = 0;
  const renderer = renderStackFrame(container, renderFrame, () => clicks++);
  const element = renderer.getElement();

  assertEqual(container.children.length, 1, 'one frame element');
  assertEqual(element.className, 'stackFrame', 'class');
  assertEqual(element.textContent, 'app.js::render() Line 120 Col 17', 'text');
  assertEqual(
    Array.from(element.childNodes).map(node => node.nodeName),
    ['#text', '#text', 'A', 'BR'],
    'node order'
  );

  const [lineLink] = anchors(element);
  assertEqual(lineLink.getAttribute('href'), 'javascript:;', 'href');
  lineLink.click();
  assertEqual(clicks, 1, 'click handler');
});

await test('missing names fall back to the base and [unknown]', () => {
  const container = freshContainer();
  const renderer = renderStackFrame(
    container,
    { ...renderFrame, resourceName: '', resourceBase: 'https://example.test/lib/', symbolName: '', lineNumber: 0, colNumber: 0 },
    () => {}
  );
  assertEqual(renderer.getElement().textContent, 'https://example.test/lib/::[unknown] Line 0 Col 0', 'text');
});

await test('reSymbolize appends a symbol link', () => {
  const container = freshContainer();
  const calls: string[] = [];
  const renderer = new StackFrameRenderer(container, renderFrame);
  renderer.renderFrame(() => calls.push('line'));
  renderer.reSymbolize('https://src.example.test/', widgetSymbol, () => calls.push('symbol'));

  const element = renderer.getElement();
  const links = anchors(element);
  assertEqual(links.length, 2, 'links');
  assertEqual(element.querySelectorAll('br').length, 2, 'line breaks');

  const symbolLink = links[1];
  assertEqual(symbolLink.className, 'resymbolizedSymbol', 'class');
  assertEqual(symbolLink.textContent, 'com.example.client.Widget::render', 'text');
  assertEqual(symbolLink.title, 'https://src.example.test/com/example/client/Widget.java:88', 'title');
  assertEqual(symbolLink.getAttribute('href'), 'javascript:;', 'href');

  symbolLink.click();
  assertEqual(calls, ['symbol'], 'only the symbol handler ran');
  assertEqual(renderer.listenerCount, 2, 'listeners');
});

await test('re-rendering replaces content and listeners', () => {
  const container = freshContainer();
  let first = 0;
  let second = 0;
  const renderer = renderStackFrame(container, renderFrame, () => first++);
  const oldLink = anchors(renderer.getElement())[0];

  renderer.renderFrame(() => second++);
  assertEqual(anchors(renderer.getElement()).length, 1, 'single link');
  assertEqual(renderer.listenerCount, 1, 'single listener');

  oldLink.click();
  anchors(renderer.getElement())[0].click();
  assertEqual([first, second], [0, 1], 'click counts');
});

await test('detach removes the element and its listeners', () => {
  const container = freshContainer();
  let clicks = 0;
  const renderer = renderStackFrame(container, renderFrame, () => clicks++);
  const link = anchors(renderer.getElement())[0];

  renderer.detach();
  link.click();

  assertEqual(container.children.length, 0, 'element removed');
  assertEqual(renderer.listenerCount, 0, 'listeners removed');
  assertEqual(clicks, 0, 'no click after detach');
});

await test('custom css class names', () => {
  const container = freshContainer();
  const renderer = new StackFrameRenderer(container, renderFrame, { stackFrame: 'frame', resymbolizedSymbol: 'sym' });
  renderer.renderFrame(() => {});
  renderer.reSymbolize('', widgetSymbol, () => {});

  assertEqual(renderer.getElement().className, 'frame', 'frame class');
  assertEqual(anchors(renderer.getElement())[1].className, 'sym', 'symbol class');
  assertEqual(anchors(renderer.getElement())[1].title, 'com/example/client/Widget.java:88', 'title without server');
});

await test('StackTraceView renders and resymbolizes a trace', () => {
  const container = freshContainer();
  const clicked: string[] = [];
  const view = new StackTraceView(container, { onFrameClick: frame => clicked.push(frame.symbolName) });

  const parsed = new StackTraceParser().parseString(TEST_DATA.v8Stack);
  if (!parsed.success) throw new Error(parsed.error);
  view.render(parsed.data);
  assertEqual(view.frameCount, 4, 'frames');
  assertEqual(container.children.length, 4, 'frame elements');
  assertEqual(
    container.children[1].textContent,
    'vendor.js::[unknown] Line 5 Col 3',
    'anonymous frame'
  );

  anchors(container.children[2])[0].click();
  assertEqual(clicked, ['new Widget'], 'frame click');

  const trace = new StackTraceParser().fromCallFrames([
    { functionName: 'Ab', url: 'https://example.test/app.js', lineNumber: 0, columnNumber: 0 },
    { functionName: 'Zz', url: 'https://example.test/app.js', lineNumber: 1, columnNumber: 0 },
  ]);
  view.render(trace);
  assertEqual(container.children.length, 2, 'previous frames replaced');

  const symbols = SymbolMap.parse(TEST_DATA.symbolManifest);
  if (!symbols.success) throw new Error(symbols.error);
  const symbolClicks: string[] = [];
  const count = view.resymbolize(symbols.data, 'https://src.example.test/', symbol => symbolClicks.push(symbol.symbolName));
  assertEqual(count, 1, 'resymbolized frames');
  assertEqual(
    container.children[0].textContent,
    'app.js::Ab() Line 1 Col 1com.example.client.Widget::render',
    'resymbolized text'
  );

  anchors(container.children[0])[1].click();
  assertEqual(symbolClicks, ['com.example.client.Widget::render'], 'symbol click');

  view.detach();
  assertEqual(container.children.length, 0, 'detached');
});
