/**
 * Tests for the hintlet API, record utilities and message envelopes
 */

import { HintletApi } from '../src/hintlet/api.js';
import { ResourceType } from '../src/hintlet/constants.js';
import { decodeHostMessage, decodeMessage, encodeMessage } from '../src/hintlet/messages.js';
import {
  formatMilliseconds,
  formatSeconds,
  getResourceType,
  hasHeader,
  headerContains,
  isCompressed,
  stringToType,
  typeToString,
} from '../src/hintlet/utils.js';
import { Severity } from '../src/core/types.js';
import type { HeaderMap } from '../src/core/types.js';
import {
  assertEqual,
  collectingSink,
  expectRejection,
  expectThrow,
  logsFrom,
  makeResponse,
  test,
} from './shared-test-data.js';

await test('register keeps duplicate names in registration order', () => {
  const { sink, messages } = collectingSink();
  const api = new HintletApi(sink);
  const first = () => {};
  const second = () => {};

  api.register('dup', first);
  api.register('dup', second);

  assertEqual(api.rules.map(rule => rule.name), ['dup', 'dup'], 'names');
  if (api.rules[0].callback !== first || api.rules[1].callback !== second) {
    throw new Error('callbacks out of order');
  }
  assertEqual(messages, [
    '{"type":1,"payload":"Registered hintlet: dup"}',
    '{"type":1,"payload":"Registered hintlet: dup"}',
  ], 'registration logs');
});

await test('addHint posts a type 2 envelope with INFO by default', () => {
  const { sink, messages } = collectingSink();
  const api = new HintletApi(sink);

  api.addHint('r', 5, 'desc', 7);
  api.addHint('r', 6, 'bad', undefined, Severity.CRITICAL);

  assertEqual(messages, [
    '{"type":2,"payload":{"hintletRule":"r","timestamp":5,"description":"desc","refRecord":7,"severity":3}}',
    '{"type":2,"payload":{"hintletRule":"r","timestamp":6,"description":"bad","severity":1}}',
  ], 'hint envelopes');
});

await test('addHint without a timestamp throws before sending', () => {
  const { sink, messages } = collectingSink();
  const api = new HintletApi(sink);

  expectThrow(() => api.addHint('slow-rule', undefined, 'desc', 1), 'slow-rule: timestamp must be defined');
  expectThrow(() => api.formatHint('slow-rule', null, 'desc'), 'slow-rule: timestamp must be defined');
  assertEqual(messages.length, 0, 'messages sent');
});

await test('log posts a type 1 envelope', () => {
  const { sink, messages } = collectingSink();
  new HintletApi(sink).log('hello');
  assertEqual(messages, ['{"type":1,"payload":"hello"}'], 'log envelope');
});

await test('load goes through the script loader', async () => {
  const { sink } = collectingSink();
  await expectRejection(
    () => new HintletApi(sink).load('rules/extra.js'),
    'Cannot load rules/extra.js: no script loader available'
  );

  const loaded: string[] = [];
  const api = new HintletApi(sink, path => {
    loaded.push(path);
  });
  await api.load('rules/extra.js');
  assertEqual(loaded, ['rules/extra.js'], 'loaded paths');
});

await test('dispatch reports a throwing rule and keeps going', () => {
  const { sink, messages } = collectingSink();
  const api = new HintletApi(sink);
  const seen: number[] = [];

  api.register('bad', () => {
    throw new Error('boom');
  });
  api.register('good', record => seen.push(record.time));
  api.dispatch({ type: 0, time: 42, data: {} });

  assertEqual(seen, [42], 'later rule ran');
  assertEqual(logsFrom(messages), [
    'Registered hintlet: bad',
    'Registered hintlet: good',
    'Exception in hintlet rule bad: boom',
  ], 'logs');
});

await test('getResourceType classification', () => {
  const favicon = 'https://example.test/favicon.ico';
  const cases: Array<[string, HeaderMap, string | undefined, number]> = [
    ['html with charset', { 'Content-Type': 'text/html; charset=utf-8' }, undefined, ResourceType.DOCUMENT],
    ['plain', { 'Content-Type': 'text/plain' }, undefined, ResourceType.DOCUMENT],
    ['json', { 'Content-Type': 'application/json' }, undefined, ResourceType.DOCUMENT],
    ['xml', { 'Content-Type': 'application/xml' }, undefined, ResourceType.DOCUMENT],
    ['css', { 'Content-Type': 'text/css' }, undefined, ResourceType.STYLESHEET],
    ['js', { 'Content-Type': 'text/javascript' }, undefined, ResourceType.SCRIPT],
    ['application js', { 'Content-Type': 'application/javascript' }, undefined, ResourceType.OTHER],
    ['x-javascript', { 'Content-Type': 'application/x-javascript' }, undefined, ResourceType.OTHER],
    ['png', { 'Content-Type': 'image/png' }, undefined, ResourceType.IMAGE],
    ['icon mime', { 'Content-Type': 'image/vnd.microsoft.icon' }, undefined, ResourceType.FAVICON],
    ['png favicon url', { 'Content-Type': 'image/png' }, favicon, ResourceType.FAVICON],
    ['octet favicon url', { 'Content-Type': 'application/octet-stream' }, favicon, ResourceType.FAVICON],
    ['html favicon url', { 'Content-Type': 'text/html' }, favicon, ResourceType.DOCUMENT],
    ['mixed case html', { 'Content-Type': 'Text/HTML' }, undefined, ResourceType.OTHER],
    ['upper case css', { 'Content-Type': 'TEXT/CSS' }, undefined, ResourceType.OTHER],
    ['lowercase header', { 'content-type': 'text/css' }, undefined, ResourceType.STYLESHEET],
    ['video', { 'Content-Type': 'video/mp4' }, undefined, ResourceType.OTHER],
    ['garbage', { 'Content-Type': 'garbage' }, undefined, ResourceType.OTHER],
    ['no value', { 'Content-Type': undefined }, undefined, ResourceType.OTHER],
    ['no header', {}, undefined, ResourceType.OTHER],
  ];

  for (const [name, headers, url, expected] of cases) {
    const record = makeResponse(headers, url);
    if (url === undefined) delete record.data.url;
    assertEqual(getResourceType(record), expected, name);
  }

  assertEqual(getResourceType({ type: 21, time: 0, data: {} }), ResourceType.OTHER, 'no headers at all');
});

await test('hasHeader and headerContains', () => {
  const headers: HeaderMap = {
    'Content-Type': 'text/html',
    'Cache-Control': 'public, MAX-AGE=3600',
    'X-Empty': undefined,
  };

  assertEqual(hasHeader(headers, 'content-type'), 'text/html', 'case-insensitive match');
  assertEqual(hasHeader(headers, 'Expires'), undefined, 'absent');
  assertEqual(hasHeader(headers, 'x-empty'), null, 'present without value');
  assertEqual(hasHeader(undefined, 'Expires'), undefined, 'no headers');

  assertEqual(headerContains(headers, 'cache-control', 'max-age'), true, 'contains');
  assertEqual(headerContains(headers, 'Cache-Control', 'no-cache'), false, 'does not contain');
  assertEqual(headerContains(headers, 'Expires', '.'), false, 'absent header');
  assertEqual(headerContains(headers, 'X-Empty', '.*'), false, 'valueless header');
});

await test('isCompressed', () => {
  const cases: Array<[HeaderMap | undefined, boolean]> = [
    [{ 'Content-Encoding': 'gzip' }, true],
    [{ 'content-encoding': 'GZIP' }, true],
    [{ 'Content-Encoding': 'deflate' }, true],
    [{ 'Content-Encoding': 'compress' }, true],
    [{ 'Content-Encoding': 'pack200-gzip' }, true],
    [{ 'Content-Encoding': 'bzip2' }, true],
    [{ 'Content-Encoding': 'sdch' }, true],
    [{ 'Content-Encoding': 'br' }, false],
    [{ 'Content-Encoding': 'identity' }, false],
    [{ 'Content-Encoding': undefined }, false],
    [{ 'Content-Type': 'text/html' }, false],
    [undefined, false],
  ];
  for (const [headers, expected] of cases) {
    assertEqual(isCompressed(headers), expected, JSON.stringify(headers ?? null));
  }
});

await test('time formatting', () => {
  assertEqual(formatSeconds(2500, 2), '2.50s', 'seconds');
  assertEqual(formatSeconds(1234, 0), '1s', 'rounded seconds');
  assertEqual(formatMilliseconds(2500, 0), '2500ms', 'milliseconds');
  assertEqual(formatMilliseconds(12.345, 1), '12.3ms', 'fractional milliseconds');
});

await test('record type names', () => {
  assertEqual(typeToString(0), 'DOM_EVENT', 'first');
  assertEqual(typeToString(21), 'NETWORK_RESOURCE_RESPONSE', 'network response');
  assertEqual(typeToString(-1), undefined, 'negative');
  assertEqual(typeToString(26), undefined, 'past the end');
  assertEqual(typeToString(1.5), undefined, 'fractional');
  assertEqual(stringToType('PAINT_EVENT'), 3, 'paint');
  assertEqual(stringToType('NOPE'), undefined, 'unknown');
  assertEqual(stringToType('toString'), undefined, 'prototype member');
});

await test('message envelopes decode and validate', () => {
  assertEqual(decodeMessage('{"type":1,"payload":"x"}'), { success: true, data: { type: 1, payload: 'x' } }, 'log');

  const hint = { hintletRule: 'r', timestamp: 1, description: 'd', refRecord: 3, severity: 2 };
  assertEqual(decodeMessage(JSON.stringify({ type: 2, payload: hint })), { success: true, data: { type: 2, payload: hint } }, 'hint');

  assertEqual(
    decodeMessage('{"type":2,"payload":{"hintletRule":"r","timestamp":1,"description":"d","severity":9}}'),
    { success: false, error: 'Malformed hint record' },
    'bad severity'
  );
  assertEqual(decodeMessage('{"type":7}'), { success: false, error: 'Unknown message type: 7' }, 'unknown type');
  assertEqual(decodeMessage('[]'), { success: false, error: 'Message is not an object' }, 'array');
  assertEqual(decodeMessage('nope').success, false, 'not JSON');

  const record = { type: 0, time: 1, data: {} };
  assertEqual(
    decodeHostMessage(encodeMessage({ type: 'record', record })),
    { success: true, data: { type: 'record', record } },
    'host record'
  );
  assertEqual(
    decodeHostMessage('{"type":"configure","settings":{"longDurationMs":5}}'),
    { success: false, error: 'Malformed settings' },
    'partial settings'
  );
});

await test('valueless headers survive the host envelope', () => {
  const record = makeResponse({ 'Content-Encoding': undefined, 'Content-Type': 'text/html' });
  delete record.data.url;

  const json = encodeMessage({ type: 'record', record });
  assertEqual(
    json,
    '{"type":"record","record":{"type":21,"time":100,"sequence":4,"data":{"headers":{"Content-Encoding":null,"Content-Type":"text/html"}}}}',
    'encoded'
  );

  const decoded = decodeHostMessage(json);
  if (!decoded.success || decoded.data.type !== 'record') {
    throw new Error(`Expected a record message, got ${JSON.stringify(decoded)}`);
  }
  const headers = decoded.data.record.data.headers;
  assertEqual(hasHeader(headers, 'content-encoding'), null, 'present without value');
  assertEqual(hasHeader(headers, 'Content-Type'), 'text/html', 'valued header');
  assertEqual(hasHeader(headers, 'Expires'), undefined, 'absent');
  assertEqual(record.data.headers, { 'Content-Encoding': undefined, 'Content-Type': 'text/html' }, 'source record untouched');
});
