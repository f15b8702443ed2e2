/**
 * Constants for evaluating data records
 */

// Resource types after the content-policy codes browsers use, plus a few
// custom ones (the two-digit values).
export const ResourceType = {
  OTHER: 1, // typically XHR
  SCRIPT: 2,
  IMAGE: 3,
  CSSIMAGE: 31,
  FAVICON: 32,
  STYLESHEET: 4,
  OBJECT: 5, // i.e. Flash
  DOCUMENT: 6,
  SUBDOCUMENT: 7, // iframe
  REDIRECT: 71,
  JS_REDIRECT: 72,
  REFRESH: 8,
  XBL: 9,
  PING: 10,
  XMLHTTPREQUEST: 11,
  OBJECT_SUBREQUEST: 12,
} as const;

export type ResourceTypeCode = (typeof ResourceType)[keyof typeof ResourceType];

// Numeric codes of the data record types the browser emits.
export const RecordType = {
  DOM_EVENT: 0,
  LAYOUT_EVENT: 1,
  RECALC_STYLE_EVENT: 2,
  PAINT_EVENT: 3,
  PARSE_HTML_EVENT: 4,
  TIMER_INSTALLED: 5,
  TIMER_CLEARED: 6,
  TIMER_FIRED: 7,
  XHR_READY_STATE_CHANGE: 8,
  XHR_LOAD: 9,
  EVAL_SCRIPT_EVENT: 10,
  LOG_MESSAGE_EVENT: 11,
  RESOURCE_SEND_REQUEST: 12,
  RESOURCE_RECEIVE_RESPONSE: 13,
  RESOURCE_FINISH: 14,
  JAVASCRIPT_EXECUTION: 15,
  RESOURCE_DATA_RECEIVED: 16,
  GC_EVENT: 17,
  DOM_CONTENT_LOADED: 18,
  LOAD_EVENT: 19,
  NETWORK_RESOURCE_START: 20,
  NETWORK_RESOURCE_RESPONSE: 21,
  NETWORK_RESOURCE_FINISH: 22,
  NETWORK_RESOURCE_ERROR: 23,
  TAB_CHANGED: 24,
  PAGE_TRANSITION: 25,
} as const;

export type RecordTypeName = keyof typeof RecordType;

// Record type names, indexed by their numeric code.
export const RECORD_TYPE_LIST: readonly string[] = Object.entries(RecordType)
  .sort((a, b) => a[1] - b[1])
  .map(([name]) => name);

export const MessageType = {
  LOG: 1,
  HINT: 2,
} as const;
