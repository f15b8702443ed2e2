import type { SettingsSource } from '../../core/types.js';
import { Severity } from '../../core/types.js';
import type { HintletApi } from '../api.js';
import { RecordType } from '../constants.js';
import { formatMilliseconds, typeToString } from '../utils.js';

export const LONG_DURATION_RULE = 'long-duration';

// Events that run on the UI thread and block it while they do
const UI_THREAD_TYPES = new Set<number>([
  RecordType.DOM_EVENT,
  RecordType.LAYOUT_EVENT,
  RecordType.RECALC_STYLE_EVENT,
  RecordType.PAINT_EVENT,
  RecordType.PARSE_HTML_EVENT,
  RecordType.TIMER_FIRED,
  RecordType.XHR_READY_STATE_CHANGE,
  RecordType.XHR_LOAD,
  RecordType.EVAL_SCRIPT_EVENT,
  RecordType.JAVASCRIPT_EXECUTION,
  RecordType.GC_EVENT,
]);

export function registerLongDurationRule(api: HintletApi, getSettings: SettingsSource): void {
  api.register(LONG_DURATION_RULE, record => {
    const settings = getSettings();
    if (settings.disabledRules.includes(LONG_DURATION_RULE)) return;
    if (!UI_THREAD_TYPES.has(record.type)) return;

    const duration = record.duration;
    const threshold = settings.longDurationMs;
    if (duration === undefined || duration < threshold) return;

    api.addHint(
      LONG_DURATION_RULE,
      record.time,
      `${typeToString(record.type)} took ${formatMilliseconds(duration, 0)} ` +
        `(threshold ${formatMilliseconds(threshold, 0)})`,
      record.sequence,
      duration >= threshold * 2 ? Severity.CRITICAL : Severity.WARNING
    );
  });
}
