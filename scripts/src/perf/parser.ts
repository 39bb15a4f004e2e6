import type { EventMap, EventName } from "lib/report/types.js";

import { UNAVAILABLE_SENTINELS } from "../constants.js";

const METRIC_LINE = /^[0-9<]/;
const MIN_FIELDS = 3;

/**
 * Parses `perf stat -x,` output into an event map.
 *
 * Lines that do not start with a digit or `<` are treated as headers and
 * skipped, as are lines with fewer than three fields. Values that perf marks
 * as unsupported/uncounted, or that fail to parse, are recorded as `null`.
 * A repeated event name overwrites the earlier reading.
 */
export function parsePerfCsv(content: string): EventMap {
  const events: EventMap = new Map();

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || !METRIC_LINE.test(trimmed)) {
      continue;
    }

    const fields = line.split(",").map((field) => field.trim());
    if (fields.length < MIN_FIELDS) {
      continue;
    }

    const [rawValue, unit, event] = fields;
    if (isSentinel(rawValue)) {
      events.set(event, null);
      continue;
    }

    const value = parseCounterValue(rawValue);
    events.set(event, value === null ? null : { value, unit });
  }

  return events;
}

export function getValue(events: EventMap, name: EventName): number | null {
  return events.get(name)?.value ?? null;
}

function isSentinel(value: string): boolean {
  return UNAVAILABLE_SENTINELS.some((sentinel) => sentinel === value);
}

// Decimal floats only; `_` may separate digits. Radix literals such as 0x10 are rejected.
const DECIMAL_VALUE = /^[+-]?(?:\d(?:_?\d)*(?:\.(?:\d(?:_?\d)*)?)?|\.\d(?:_?\d)*)(?:[eE][+-]?\d(?:_?\d)*)?$/;

function parseCounterValue(raw: string): number | null {
  const cleaned = raw.replace(/,/g, "");
  if (!DECIMAL_VALUE.test(cleaned)) {
    return null;
  }
  return Number(cleaned.replace(/_/g, ""));
}
