/**
 * @fileoverview Extracts bars from rendered chart page text.
 *
 * Two shapes are recognized:
 * - the chart legend, `O 128450 H 128600 L 128300 C 128550 Vol 15.23K`,
 *   which describes the bar under the cursor (stamped with the scrape time)
 * - dated table rows, `2025-01-15 13:00  128450  128600  128300  128550  15230`
 *   or `15/01/2025 13:00 ...`, read as UTC
 *
 * @module @candlefeed/provider-scrape/text-parser
 */

import type { RawBar } from '@candlefeed/contracts';

const NUMBER = String.raw`[+-]?\d[\d,]*(?:\.\d+)?`;
const VOLUME = String.raw`\d[\d,]*(?:\.\d+)?\s*[KMB]?`;

const LEGEND_PATTERN = new RegExp(
  String.raw`\bO\s*(${NUMBER})\s+H\s*(${NUMBER})\s+L\s*(${NUMBER})\s+C\s*(${NUMBER})` +
    String.raw`(?:[^\n]*?\bVol(?:ume)?\s*(${VOLUME}))?`,
  'g'
);

const ISO_DATE = String.raw`\d{4}-\d{2}-\d{2}(?:[ T]\d{2}:\d{2}(?::\d{2})?)?`;
const DMY_DATE = String.raw`\d{2}/\d{2}/\d{4}(?:\s+\d{2}:\d{2}(?::\d{2})?)?`;

const ROW_PATTERN = new RegExp(
  String.raw`^(${ISO_DATE}|${DMY_DATE})\s+(${NUMBER})\s+(${NUMBER})\s+(${NUMBER})\s+(${NUMBER})(?:\s+(${VOLUME}))?$`
);

const VOLUME_MULTIPLIERS: Record<string, number> = { K: 1e3, M: 1e6, B: 1e9 };

/**
 * Reads a price such as `128,450.5`.
 */
export function parsePrice(text: string): number {
  return Number(text.replace(/,/g, ''));
}

/**
 * Reads a volume such as `15.23K` or `1,200`.
 */
export function parseVolume(text: string): number {
  const match = /^([\d,]*(?:\.\d+)?)\s*([KMB])?$/.exec(text.trim());
  if (!match) {
    return Number.NaN;
  }
  const base = Number((match[1] ?? '').replace(/,/g, ''));
  const multiplier = match[2] ? (VOLUME_MULTIPLIERS[match[2]] ?? 1) : 1;
  return base * multiplier;
}

/**
 * Converts a row date to an ISO-like UTC string.
 *
 * @example
 * ```typescript
 * rowDateToIso('15/01/2025 13:00') // '2025-01-15T13:00:00Z'
 * rowDateToIso('2025-01-15')       // '2025-01-15T00:00:00Z'
 * ```
 */
export function rowDateToIso(text: string): string {
  const [datePart = '', timePart = '00:00'] = text.trim().split(/[ T]+/);
  let date = datePart;
  const dmy = /^(\d{2})\/(\d{2})\/(\d{4})$/.exec(datePart);
  if (dmy) {
    date = `${dmy[3]}-${dmy[2]}-${dmy[1]}`;
  }
  const time = timePart.length === 5 ? `${timePart}:00` : timePart;
  return `${date}T${time}Z`;
}

function toRawBar(timestamp: RawBar['timestamp'], values: Array<string | undefined>): RawBar {
  const [open, high, low, close, volume] = values;
  return {
    timestamp,
    fields: {
      open: open === undefined ? null : parsePrice(open),
      high: high === undefined ? null : parsePrice(high),
      low: low === undefined ? null : parsePrice(low),
      close: close === undefined ? null : parsePrice(close),
      volume: volume === undefined ? null : parseVolume(volume),
    },
  };
}

/**
 * Parses dated table rows, one per line.
 */
export function parseTableRows(text: string): RawBar[] {
  const bars: RawBar[] = [];
  for (const line of text.split('\n')) {
    const match = ROW_PATTERN.exec(line.trim());
    if (!match) continue;
    const [, date = '', ...values] = match;
    bars.push(toRawBar(rowDateToIso(date), values));
  }
  return bars;
}

/**
 * Parses chart legends. Each legend becomes one bar stamped `observedAt`.
 */
export function parseLegends(text: string, observedAt: Date): RawBar[] {
  const bars: RawBar[] = [];
  for (const match of text.matchAll(LEGEND_PATTERN)) {
    bars.push(toRawBar(observedAt, match.slice(1)));
  }
  return bars;
}

/**
 * Extracts bars from page text, preferring table rows over legends.
 *
 * @returns Bars sorted by time; empty when nothing recognizable is on the page
 */
export function parsePageText(text: string, observedAt: Date = new Date()): RawBar[] {
  const rows = parseTableRows(text);
  if (rows.length > 0) {
    return rows.sort((a, b) => String(a.timestamp).localeCompare(String(b.timestamp)));
  }
  return parseLegends(text, observedAt).slice(-1);
}
