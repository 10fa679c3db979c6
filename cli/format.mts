/**
 * Terminal formatting for controls and state events
 */

import type { Control, StateEvent } from '../lib/types.mjs';
import { parseRgbHex } from '../lib/utils/ValueConverters.mjs';

/** Looks up a control by uuid; MiniserverClient.getControl fits */
export type ControlLookup = (uuid: string) => Control | undefined;

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Local time as `YYYY-MM-DD HH:MM:SS`
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined) return 'undefined';
  return JSON.stringify(value);
}

/**
 * Render the control list, sorted case-insensitively by name
 */
export function formatControlListing(controls: Iterable<Control>): string {
  const sorted = [...controls].sort((a, b) =>
    a.name.toLowerCase().localeCompare(b.name.toLowerCase())
  );

  const lines = ['Discovered controls:'];
  for (const control of sorted) {
    const label = control.room ? `${control.name} (${control.room})` : control.name;
    lines.push(`- ${label} [${control.uuid}] type=${control.type}`);
  }
  return lines.join('\n');
}

/**
 * Render one state event, labelled with the control name when known.
 * Colour controls also get their RGB channels.
 */
export function formatState(
  event: StateEvent,
  lookup: ControlLookup,
  now: Date = new Date()
): string {
  const control = lookup(event.controlUuid);
  let label = control ? control.name : event.controlUuid;
  if (event.state) {
    label += ` ${event.state}`;
  }
  let value = formatValue(event.value);
  const rgb = control && /color/i.test(control.type) ? parseRgbHex(event.value) : null;
  if (rgb) {
    value += ` (rgb ${rgb.r},${rgb.g},${rgb.b})`;
  }
  return `[${formatTimestamp(now)}] ${label}: ${value}`;
}
