/**
 * Value Converters for platform ↔ Miniserver values
 *
 * Platforms usually express brightness as 0-255; the Miniserver uses 0-100.
 * Colour controls report RGB as six hex digits.
 */

export interface RgbColor {
  r: number;
  g: number;
  b: number;
}

const RGB_HEX_REGEX = /^#?([0-9a-fA-F]{6})$/;

function assertNumber(value: number, label: string): void {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new TypeError(`${label} must be a number`);
  }
}

/**
 * Convert platform brightness (0-255) to a Miniserver percentage (0-100)
 *
 * @example
 * brightnessToPercent(255) // returns 100
 * brightnessToPercent(128) // returns 50.2
 */
export function brightnessToPercent(brightness: number): number {
  assertNumber(brightness, 'Brightness');

  const clamped = Math.max(0, Math.min(255, brightness));
  return Math.round((clamped * 1000) / 255) / 10;
}

/**
 * Convert a Miniserver value to platform brightness (0-255)
 *
 * Values above 100 are taken to be on the 0-255 scale already.
 * Rounds to the nearest step: 50 gives 128, where truncating adapters give 127.
 *
 * @example
 * percentToBrightness(100) // returns 255
 * percentToBrightness(50)  // returns 128
 */
export function percentToBrightness(value: number): number {
  assertNumber(value, 'Value');

  const brightness = value <= 100 ? (value * 255) / 100 : value;
  return Math.max(0, Math.min(255, Math.round(brightness)));
}

/**
 * Parse a six-digit RGB hex string ("FF8000" or "#FF8000")
 *
 * @returns null when the value is not an RGB hex string
 */
export function parseRgbHex(value: unknown): RgbColor | null {
  if (typeof value !== 'string') return null;

  const match = RGB_HEX_REGEX.exec(value.trim());
  if (!match?.[1]) return null;

  const rgb = parseInt(match[1], 16);
  return {
    r: (rgb >> 16) & 255,
    g: (rgb >> 8) & 255,
    b: rgb & 255,
  };
}

/**
 * Encode a colour as six uppercase hex digits
 */
export function toRgbHex(color: RgbColor): string {
  const channel = (value: number): string =>
    Math.max(0, Math.min(255, Math.round(value)))
      .toString(16)
      .padStart(2, '0');

  return `${channel(color.r)}${channel(color.g)}${channel(color.b)}`.toUpperCase();
}
