/**
 * Utilities barrel export
 */

export {
  brightnessToPercent,
  percentToBrightness,
  parseRgbHex,
  toRgbHex,
  type RgbColor,
} from './ValueConverters.mjs';

export { consoleSink, createLogger, type LoggerOptions } from './Logger.mjs';
