import { test } from 'node:test';
import assert from 'node:assert/strict';
import {
  brightnessToPercent,
  parseRgbHex,
  percentToBrightness,
  toRgbHex,
} from '../lib/utils/ValueConverters.mjs';

test('brightnessToPercent: maps 0-255 to 0-100 with one decimal', () => {
  assert.equal(brightnessToPercent(0), 0);
  assert.equal(brightnessToPercent(255), 100);
  assert.equal(brightnessToPercent(128), 50.2);
});

test('brightnessToPercent: clamps out of range input', () => {
  assert.equal(brightnessToPercent(300), 100);
  assert.equal(brightnessToPercent(-5), 0);
});

test('percentToBrightness: maps 0-100 to 0-255', () => {
  assert.equal(percentToBrightness(0), 0);
  assert.equal(percentToBrightness(50), 128);
  assert.equal(percentToBrightness(100), 255);
});

test('percentToBrightness: values above 100 are already brightness', () => {
  assert.equal(percentToBrightness(180), 180);
  assert.equal(percentToBrightness(400), 255);
});

test('converters: reject NaN', () => {
  assert.throws(() => brightnessToPercent(Number.NaN), TypeError);
  assert.throws(() => percentToBrightness(Number.NaN), TypeError);
});

test('parseRgbHex: accepts six hex digits with optional #', () => {
  assert.deepEqual(parseRgbHex('FF8000'), { r: 255, g: 128, b: 0 });
  assert.deepEqual(parseRgbHex('#00ff7f'), { r: 0, g: 255, b: 127 });
});

test('parseRgbHex: anything else is null', () => {
  assert.equal(parseRgbHex('FF80'), null);
  assert.equal(parseRgbHex('GG0000'), null);
  assert.equal(parseRgbHex(0xff8000), null);
  assert.equal(parseRgbHex(null), null);
});

test('toRgbHex: uppercase, padded, clamped', () => {
  assert.equal(toRgbHex({ r: 255, g: 128, b: 0 }), 'FF8000');
  assert.equal(toRgbHex({ r: 1, g: 2, b: 3 }), '010203');
  assert.equal(toRgbHex({ r: 300, g: -1, b: 15.6 }), 'FF0010');
});
