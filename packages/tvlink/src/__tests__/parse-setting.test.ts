/**
 * Tests for CLI argument parsing
 */

import { describe, it, expect } from 'vitest';
import { coerceSettingValue, parseSettingAssignments } from '../utils/parse-setting.js';
import { parseRequestPayload } from '../commands/request.js';

describe('coerceSettingValue', () => {
  it.each([
    ['70', 70],
    ['-5', -5],
    ['1.5', 1.5],
    ['true', true],
    ['false', false],
    ['off', 'off'],
    ['1e3', '1e3'],
    ['', ''],
  ])('turns %j into %j', (raw, expected) => {
    expect(coerceSettingValue(raw)).toBe(expected);
  });
});

describe('parseSettingAssignments', () => {
  it('parses key=value pairs', () => {
    expect(parseSettingAssignments(['backlight=70', 'energySaving=off'])).toEqual({
      backlight: 70,
      energySaving: 'off',
    });
  });

  it('keeps everything after the first equals sign', () => {
    expect(parseSettingAssignments(['pictureMode=a=b'])).toEqual({ pictureMode: 'a=b' });
  });

  it('lets later pairs win', () => {
    expect(parseSettingAssignments(['backlight=70', 'backlight=80'])).toEqual({ backlight: 80 });
  });

  it('rejects a pair without a key', () => {
    expect(() => parseSettingAssignments(['=70'])).toThrow('Expected key=value, got "=70"');
    expect(() => parseSettingAssignments(['backlight'])).toThrow(
      'Expected key=value, got "backlight"',
    );
  });
});

describe('parseRequestPayload', () => {
  it('defaults to an empty object', () => {
    expect(parseRequestPayload(undefined)).toEqual({});
  });

  it('parses a JSON object', () => {
    expect(parseRequestPayload('{"volume":5}')).toEqual({ volume: 5 });
  });

  it('rejects JSON that is not an object', () => {
    expect(() => parseRequestPayload('[1,2]')).toThrow('Payload must be a JSON object');
    expect(() => parseRequestPayload('5')).toThrow('Payload must be a JSON object');
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseRequestPayload('{volume')).toThrow(/^Payload is not valid JSON: /);
  });
});
