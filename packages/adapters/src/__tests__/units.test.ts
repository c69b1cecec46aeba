import { describe, it, expect } from '@jest/globals';
import { cleanSensorName, kphToKnots, mphToKnots, mpsToKnots, roundTo } from '../index.js';

describe('speed conversions', () => {
  it('converts to knots', () => {
    expect(mpsToKnots(10)).toBeCloseTo(19.4384, 6);
    expect(kphToKnots(100)).toBeCloseTo(53.9957, 6);
    expect(mphToKnots(60)).toBeCloseTo(52.13856, 6);
  });

  it('returns 0 for non-finite input', () => {
    expect(mpsToKnots(Number.NaN)).toBe(0);
    expect(kphToKnots(Number.POSITIVE_INFINITY)).toBe(0);
  });
});

describe('cleanSensorName', () => {
  it('lower-cases and replaces punctuation runs with one underscore', () => {
    expect(cleanSensorName('Coolant Temp. (C)')).toBe('coolant_temp_c');
    expect(cleanSensorName('__Engine--Load__')).toBe('engine_load');
  });

  it('keeps names that are already clean', () => {
    expect(cleanSensorName('rpm')).toBe('rpm');
  });

  it('falls back when nothing usable remains', () => {
    expect(cleanSensorName('***')).toBe('unknown_sensor');
    expect(cleanSensorName('')).toBe('unknown_sensor');
  });
});

describe('roundTo', () => {
  it('rounds to the given decimals', () => {
    expect(roundTo(1.23456, 2)).toBe(1.23);
    expect(roundTo(-2957.29999, 4)).toBe(-2957.3);
    expect(roundTo(75, 4)).toBe(75);
  });

  it('returns integers beyond 2^53 unchanged', () => {
    expect(roundTo(2 ** 60, 4)).toBe(2 ** 60);
    expect(roundTo(2 ** 64, 4)).toBe(2 ** 64);
    expect(roundTo(-(2 ** 63), 4)).toBe(-(2 ** 63));
  });
});
