/**
 * Duration Unit Tests
 *
 * max_age strings: <non-negative integer><s|m|h>
 */

import { describe, it, expect } from 'vitest';
import { formatDuration, parseDuration } from '../../../src/rules/duration';

describe('parseDuration', () => {
  it('should parse seconds, minutes and hours', () => {
    expect(parseDuration('45s')).toBe(45);
    expect(parseDuration('90m')).toBe(5400);
    expect(parseDuration('168h')).toBe(604800);
  });

  it('should return null for unsupported forms', () => {
    expect(parseDuration('')).toBeNull();
    expect(parseDuration('10')).toBeNull();
    expect(parseDuration('h')).toBeNull();
    expect(parseDuration('1.5h')).toBeNull();
    expect(parseDuration('10ms')).toBeNull();
    expect(parseDuration('1H')).toBeNull();
    expect(parseDuration(' 1h')).toBeNull();
  });

  it('should return null when the value overflows a safe integer', () => {
    expect(parseDuration('9007199254740993s')).toBeNull();
    expect(parseDuration('99999999999999999h')).toBeNull();
  });
});

describe('formatDuration', () => {
  it('should use the largest unit that divides evenly', () => {
    expect(formatDuration(604800)).toBe('168h');
    expect(formatDuration(5400)).toBe('90m');
    expect(formatDuration(61)).toBe('61s');
  });

  it('should format zero as seconds', () => {
    expect(formatDuration(0)).toBe('0s');
  });

  it('should produce strings parseDuration reads back', () => {
    for (const seconds of [1, 59, 60, 3599, 3600, 86400]) {
      expect(parseDuration(formatDuration(seconds))).toBe(seconds);
    }
  });
});
