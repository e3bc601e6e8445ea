import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { emptyProgress } from '@encodeq/core';
import { formatBytes, formatJobProgress, parsePositiveInt } from './format.js';

describe('formatJobProgress', () => {
  it('shows percent, speed and remaining time', () => {
    expect(formatJobProgress('clip.mov', {
      ...emptyProgress(20_000),
      positionMs: 5_000,
      percent: 25,
      speed: 2,
      averageSpeed: 2,
      etaMs: 7_500,
    })).toBe('clip.mov 25.0% 2x ETA 7s');
  });

  it('falls back to the position without a duration', () => {
    expect(formatJobProgress('live.ts', { ...emptyProgress(), positionMs: 65_500 })).toBe('live.ts 00:01:05.500');
  });
});

describe('formatBytes', () => {
  it('scales to the largest unit', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(5 * 1024 * 1024)).toBe('5 MB');
  });
});

describe('parsePositiveInt', () => {
  it('accepts whole numbers', () => {
    expect(parsePositiveInt('3')).toBe(3);
  });

  it('rejects anything else', () => {
    expect(() => parsePositiveInt('0')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('1.5')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('two')).toThrow(InvalidArgumentError);
  });
});
