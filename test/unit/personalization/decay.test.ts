import { describe, it, expect } from 'vitest';
import { decay, elapsedDays } from '../../../src/personalization/decay.js';

describe('decay', () => {
  it('returns the weight unchanged when no time has passed', () => {
    expect(decay(0.7, 0, 14)).toBe(0.7);
    expect(decay(0.7, -3, 14)).toBe(0.7);
  });

  it('shrinks by a factor of e per half-life', () => {
    expect(decay(2, 14, 14)).toBeCloseTo(2 * Math.exp(-1), 12);
    expect(decay(-0.5, 28, 14)).toBeCloseTo(-0.5 * Math.exp(-2), 12);
  });

  it('rejects a non-positive half-life', () => {
    expect(() => decay(1, 1, 0)).toThrow(RangeError);
  });
});

describe('elapsedDays', () => {
  it('measures fractional days', () => {
    expect(elapsedDays('2026-03-01T00:00:00.000Z', new Date('2026-03-03T12:00:00.000Z'))).toBe(2.5);
  });

  it('clamps future timestamps and ignores unparseable ones', () => {
    expect(elapsedDays('2026-03-05T00:00:00.000Z', new Date('2026-03-03T00:00:00.000Z'))).toBe(0);
    expect(elapsedDays('yesterday', new Date('2026-03-03T00:00:00.000Z'))).toBe(0);
  });
});
