import { describe, it, expect } from 'vitest';
import { encodeCoarsePhase } from '../src/solver/phase-encoder';

describe('Coarse phase encoder', () => {
  it('should encode phase 0 as divider - 1', () => {
    for (let d = 1; d <= 128; d++) {
      expect(encodeCoarsePhase(0, d)).toBe(d - 1);
    }
  });

  it('should wrap 360 degrees to one full counter cycle past phase 0', () => {
    for (let d = 1; d <= 128; d++) {
      expect(encodeCoarsePhase(360, d) - encodeCoarsePhase(0, d)).toBe(d + 1);
    }
  });

  it('should truncate fractional cycle offsets', () => {
    expect(encodeCoarsePhase(90, 4)).toBe(4);
    expect(encodeCoarsePhase(180, 4)).toBe(5);
    expect(encodeCoarsePhase(270, 4)).toBe(6);
    expect(encodeCoarsePhase(45, 1)).toBe(0);
  });

  it('should grow monotonically with phase for a fixed divider', () => {
    let previous = encodeCoarsePhase(0, 8);
    for (let phase = 15; phase < 360; phase += 15) {
      const current = encodeCoarsePhase(phase, 8);
      expect(current).toBeGreaterThanOrEqual(previous);
      previous = current;
    }
  });
});
