import { describe, it, expect } from 'vitest';
import { scrollDelta } from '../session.js';

describe('scrollDelta', () => {
  it('should map directions to wheel deltas', () => {
    expect(scrollDelta('down', 400)).toEqual([0, 400]);
    expect(scrollDelta('up', 400)).toEqual([0, -400]);
    expect(scrollDelta('left', 120)).toEqual([-120, 0]);
    expect(scrollDelta('right', 120)).toEqual([120, 0]);
  });
});
