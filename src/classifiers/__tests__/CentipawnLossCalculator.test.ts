import { describe, it, expect } from 'vitest';

import { calculateCentipawnLoss } from '../CentipawnLossCalculator.js';

describe('calculateCentipawnLoss', () => {
  describe('white to move', () => {
    it('subtracts the actual score from the best score', () => {
      expect(calculateCentipawnLoss('white', 50, 50)).toBe(0);
      expect(calculateCentipawnLoss('white', 30, -120)).toBe(150);
      expect(calculateCentipawnLoss('white', 10, 40)).toBe(-30);
    });
  });

  describe('black to move', () => {
    it('subtracts the best score from the actual score', () => {
      expect(calculateCentipawnLoss('black', -200, -260)).toBe(-60);
      expect(calculateCentipawnLoss('black', 20, 340)).toBe(320);
      expect(calculateCentipawnLoss('black', 0, 0)).toBe(0);
    });
  });

  it('gives opposite signs for the same scores depending on the mover', () => {
    expect(calculateCentipawnLoss('white', 100, 40)).toBe(60);
    expect(calculateCentipawnLoss('black', 100, 40)).toBe(-60);
  });
});
