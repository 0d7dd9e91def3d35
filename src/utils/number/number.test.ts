import { clamp, drawInRange, isFiniteNumber, isInteger } from './index';

describe('number utils', () => {
  describe('isFiniteNumber', () => {
    it('should accept finite numbers', () => {
      expect(isFiniteNumber(0)).toBe(true);
      expect(isFiniteNumber(-3.5)).toBe(true);
    });

    it('should reject non-numbers without coercion', () => {
      expect(isFiniteNumber('5')).toBe(false);
      expect(isFiniteNumber(null)).toBe(false);
    });

    it('should reject NaN and Infinity', () => {
      expect(isFiniteNumber(NaN)).toBe(false);
      expect(isFiniteNumber(Infinity)).toBe(false);
    });
  });

  describe('isInteger', () => {
    it('should distinguish integers from fractions', () => {
      expect(isInteger(4)).toBe(true);
      expect(isInteger(4.2)).toBe(false);
      expect(isInteger('4')).toBe(false);
    });
  });

  describe('clamp', () => {
    it('should pass through values in range', () => {
      expect(clamp(42, 0, 100)).toBe(42);
    });

    it('should clamp both ends', () => {
      expect(clamp(-1, 0, 100)).toBe(0);
      expect(clamp(140, 0, 100)).toBe(100);
    });

    it('should clamp NaN to the lower bound', () => {
      expect(clamp(NaN, 0, 100)).toBe(0);
    });
  });

  describe('drawInRange', () => {
    it('should map the random source onto the span', () => {
      expect(drawInRange(() => 0, 10, 40)).toBe(10);
      expect(drawInRange(() => 0.5, 10, 40)).toBe(30);
      expect(drawInRange(() => 0.999, 10, 40)).toBe(49);
    });
  });
});
