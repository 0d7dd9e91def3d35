import {
  createWatchdogState,
  evaluateWatchdog,
  petWatchdog
} from './loop-watchdog';
import type { WatchdogState } from './types';

describe('loop-watchdog', () => {
  describe('createWatchdogState', () => {
    it('should arm the watchdog at the given time', () => {
      expect(createWatchdogState(100)).toEqual({ lastWatchdogPet: 100, lastFiredWindow: 0 });
    });

    it('should throw on negative time', () => {
      expect(() => createWatchdogState(-1)).toThrow('createWatchdogState: nowSec must be a non-negative finite number, got -1');
    });
  });

  describe('petWatchdog', () => {
    it('should return new state with updated timestamp', () => {
      const state: WatchdogState = { lastWatchdogPet: 1000, lastFiredWindow: 2 };
      const newState = petWatchdog(state, 1005);

      expect(newState).toEqual({ lastWatchdogPet: 1005, lastFiredWindow: 0 });
      expect(newState).not.toBe(state);
      expect(state.lastWatchdogPet).toBe(1000);
    });

    it('should throw on NaN', () => {
      const state: WatchdogState = { lastWatchdogPet: 0, lastFiredWindow: 0 };
      expect(() => petWatchdog(state, NaN)).toThrow();
    });
  });

  describe('evaluateWatchdog', () => {
    it('should throw on zero timeout', () => {
      expect(() => evaluateWatchdog(createWatchdogState(0), 10, 0)).toThrow('evaluateWatchdog: timeoutSec must be a positive finite number, got 0');
    });

    it('should not fire while fresh', () => {
      const result = evaluateWatchdog(createWatchdogState(0), 4.9, 5);

      expect(result.fired).toBe(false);
      expect(result.staleSec).toBe(4.9);
    });

    it('should fire once when the first window is crossed', () => {
      const result = evaluateWatchdog(createWatchdogState(0), 5, 5);

      expect(result.fired).toBe(true);
      expect(result.state).toEqual({ lastWatchdogPet: 0, lastFiredWindow: 1 });
    });

    it('should not fire again within the same window', () => {
      const first = evaluateWatchdog(createWatchdogState(0), 5, 5);
      const second = evaluateWatchdog(first.state, 9.9, 5);

      expect(second.fired).toBe(false);
      expect(second.state).toBe(first.state);
    });

    it('should fire once per stale window over 12 seconds of 1 second checks', () => {
      let state = createWatchdogState(0);
      const firedAt: number[] = [];

      for (let t = 1; t <= 12; t++) {
        const result = evaluateWatchdog(state, t, 5);
        state = result.state;
        if (result.fired) firedAt.push(t);
      }

      expect(firedAt).toEqual([5, 10]);
    });

    it('should not repeat-fire with sub-second checks', () => {
      let state = createWatchdogState(0);
      let fired = 0;

      for (let tenths = 1; tenths <= 70; tenths++) {
        const result = evaluateWatchdog(state, tenths / 10, 5);
        state = result.state;
        if (result.fired) fired++;
      }

      expect(fired).toBe(1);
    });

    it('should re-arm after a pet', () => {
      const fired = evaluateWatchdog(createWatchdogState(0), 6, 5);
      const petted = petWatchdog(fired.state, 6);

      expect(evaluateWatchdog(petted, 10, 5).fired).toBe(false);
      expect(evaluateWatchdog(petted, 11, 5).fired).toBe(true);
    });

    it('should treat a clock running backwards as fresh', () => {
      const result = evaluateWatchdog(createWatchdogState(100), 90, 5);

      expect(result.fired).toBe(false);
      expect(result.staleSec).toBe(-10);
    });
  });
});
