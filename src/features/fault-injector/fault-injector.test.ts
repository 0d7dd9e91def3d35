import { activateFault, createInjectorState, deactivateFault, tickInjector } from './fault-injector';
import { emissionFor, pickFaultKind, validateInjectorConfig } from './helpers';
import type { InjectorState } from './types';

const config = { FAULT_EMIT_EVERY: 5 };

function runTicks(initial: InjectorState, count: number): { state: InjectorState; emitted: number[] } {
  let state = initial;
  const emitted: number[] = [];
  for (let i = 1; i <= count; i++) {
    const result = tickInjector(state, config);
    state = result.state;
    if (result.event) emitted.push(i);
  }
  return { state: state, emitted: emitted };
}

describe('fault-injector', () => {
  describe('createInjectorState', () => {
    it('should start inactive', () => {
      expect(createInjectorState()).toEqual({ active: false, kind: 'none', tickCount: 0 });
    });
  });

  describe('tickInjector', () => {
    it('should emit nothing while inactive', () => {
      const result = runTicks(createInjectorState(), 20);

      expect(result.emitted).toEqual([]);
      expect(result.state.tickCount).toBe(0);
    });

    it('should emit on every fifth tick while active', () => {
      const result = runTicks(activateFault('sensor_noise'), 12);

      expect(result.emitted).toEqual([5, 10]);
      expect(result.state.tickCount).toBe(12);
    });

    it('should emit the actuator signal at error severity', () => {
      let state = activateFault('actuator_fail');
      for (let i = 0; i < 4; i++) state = tickInjector(state, config).state;

      expect(tickInjector(state, config).event).toEqual({
        severity: 'error',
        errorKind: 'actuator_stuck',
        message: 'Actuator failure simulation active',
        func: 'simulateFault'
      });
    });

    it('should restart the throttle when a new fault is activated', () => {
      const first = runTicks(activateFault('comm_break'), 3);
      expect(first.state.tickCount).toBe(3);

      const second = runTicks(activateFault('power_spike'), 5);
      expect(second.emitted).toEqual([5]);
    });

    it('should stop emitting after deactivation', () => {
      const partial = runTicks(activateFault('memory_leak'), 4);
      const result = runTicks(deactivateFault(partial.state), 10);

      expect(result.emitted).toEqual([]);
      expect(result.state).toEqual({ active: false, kind: 'none', tickCount: 4 });
    });
  });

  describe('emissionFor', () => {
    it.each([
      ['sensor_noise', 'warning', 'sensor_failure', 'Sensor noise simulation active'],
      ['actuator_fail', 'error', 'actuator_stuck', 'Actuator failure simulation active'],
      ['comm_break', 'warning', 'communication_lost', 'Communication break simulation active'],
      ['power_spike', 'warning', 'power_fluctuation', 'Power fluctuation simulation active'],
      ['memory_leak', 'critical', 'memory_corruption', 'Memory corruption simulation active']
    ] as const)('should map %s to %s %s', (kind, severity, errorKind, message) => {
      expect(emissionFor(kind)).toEqual({ severity, errorKind, message, func: 'simulateFault' });
    });
  });

  describe('pickFaultKind', () => {
    it('should map the unit interval uniformly onto the five kinds', () => {
      expect(pickFaultKind(() => 0)).toBe('sensor_noise');
      expect(pickFaultKind(() => 0.2)).toBe('actuator_fail');
      expect(pickFaultKind(() => 0.5)).toBe('comm_break');
      expect(pickFaultKind(() => 0.7)).toBe('power_spike');
      expect(pickFaultKind(() => 0.99)).toBe('memory_leak');
    });

    it('should stay in range for an out-of-contract source', () => {
      expect(pickFaultKind(() => 1)).toBe('memory_leak');
    });
  });

  describe('validateInjectorConfig', () => {
    it('should accept a positive integer', () => {
      expect(() => validateInjectorConfig(config)).not.toThrow();
    });

    it('should reject zero', () => {
      expect(() => validateInjectorConfig({ FAULT_EMIT_EVERY: 0 }))
        .toThrow('FAULT_EMIT_EVERY must be a positive integer, got 0');
    });
  });
});
