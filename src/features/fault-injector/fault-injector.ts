/**
 * Fault injector
 *
 * Simulates a degraded subsystem. While active, every FAULT_EMIT_EVERY-th
 * tick produces the fault's signal; the caller logs it, which is what moves
 * the system into fault for error-level kinds.
 */

import { emissionFor } from './helpers';

import type { InjectableFaultKind } from '$types/common';
import type { InjectorConfig, InjectorState, InjectorTickResult } from './types';

export type { InjectorConfig, InjectorState, InjectorTickResult };

/**
 * Initialize an idle injector
 * @returns Inactive injector state
 */
export function createInjectorState(): InjectorState {
  return { active: false, kind: 'none', tickCount: 0 };
}

/**
 * Start simulating a fault
 *
 * Replaces any fault already active and restarts the throttle.
 *
 * @param kind - Fault kind to simulate
 * @returns Active injector state
 */
export function activateFault(kind: InjectableFaultKind): InjectorState {
  return { active: true, kind: kind, tickCount: 0 };
}

/**
 * Stop simulating
 * @param state - Current injector state
 * @returns Inactive state (tick count kept for diagnostics)
 */
export function deactivateFault(state: InjectorState): InjectorState {
  return { active: false, kind: 'none', tickCount: state.tickCount };
}

/**
 * Advance the injector by one loop iteration
 *
 * @param state - Current injector state
 * @param config - Emission throttle
 * @returns Updated state and the event to log, if this tick emits
 *
 * @example
 * ```typescript
 * let injector = activateFault('actuator_fail');
 * for (let i = 0; i < 5; i++) {
 *   const tick = tickInjector(injector, config);
 *   injector = tick.state;
 *   if (tick.event) monitor.log(tick.event); // fifth tick only
 * }
 * ```
 */
export function tickInjector(state: InjectorState, config: InjectorConfig): InjectorTickResult {
  if (!state.active || state.kind === 'none') {
    return { state: state, event: null };
  }

  const tickCount = state.tickCount + 1;
  const next: InjectorState = { active: true, kind: state.kind, tickCount: tickCount };

  if (tickCount % config.FAULT_EMIT_EVERY !== 0) {
    return { state: next, event: null };
  }

  return { state: next, event: emissionFor(state.kind) };
}
