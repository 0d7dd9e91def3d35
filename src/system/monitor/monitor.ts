/**
 * Fault monitor
 *
 * Owns the log store, fault history, health state, injector state and the
 * optional log target, and is the only handle the control loop and the CLI
 * hold. All severity escalation happens in log(): an entry at error or above
 * counts a fault and moves a running system into fault.
 */

import { UnrecoverableStateError } from '$types/errors';
import { err, ok } from '$types/result';
import { isAtLeast } from '$types/common';
import { createFaultHistory } from '@core/fault-history';
import {
  checkHealth as runHealthCheck,
  createHealthState,
  feedWatchdog,
  recordFault,
  recordRecovery,
  resetGauges,
  validateHealthConfig
} from '@core/health-tracker';
import { createLogStore, formatEntryLine } from '@core/log-store';
import { isTerminal, stateLabel, transition } from '@core/state-machine';
import { buildDebugReport } from '@features/debug-report';
import {
  activateFault,
  createInjectorState,
  deactivateFault,
  tickInjector as advanceInjector,
  validateInjectorConfig
} from '@features/fault-injector';
import { attemptRecovery as runRecovery } from '@features/recovery';
import { captureLine } from '@utils/text';

import type { InjectableFaultKind, SystemState } from '$types/common';
import type { Result } from '$types/result';
import type { HealthState } from '@core/health-tracker';
import type { LogEntry, LogEvent } from '@core/log-store';
import type { InjectorState } from '@features/fault-injector';
import type { RecoveryContext, RecoveryOutcome } from '@features/recovery';
import type {
  HealthSnapshot,
  InjectionOutcome,
  Monitor,
  MonitorConfig,
  MonitorDependencies,
  ShutdownReport
} from './types';

export const SESSION_END_MARKER = '=== Log Session End ===';

const REFUSED_MESSAGE = 'Request refused: system is shut down';

/**
 * Create a fault monitor in the init state
 *
 * @param config - Complete monitor configuration
 * @param deps - Clock, randomness, sleep, operator logger and log target
 * @returns Monitor instance (call init() before use)
 * @throws {Error} If configuration is invalid
 *
 * @example
 * ```typescript
 * const monitor = createMonitor(CONFIG, { timeSource: now, random: Math.random, sleep, logger, logTarget });
 * monitor.init();
 * monitor.injectFault('actuator_fail');
 * await monitor.attemptRecovery();
 * const result = monitor.shutdown();
 * ```
 */
export function createMonitor(config: MonitorConfig, deps: MonitorDependencies): Monitor {
  validateHealthConfig(config);
  validateInjectorConfig(config);

  const store = createLogStore(
    { capacity: config.LOG_CAPACITY, messageMaxLength: config.MESSAGE_MAX_LENGTH, funcMaxLength: config.FUNC_MAX_LENGTH },
    { timeSource: deps.timeSource, logger: deps.logger }
  );
  const history = createFaultHistory(
    { capacity: config.FAULT_HISTORY_CAPACITY, descriptionMaxLength: config.DESCRIPTION_MAX_LENGTH },
    deps.timeSource
  );

  let state: SystemState = 'init';
  let health: HealthState = createHealthState(deps.timeSource());
  let injector: InjectorState = createInjectorState();
  let lastShutdown: ShutdownReport | null = null;

  // ─────────────────────────────────────────────────────────────
  // State changes
  // ─────────────────────────────────────────────────────────────

  function enterState(to: SystemState): boolean {
    const from = state;
    const result = transition(from, to);
    if (!result.ok) {
      append({ severity: 'warning', errorKind: 'invalid_state', message: result.error.message, func: 'enterState' }, 0);
      return false;
    }
    state = result.value;
    if (deps.onTransition) deps.onTransition(from, state);
    return true;
  }

  // ─────────────────────────────────────────────────────────────
  // Logging and escalation
  // ─────────────────────────────────────────────────────────────

  function append(event: LogEvent, line: number): LogEntry {
    const entry = store.append(event.severity, event.errorKind, event.message, { func: event.func, line: line });

    if (isAtLeast(event.severity, 'error')) {
      health = recordFault(health);
      if (state === 'running' && enterState('fault')) {
        store.append('warning', event.errorKind, 'System entered fault state', { func: 'log', line: 0 });
      }
    }

    return entry;
  }

  function log(event: LogEvent): LogEntry {
    return append(event, captureLine(1));
  }

  function refuseIfShutdown(func: string): boolean {
    if (!isTerminal(state)) return false;
    append({ severity: 'warning', errorKind: 'invalid_state', message: REFUSED_MESSAGE, func: func }, 0);
    return true;
  }

  // ─────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────

  function init(): void {
    if (state !== 'init') {
      append({ severity: 'warning', errorKind: 'invalid_state', message: 'Monitor already initialized', func: 'init' }, 0);
      return;
    }

    if (deps.logTarget !== null) {
      const opened = deps.logTarget.open();
      if (!opened.ok) {
        append({ severity: 'warning', errorKind: 'file_io_error', message: opened.error.message, func: 'init' }, 0);
      }
    }

    append({ severity: 'info', errorKind: 'none', message: 'Debug monitoring system initialized', func: 'init' }, 0);
    enterState('running');
    append({ severity: 'info', errorKind: 'none', message: 'System transitioned to RUNNING state', func: 'init' }, 0);
  }

  function flush(): number {
    const target = deps.logTarget;
    if (target === null || !target.isOpen()) {
      append({ severity: 'warning', errorKind: 'file_io_error', message: 'Log file not available', func: 'flush' }, 0);
      return 0;
    }

    const entries = store.entries();
    const lines = entries.map(formatEntryLine);
    lines.push(SESSION_END_MARKER);

    const written = target.write(lines);
    if (!written.ok) {
      append({ severity: 'error', errorKind: 'file_io_error', message: written.error.message, func: 'flush' }, 0);
      return 0;
    }
    return entries.length;
  }

  function shutdown(): Result<ShutdownReport, UnrecoverableStateError> {
    if (state === 'shutdown' && lastShutdown !== null) {
      return ok({ ...lastShutdown, alreadyShutdown: true });
    }

    append({ severity: 'info', errorKind: 'none', message: 'Shutting down debug monitoring system', func: 'shutdown' }, 0);

    const flushedEntries = flush();

    if (deps.logTarget !== null) {
      const closed = deps.logTarget.close();
      if (!closed.ok) {
        append({ severity: 'warning', errorKind: 'file_io_error', message: closed.error.message, func: 'shutdown' }, 0);
      }
    }

    let failure: UnrecoverableStateError | null = null;
    if (state === 'fault') {
      const message = 'System shutdown with unresolved faults';
      append({ severity: 'critical', errorKind: 'invalid_state', message: message, func: 'shutdown' }, 0);
      failure = new UnrecoverableStateError(message, 'not FAULT', state);
    }

    enterState('shutdown');
    lastShutdown = {
      flushedEntries: flushedEntries,
      unresolvedFaults: history.unresolvedCount(),
      evictedEntries: store.evictedCount(),
      droppedFaults: history.droppedCount(),
      alreadyShutdown: false
    };

    return failure === null ? ok(lastShutdown) : err(failure);
  }

  // ─────────────────────────────────────────────────────────────
  // Faults and recovery
  // ─────────────────────────────────────────────────────────────

  function injectFault(kind: InjectableFaultKind): InjectionOutcome {
    if (refuseIfShutdown('injectFault')) {
      return { accepted: false, record: null };
    }

    injector = activateFault(kind);
    const record = history.record(kind);
    append({ severity: 'warning', errorKind: 'none', message: 'Fault injection activated: ' + kind, func: 'injectFault' }, 0);

    return { accepted: true, record: record };
  }

  function tickInjector(): LogEntry | null {
    if (isTerminal(state)) return null;

    const result = advanceInjector(injector, config);
    injector = result.state;
    return result.event === null ? null : append(result.event, 0);
  }

  const recoveryContext: RecoveryContext = {
    getState: function() { return state; },
    log: function(event) { append(event, 0); },
    enterState: function(to) { enterState(to); },
    deactivateInjector: function() { injector = deactivateFault(injector); },
    recordRecovery: function() { health = recordRecovery(health); },
    resolveFaults: history.resolveAll,
    resetGauges: function() { health = resetGauges(health, deps.random, config); }
  };

  async function attemptRecovery(): Promise<RecoveryOutcome> {
    if (refuseIfShutdown('attemptRecovery')) {
      return { recovered: false };
    }
    return runRecovery(recoveryContext, config, { sleep: deps.sleep });
  }

  function assertState(expected: SystemState): Result<void, UnrecoverableStateError> {
    if (refuseIfShutdown('assertState')) {
      return err(new UnrecoverableStateError(REFUSED_MESSAGE, stateLabel(expected), state));
    }
    if (state === expected) {
      return ok(undefined);
    }

    const message = 'Expected state ' + stateLabel(expected) + ', got ' + stateLabel(state);
    append({ severity: 'critical', errorKind: 'invalid_state', message: message, func: 'assertState' }, 0);
    return err(new UnrecoverableStateError(message, stateLabel(expected), state));
  }

  // ─────────────────────────────────────────────────────────────
  // Health
  // ─────────────────────────────────────────────────────────────

  function snapshot(): HealthSnapshot {
    return {
      state: state,
      uptimeSec: health.uptimeSec,
      sinceStartSec: health.sinceStartSec,
      faultCount: health.faultCount,
      recoveryCount: health.recoveryCount,
      cpuUsagePct: health.cpuUsagePct,
      memoryUsagePct: health.memoryUsagePct,
      lastHealthCheck: health.lastHealthCheck
    };
  }

  function checkHealth(): HealthSnapshot {
    const result = runHealthCheck(health, deps.timeSource(), deps.random, config);
    health = result.state;
    for (let i = 0; i < result.events.length; i++) {
      append(result.events[i], 0);
    }
    return snapshot();
  }

  function petWatchdog(): void {
    health = feedWatchdog(health, deps.timeSource());
  }

  return {
    getState: function() { return state; },
    init: init,
    shutdown: shutdown,
    log: log,
    injectFault: injectFault,
    tickInjector: tickInjector,
    checkHealth: checkHealth,
    petWatchdog: petWatchdog,
    attemptRecovery: attemptRecovery,
    assertState: assertState,
    getHealth: snapshot,
    getLogs: store.entries,
    getFaultHistory: history.records,
    debugReport: function() {
      return buildDebugReport(state, health, store.recent(config.DEBUG_RECENT_LOGS), history.records());
    }
  };
}
