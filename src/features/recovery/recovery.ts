/**
 * Recovery coordinator
 *
 * Drives fault -> recovery -> running. Recovery always converges: there is
 * no partial-failure branch and no retry.
 */

import type { RecoveryConfig, RecoveryContext, RecoveryDependencies, RecoveryOutcome } from './types';

export type { RecoveryConfig, RecoveryContext, RecoveryDependencies, RecoveryOutcome };

const FUNC = 'attemptRecovery';

/**
 * Attempt recovery from the fault state
 *
 * 1. Log the attempt and stop the injector
 * 2. fault -> recovery, count the attempt
 * 3. Resolve every unresolved fault, one info entry each
 * 4. Wait RECOVERY_LATENCY_MS
 * 5. recovery -> running, reset gauges into the healthy range
 *
 * Requested outside the fault state it only logs and returns
 * `{ recovered: false }`. If the system left recovery while the latency
 * elapsed (a shutdown), nothing further is logged and the outcome is
 * `{ recovered: false }`.
 *
 * @param context - Monitor operations the attempt drives
 * @param config - Recovery latency
 * @param deps - Injected sleep
 * @returns Whether a recovery ran and how many faults it resolved
 */
export async function attemptRecovery(
  context: RecoveryContext,
  config: RecoveryConfig,
  deps: RecoveryDependencies
): Promise<RecoveryOutcome> {
  if (context.getState() !== 'fault') {
    context.log({ severity: 'info', errorKind: 'none', message: 'No faults to recover from', func: FUNC });
    return { recovered: false };
  }

  context.log({ severity: 'info', errorKind: 'none', message: 'Attempting fault recovery', func: FUNC });
  context.deactivateInjector();
  context.enterState('recovery');
  context.recordRecovery();

  const resolved = context.resolveFaults();
  for (let i = 0; i < resolved.length; i++) {
    context.log({
      severity: 'info',
      errorKind: 'none',
      message: 'Fault resolved in recovery attempt: ' + resolved[i].description,
      func: FUNC
    });
  }

  await deps.sleep(config.RECOVERY_LATENCY_MS);

  // A shutdown during the wait already ended the session
  if (context.getState() !== 'recovery') {
    return { recovered: false };
  }

  context.enterState('running');
  context.log({ severity: 'info', errorKind: 'none', message: 'Fault recovery successful', func: FUNC });
  context.resetGauges();

  return { recovered: true, resolvedCount: resolved.length };
}
