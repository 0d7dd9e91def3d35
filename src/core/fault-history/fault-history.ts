/**
 * Fault history
 *
 * Append-only within capacity: once full, new records are dropped rather
 * than evicting old ones, so the earliest faults of a session are never lost.
 * Only the recovery path flips `resolved`, and only from false to true.
 */

import { FAULT_ERROR_KIND } from '$types/common';
import { ConfigValidationError } from '$types/errors';
import { isInteger } from '@utils/number';
import { truncate } from '@utils/text';

import type { InjectableFaultKind, TimeSource } from '$types/common';
import type { FaultHistory, FaultHistoryConfig, FaultRecord } from './types';

export type { FaultHistory, FaultHistoryConfig, FaultRecord } from './types';

/**
 * Validate fault history configuration
 * @throws {ConfigValidationError} If configuration is invalid
 */
export function validateFaultHistoryConfig(config: FaultHistoryConfig): void {
  if (!isInteger(config.capacity) || config.capacity < 1) {
    throw new ConfigValidationError('FAULT_HISTORY_CAPACITY must be a positive integer, got ' + config.capacity, ['FAULT_HISTORY_CAPACITY']);
  }
  if (!isInteger(config.descriptionMaxLength) || config.descriptionMaxLength < 1) {
    throw new ConfigValidationError('FAULT_DESCRIPTION_MAX_LENGTH must be a positive integer, got ' + config.descriptionMaxLength, ['FAULT_DESCRIPTION_MAX_LENGTH']);
  }
}

/**
 * Describe an injected fault
 * @param faultKind - Injected kind
 * @returns Human-readable description
 */
export function describeFault(faultKind: InjectableFaultKind): string {
  return 'Injected fault: ' + faultKind;
}

/**
 * Create a fault history
 *
 * @param config - Capacity and field limits
 * @param timeSource - Clock for record timestamps
 * @returns Fault history instance
 * @throws {ConfigValidationError} If configuration is invalid
 */
export function createFaultHistory(config: FaultHistoryConfig, timeSource: TimeSource): FaultHistory {
  validateFaultHistoryConfig(config);

  const items: FaultRecord[] = [];
  let dropped = 0;

  function record(faultKind: InjectableFaultKind): FaultRecord | null {
    if (items.length >= config.capacity) {
      dropped++;
      return null;
    }

    const entry: FaultRecord = {
      timestamp: timeSource(),
      faultKind: faultKind,
      errorKind: FAULT_ERROR_KIND[faultKind],
      resolved: false,
      description: truncate(describeFault(faultKind), config.descriptionMaxLength)
    };
    items.push(entry);
    return { ...entry };
  }

  function resolveAll(): FaultRecord[] {
    const changed: FaultRecord[] = [];
    for (let i = 0; i < items.length; i++) {
      if (!items[i].resolved) {
        items[i].resolved = true;
        changed.push({ ...items[i] });
      }
    }
    return changed;
  }

  function unresolvedCount(): number {
    let count = 0;
    for (let i = 0; i < items.length; i++) {
      if (!items[i].resolved) count++;
    }
    return count;
  }

  return {
    record: record,
    resolveAll: resolveAll,
    records: function() { return items.map(function(r) { return { ...r }; }); },
    unresolvedCount: unresolvedCount,
    size: function() { return items.length; },
    droppedCount: function() { return dropped; }
  };
}
