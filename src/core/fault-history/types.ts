/**
 * Fault history type definitions
 */

import type { ErrorKind, InjectableFaultKind } from '$types/common';

/**
 * Record of one injected fault
 */
export interface FaultRecord {
  /** Seconds since epoch */
  timestamp: number;
  faultKind: InjectableFaultKind;
  /** Error kind correlated with the fault kind */
  errorKind: ErrorKind;
  /** Set by recovery; never reverts to false */
  resolved: boolean;
  description: string;
}

/**
 * Fault history configuration
 */
export interface FaultHistoryConfig {
  /** Maximum number of records kept */
  capacity: number;
  /** Maximum description length in characters */
  descriptionMaxLength: number;
}

/**
 * Bounded, append-only fault history with drop-on-full
 */
export interface FaultHistory {
  /** Append a record; returns null (and stores nothing) when full */
  record(faultKind: InjectableFaultKind): FaultRecord | null;
  /** Mark every unresolved record resolved; returns copies of the records it changed */
  resolveAll(): FaultRecord[];
  /** Copies of all records, oldest first */
  records(): FaultRecord[];
  unresolvedCount(): number;
  size(): number;
  /** Number of records dropped because the history was full */
  droppedCount(): number;
}
