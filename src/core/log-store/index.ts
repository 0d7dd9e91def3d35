export { createLogStore } from './log-store';
export { createRingBuffer, formatEntryLine, formatOperatorMessage } from './helpers';
export type { LogEntry, LogEvent, LogOrigin, LogStore, LogStoreConfig, RingBuffer } from './types';
export type { LogStoreDependencies } from './log-store';
