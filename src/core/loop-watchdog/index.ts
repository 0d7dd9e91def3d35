export {
  createWatchdogState,
  evaluateWatchdog,
  petWatchdog
} from './loop-watchdog';
export type { WatchdogEvaluation, WatchdogState } from './types';
