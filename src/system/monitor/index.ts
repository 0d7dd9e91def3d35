export { SESSION_END_MARKER, createMonitor } from './monitor';
export type {
  HealthSnapshot,
  InjectionOutcome,
  Monitor,
  MonitorConfig,
  MonitorDependencies,
  ShutdownReport
} from './types';
