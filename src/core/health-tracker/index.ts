export {
  checkHealth,
  createHealthState,
  feedWatchdog,
  recordFault,
  recordRecovery,
  resetGauges
} from './health-tracker';
export { sampleGauge, validateHealthConfig } from './helpers';
export type { HealthCheckResult, HealthConfig, HealthState } from './types';
