export { attemptRecovery } from './recovery';
export type { RecoveryConfig, RecoveryContext, RecoveryDependencies, RecoveryOutcome } from './types';
