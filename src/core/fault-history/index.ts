export { createFaultHistory, describeFault, validateFaultHistoryConfig } from './fault-history';
export type { FaultHistory, FaultHistoryConfig, FaultRecord } from './types';
