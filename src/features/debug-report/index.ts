export { buildDebugReport, formatDebugReport } from './debug-report';
export type { DebugReport } from './types';
