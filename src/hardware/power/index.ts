export { readSupplyVoltage } from './power';
export type { PowerConfig, PowerReadResult } from './types';
