export { createSensorState, readSensor } from './sensors';
export type { SensorConfig, SensorReadResult, SensorState } from './types';
